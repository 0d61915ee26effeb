import { describe, it, expect } from 'vitest';

import {
  checkMessageContent,
  MAX_MESSAGE_LENGTH,
} from '../../../src/modules/cable/policies/message-content.policy';

describe('checkMessageContent', () => {
  it('accepts exactly the maximum length', () => {
    const result = checkMessageContent('a'.repeat(MAX_MESSAGE_LENGTH));

    expect(result.ok).toBe(true);
  });

  it('rejects one character over the maximum', () => {
    expect(checkMessageContent('a'.repeat(MAX_MESSAGE_LENGTH + 1))).toEqual({
      ok: false,
      reason: 'too_long',
      message: 'Message exceeds 2000 characters',
    });
  });

  it('rejects all-whitespace content', () => {
    expect(checkMessageContent(' \n\t  ')).toEqual({
      ok: false,
      reason: 'blank',
      message: 'Message content cannot be blank',
    });
    expect(checkMessageContent('').ok).toBe(false);
  });

  it('trims before measuring and returns the trimmed content', () => {
    const padded = `  ${'b'.repeat(MAX_MESSAGE_LENGTH)}  `;

    expect(checkMessageContent(padded)).toEqual({ ok: true, content: 'b'.repeat(2000) });
  });

  it('counts astral characters once', () => {
    const emoji = '\u{1F3AE}';

    expect(checkMessageContent(emoji.repeat(MAX_MESSAGE_LENGTH)).ok).toBe(true);
    expect(checkMessageContent(emoji.repeat(MAX_MESSAGE_LENGTH + 1)).ok).toBe(false);
  });
});
