/**
 * backend/src/modules/cable/policies/message-content.policy.ts
 *
 * RULES:
 * - Content is trimmed before any check and stored trimmed.
 * - Length is counted in Unicode code points, inclusive maximum.
 * - Pure function. No IO.
 */

export const MAX_MESSAGE_LENGTH = 2000;

export type ContentCheck =
  | { ok: true; content: string }
  | { ok: false; reason: 'blank' | 'too_long'; message: string };

export function checkMessageContent(raw: string): ContentCheck {
  const content = raw.trim();

  if (!content) {
    return { ok: false, reason: 'blank', message: 'Message content cannot be blank' };
  }

  if (Array.from(content).length > MAX_MESSAGE_LENGTH) {
    return {
      ok: false,
      reason: 'too_long',
      message: `Message exceeds ${MAX_MESSAGE_LENGTH} characters`,
    };
  }

  return { ok: true, content };
}
