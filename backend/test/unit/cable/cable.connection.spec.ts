import { describe, it, expect, vi } from 'vitest';

import type { Identity } from '../../../src/modules/auth/auth.types';
import { CableConnection, type CableTransport } from '../../../src/modules/cable/cable.connection';
import type { ServerFrame } from '../../../src/modules/cable/cable.types';
import { ChannelAuthorizer } from '../../../src/modules/cable/channel-authorizer';
import { StreamBroker } from '../../../src/modules/cable/stream-broker';
import { logger } from '../../../src/shared/logger/logger';
import { withConnectionContext } from '../../../src/shared/logger/with-context';
import { TenantContext } from '../../../src/shared/tenancy/tenant-context';
import {
  InMemoryMessageStore,
  InMemoryUserStore,
  makeUser,
} from '../../helpers/in-memory-stores';

class FakeTransport implements CableTransport {
  readonly frames: ServerFrame[] = [];
  closedWith: { code: number; reason: string } | null = null;

  send(frame: ServerFrame): void {
    this.frames.push(frame);
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
  }

  last(): ServerFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}

function setup() {
  const users = new InMemoryUserStore();
  users.add(makeUser({ id: 'alice', organizationId: 'org-1' }));
  users.add(makeUser({ id: 'bob', organizationId: 'org-1' }));
  users.add(makeUser({ id: 'carol', organizationId: 'org-2' }));

  const messages = new InMemoryMessageStore();
  const broker = new StreamBroker(logger);
  const authorizer = new ChannelAuthorizer({ users });

  const open = (identity: Identity) => {
    const transport = new FakeTransport();
    const tenant = new TenantContext(identity);
    const connection = new CableConnection({
      id: `conn-${identity.userId}`,
      identity,
      sender: { id: identity.userId, fullName: 'Test Player', role: identity.role },
      tenant,
      transport,
      authorizer,
      messages,
      broker,
      logger: withConnectionContext({ connectionId: `conn-${identity.userId}`, ...identity }),
    });
    return { connection, transport, tenant };
  };

  return { users, messages, broker, open };
}

const alice: Identity = { userId: 'alice', organizationId: 'org-1', role: 'coach' };
const bob: Identity = { userId: 'bob', organizationId: 'org-1', role: 'analyst' };
const carol: Identity = { userId: 'carol', organizationId: 'org-2', role: 'owner' };

describe('CableConnection', () => {
  it('sends welcome', () => {
    const { open } = setup();
    const { connection, transport } = open(alice);

    connection.welcome();

    expect(transport.frames).toEqual([{ type: 'welcome' }]);
  });

  it('answers malformed JSON and invalid frames without closing', async () => {
    const { open } = setup();
    const { connection, transport } = open(alice);

    await connection.receive('{not json');
    await connection.receive(JSON.stringify({ command: 'dance', identifier: { channel: 'team' } }));

    expect(transport.frames).toEqual([
      { type: 'error', error: 'Malformed frame' },
      { type: 'error', error: 'Invalid frame' },
    ]);
    expect(transport.closedWith).toBeNull();
  });

  it('confirms a team subscription and broadcasts persisted messages to the org only', async () => {
    const { open, messages } = setup();
    const a = open(alice);
    const b = open(bob);
    const c = open(carol);

    await a.connection.subscribe({ channel: 'team' });
    await b.connection.subscribe({ channel: 'team' });
    await c.connection.subscribe({ channel: 'team' });

    expect(a.transport.last()).toEqual({
      type: 'confirm_subscription',
      identifier: { channel: 'team' },
    });

    await a.connection.receive(
      JSON.stringify({
        command: 'message',
        identifier: { channel: 'team' },
        data: { content: '  scrim at 8  ' },
      }),
    );

    expect(messages.messages).toHaveLength(1);
    const stored = messages.messages[0];
    expect(stored).toMatchObject({
      content: 'scrim at 8',
      senderId: 'alice',
      recipientId: null,
      organizationId: 'org-1',
    });

    const expected = {
      identifier: { channel: 'team' },
      message: {
        type: 'new_message',
        message: {
          id: stored?.id,
          content: 'scrim at 8',
          createdAt: stored?.createdAt.toISOString(),
          recipientId: null,
          sender: { id: 'alice', fullName: 'Test Player', role: 'coach' },
        },
      },
    };
    expect(a.transport.last()).toEqual(expected);
    expect(b.transport.last()).toEqual(expected);
    expect(c.transport.last()).toEqual({
      type: 'confirm_subscription',
      identifier: { channel: 'team' },
    });
  });

  it('delivers direct messages to both participants with their own identifiers', async () => {
    const { open } = setup();
    const a = open(alice);
    const b = open(bob);

    await a.connection.subscribe({ channel: 'direct', recipientId: 'bob' });
    await b.connection.subscribe({ channel: 'direct', recipientId: 'alice' });
    expect(a.connection.streamKeyFor({ channel: 'direct', recipientId: 'bob' })).toBe(
      b.connection.streamKeyFor({ channel: 'direct', recipientId: 'alice' }),
    );

    await a.connection.speak({ channel: 'direct', recipientId: 'bob' }, { content: 'hey' });

    expect(b.transport.last()).toMatchObject({
      identifier: { channel: 'direct', recipientId: 'alice' },
      message: { type: 'new_message', message: { content: 'hey', recipientId: 'bob' } },
    });
    expect(a.transport.last()).toMatchObject({
      identifier: { channel: 'direct', recipientId: 'bob' },
      message: { type: 'new_message', message: { sender: { id: 'alice', role: 'coach' } } },
    });
  });

  it('rejects a cross-organization direct subscription without binding anything', async () => {
    const { open } = setup();
    const a = open(alice);

    await a.connection.subscribe({ channel: 'direct', recipientId: 'carol' });

    expect(a.transport.last()).toEqual({
      type: 'reject_subscription',
      identifier: { channel: 'direct', recipientId: 'carol' },
      reason: 'recipient_not_found',
    });
    expect(a.connection.subscriptionCount).toBe(0);
  });

  it('refuses to send on a channel it is not subscribed to', async () => {
    const { open, messages } = setup();
    const a = open(alice);

    await a.connection.speak({ channel: 'team' }, { content: 'hello?' });

    expect(a.transport.last()).toEqual({
      identifier: { channel: 'team' },
      message: { error: 'Not subscribed to this channel' },
    });
    expect(messages.messages).toHaveLength(0);
  });

  it('answers rejected content with the rejection message', async () => {
    const { open } = setup();
    const a = open(alice);
    await a.connection.subscribe({ channel: 'team' });

    await a.connection.speak({ channel: 'team' }, { content: '   ' });

    expect(a.transport.last()).toEqual({
      identifier: { channel: 'team' },
      message: { error: 'Message content cannot be blank' },
    });
  });

  it('reports a persistence failure and keeps the connection usable', async () => {
    const { open, messages } = setup();
    const a = open(alice);
    await a.connection.subscribe({ channel: 'team' });

    messages.failNext();
    await a.connection.speak({ channel: 'team' }, { content: 'first' });

    expect(a.transport.last()).toEqual({
      identifier: { channel: 'team' },
      message: { error: 'Failed to send message' },
    });

    await a.connection.speak({ channel: 'team' }, { content: 'second' });
    expect(messages.messages.map((m) => m.content)).toEqual(['second']);
  });

  it('stops delivery after unsubscribe', async () => {
    const { open } = setup();
    const a = open(alice);
    const b = open(bob);
    await a.connection.subscribe({ channel: 'team' });
    await b.connection.subscribe({ channel: 'team' });

    b.connection.unsubscribe({ channel: 'team' });
    const before = b.transport.frames.length;
    await a.connection.speak({ channel: 'team' }, { content: 'anyone?' });

    expect(b.transport.frames).toHaveLength(before);
    expect(b.connection.subscriptionCount).toBe(0);
  });

  it('does not double-bind a repeated subscribe', async () => {
    const { open, broker } = setup();
    const a = open(alice);

    await a.connection.subscribe({ channel: 'team' });
    await a.connection.subscribe({ channel: 'team' });

    expect(broker.listenerCount('team:org-1')).toBe(1);
    expect(a.transport.frames).toHaveLength(2);
  });

  it('releases bindings and closes the tenant context on disconnect', async () => {
    const { open, broker } = setup();
    const a = open(alice);
    await a.connection.subscribe({ channel: 'team' });
    await a.connection.subscribe({ channel: 'direct', recipientId: 'bob' });

    a.connection.disconnect();
    a.connection.disconnect();

    expect(broker.listenerCount('team:org-1')).toBe(0);
    expect(broker.listenerCount('dm:org-1:alice:bob')).toBe(0);
    expect(a.tenant.isOpen).toBe(false);
    expect(a.connection.isClosed).toBe(true);
  });

  it('closes the transport on server-initiated close', () => {
    const { open } = setup();
    const a = open(alice);

    a.connection.close(1001, 'Server shutting down');

    expect(a.transport.closedWith).toEqual({ code: 1001, reason: 'Server shutting down' });
    expect(a.tenant.isOpen).toBe(false);
  });

  it('ignores frames after disconnect', async () => {
    const { open } = setup();
    const a = open(alice);
    const send = vi.spyOn(a.transport, 'send');

    a.connection.disconnect();
    await a.connection.receive(JSON.stringify({ command: 'subscribe', identifier: { channel: 'team' } }));

    expect(send).not.toHaveBeenCalled();
  });
});

describe('StreamBroker', () => {
  it('keeps delivering when one listener throws', () => {
    const broker = new StreamBroker(logger);
    const received: string[] = [];

    broker.subscribe('team:org-1', () => {
      throw new Error('socket gone');
    });
    broker.subscribe('team:org-1', (m) => received.push(m.content));

    const delivered = broker.publish('team:org-1', {
      id: 'm1',
      content: 'hello',
      createdAt: '2026-01-01T00:00:00.000Z',
      recipientId: null,
      sender: { id: 'alice', fullName: null, role: 'coach' },
    });

    expect(delivered).toBe(1);
    expect(received).toEqual(['hello']);
  });

  it('tolerates releasing twice', () => {
    const broker = new StreamBroker(logger);
    const release = broker.subscribe('team:org-1', () => undefined);

    release();
    release();

    expect(broker.listenerCount('team:org-1')).toBe(0);
  });
});
