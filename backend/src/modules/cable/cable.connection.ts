/**
 * backend/src/modules/cable/cable.connection.ts
 *
 * WHY:
 * - One authenticated cable connection: its frozen Identity, its TenantContext
 *   and its stream bindings.
 * - Transport-agnostic. cable.server.ts adapts a ws socket; tests use a fake.
 *
 * LIFECYCLE:
 * - Created only after ConnectionAuthenticator accepted the token.
 * - subscribe / unsubscribe / message frames run against the same Identity.
 * - disconnect() releases every binding and closes the TenantContext. Idempotent.
 *
 * RULES:
 * - Sender and organization of a message come from the Identity, never the frame.
 * - A rejected subscription leaves no binding behind.
 * - A failed send answers the client; it never closes the connection.
 */

import type { ContextLogger } from '../../shared/logger/with-context';
import type { TenantContext } from '../../shared/tenancy/tenant-context';
import type { Identity, UserSummary } from '../auth/auth.types';
import type { MessageStore } from '../messages/message.store';
import type { Message } from '../messages/message.types';
import { clientFrameSchema, type ClientFrame } from './cable.schemas';
import {
  toBroadcastMessage,
  type ChannelIdentifier,
  type SendPayload,
  type ServerFrame,
  type StreamKey,
} from './cable.types';
import type { ChannelAuthorizer } from './channel-authorizer';
import type { StreamBroker } from './stream-broker';

export const SEND_FAILED_ERROR = 'Failed to send message';

export interface CableTransport {
  send(frame: ServerFrame): void;
  close(code: number, reason: string): void;
}

type Binding = {
  identifier: ChannelIdentifier;
  streamKey: StreamKey;
  release: () => void;
};

export function identifierKey(identifier: ChannelIdentifier): string {
  return identifier.channel === 'team' ? 'team' : `direct:${identifier.recipientId}`;
}

export type CableConnectionDeps = {
  id: string;
  identity: Identity;
  /** Sender details stamped on every broadcast from this connection. */
  sender: UserSummary;
  tenant: TenantContext;
  transport: CableTransport;
  authorizer: ChannelAuthorizer;
  messages: MessageStore;
  broker: StreamBroker;
  logger: ContextLogger;
};

export class CableConnection {
  readonly id: string;
  readonly identity: Identity;

  private readonly bindings = new Map<string, Binding>();
  private closed = false;

  constructor(private readonly deps: CableConnectionDeps) {
    this.id = deps.id;
    this.identity = deps.identity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriptionCount(): number {
    return this.bindings.size;
  }

  streamKeyFor(identifier: ChannelIdentifier): StreamKey | null {
    return this.bindings.get(identifierKey(identifier))?.streamKey ?? null;
  }

  welcome(): void {
    this.send({ type: 'welcome' });
  }

  /** Entry point for raw socket text. */
  async receive(raw: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.send({ type: 'error', error: 'Malformed frame' });
      return;
    }

    const parsed = clientFrameSchema.safeParse(json);
    if (!parsed.success) {
      this.send({ type: 'error', error: 'Invalid frame' });
      return;
    }

    await this.handle(parsed.data);
  }

  async handle(frame: ClientFrame): Promise<void> {
    if (this.closed) return;

    switch (frame.command) {
      case 'subscribe':
        return this.subscribe(frame.identifier);
      case 'unsubscribe':
        return this.unsubscribe(frame.identifier);
      case 'message':
        return this.speak(frame.identifier, frame.data);
    }
  }

  async subscribe(identifier: ChannelIdentifier): Promise<void> {
    const key = identifierKey(identifier);
    if (this.bindings.has(key)) {
      this.send({ type: 'confirm_subscription', identifier });
      return;
    }

    const result = await this.deps.authorizer.authorizeSubscription(this.identity, identifier);
    if (!result.ok) {
      this.deps.logger.warn('cable.subscription.rejected', {
        channel: identifier.channel,
        reason: result.reason,
      });
      this.send({ type: 'reject_subscription', identifier, reason: result.reason });
      return;
    }

    // Disconnected while the lookup was in flight.
    if (this.closed || this.bindings.has(key)) return;

    const release = this.deps.broker.subscribe(result.streamKey, (message) => {
      this.send({ identifier, message: { type: 'new_message', message } });
    });
    this.bindings.set(key, { identifier, streamKey: result.streamKey, release });

    this.deps.logger.info('cable.subscription.confirmed', {
      channel: identifier.channel,
      streamKey: result.streamKey,
    });
    this.send({ type: 'confirm_subscription', identifier });
  }

  unsubscribe(identifier: ChannelIdentifier): void {
    const key = identifierKey(identifier);
    const binding = this.bindings.get(key);
    if (!binding) return;

    binding.release();
    this.bindings.delete(key);
    this.deps.logger.info('cable.subscription.released', { channel: identifier.channel });
  }

  async speak(identifier: ChannelIdentifier, payload: SendPayload): Promise<void> {
    const binding = this.bindings.get(identifierKey(identifier));
    if (!binding) {
      this.send({ identifier, message: { error: 'Not subscribed to this channel' } });
      return;
    }

    const decision = await this.deps.authorizer.authorizeSend(this.identity, identifier, payload);
    if (!decision.ok) {
      this.deps.logger.info('cable.message.rejected', {
        channel: identifier.channel,
        reason: decision.reason,
      });
      this.send({ identifier, message: { error: decision.message } });
      return;
    }

    let created: Message;
    try {
      created = await this.deps.messages.create(this.deps.tenant, {
        content: decision.content,
        senderId: this.identity.userId,
        recipientId: decision.recipientId,
        organizationId: this.identity.organizationId,
      });
    } catch (err) {
      this.deps.logger.error('cable.message.persist_failed', { channel: identifier.channel, err });
      this.send({ identifier, message: { error: SEND_FAILED_ERROR } });
      return;
    }

    this.deps.broker.publish(decision.streamKey, toBroadcastMessage(created, this.deps.sender));
  }

  /** Releases bindings and the tenant scope. Safe to call more than once. */
  disconnect(): void {
    if (this.closed) return;
    this.closed = true;

    for (const binding of this.bindings.values()) {
      binding.release();
    }
    this.bindings.clear();
    this.deps.tenant.close();

    this.deps.logger.info('cable.connection.closed');
  }

  /** Server-initiated close (shutdown). */
  close(code: number, reason: string): void {
    this.deps.transport.close(code, reason);
    this.disconnect();
  }

  private send(frame: ServerFrame): void {
    if (this.closed) return;
    this.deps.transport.send(frame);
  }
}
