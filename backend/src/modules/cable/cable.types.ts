/**
 * backend/src/modules/cable/cable.types.ts
 *
 * WHY:
 * - Channels are a tagged variant over subscription parameters, not classes.
 *   Each variant has its own authorization rule in ChannelAuthorizer.
 * - Authorization outcomes are typed result values carrying a machine-readable
 *   reason, so the connection can answer without exceptions.
 */

import type { UserSummary } from '../auth/auth.types';
import type { Message } from '../messages/message.types';

export type TeamChannelIdentifier = { channel: 'team' };
export type DirectChannelIdentifier = { channel: 'direct'; recipientId: string };
export type ChannelIdentifier = TeamChannelIdentifier | DirectChannelIdentifier;

export type StreamKey = string;

export type SubscriptionRejectReason =
  | 'no_organization'
  | 'recipient_missing'
  | 'recipient_not_found'
  | 'self_target';

export type ContentRejectReason =
  | 'blank'
  | 'too_long'
  | 'recipient_not_found'
  | 'recipient_mismatch'
  | 'persist_failed';

export type SubscriptionAuthorization =
  | { ok: true; streamKey: StreamKey }
  | {
      ok: false;
      kind: 'SUBSCRIPTION_REJECTED';
      reason: SubscriptionRejectReason;
      message: string;
    };

export type SendPayload = {
  content: string;
  recipientId?: string;
};

export type AcceptedSend = {
  streamKey: StreamKey;
  content: string;
  recipientId: string | null;
};

export type SendAuthorization =
  | ({ ok: true } & AcceptedSend)
  | {
      ok: false;
      kind: 'CONTENT_REJECTED';
      reason: ContentRejectReason;
      message: string;
    };

export type BroadcastMessage = {
  id: string;
  content: string;
  createdAt: string;
  recipientId: string | null;
  sender: { id: string; fullName: string | null; role: string };
};

export function toBroadcastMessage(message: Message, sender: UserSummary): BroadcastMessage {
  return {
    id: message.id,
    content: message.content,
    createdAt: message.createdAt.toISOString(),
    recipientId: message.recipientId,
    sender: { id: message.senderId, fullName: sender.fullName, role: sender.role },
  };
}

/** Frames the server writes to a socket. */
export type ServerFrame =
  | { type: 'welcome' }
  | { type: 'disconnect'; reason: string; reconnect: boolean }
  | { type: 'confirm_subscription'; identifier: ChannelIdentifier }
  | { type: 'reject_subscription'; identifier: ChannelIdentifier; reason: SubscriptionRejectReason }
  | { type: 'error'; error: string }
  | {
      identifier: ChannelIdentifier;
      message: { type: 'new_message'; message: BroadcastMessage } | { error: string };
    };
