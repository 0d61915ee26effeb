/**
 * backend/src/modules/cable/channel-authorizer.ts
 *
 * WHY:
 * - Decides which stream a subscription binds to, and whether a send is allowed.
 * - Team: the caller's own organization stream only. No parameter can select
 *   another organization.
 * - Direct: target must exist, be in the caller's organization and not be the caller.
 *
 * RULES:
 * - Stateless. The only IO is the user lookup.
 * - A rejection never falls back to a default stream.
 * - Direct sends re-resolve the target on EVERY send. A target that left the
 *   organization after subscribing cannot receive further messages.
 * - A recipient in another organization is reported exactly like a missing one.
 */

import type { Identity } from '../auth/auth.types';
import type { UserStore } from '../users/user.store';
import type {
  ChannelIdentifier,
  SendAuthorization,
  SendPayload,
  SubscriptionAuthorization,
  SubscriptionRejectReason,
} from './cable.types';
import { checkMessageContent } from './policies/message-content.policy';
import { directStreamKey, teamStreamKey } from './policies/stream-key.policy';

type SubscriptionIdentity = Pick<Identity, 'userId'> & { organizationId: string | null };

function rejectSubscription(
  reason: SubscriptionRejectReason,
  message: string,
): SubscriptionAuthorization {
  return { ok: false, kind: 'SUBSCRIPTION_REJECTED', reason, message };
}

export class ChannelAuthorizer {
  constructor(private readonly deps: { users: UserStore }) {}

  async authorizeSubscription(
    identity: SubscriptionIdentity,
    identifier: ChannelIdentifier,
  ): Promise<SubscriptionAuthorization> {
    const organizationId = identity.organizationId;
    if (!organizationId) {
      return rejectSubscription('no_organization', 'No organization for this connection');
    }

    switch (identifier.channel) {
      case 'team':
        return { ok: true, streamKey: teamStreamKey(organizationId) };

      case 'direct': {
        const target = await this.resolveDirectTarget(
          { userId: identity.userId, organizationId },
          identifier.recipientId,
        );
        if (!target.ok) return target;
        return {
          ok: true,
          streamKey: directStreamKey(organizationId, identity.userId, target.recipientId),
        };
      }
    }
  }

  async authorizeSend(
    identity: Identity,
    identifier: ChannelIdentifier,
    payload: SendPayload,
  ): Promise<SendAuthorization> {
    const checked = checkMessageContent(payload.content);
    if (!checked.ok) {
      return { ok: false, kind: 'CONTENT_REJECTED', reason: checked.reason, message: checked.message };
    }

    switch (identifier.channel) {
      case 'team':
        return {
          ok: true,
          streamKey: teamStreamKey(identity.organizationId),
          content: checked.content,
          recipientId: null,
        };

      case 'direct': {
        if (payload.recipientId !== undefined && payload.recipientId !== identifier.recipientId) {
          return {
            ok: false,
            kind: 'CONTENT_REJECTED',
            reason: 'recipient_mismatch',
            message: 'Recipient does not match this conversation',
          };
        }

        const target = await this.resolveDirectTarget(identity, identifier.recipientId);
        if (!target.ok) {
          return {
            ok: false,
            kind: 'CONTENT_REJECTED',
            reason: 'recipient_not_found',
            message: target.message,
          };
        }

        return {
          ok: true,
          streamKey: directStreamKey(identity.organizationId, identity.userId, target.recipientId),
          content: checked.content,
          recipientId: target.recipientId,
        };
      }
    }
  }

  private async resolveDirectTarget(
    identity: { userId: string; organizationId: string },
    recipientId: string,
  ): Promise<{ ok: true; recipientId: string } | Extract<SubscriptionAuthorization, { ok: false }>> {
    if (!recipientId) {
      return {
        ok: false,
        kind: 'SUBSCRIPTION_REJECTED',
        reason: 'recipient_missing',
        message: 'No recipient provided',
      };
    }

    const recipient = await this.deps.users.findById(recipientId);
    if (!recipient || recipient.organizationId !== identity.organizationId) {
      return {
        ok: false,
        kind: 'SUBSCRIPTION_REJECTED',
        reason: 'recipient_not_found',
        message: 'Recipient not found in your organization',
      };
    }

    if (recipient.id === identity.userId) {
      return {
        ok: false,
        kind: 'SUBSCRIPTION_REJECTED',
        reason: 'self_target',
        message: 'Cannot message yourself',
      };
    }

    return { ok: true, recipientId: recipient.id };
  }
}
