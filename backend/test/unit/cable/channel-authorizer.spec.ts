import { describe, it, expect } from 'vitest';

import type { Identity } from '../../../src/modules/auth/auth.types';
import { ChannelAuthorizer } from '../../../src/modules/cable/channel-authorizer';
import { InMemoryUserStore, makeUser } from '../../helpers/in-memory-stores';

function setup() {
  const users = new InMemoryUserStore();
  users.add(makeUser({ id: 'alice', organizationId: 'org-1' }));
  users.add(makeUser({ id: 'bob', organizationId: 'org-1' }));
  users.add(makeUser({ id: 'mallory', organizationId: 'org-2', role: 'owner' }));

  const authorizer = new ChannelAuthorizer({ users });
  const alice: Identity = { userId: 'alice', organizationId: 'org-1', role: 'coach' };
  const bob: Identity = { userId: 'bob', organizationId: 'org-1', role: 'coach' };
  const mallory: Identity = { userId: 'mallory', organizationId: 'org-2', role: 'owner' };

  return { users, authorizer, alice, bob, mallory };
}

describe('ChannelAuthorizer', () => {
  describe('authorizeSubscription', () => {
    it('binds team subscriptions to the caller organization', async () => {
      const { authorizer, alice, mallory } = setup();

      expect(await authorizer.authorizeSubscription(alice, { channel: 'team' })).toEqual({
        ok: true,
        streamKey: 'team:org-1',
      });
      expect(await authorizer.authorizeSubscription(mallory, { channel: 'team' })).toEqual({
        ok: true,
        streamKey: 'team:org-2',
      });
    });

    it('rejects a subscription without an organization', async () => {
      const { authorizer } = setup();

      const result = await authorizer.authorizeSubscription(
        { userId: 'alice', organizationId: null },
        { channel: 'team' },
      );

      expect(result).toMatchObject({
        ok: false,
        kind: 'SUBSCRIPTION_REJECTED',
        reason: 'no_organization',
      });
    });

    it('converges both participants on one direct stream', async () => {
      const { authorizer, alice, bob } = setup();

      const fromAlice = await authorizer.authorizeSubscription(alice, {
        channel: 'direct',
        recipientId: 'bob',
      });
      const fromBob = await authorizer.authorizeSubscription(bob, {
        channel: 'direct',
        recipientId: 'alice',
      });

      expect(fromAlice).toEqual({ ok: true, streamKey: 'dm:org-1:alice:bob' });
      expect(fromBob).toEqual(fromAlice);
    });

    it('rejects a recipient in another organization, whatever the role', async () => {
      const { authorizer, alice, mallory } = setup();

      expect(
        await authorizer.authorizeSubscription(mallory, { channel: 'direct', recipientId: 'alice' }),
      ).toMatchObject({ ok: false, reason: 'recipient_not_found' });
      expect(
        await authorizer.authorizeSubscription(alice, { channel: 'direct', recipientId: 'mallory' }),
      ).toMatchObject({ ok: false, reason: 'recipient_not_found' });
    });

    it('rejects self-targeted and unknown recipients', async () => {
      const { authorizer, alice } = setup();

      expect(
        await authorizer.authorizeSubscription(alice, { channel: 'direct', recipientId: 'alice' }),
      ).toMatchObject({ ok: false, reason: 'self_target' });
      expect(
        await authorizer.authorizeSubscription(alice, { channel: 'direct', recipientId: 'ghost' }),
      ).toMatchObject({ ok: false, reason: 'recipient_not_found' });
      expect(
        await authorizer.authorizeSubscription(alice, { channel: 'direct', recipientId: '' }),
      ).toMatchObject({ ok: false, reason: 'recipient_missing' });
    });
  });

  describe('authorizeSend', () => {
    it('accepts trimmed team content', async () => {
      const { authorizer, alice } = setup();

      expect(
        await authorizer.authorizeSend(alice, { channel: 'team' }, { content: '  gg wp  ' }),
      ).toEqual({ ok: true, streamKey: 'team:org-1', content: 'gg wp', recipientId: null });
    });

    it('rejects blank and oversized content as CONTENT_REJECTED', async () => {
      const { authorizer, alice } = setup();

      expect(
        await authorizer.authorizeSend(alice, { channel: 'team' }, { content: '   ' }),
      ).toEqual({
        ok: false,
        kind: 'CONTENT_REJECTED',
        reason: 'blank',
        message: 'Message content cannot be blank',
      });
      expect(
        await authorizer.authorizeSend(alice, { channel: 'team' }, { content: 'x'.repeat(2001) }),
      ).toMatchObject({ ok: false, kind: 'CONTENT_REJECTED', reason: 'too_long' });
    });

    it('re-resolves the direct recipient on every send', async () => {
      const { authorizer, users, alice } = setup();
      const identifier = { channel: 'direct' as const, recipientId: 'bob' };

      expect(await authorizer.authorizeSend(alice, identifier, { content: 'hi' })).toEqual({
        ok: true,
        streamKey: 'dm:org-1:alice:bob',
        content: 'hi',
        recipientId: 'bob',
      });

      users.update('bob', { organizationId: 'org-2' });

      expect(await authorizer.authorizeSend(alice, identifier, { content: 'still there?' })).toEqual(
        {
          ok: false,
          kind: 'CONTENT_REJECTED',
          reason: 'recipient_not_found',
          message: 'Recipient not found in your organization',
        },
      );
    });

    it('rejects a payload recipient that differs from the subscription', async () => {
      const { authorizer, alice } = setup();

      expect(
        await authorizer.authorizeSend(
          alice,
          { channel: 'direct', recipientId: 'bob' },
          { content: 'hi', recipientId: 'mallory' },
        ),
      ).toMatchObject({ ok: false, reason: 'recipient_mismatch' });
    });
  });
});
