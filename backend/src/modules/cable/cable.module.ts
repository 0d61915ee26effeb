/**
 * backend/src/modules/cable/cable.module.ts
 *
 * WHY:
 * - Encapsulates cable wiring: authorizer, broker and the ws server.
 * - DI passes stores and the authenticator in; the module owns nothing global.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ConnectionAuthenticator } from '../auth/connection-authenticator';
import type { MessageStore } from '../messages/message.store';
import type { UserStore } from '../users/user.store';
import { CableServer } from './cable.server';
import { ChannelAuthorizer } from './channel-authorizer';
import { StreamBroker } from './stream-broker';

export type CableModule = ReturnType<typeof createCableModule>;

export function createCableModule(deps: {
  path: string;
  maxPayloadBytes: number;
  authenticator: ConnectionAuthenticator;
  users: UserStore;
  messages: MessageStore;
  logger: Logger;
}) {
  const channelAuthorizer = new ChannelAuthorizer({ users: deps.users });
  const broker = new StreamBroker(deps.logger);

  const server = new CableServer({
    path: deps.path,
    maxPayloadBytes: deps.maxPayloadBytes,
    authenticator: deps.authenticator,
    authorizer: channelAuthorizer,
    messages: deps.messages,
    broker,
    logger: deps.logger,
  });

  return {
    channelAuthorizer,
    broker,
    server,
  };
}
