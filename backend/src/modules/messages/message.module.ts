/**
 * backend/src/modules/messages/message.module.ts
 *
 * WHY:
 * - Support module (no routes). The cable module persists messages through it.
 */

import type { DbExecutor } from '../../shared/db/db';
import { KyselyMessageStore } from './message.store';
import type { MessageStore } from './message.store';

export type MessageModule = ReturnType<typeof createMessageModule>;

export function createMessageModule(deps: { db: DbExecutor; messageStore?: MessageStore }) {
  const messageStore: MessageStore = deps.messageStore ?? new KyselyMessageStore(deps.db);

  return {
    messageStore,
  };
}
