/**
 * backend/src/modules/messages/dal/message.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for messages.
 *
 * RULES:
 * - No AppError.
 * - No policies (content rules are enforced before we get here).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MessagesTable } from '../../../shared/db/schema';
import type { CreateMessageInput } from '../message.types';

export type MessageRow = Selectable<MessagesTable>;

export class MessageRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertMessage(input: CreateMessageInput): Promise<MessageRow> {
    return this.db
      .insertInto('messages')
      .values({
        content: input.content,
        user_id: input.senderId,
        recipient_id: input.recipientId,
        organization_id: input.organizationId,
        deleted_at: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }
}
