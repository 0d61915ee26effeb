/**
 * backend/src/modules/messages/message.store.ts
 *
 * WHY:
 * - MessageStore is the contract the cable core calls after a send is authorized.
 * - Every write receives the caller's TenantContext and checks the row's
 *   organization against it, on top of the explicit organization_id column.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TenantContext } from '../../shared/tenancy/tenant-context';
import { MessageRepo } from './dal/message.repo';
import type { MessageRow } from './dal/message.repo';
import type { CreateMessageInput, Message } from './message.types';

export interface MessageStore {
  create(tenant: TenantContext, input: CreateMessageInput): Promise<Message>;
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    content: row.content,
    senderId: row.user_id,
    recipientId: row.recipient_id ?? null,
    organizationId: row.organization_id,
    createdAt: row.created_at,
  };
}

export class KyselyMessageStore implements MessageStore {
  private readonly repo: MessageRepo;

  constructor(db: DbExecutor) {
    this.repo = new MessageRepo(db);
  }

  async create(tenant: TenantContext, input: CreateMessageInput): Promise<Message> {
    tenant.assertOwns(input.organizationId);

    const row = await this.repo.insertMessage(input);
    return toMessage(row);
  }
}
