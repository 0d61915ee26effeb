/**
 * backend/src/modules/messages/message.types.ts
 *
 * WHY:
 * - A message is either a team message (recipientId null) or a direct message.
 * - Sender and organization always come from the authenticated identity,
 *   never from client payloads.
 */

export type MessageId = string;

export type Message = {
  id: MessageId;
  content: string;
  senderId: string;
  recipientId: string | null;
  organizationId: string;
  createdAt: Date;
};

export type CreateMessageInput = {
  content: string;
  senderId: string;
  recipientId: string | null;
  organizationId: string;
};
