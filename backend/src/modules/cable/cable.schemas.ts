/**
 * backend/src/modules/cable/cable.schemas.ts
 *
 * WHY:
 * - Every client frame is untrusted JSON. Validate shape before any handler runs.
 *
 * RULES:
 * - Identifiers carry only the channel and, for direct, the recipient.
 *   Organization and sender never come from the client.
 */

import { z } from 'zod';

export const channelIdentifierSchema = z.discriminatedUnion('channel', [
  z.object({ channel: z.literal('team') }),
  z.object({ channel: z.literal('direct'), recipientId: z.string() }),
]);

export const sendPayloadSchema = z.object({
  content: z.string(),
  recipientId: z.string().optional(),
});

export const clientFrameSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('subscribe'), identifier: channelIdentifierSchema }),
  z.object({ command: z.literal('unsubscribe'), identifier: channelIdentifierSchema }),
  z.object({
    command: z.literal('message'),
    identifier: channelIdentifierSchema,
    data: sendPayloadSchema,
  }),
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;
