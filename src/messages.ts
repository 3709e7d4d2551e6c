import { z } from 'zod';
import { SignedEventSchema, type SignedEvent } from './event.js';
import { RelationshipStatusSchema } from './models.js';

const count = z.number();

/**
 * Control messages exchanged over the peer transport. Field names are the
 * wire names.
 */
export const ControlMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('backup_invite'), event: SignedEventSchema }),
  z.object({
    type: z.literal('backup_invite_response'),
    accepted: z.boolean(),
    provider_npub: z.string().default(''),
    max_storage_bytes: count.default(0),
    max_snapshots: count.default(0),
  }),
  z.object({ type: z.literal('backup_start'), snapshot_id: z.string().min(1) }),
  z.object({
    type: z.literal('backup_complete'),
    snapshot_id: z.string().min(1),
    total_files: count.default(0),
    total_bytes: count.default(0),
  }),
  z.object({
    type: z.literal('backup_discovery_challenge'),
    event: SignedEventSchema,
    discovery_id: z.string().min(1),
  }),
  z.object({
    type: z.literal('backup_discovery_response'),
    event: SignedEventSchema,
    discovery_id: z.string().min(1),
    has_backups: z.boolean(),
    max_storage_bytes: count.optional(),
    snapshot_count: count.optional(),
    latest_snapshot: z.string().optional(),
  }),
  z.object({ type: z.literal('backup_status_change'), status: RelationshipStatusSchema }),
]);

export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export type ControlMessageType = ControlMessage['type'];

export type MessageOf<T extends ControlMessageType> = Extract<ControlMessage, { type: T }>;

export type SignedControlMessage = Extract<ControlMessage, { event: SignedEvent }>;

export function isSigned(message: ControlMessage): message is SignedControlMessage {
  return 'event' in message;
}

/** Returns null for anything that is not a well-formed control message. */
export function parseControlMessage(value: unknown): ControlMessage | null {
  const parsed = ControlMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
