import { z } from 'zod';
import { sha256 } from './checksum.js';

/**
 * Signed protocol event. Serialisation for the id follows the
 * `[0, pubkey, created_at, kind, tags, content]` array form.
 */
export const SignedEventSchema = z.object({
  id: z.string(),
  pubkey: z.string(),
  /** Unix seconds */
  created_at: z.number(),
  kind: z.number().int(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string(),
});

export type SignedEvent = z.infer<typeof SignedEventSchema>;

export interface EventTemplate {
  kind?: number;
  tags: string[][];
  content: string;
}

export const TEXT_NOTE_KIND = 1;

/** Maximum allowed skew between an event's timestamp and the verifier's clock. */
export const FRESHNESS_WINDOW_SECONDS = 300;

export function eventId(event: Omit<SignedEvent, 'id' | 'sig'>): string {
  return sha256(JSON.stringify([0, event.pubkey, event.created_at, event.kind, event.tags, event.content]));
}

export function getTag(event: SignedEvent, name: string): string | undefined {
  const tag = event.tags.find(t => t[0] === name);
  return tag?.[1];
}

export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function isFresh(event: SignedEvent, now: Date, windowSeconds = FRESHNESS_WINDOW_SECONDS): boolean {
  return Math.abs(unixSeconds(now) - event.created_at) <= windowSeconds;
}
