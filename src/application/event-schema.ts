import { z } from 'zod';
import { EventType, freezeEvent } from '../domain/index.js';
import type { Event } from '../domain/index.js';

/**
 * Zod schema for an event envelope read off the broker.
 *
 * - `event_type` must be a tag from the closed catalog.
 * - `timestamp` must be a valid ISO-8601 string (offsets accepted).
 * - `data` and `metadata` are open-ended objects so each event type
 *   can carry its own payload without a schema per type.
 */
export const eventEnvelopeSchema = z.object({
  event_id: z.string().uuid(),
  event_type: z.nativeEnum(EventType),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
  user_id: z.number().int(),
  cell_id: z.string().min(1).max(255),
  correlation_id: z.string().min(1).nullable().default(null),
  data: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type EventEnvelope = z.infer<typeof eventEnvelopeSchema>;

export function serializeEvent(event: Event): string {
  return JSON.stringify(event);
}

/**
 * Parses a raw broker message value into a frozen Event.
 * Throws on invalid JSON or an envelope that fails validation.
 */
export function parseEventMessage(raw: string): Event {
  const json: unknown = JSON.parse(raw);
  return freezeEvent(eventEnvelopeSchema.parse(json));
}
