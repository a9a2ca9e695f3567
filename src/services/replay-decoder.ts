import type { ZodError } from 'zod';
import type { Details, MessageEvent, TrackerEvent } from '../types/replay.types';
import {
  KNOWN_TRACKER_KINDS,
  KnownTrackerEventSchema,
  ReplayExportSchema,
  type RawTrackerEvent,
  type ReplayExport,
} from '../types/replay.schemas';

/**
 * Boundary to whatever turns replay bytes into decoded structures.
 *
 * `parseArchive` throws when the bytes are not a replay; the readers work on
 * the archive it returned together with the original bytes.
 */
export interface ReplayDecoder<A = unknown> {
  parseArchive(data: Uint8Array): A;
  readDetails(archive: A, data: Uint8Array): Details;
  readMessageEvents(archive: A, data: Uint8Array): MessageEvent[];
  readTrackerEvents(archive: A, data: Uint8Array): TrackerEvent[];
}

function formatIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function toTrackerEvent(raw: RawTrackerEvent, index: number): TrackerEvent {
  const { kind } = raw.event;
  if (!KNOWN_TRACKER_KINDS.has(kind)) {
    return { delta: raw.delta, event: { kind: 'Other', name: kind } };
  }
  const result = KnownTrackerEventSchema.safeParse(raw.event);
  if (!result.success) {
    throw new Error(`Invalid ${kind} tracker event at index ${index}: ${formatIssues(result.error)}`);
  }
  return { delta: raw.delta, event: result.data };
}

/**
 * Decoder for the JSON export of an already-decoded replay.
 */
export const jsonReplayDecoder: ReplayDecoder<ReplayExport> = {
  parseArchive(data) {
    let json: unknown;
    try {
      json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(data));
    } catch (err) {
      throw new Error(`Not a replay export: ${err instanceof Error ? err.message : String(err)}`);
    }
    const result = ReplayExportSchema.safeParse(json);
    if (!result.success) {
      throw new Error(`Invalid replay export: ${formatIssues(result.error)}`);
    }
    return result.data;
  },

  readDetails(archive) {
    return archive.details;
  },

  readMessageEvents(archive) {
    return archive.messageEvents;
  },

  readTrackerEvents(archive) {
    return archive.trackerEvents.map(toTrackerEvent);
  },
};
