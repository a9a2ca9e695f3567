import type { ProcessedReplay } from '../types/replay.types';
import { ReplayParseError } from '../types/errors';
import type { ReplayDecoder } from './replay-decoder';
import { extractGameSnapshots, totalFrames } from './snapshot-extractor';

/**
 * Decode one replay file and extract its snapshot timeline.
 * Any decoder failure surfaces as a ReplayParseError for that file.
 */
export function processReplay<A>(name: string, data: Uint8Array, decoder: ReplayDecoder<A>): ProcessedReplay {
  try {
    const archive = decoder.parseArchive(data);
    const details = decoder.readDetails(archive, data);
    const messages = decoder.readMessageEvents(archive, data);
    const trackerEvents = decoder.readTrackerEvents(archive, data);
    const snapshots = extractGameSnapshots(trackerEvents);

    console.log(`[replay-processor] ${name}: ${trackerEvents.length} tracker events, ${snapshots.length} snapshots, ${messages.length} messages`);

    return {
      name,
      details,
      messages,
      snapshots,
      trackerEvents,
      totalFrames: totalFrames(trackerEvents),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ReplayParseError(name, `Unable to parse ${name}: ${message}`, err);
  }
}
