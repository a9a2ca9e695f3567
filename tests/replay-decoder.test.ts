import { afterEach, describe, expect, it, vi } from 'vitest';
import { jsonReplayDecoder, type ReplayDecoder } from '../src/services/replay-decoder';
import { processReplay } from '../src/services/replay-processor';
import { ReplayParseError } from '../src/types/errors';
import { DETAILS, encodeExport, sampleExport } from './fixtures';

function decode(doc: unknown) {
  const data = encodeExport(doc);
  const archive = jsonReplayDecoder.parseArchive(data);
  return {
    details: jsonReplayDecoder.readDetails(archive, data),
    messages: jsonReplayDecoder.readMessageEvents(archive, data),
    events: jsonReplayDecoder.readTrackerEvents(archive, data),
  };
}

describe('jsonReplayDecoder', () => {
  it('reads details, messages and tracker events', () => {
    const { details, messages, events } = decode(sampleExport());

    expect(details).toEqual(DETAILS);
    expect(messages).toEqual([{ delta: 10, userId: 0, recipient: 'All', text: 'glhf' }]);
    expect(events).toHaveLength(5);
    expect(events[0]).toEqual({
      delta: 0,
      event: { kind: 'UnitBorn', unitTag: 1, unitTypeName: 'SCV', controlPlayerId: 1, x: 10, y: 20 },
    });
  });

  it('keeps unmodelled kinds as Other', () => {
    const { events } = decode(sampleExport());
    expect(events[2]).toEqual({ delta: 3, event: { kind: 'Other', name: 'SomethingNew' } });
  });

  it('fills optional fields with defaults', () => {
    const { details, messages, events } = decode({
      details: { title: 'Bare', timeUtc: 0, playerList: [] },
      trackerEvents: [{ delta: 1, event: { kind: 'UnitDied', unitTag: 4, x: 1, y: 2 } }],
    });

    expect(details).toEqual({
      title: 'Bare',
      mapFileName: '',
      description: '',
      isBlizzardMap: false,
      timeUtc: 0,
      playerList: [],
    });
    expect(messages).toEqual([]);
    expect(events[0].event).toEqual({ kind: 'UnitDied', unitTag: 4, x: 1, y: 2 });
  });

  it('rejects bytes that are not JSON', () => {
    const data = new TextEncoder().encode('MPQ\u001a');
    expect(() => jsonReplayDecoder.parseArchive(data)).toThrow(/^Not a replay export: /);
  });

  it('rejects documents without tracker events', () => {
    expect(() => decode({ details: DETAILS })).toThrow('Invalid replay export: trackerEvents: Required');
  });

  it('rejects malformed events of a known kind', () => {
    const doc = {
      details: DETAILS,
      trackerEvents: [
        { delta: 0, event: { kind: 'Other', name: 'x' } },
        { delta: 1, event: { kind: 'PlayerStats', playerId: 'one' } },
      ],
    };
    expect(() => decode(doc)).toThrow(/^Invalid PlayerStats tracker event at index 1: /);
  });

  it('rejects negative deltas', () => {
    const doc = { details: DETAILS, trackerEvents: [{ delta: -1, event: { kind: 'Other' } }] };
    expect(() => decode(doc)).toThrow(/^Invalid replay export: trackerEvents\.0\.delta: /);
  });
});

describe('processReplay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the snapshot timeline of one file', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const replay = processReplay('game.json', encodeExport(sampleExport()), jsonReplayDecoder);

    expect(replay.name).toBe('game.json');
    expect(replay.totalFrames).toBe(10);
    expect(replay.messages).toHaveLength(1);
    expect(replay.snapshots.map((s) => [s.frame, s.userId, s.minerals, s.supplyCap])).toEqual([
      [10, 1, 50, 15],
      [10, 2, 75, 200],
    ]);
    expect(log).toHaveBeenCalledWith('[replay-processor] game.json: 5 tracker events, 2 snapshots, 1 messages');
  });

  it('wraps decoder failures in a parse error for that file', () => {
    let caught: unknown;
    try {
      processReplay('broken.json', new TextEncoder().encode('{'), jsonReplayDecoder);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ReplayParseError);
    if (!(caught instanceof ReplayParseError)) return;
    expect(caught.fileName).toBe('broken.json');
    expect(caught.message).toMatch(/^Unable to parse broken\.json: Not a replay export: /);
  });

  it('passes the archive from parseArchive to every reader', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const archive = { marker: 'archive' };
    const seen: unknown[] = [];
    const decoder: ReplayDecoder<typeof archive> = {
      parseArchive: () => archive,
      readDetails: (a) => {
        seen.push(a);
        return DETAILS;
      },
      readMessageEvents: (a) => {
        seen.push(a);
        return [];
      },
      readTrackerEvents: (a) => {
        seen.push(a);
        return [];
      },
    };

    const replay = processReplay('custom', new Uint8Array(0), decoder);

    expect(seen).toEqual([archive, archive, archive]);
    expect(replay.snapshots).toEqual([]);
    expect(replay.totalFrames).toBe(0);
  });
});
