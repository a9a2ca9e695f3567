import type { Details, PlayerStatsValues, TrackerEvent } from '../src/types/replay.types';

export function stats(overrides: Partial<PlayerStatsValues> = {}): PlayerStatsValues {
  return {
    mineralsCurrent: 0,
    vespeneCurrent: 0,
    foodUsed: 12,
    foodMade: 15,
    mineralsUsedActiveForces: 0,
    vespeneUsedActiveForces: 0,
    ...overrides,
  };
}

export function playerStats(delta: number, playerId: number, overrides: Partial<PlayerStatsValues> = {}): TrackerEvent {
  return { delta, event: { kind: 'PlayerStats', playerId, stats: stats(overrides) } };
}

export function other(delta: number, name = 'Unknown'): TrackerEvent {
  return { delta, event: { kind: 'Other', name } };
}

export function born(
  delta: number,
  unitTag: number,
  unitTypeName: string,
  controlPlayerId: number | null,
  x: number,
  y: number,
): TrackerEvent {
  return { delta, event: { kind: 'UnitBorn', unitTag, unitTypeName, controlPlayerId, x, y } };
}

export const DETAILS: Details = {
  title: 'Test Map LE',
  mapFileName: '',
  description: '',
  isBlizzardMap: true,
  timeUtc: 1000,
  playerList: [
    {
      name: '&lt;CLAN&gt;<sp/>Alpha',
      race: 'Terran',
      color: { r: 180, g: 20, b: 30, a: 255 },
      result: 'Win',
      teamId: 0,
      workingSetSlotId: 0,
      toon: { region: 1, realm: 1, id: 111 },
    },
    {
      name: 'Bravo',
      race: 'Zerg',
      color: { r: 0, g: 66, b: 255, a: 255 },
      result: 'Loss',
      teamId: 1,
      workingSetSlotId: 1,
      toon: { region: 1, realm: 1, id: 222 },
    },
  ],
};

/** Encode a replay export document the way an uploaded file would carry it. */
export function encodeExport(doc: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(doc));
}

export function sampleExport(): Record<string, unknown> {
  return {
    details: DETAILS,
    messageEvents: [{ delta: 10, userId: 0, recipient: 'All', text: 'glhf' }],
    trackerEvents: [
      { delta: 0, event: { kind: 'UnitBorn', unitTag: 1, unitTypeName: 'SCV', controlPlayerId: 1, x: 10, y: 20 } },
      { delta: 5, event: { kind: 'UnitInit', unitTag: 2, unitTypeName: 'CommandCenter', controlPlayerId: 1, x: 30, y: 40 } },
      { delta: 3, event: { kind: 'SomethingNew', value: 1 } },
      { delta: 2, event: { kind: 'PlayerStats', playerId: 1, stats: stats({ mineralsCurrent: 50 }) } },
      { delta: 0, event: { kind: 'PlayerStats', playerId: 2, stats: stats({ mineralsCurrent: 75, foodMade: 250 }) } },
    ],
  };
}
