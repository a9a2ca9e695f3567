import { describe, expect, it } from 'vitest';
import { extractGameSnapshots, extractUpgrades, latestSnapshots, MAX_SUPPLY, totalFrames } from '../src/services/snapshot-extractor';
import type { TrackerEvent } from '../src/types/replay.types';
import { born, other, playerStats } from './fixtures';

describe('extractGameSnapshots', () => {
  const scenario: TrackerEvent[] = [
    other(5),
    playerStats(3, 1, { mineralsCurrent: 50 }),
    playerStats(0, 2, { mineralsCurrent: 75, foodMade: 250 }),
  ];

  it('stamps each snapshot with the accumulated frame', () => {
    const snapshots = extractGameSnapshots(scenario);

    expect(snapshots).toHaveLength(2);
    expect(snapshots[0]).toMatchObject({ frame: 8, userId: 1, minerals: 50, supplyCap: 15 });
    expect(snapshots[1]).toMatchObject({ frame: 8, userId: 2, minerals: 75, supplyCap: 200 });
  });

  it('copies every stats field', () => {
    const [snapshot] = extractGameSnapshots([
      playerStats(7, 1, {
        mineralsCurrent: 1,
        vespeneCurrent: 2,
        foodUsed: 3,
        foodMade: 4,
        mineralsUsedActiveForces: 5,
        vespeneUsedActiveForces: 6,
      }),
    ]);

    expect(snapshot).toEqual({
      frame: 7,
      userId: 1,
      minerals: 1,
      vespene: 2,
      supplyUsed: 3,
      supplyCap: 4,
      armyMinerals: 5,
      armyVespene: 6,
    });
  });

  it('emits one snapshot per player stats event', () => {
    const events = [
      born(2, 1, 'SCV', 1, 0, 0),
      playerStats(1, 1),
      other(4),
      playerStats(0, 2),
      other(9),
    ];
    const snapshots = extractGameSnapshots(events);

    expect(snapshots).toHaveLength(2);
    expect(snapshots.map((s) => s.frame)).toEqual([3, 7]);
    expect(snapshots.length).toBeLessThanOrEqual(events.length);
  });

  it('clamps the supply cap without rejecting odd values', () => {
    const snapshots = extractGameSnapshots([
      playerStats(0, 1, { foodMade: 10_000 }),
      playerStats(0, 1, { foodMade: -20 }),
      playerStats(0, 1, { foodMade: MAX_SUPPLY }),
    ]);

    expect(snapshots.map((s) => s.supplyCap)).toEqual([200, -20, 200]);
  });

  it('gives the same result on repeated calls', () => {
    expect(extractGameSnapshots(scenario)).toEqual(extractGameSnapshots(scenario));
  });

  it('handles an empty stream', () => {
    expect(extractGameSnapshots([])).toEqual([]);
    expect(totalFrames([])).toBe(0);
  });
});

describe('totalFrames', () => {
  it('sums every delta', () => {
    expect(totalFrames([other(5), playerStats(3, 1), other(0), other(12)])).toBe(20);
  });
});

describe('latestSnapshots', () => {
  const snapshots = extractGameSnapshots([
    playerStats(10, 2, { mineralsCurrent: 1 }),
    playerStats(0, 1, { mineralsCurrent: 2 }),
    playerStats(10, 1, { mineralsCurrent: 3 }),
    playerStats(10, 2, { mineralsCurrent: 4 }),
  ]);

  it('picks the newest snapshot per player at or before the frame', () => {
    const rows = latestSnapshots(snapshots, 25);
    expect(rows.map((s) => [s.userId, s.minerals])).toEqual([[1, 3], [2, 1]]);
  });

  it('is empty before the first snapshot', () => {
    expect(latestSnapshots(snapshots, 9)).toEqual([]);
  });
});

describe('extractUpgrades', () => {
  it('stamps each upgrade with its absolute frame', () => {
    const events: TrackerEvent[] = [
      playerStats(3, 1),
      { delta: 4, event: { kind: 'Upgrade', playerId: 1, upgradeTypeName: 'Stimpack' } },
      other(2),
      { delta: 0, event: { kind: 'Upgrade', playerId: 2, upgradeTypeName: 'zerglingmovementspeed' } },
    ];

    expect(extractUpgrades(events)).toEqual([
      { frame: 7, playerId: 1, name: 'Stimpack' },
      { frame: 9, playerId: 2, name: 'zerglingmovementspeed' },
    ]);
  });

  it('is empty without upgrade events', () => {
    expect(extractUpgrades([born(0, 1, 'SCV', 1, 0, 0), other(5)])).toEqual([]);
  });
});
