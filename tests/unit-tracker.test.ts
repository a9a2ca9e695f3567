import { describe, expect, it } from 'vitest';
import { collectUnitPositions, UnitTracker, unitsAtFrame } from '../src/services/unit-tracker';
import type { TrackerEvent } from '../src/types/replay.types';
import { born, other, playerStats } from './fixtures';

describe('UnitTracker', () => {
  it('creates units on birth and init', () => {
    const tracker = new UnitTracker();
    tracker.apply({ kind: 'UnitBorn', unitTag: 1, unitTypeName: 'SCV', controlPlayerId: 1, x: 1, y: 2 });
    tracker.apply({ kind: 'UnitInit', unitTag: 2, unitTypeName: 'Nexus', controlPlayerId: 2, x: 3, y: 4 });

    expect(tracker.alive()).toEqual([
      { tag: 1, name: 'SCV', userId: 1, x: 1, y: 2, alive: true },
      { tag: 2, name: 'Nexus', userId: 2, x: 3, y: 4, alive: true },
    ]);
  });

  it('moves, retypes and transfers units', () => {
    const tracker = new UnitTracker();
    tracker.apply({ kind: 'UnitInit', unitTag: 5, unitTypeName: 'Hatchery', controlPlayerId: 1, x: 0, y: 0 });
    tracker.apply({ kind: 'UnitDone', unitTag: 5 });
    tracker.apply({ kind: 'UnitTypeChange', unitTag: 5, unitTypeName: 'Lair' });
    tracker.apply({ kind: 'UnitOwnerChange', unitTag: 5, controlPlayerId: 2 });
    tracker.apply({ kind: 'UnitPositions', positions: [{ unitTag: 5, x: 9, y: 8 }, { unitTag: 77, x: 1, y: 1 }] });

    expect(tracker.alive()).toEqual([{ tag: 5, name: 'Lair', userId: 2, x: 9, y: 8, alive: true }]);
  });

  it('drops units once they die', () => {
    const tracker = new UnitTracker();
    tracker.apply({ kind: 'UnitBorn', unitTag: 3, unitTypeName: 'Drone', controlPlayerId: 2, x: 1, y: 1 });
    tracker.apply({ kind: 'UnitBorn', unitTag: 4, unitTypeName: 'Zealot', controlPlayerId: 2, x: 2, y: 2 });
    tracker.apply({ kind: 'UnitDied', unitTag: 3, x: 6, y: 7 });

    expect(tracker.alive().map((u) => u.tag)).toEqual([4]);
  });

  it('ignores events for unknown tags and non-unit events', () => {
    const tracker = new UnitTracker();
    tracker.apply({ kind: 'UnitDone', unitTag: 42 });
    tracker.apply({ kind: 'UnitDied', unitTag: 42, x: 0, y: 0 });
    tracker.apply({ kind: 'Upgrade', playerId: 1, upgradeTypeName: 'Stimpack' });
    tracker.apply({ kind: 'Other', name: 'Anything' });

    expect(tracker.alive()).toEqual([]);
  });
});

describe('unitsAtFrame', () => {
  const events: TrackerEvent[] = [
    born(0, 1, 'SCV', 1, 10, 10),
    born(4, 2, 'Drone', 2, 20, 20),
    playerStats(2, 1),
    { delta: 4, event: { kind: 'UnitDied', unitTag: 1, x: 11, y: 11 } },
    other(5),
  ];

  it('includes events up to and including the frame', () => {
    expect(unitsAtFrame(events, 0).map((u) => u.tag)).toEqual([1]);
    expect(unitsAtFrame(events, 4).map((u) => u.tag)).toEqual([1, 2]);
    expect(unitsAtFrame(events, 9).map((u) => u.tag)).toEqual([1, 2]);
    expect(unitsAtFrame(events, 10).map((u) => u.tag)).toEqual([2]);
  });
});

describe('collectUnitPositions', () => {
  it('gathers creation, movement and death positions', () => {
    const points = collectUnitPositions([
      born(0, 1, 'SCV', 1, 1, 2),
      { delta: 1, event: { kind: 'UnitPositions', positions: [{ unitTag: 1, x: 3, y: 4 }] } },
      { delta: 1, event: { kind: 'UnitDied', unitTag: 1, x: 5, y: 6 } },
      playerStats(1, 1),
    ]);
    expect(points).toEqual([{ x: 1, y: 2 }, { x: 3, y: 4 }, { x: 5, y: 6 }]);
  });
});
