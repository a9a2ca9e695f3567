import type { FrameSnapshot, TrackerEvent, UpgradeEntry } from '../types/replay.types';

/** Engine-imposed supply ceiling. */
export const MAX_SUPPLY = 200;

/**
 * Turn the delta-encoded tracker stream into absolute-frame player snapshots.
 *
 * Each event's delta is added to the running frame before the event is
 * looked at, so a snapshot carries the frame of the event that produced it.
 * Only PlayerStats events produce output; everything else just moves time on.
 */
export function extractGameSnapshots(events: Iterable<TrackerEvent>): FrameSnapshot[] {
  let frame = 0;
  const snapshots: FrameSnapshot[] = [];

  for (const { delta, event } of events) {
    frame += delta;
    if (event.kind !== 'PlayerStats') continue;

    const { stats } = event;
    snapshots.push({
      frame,
      userId: event.playerId,
      minerals: stats.mineralsCurrent,
      vespene: stats.vespeneCurrent,
      supplyUsed: stats.foodUsed,
      supplyCap: Math.min(stats.foodMade, MAX_SUPPLY),
      armyMinerals: stats.mineralsUsedActiveForces,
      armyVespene: stats.vespeneUsedActiveForces,
    });
  }

  return snapshots;
}

/**
 * Replay length in game loops: the frame of the last event.
 */
export function totalFrames(events: Iterable<TrackerEvent>): number {
  let frame = 0;
  for (const { delta } of events) frame += delta;
  return frame;
}

/**
 * Most recent snapshot of each player at or before `frame`, ordered by user id.
 */
export function latestSnapshots(snapshots: readonly FrameSnapshot[], frame: number): FrameSnapshot[] {
  const latest = new Map<number, FrameSnapshot>();
  for (const s of snapshots) {
    if (s.frame > frame) continue;
    const prev = latest.get(s.userId);
    if (!prev || s.frame >= prev.frame) latest.set(s.userId, s);
  }
  return [...latest.values()].sort((a, b) => a.userId - b.userId);
}

/**
 * Completed research in stream order, stamped with its absolute frame.
 */
export function extractUpgrades(events: Iterable<TrackerEvent>): UpgradeEntry[] {
  let frame = 0;
  const upgrades: UpgradeEntry[] = [];
  for (const { delta, event } of events) {
    frame += delta;
    if (event.kind !== 'Upgrade') continue;
    upgrades.push({ frame, playerId: event.playerId, name: event.upgradeTypeName });
  }
  return upgrades;
}
