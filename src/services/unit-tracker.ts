import type { ReplayTrackerEvent, TrackerEvent, UnitState } from '../types/replay.types';

/**
 * Unit state table rebuilt from tracker events: who owns each unit, what it
 * is, where it was last seen and whether it is still alive.
 */
export class UnitTracker {
  private units = new Map<number, UnitState>();

  apply(event: ReplayTrackerEvent): void {
    switch (event.kind) {
      case 'UnitBorn':
      case 'UnitInit':
        this.units.set(event.unitTag, {
          tag: event.unitTag,
          name: event.unitTypeName,
          userId: event.controlPlayerId,
          x: event.x,
          y: event.y,
          alive: true,
        });
        break;
      case 'UnitDied':
        this.update(event.unitTag, (u) => { u.alive = false; });
        break;
      case 'UnitOwnerChange': {
        const owner = event.controlPlayerId;
        this.update(event.unitTag, (u) => { u.userId = owner; });
        break;
      }
      case 'UnitTypeChange': {
        const name = event.unitTypeName;
        this.update(event.unitTag, (u) => { u.name = name; });
        break;
      }
      case 'UnitPositions':
        for (const pos of event.positions) {
          this.update(pos.unitTag, (u) => {
            u.x = pos.x;
            u.y = pos.y;
          });
        }
        break;
      case 'UnitDone':
      case 'PlayerStats':
      case 'Upgrade':
      case 'Other':
        break;
    }
  }

  /** Units that have not died, in creation order. */
  alive(): UnitState[] {
    return [...this.units.values()].filter((u) => u.alive);
  }

  private update(tag: number, fn: (unit: UnitState) => void): void {
    const unit = this.units.get(tag);
    if (unit) fn(unit);
  }
}

/**
 * Replay every event up to and including `frame` and return the living units.
 */
export function unitsAtFrame(events: Iterable<TrackerEvent>, frame: number): UnitState[] {
  const tracker = new UnitTracker();
  let current = 0;
  for (const { delta, event } of events) {
    current += delta;
    if (current > frame) break;
    tracker.apply(event);
  }
  return tracker.alive();
}

/**
 * Every position a unit was created, moved or died at. Used to fit the map
 * view around the units of a replay.
 */
export function collectUnitPositions(events: Iterable<TrackerEvent>): Array<{ x: number; y: number }> {
  const points: Array<{ x: number; y: number }> = [];
  for (const { event } of events) {
    switch (event.kind) {
      case 'UnitBorn':
      case 'UnitInit':
      case 'UnitDied':
        points.push({ x: event.x, y: event.y });
        break;
      case 'UnitPositions':
        for (const p of event.positions) points.push({ x: p.x, y: p.y });
        break;
      default:
        break;
    }
  }
  return points;
}
