// ── Details ──────────────────────────────────────────────

export type GameResult = 'Win' | 'Loss' | 'Tie' | 'Undecided';

export interface PlayerColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface PlayerToon {
  region: number;
  realm: number;
  id: number;
}

export interface PlayerDetails {
  name: string;
  race: string;
  color: PlayerColor;
  result: GameResult;
  teamId: number;
  workingSetSlotId: number | null;
  toon: PlayerToon;
}

export interface Details {
  title: string;
  mapFileName: string;
  description: string;
  isBlizzardMap: boolean;
  timeUtc: number;
  playerList: PlayerDetails[];
}

// ── Message events (chat only) ───────────────────────────

export type MessageRecipient = 'All' | 'Allies' | 'Individual' | 'Battlenet' | 'Observers';

export interface MessageEvent {
  delta: number;
  userId: number;
  recipient: MessageRecipient;
  text: string;
}

// ── Tracker events ───────────────────────────────────────

export interface PlayerStatsValues {
  mineralsCurrent: number;
  vespeneCurrent: number;
  foodUsed: number;
  foodMade: number;
  mineralsUsedActiveForces: number;
  vespeneUsedActiveForces: number;
}

export interface PlayerStatsEvent {
  kind: 'PlayerStats';
  playerId: number;
  stats: PlayerStatsValues;
}

export interface UnitBornEvent {
  kind: 'UnitBorn' | 'UnitInit';
  unitTag: number;
  unitTypeName: string;
  controlPlayerId: number | null;
  x: number;
  y: number;
}

export interface UnitDoneEvent {
  kind: 'UnitDone';
  unitTag: number;
}

export interface UnitDiedEvent {
  kind: 'UnitDied';
  unitTag: number;
  x: number;
  y: number;
}

export interface UnitOwnerChangeEvent {
  kind: 'UnitOwnerChange';
  unitTag: number;
  controlPlayerId: number | null;
}

export interface UnitTypeChangeEvent {
  kind: 'UnitTypeChange';
  unitTag: number;
  unitTypeName: string;
}

export interface UnitPosition {
  unitTag: number;
  x: number;
  y: number;
}

export interface UnitPositionsEvent {
  kind: 'UnitPositions';
  positions: UnitPosition[];
}

export interface UpgradeEvent {
  kind: 'Upgrade';
  playerId: number;
  upgradeTypeName: string;
}

/** A tracker event kind the core only uses to advance time. */
export interface OtherTrackerEvent {
  kind: 'Other';
  name: string;
}

export type ReplayTrackerEvent =
  | PlayerStatsEvent
  | UnitBornEvent
  | UnitDoneEvent
  | UnitDiedEvent
  | UnitOwnerChangeEvent
  | UnitTypeChangeEvent
  | UnitPositionsEvent
  | UpgradeEvent
  | OtherTrackerEvent;

export interface TrackerEvent {
  /** Game loops elapsed since the previous event of the stream. */
  delta: number;
  event: ReplayTrackerEvent;
}

// ── Derived data ─────────────────────────────────────────

export interface FrameSnapshot {
  readonly frame: number;
  readonly userId: number;
  readonly minerals: number;
  readonly vespene: number;
  readonly supplyUsed: number;
  /** Clamped to the engine ceiling of 200. */
  readonly supplyCap: number;
  readonly armyMinerals: number;
  readonly armyVespene: number;
}

export interface ProcessedReplay {
  name: string;
  details: Details;
  messages: MessageEvent[];
  snapshots: FrameSnapshot[];
  trackerEvents: TrackerEvent[];
  totalFrames: number;
}

export interface UnitState {
  tag: number;
  name: string;
  userId: number | null;
  x: number;
  y: number;
  alive: boolean;
}

export interface UpgradeEntry {
  frame: number;
  playerId: number;
  name: string;
}
