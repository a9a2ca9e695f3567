/**
 * Zod schemas for the JSON export of a decoded replay.
 *
 * The export mirrors the in-memory types: `details`, `messageEvents` and
 * `trackerEvents` (each `{ delta, event: { kind, ... } }`). Tracker events of
 * kinds not listed here are kept as `Other` so they still move time forward.
 */

import { z } from 'zod';

const int = () => z.number().int();

// ---------------------------------------------------------------------------
// Details
// ---------------------------------------------------------------------------

export const PlayerColorSchema = z.object({
  r: int().min(0).max(255),
  g: int().min(0).max(255),
  b: int().min(0).max(255),
  a: int().min(0).max(255),
});

export const PlayerDetailsSchema = z.object({
  name: z.string(),
  race: z.string(),
  color: PlayerColorSchema,
  result: z.enum(['Win', 'Loss', 'Tie', 'Undecided']),
  teamId: int(),
  workingSetSlotId: int().nullable().default(null),
  toon: z.object({
    region: int(),
    realm: int(),
    id: int(),
  }),
});

export const DetailsSchema = z.object({
  title: z.string(),
  mapFileName: z.string().default(''),
  description: z.string().default(''),
  isBlizzardMap: z.boolean().default(false),
  timeUtc: z.number(),
  playerList: z.array(PlayerDetailsSchema),
});

// ---------------------------------------------------------------------------
// Message events
// ---------------------------------------------------------------------------

export const MessageEventSchema = z.object({
  delta: int().nonnegative(),
  userId: int(),
  recipient: z.enum(['All', 'Allies', 'Individual', 'Battlenet', 'Observers']),
  text: z.string(),
});

// ---------------------------------------------------------------------------
// Tracker events
// ---------------------------------------------------------------------------

export const PlayerStatsEventSchema = z.object({
  kind: z.literal('PlayerStats'),
  playerId: int(),
  stats: z.object({
    mineralsCurrent: int(),
    vespeneCurrent: int(),
    foodUsed: int(),
    foodMade: int(),
    mineralsUsedActiveForces: int(),
    vespeneUsedActiveForces: int(),
  }),
});

const unitCreatedFields = {
  unitTag: int(),
  unitTypeName: z.string(),
  controlPlayerId: int().nullable(),
  x: z.number(),
  y: z.number(),
};

export const UnitBornEventSchema = z.object({ kind: z.literal('UnitBorn'), ...unitCreatedFields });
export const UnitInitEventSchema = z.object({ kind: z.literal('UnitInit'), ...unitCreatedFields });

export const UnitDoneEventSchema = z.object({
  kind: z.literal('UnitDone'),
  unitTag: int(),
});

export const UnitDiedEventSchema = z.object({
  kind: z.literal('UnitDied'),
  unitTag: int(),
  x: z.number(),
  y: z.number(),
});

export const UnitOwnerChangeEventSchema = z.object({
  kind: z.literal('UnitOwnerChange'),
  unitTag: int(),
  controlPlayerId: int().nullable(),
});

export const UnitTypeChangeEventSchema = z.object({
  kind: z.literal('UnitTypeChange'),
  unitTag: int(),
  unitTypeName: z.string(),
});

export const UnitPositionsEventSchema = z.object({
  kind: z.literal('UnitPositions'),
  positions: z.array(z.object({ unitTag: int(), x: z.number(), y: z.number() })),
});

export const UpgradeEventSchema = z.object({
  kind: z.literal('Upgrade'),
  playerId: int(),
  upgradeTypeName: z.string(),
});

export const KnownTrackerEventSchema = z.discriminatedUnion('kind', [
  PlayerStatsEventSchema,
  UnitBornEventSchema,
  UnitInitEventSchema,
  UnitDoneEventSchema,
  UnitDiedEventSchema,
  UnitOwnerChangeEventSchema,
  UnitTypeChangeEventSchema,
  UnitPositionsEventSchema,
  UpgradeEventSchema,
]);

export const KNOWN_TRACKER_KINDS: ReadonlySet<string> = new Set(
  KnownTrackerEventSchema.options.map((option) => option.shape.kind.value),
);

/** Envelope of one tracker event; the payload is checked once its kind is known. */
export const RawTrackerEventSchema = z.object({
  delta: int().nonnegative(),
  event: z.object({ kind: z.string().min(1) }).passthrough(),
});
export type RawTrackerEvent = z.infer<typeof RawTrackerEventSchema>;

// ---------------------------------------------------------------------------
// Export document
// ---------------------------------------------------------------------------

export const ReplayExportSchema = z.object({
  details: DetailsSchema,
  messageEvents: z.array(MessageEventSchema).default([]),
  trackerEvents: z.array(RawTrackerEventSchema),
});
export type ReplayExport = z.infer<typeof ReplayExportSchema>;
