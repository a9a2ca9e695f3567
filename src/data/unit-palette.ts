import type { PackedColor } from '../types/render.types';

// ── Palette (0xRRGGBBAA, alpha byte unused) ──────────────

export const PALETTE = {
  orange: 0xeb790700,
  gold: 0xea9e3600,
  red: 0xf8105300,
  blue: 0x30b5f700,
  green: 0x0aeb9f00,
  lightBlue: 0x72c5dd00,
  gray: 0xb2c5c500,
  pink: 0xeaa48300,
  lightGray: 0xf4f5f800,
  darkBlue: 0x4da7c200,
  darkGreen: 0x37bda900,
  darkRed: 0xae204400,
  violet: 0xa401ed00,
  white: 0xfaf8fb00,
  yellow: 0xf7d45400,
  lightYellow: 0xead8ad00,
  lightGreen: 0x6ec29c00,
} as const satisfies Record<string, PackedColor>;

export const DEFAULT_UNIT_SIZE = 0.045;

/** Owner id the unit table reports for units nobody controls. */
export const UNKNOWN_OWNER = 99;

/** Map markers whose names start with this are never reported as unknown. */
export const IGNORED_UNIT_PREFIX = 'Beacon';

export interface UnitPaletteEntry {
  size?: number;
  color: PackedColor;
}

const entries: Array<[string[], UnitPaletteEntry]> = [
  // Resources. The geyser was keyed 'VespeneEDyser' in the table this one
  // replaces; no replay carries that name, so the real type name is used.
  [['VespeneGeyser', 'SpacePlatformGeyser'], { color: PALETTE.lightGreen }],
  [['LabMineralField'], { size: 0.024, color: PALETTE.lightBlue }],
  [['LabMineralField750'], { size: 0.036, color: PALETTE.lightBlue }],
  [['MineralField'], { size: 0.048, color: PALETTE.lightBlue }],
  [['MineralField450'], { size: 0.06, color: PALETTE.lightBlue }],
  [['MineralField750'], { size: 0.072, color: PALETTE.lightBlue }],
  [['RichMineralField'], { color: PALETTE.gold }],
  [['RichMineralField750'], { color: PALETTE.orange }],
  // Map features. The watch tower is meant to read as near-transparent but
  // the palette has no alpha, so it keeps the plain white.
  [['XelNagaTower'], { size: 0.072, color: PALETTE.white }],
  [['DestructibleDebris6x6'], { size: 0.18, color: PALETTE.gray }],
  [['UnbuildablePlatesDestructible'], { size: 0.06, color: PALETTE.lightGray }],
  // Units and structures
  [['Overlord'], { size: 0.06, color: PALETTE.yellow }],
  [['SCV', 'Drone', 'Probe', 'Larva'], { size: 0.03, color: PALETTE.lightGray }],
  [['Hatchery', 'CommandCenter', 'Nexus'], { size: 0.12, color: PALETTE.pink }],
  [['Broodling'], { size: 0.006, color: PALETTE.lightGray }],
];

export const UNIT_PALETTE: ReadonlyMap<string, Readonly<UnitPaletteEntry>> = new Map(
  entries.flatMap(([names, entry]) => names.map((name): [string, Readonly<UnitPaletteEntry>] => [name, Object.freeze(entry)])),
);

/** Fallback colours for the first four participants; everyone else is white. */
export const USER_COLORS: readonly PackedColor[] = [
  PALETTE.lightGreen,
  PALETTE.lightBlue,
  PALETTE.lightGray,
  PALETTE.orange,
];

export const NEUTRAL_USER_COLOR: PackedColor = PALETTE.white;
