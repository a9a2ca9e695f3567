import {
  DEFAULT_UNIT_SIZE,
  IGNORED_UNIT_PREFIX,
  NEUTRAL_USER_COLOR,
  UNIT_PALETTE,
  USER_COLORS,
} from '../data/unit-palette';
import type { EntityVisual, PackedColor } from '../types/render.types';

/**
 * Fallback colour for a participant. Ids 0-3 get a fixed palette colour,
 * anything else (negative, 4+, or the unknown-owner sentinel) is white.
 */
export function userColor(userId: number): PackedColor {
  if (Number.isInteger(userId) && userId >= 0 && userId < USER_COLORS.length) {
    return USER_COLORS[userId];
  }
  return NEUTRAL_USER_COLOR;
}

/**
 * Resolve the marker size and colour for a unit type. Known types come from
 * the palette table; unknown ones use the default size and the owner's colour.
 */
export function classifyUnit(unitName: string, userId: number): EntityVisual {
  const entry = UNIT_PALETTE.get(unitName);
  if (entry) {
    return { size: entry.size ?? DEFAULT_UNIT_SIZE, color: entry.color };
  }

  if (!unitName.startsWith(IGNORED_UNIT_PREFIX)) {
    console.log(`[unit-classifier] Unknown unit name: '${unitName}'`);
  }
  return { size: DEFAULT_UNIT_SIZE, color: userColor(userId) };
}
