export function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const env = import.meta.env;

/** Amount added to the `uTime` uniform on every animation frame. */
export const RENDER_TIME_STEP = numberFromEnv(env.VITE_RENDER_TIME_STEP, 20);

export const MAP_TOLERANCE = numberFromEnv(env.VITE_MAP_TOLERANCE, 0.1);
export const MAP_CORNER_RADIUS = numberFromEnv(env.VITE_MAP_CORNER_RADIUS, 0.02);

export const UNIT_TOLERANCE = numberFromEnv(env.VITE_UNIT_TOLERANCE, 0.005);
