/**
 * Range checks applied during the validate phase of a sampler tick.
 */

export const MIN_VALID_TEMPERATURE = -40;
export const MAX_VALID_TEMPERATURE = 150;

export function isValidTemperature(celsius: number): boolean {
  return Number.isFinite(celsius) && celsius >= MIN_VALID_TEMPERATURE && celsius <= MAX_VALID_TEMPERATURE;
}

/** Clamps to [0, 100]; NaN becomes 0 */
export function clampPercentage(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(100, value));
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Negative or non-finite byte counts become 0 */
export function sanitizeBytes(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}
