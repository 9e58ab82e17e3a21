import { clamp } from './utils';

/**
 * # Volume Scale
 * המרה בין דציבלים לעוצמה מנורמלת 0..1 עבור המארח.
 * הטווח הפיזי של המקלט: -80.0 עד +15.0 dB בצעדים של 0.5.
 */

export const MIN_VOLUME_DB = -80;
export const MAX_VOLUME_DB = 15;
const VOLUME_RANGE_DB = MAX_VOLUME_DB - MIN_VOLUME_DB;

export function volumeToLevel(db: number): number {
  return clamp((db - MIN_VOLUME_DB) / VOLUME_RANGE_DB, 0, 1);
}

/**
 * @hebrew ממיר עוצמה מנורמלת לדציבלים, מעוגל לצעד חצי dB הקרוב.
 */
export function levelToVolume(level: number): number {
  const db = clamp(level, 0, 1) * VOLUME_RANGE_DB + MIN_VOLUME_DB;
  return Math.round(db * 2) / 2;
}
