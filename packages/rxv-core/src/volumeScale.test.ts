import { describe, expect, it } from 'vitest';
import { MAX_VOLUME_DB, MIN_VOLUME_DB, levelToVolume, volumeToLevel } from './volumeScale';

describe('volumeScale', () => {
  it('ממפה את קצוות הטווח', () => {
    expect(volumeToLevel(MIN_VOLUME_DB)).toBe(0);
    expect(volumeToLevel(MAX_VOLUME_DB)).toBe(1);
    expect(levelToVolume(0)).toBe(-80);
    expect(levelToVolume(1)).toBe(15);
  });

  it('מעגל לצעד של חצי dB', () => {
    expect(levelToVolume(0.5)).toBe(-32.5);
    expect(levelToVolume(0.3)).toBe(-51.5);
    expect(volumeToLevel(-32.5)).toBeCloseTo(0.5);
  });

  it('מגביל ערכים מחוץ לטווח', () => {
    expect(volumeToLevel(-100)).toBe(0);
    expect(volumeToLevel(20)).toBe(1);
    expect(levelToVolume(1.5)).toBe(15);
    expect(levelToVolume(-0.2)).toBe(-80);
  });
});
