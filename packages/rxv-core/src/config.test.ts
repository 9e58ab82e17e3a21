import { afterEach, describe, expect, it, vi } from 'vitest';
import { camelToSnakeCase, defaultConfig, loadConfig } from './config';
import { getProcessedEnv, isStringLosslesslyNumeric } from './env';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('loadConfig', () => {
  it('מחזיר את ברירות המחדל כשאין משתני סביבה', () => {
    expect(loadConfig()).toEqual(defaultConfig);
  });

  it('משתני RXV_* דורסים ברירות מחדל', () => {
    vi.stubEnv('RXV_MENU_MAX_ATTEMPTS', '30');
    vi.stubEnv('RXV_POLLER_TICK_TIMEOUT_MS', '2500');
    vi.stubEnv('RXV_ENDPOINTS_DEVICE_DESCRIPTION_PATH', '/desc.xml');

    const config = loadConfig();

    expect(config.menu).toEqual({ maxAttempts: 30, retryDelayMs: 1000 });
    expect(config.poller.tickTimeoutMs).toBe(2500);
    expect(config.endpoints.deviceDescriptionPath).toBe('/desc.xml');
  });

  it('ערך לא מספרי בשדה מספרי נופל לברירת המחדל', () => {
    vi.stubEnv('RXV_HTTP_TIMEOUT_MS', 'soon');

    expect(loadConfig().http.timeoutMs).toBe(10000);
  });

  it('דריסה מהקוד גוברת על משתני הסביבה', () => {
    vi.stubEnv('RXV_VOLUME_FADE_STEP_DELAY_MS', '250');
    vi.stubEnv('RXV_DISCOVERY_RETRIES', '5');

    const config = loadConfig({ volumeFade: { stepDelayMs: 0 } });

    expect(config.volumeFade.stepDelayMs).toBe(0);
    expect(config.discovery).toEqual({ retries: 5, retryDelayMs: 1000 });
  });
});

describe('env', () => {
  it('camelToSnakeCase', () => {
    expect(camelToSnakeCase('tickTimeoutMs')).toBe('TICK_TIMEOUT_MS');
    expect(camelToSnakeCase('volumeFade')).toBe('VOLUME_FADE');
    expect(camelToSnakeCase('http')).toBe('HTTP');
  });

  it('isStringLosslesslyNumeric', () => {
    expect(isStringLosslesslyNumeric('42')).toBe(true);
    expect(isStringLosslesslyNumeric('1.0')).toBe(true);
    expect(isStringLosslesslyNumeric('-0.5')).toBe(true);
    expect(isStringLosslesslyNumeric('0x10')).toBe(false);
    expect(isStringLosslesslyNumeric('Infinity')).toBe(false);
    expect(isStringLosslesslyNumeric('')).toBe(false);
    expect(isStringLosslesslyNumeric(undefined)).toBe(false);
  });

  it('getProcessedEnv ממיר מספרים ומשאיר מחרוזות', () => {
    vi.stubEnv('RXV_HOST', 'receiver.local');
    vi.stubEnv('RXV_HTTP_TIMEOUT_MS', '1500');

    const env = getProcessedEnv();

    expect(env.RXV_HOST).toBe('receiver.local');
    expect(env.RXV_HTTP_TIMEOUT_MS).toBe(1500);
  });
});
