import { getProcessedEnv, type EnvValue } from './env';

/**
 * # Configuration
 * ברירות מחדל, דריסה ממשתני סביבה `RXV_*`, ודריסה מפורשת מהקוד (בסדר עדיפות עולה).
 */

export interface RxvConfig {
  http: {
    /** @hebrew זמן קצוב לכל בקשת HTTP. */
    timeoutMs: number;
  };
  endpoints: {
    deviceDescriptionPort: number;
    deviceDescriptionPath: string;
  };
  menu: {
    maxAttempts: number;
    retryDelayMs: number;
  };
  poller: {
    intervalMs: number;
    /** @hebrew זמן קצוב לסבב עדכון שלם; סבב שחורג ממנו מבוטל ולא מפורסם. */
    tickTimeoutMs: number;
  };
  discovery: {
    retries: number;
    retryDelayMs: number;
  };
  storage: {
    directory: string;
  };
  volumeFade: {
    stepDelayMs: number;
  };
}

export const defaultConfig: RxvConfig = {
  http: {
    timeoutMs: 10000,
  },
  endpoints: {
    deviceDescriptionPort: 8080,
    deviceDescriptionPath: '/MediaRenderer/desc.xml',
  },
  menu: {
    maxAttempts: 20,
    retryDelayMs: 1000,
  },
  poller: {
    intervalMs: 2000,
    tickTimeoutMs: 8000,
  },
  discovery: {
    retries: 3,
    retryDelayMs: 1000,
  },
  storage: {
    directory: '.rxv',
  },
  volumeFade: {
    stepDelayMs: 500,
  },
};

export type RxvConfigOverrides = {
  [Section in keyof RxvConfig]?: Partial<RxvConfig[Section]>;
};

/**
 * ממיר camelCase ל-SNAKE_CASE עבור שמות משתני סביבה.
 * @example camelToSnakeCase('tickTimeoutMs') // 'TICK_TIMEOUT_MS'
 */
export const camelToSnakeCase = (str: string): string =>
  str.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();

const envName = (section: string, key: string): string =>
  `RXV_${camelToSnakeCase(section)}_${camelToSnakeCase(key)}`;

function readNumber(env: Record<string, EnvValue>, section: string, key: string, fallback: number): number {
  const value = env[envName(section, key)];
  return typeof value === 'number' ? value : fallback;
}

function readString(env: Record<string, EnvValue>, section: string, key: string, fallback: string): string {
  const value = env[envName(section, key)];
  return value === undefined || value === '' ? fallback : String(value);
}

/**
 * בונה את התצורה הסופית.
 * @example RXV_MENU_MAX_ATTEMPTS=30 דורס את menu.maxAttempts
 */
export function loadConfig(overrides: RxvConfigOverrides = {}): RxvConfig {
  const env = getProcessedEnv();
  const d = defaultConfig;
  const fromEnv: RxvConfig = {
    http: {
      timeoutMs: readNumber(env, 'http', 'timeoutMs', d.http.timeoutMs),
    },
    endpoints: {
      deviceDescriptionPort: readNumber(env, 'endpoints', 'deviceDescriptionPort', d.endpoints.deviceDescriptionPort),
      deviceDescriptionPath: readString(env, 'endpoints', 'deviceDescriptionPath', d.endpoints.deviceDescriptionPath),
    },
    menu: {
      maxAttempts: readNumber(env, 'menu', 'maxAttempts', d.menu.maxAttempts),
      retryDelayMs: readNumber(env, 'menu', 'retryDelayMs', d.menu.retryDelayMs),
    },
    poller: {
      intervalMs: readNumber(env, 'poller', 'intervalMs', d.poller.intervalMs),
      tickTimeoutMs: readNumber(env, 'poller', 'tickTimeoutMs', d.poller.tickTimeoutMs),
    },
    discovery: {
      retries: readNumber(env, 'discovery', 'retries', d.discovery.retries),
      retryDelayMs: readNumber(env, 'discovery', 'retryDelayMs', d.discovery.retryDelayMs),
    },
    storage: {
      directory: readString(env, 'storage', 'directory', d.storage.directory),
    },
    volumeFade: {
      stepDelayMs: readNumber(env, 'volumeFade', 'stepDelayMs', d.volumeFade.stepDelayMs),
    },
  };

  return {
    http: { ...fromEnv.http, ...overrides.http },
    endpoints: { ...fromEnv.endpoints, ...overrides.endpoints },
    menu: { ...fromEnv.menu, ...overrides.menu },
    poller: { ...fromEnv.poller, ...overrides.poller },
    discovery: { ...fromEnv.discovery, ...overrides.discovery },
    storage: { ...fromEnv.storage, ...overrides.storage },
    volumeFade: { ...fromEnv.volumeFade, ...overrides.volumeFade },
  };
}
