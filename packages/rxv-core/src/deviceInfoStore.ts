import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DescriptorError, ValidationError } from './errors';
import { createModuleLogger } from './logger';
import type { CapabilitySet, DeviceDescriptor, KeyValueStore, RxvDeviceInfo } from './types';

const logger = createModuleLogger('DeviceInfoStore');

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

const assertKey = (key: string): void => {
  if (!KEY_PATTERN.test(key)) {
    throw new ValidationError(`Invalid store key "${key}"`);
  }
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * @hebrew אחסון JSON בקבצים: קובץ אחד לכל מפתח בתיקייה הנתונה.
 */
export class JsonFileStore implements KeyValueStore<unknown> {
  constructor(private readonly directory: string) {}

  private filePath(key: string): string {
    assertKey(key);
    return path.join(this.directory, `${key}.json`);
  }

  /**
   * @returns הערך השמור, או undefined אם הקובץ לא קיים או ריק.
   */
  async load(key: string): Promise<unknown> {
    const filePath = this.filePath(key);
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      logger.error(`load: Error reading ${filePath}`, { error });
      throw error;
    }
    if (!data.trim()) {
      return undefined;
    }
    return JSON.parse(data);
  }

  async save(key: string, value: unknown): Promise<void> {
    const filePath = this.filePath(key);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
    logger.debug(`save: Wrote ${filePath}`);
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.filePath(key), { force: true });
  }
}

/**
 * @hebrew אחסון בזיכרון, למארחים שמנהלים את ההתמדה בעצמם ולבדיקות.
 */
export class MemoryStore<T> implements KeyValueStore<T> {
  private readonly entries = new Map<string, T>();

  async load(key: string): Promise<T | undefined> {
    return this.entries.get(key);
  }

  async save(key: string, value: T): Promise<void> {
    this.entries.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

// --- ולידציה של רשומה שמורה ---

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

const isRecordOf = <T>(value: unknown, guard: (item: unknown) => item is T): value is Record<string, T> =>
  isRecord(value) && Object.values(value).every(guard);

const isString = (value: unknown): value is string => typeof value === 'string';

function isDeviceDescriptor(value: unknown): value is DeviceDescriptor {
  return isRecord(value)
    && ['deviceId', 'udn', 'friendlyName', 'manufacturer', 'modelName', 'serialNumber', 'controlUrl', 'unitDescriptionUrl']
      .every(field => isString(value[field]))
    && isStringArray(value.iconUrls);
}

function isCapabilitySet(value: unknown): value is CapabilitySet {
  return isRecord(value)
    && isStringArray(value.zones)
    && isStringArray(value.commands)
    && isRecordOf(value.zoneSurroundPrograms, isStringArray)
    && isRecordOf(value.sourcePlayMethods, isStringArray)
    && isRecordOf(value.sourceCursorActions, isStringArray)
    && isRecordOf(value.inputsSource, isString)
    && isRecordOf(value.scenesNumber, isString);
}

export function isRxvDeviceInfo(value: unknown): value is RxvDeviceInfo {
  return isRecord(value)
    && value.version === 1
    && isDeviceDescriptor(value.descriptor)
    && isCapabilitySet(value.capabilities);
}

/**
 * @hebrew שומר רשומת התקן.
 * @param key - מפתח קיים לעדכון; אם לא סופק נוצר מזהה חדש.
 * @returns המפתח שתחתיו נשמרה הרשומה.
 */
export async function saveDeviceInfo(
  store: KeyValueStore<unknown>,
  info: RxvDeviceInfo,
  key: string = randomUUID().replace(/-/g, ''),
): Promise<string> {
  await store.save(key, info);
  logger.info(`saveDeviceInfo: Saved ${info.descriptor.friendlyName || info.descriptor.deviceId} as ${key}`);
  return key;
}

/**
 * @hebrew טוען רשומת התקן שמורה.
 * @returns הרשומה, או undefined אם אין רשומה תחת המפתח.
 * @throws DescriptorError אם הרשומה השמורה פגומה (יש לבצע גילוי מחדש).
 */
export async function loadDeviceInfo(store: KeyValueStore<unknown>, key: string): Promise<RxvDeviceInfo | undefined> {
  let value: unknown;
  try {
    value = await store.load(key);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new DescriptorError(`Stored device info "${key}" is not valid JSON; rediscover the device`, { cause: error });
    }
    throw error;
  }
  if (value === undefined) {
    return undefined;
  }
  if (!isRxvDeviceInfo(value)) {
    throw new DescriptorError(`Stored device info "${key}" is corrupt; rediscover the device`);
  }
  return value;
}

export async function removeDeviceInfo(store: KeyValueStore<unknown>, key: string): Promise<void> {
  await store.remove(key);
  logger.info(`removeDeviceInfo: Removed ${key}`);
}
