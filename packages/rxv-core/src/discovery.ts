import { Commands, decodeInputList, decodeScenes } from './commandCodec';
import { ControlChannel } from './controlChannel';
import { loadConfig, type RxvConfig } from './config';
import { parseDeviceDescriptor, parseUnitDescriptor } from './descriptorParser';
import { createAxiosTransport } from './httpTransport';
import { createModuleLogger } from './logger';
import type { CapabilitySet, HttpTransport, RxvDeviceInfo } from './types';
import { retry } from './utils';

const logger = createModuleLogger('Discovery');

export interface DiscoveryOptions {
  transport?: HttpTransport;
  config?: RxvConfig;
  signal?: AbortSignal;
}

/**
 * @hebrew כתובת קובץ ה-device descriptor של מקלט לפי שם המארח או ה-IP שלו.
 */
export function deviceDescriptionUrl(host: string, config: RxvConfig = loadConfig()): string {
  const { deviceDescriptionPort, deviceDescriptionPath } = config.endpoints;
  return new URL(deviceDescriptionPath, `http://${host}:${deviceDescriptionPort}`).toString();
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * @hebrew מגלה את המקלט ובונה את רשומת ההתקן המלאה באופן אטומי:
 * device descriptor, unit descriptor, ואז רשימת הקלטים והסצנות מה-control endpoint.
 * כל כשל עוצר את הגילוי; לא מוחזרת רשומה חלקית.
 * @param target - שם מארח / IP, או כתובת מלאה של ה-device descriptor.
 * @throws DescriptorError / ProtocolError / TransportError / ResponseParseError
 */
export async function discoverDevice(target: string, options: DiscoveryOptions = {}): Promise<RxvDeviceInfo> {
  const config = options.config ?? loadConfig();
  const transport = options.transport ?? createAxiosTransport();
  const locationUrl = /^https?:\/\//i.test(target) ? target : deviceDescriptionUrl(target, config);
  const requestOptions = { timeoutMs: config.http.timeoutMs, signal: options.signal };
  const withRetry = <T>(fn: () => Promise<T>) =>
    retry(fn, { retries: config.discovery.retries, delayMs: config.discovery.retryDelayMs, logger });

  logger.info(`discoverDevice: Fetching device description from ${locationUrl}`);
  const deviceXml = await withRetry(() => transport.get(locationUrl, requestOptions));
  const descriptor = await parseDeviceDescriptor(deviceXml, locationUrl);

  logger.debug(`discoverDevice: Fetching unit description from ${descriptor.unitDescriptionUrl}`);
  const unitXml = await withRetry(() => transport.get(descriptor.unitDescriptionUrl, requestOptions));
  const unit = await parseUnitDescriptor(unitXml);

  const [mainZone] = unit.zones;
  let inputsSource: Record<string, string> = {};
  let scenesNumber: Record<string, string> = {};
  if (mainZone !== undefined) {
    const channel = new ControlChannel(descriptor.controlUrl, { transport, timeoutMs: config.http.timeoutMs });
    const inputs = await withRetry(() => channel.send(Commands.getInputList(), mainZone, options.signal));
    inputsSource = decodeInputList(inputs, mainZone);
    const zoneConfig = await withRetry(() => channel.send(Commands.getZoneConfig(), mainZone, options.signal));
    scenesNumber = decodeScenes(zoneConfig);
  } else {
    logger.warn(`discoverDevice: ${descriptor.modelName} advertises no zones`);
  }

  const capabilities: CapabilitySet = { ...unit, inputsSource, scenesNumber };

  logger.info(`discoverDevice: Discovered ${descriptor.friendlyName} (${descriptor.modelName})`, {
    deviceId: descriptor.deviceId,
    zones: unit.zones,
    inputs: Object.keys(inputsSource),
  });
  const info: RxvDeviceInfo = { version: 1, descriptor, capabilities };
  return deepFreeze(info);
}
