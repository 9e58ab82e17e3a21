import { DescriptorError } from './errors';
import { createModuleLogger } from './logger';
import type { DeviceDescriptor, UnitCapabilities } from './types';
import {
  byAttr,
  byName,
  childAt,
  childNamed,
  findAll,
  findFirst,
  parseXmlDocument,
  type XmlElement,
} from './xmlTree';

const logger = createModuleLogger('DescriptorParser');

export const DEFAULT_CONTROL_PATH = '/YamahaRemoteControl/ctrl';
export const DEFAULT_UNIT_DESCRIPTION_PATH = '/YamahaRemoteControl/desc.xml';
export const DEFAULT_CONTROL_PORT = 80;

const UDN_PATTERN = /^uuid:([A-Za-z0-9-]+)$/i;

/**
 * @hebrew גוזר מזהה יציב מתוך UDN (מסיר את הקידומת `uuid:`).
 * @returns המזהה, או undefined אם ה-UDN אינו בפורמט הצפוי.
 */
export function deviceIdFromUdn(udn: string): string | undefined {
  return UDN_PATTERN.exec(udn.trim())?.[1];
}

async function parseDescriptorXml(xml: string, what: string): Promise<XmlElement> {
  try {
    return await parseXmlDocument(xml);
  } catch (error) {
    throw new DescriptorError(`Malformed ${what} XML`, { cause: error });
  }
}

const resolveUrl = (base: string, relative: string): string => {
  try {
    return new URL(relative, base).toString();
  } catch (error) {
    logger.warn(`resolveUrl: Could not resolve URL. Base: ${base}, Relative: ${relative}`, { error });
    return relative;
  }
};

const textOf = (node: XmlElement, name: string): string => childNamed(node, name)?.text ?? '';

/**
 * @hebrew מנתח את קובץ ה-device descriptor (UPnP) של המקלט.
 * @param xml - תוכן הקובץ.
 * @param locationUrl - הכתובת שממנה נטען הקובץ; משמשת לפתרון כתובות יחסיות ולכתובות ברירת המחדל.
 * @throws DescriptorError אם אין צומת device, אין UDN, או שה-UDN אינו ניתן לזיהוי.
 */
export async function parseDeviceDescriptor(xml: string, locationUrl: string): Promise<DeviceDescriptor> {
  const root = await parseDescriptorXml(xml, 'device descriptor');
  const deviceNode = root.name === 'device' ? root : childNamed(root, 'device');
  if (!deviceNode) {
    throw new DescriptorError(`Device descriptor from ${locationUrl} has no device node`);
  }

  const udn = textOf(deviceNode, 'UDN');
  if (!udn) {
    throw new DescriptorError(`Device descriptor from ${locationUrl} has no UDN`);
  }
  const deviceId = deviceIdFromUdn(udn);
  if (!deviceId) {
    throw new DescriptorError(`Could not derive a device id from UDN "${udn}"`);
  }

  // Array.prototype.sort יציב, כך שרוחב זהה שומר על סדר המסמך
  const icons = (childNamed(deviceNode, 'iconList')?.children ?? [])
    .filter(icon => icon.name === 'icon')
    .map(icon => {
      const width = parseInt(textOf(icon, 'width'), 10);
      return { width: Number.isNaN(width) ? 0 : width, url: textOf(icon, 'url') };
    })
    .filter(icon => icon.url !== '')
    .sort((a, b) => b.width - a.width);

  const location = new URL(locationUrl);
  const urlBase = findFirst(root, byName('X_URLBase'))?.text
    || `${location.protocol}//${location.hostname}:${DEFAULT_CONTROL_PORT}/`;
  const controlPath = findFirst(root, byName('X_controlURL'))?.text || DEFAULT_CONTROL_PATH;
  const unitDescriptionPath = findFirst(root, byName('X_unitDescURL'))?.text || DEFAULT_UNIT_DESCRIPTION_PATH;

  const descriptor: DeviceDescriptor = {
    deviceId,
    udn,
    friendlyName: textOf(deviceNode, 'friendlyName'),
    manufacturer: textOf(deviceNode, 'manufacturer'),
    modelName: textOf(deviceNode, 'modelName'),
    serialNumber: textOf(deviceNode, 'serialNumber'),
    iconUrls: icons.map(icon => resolveUrl(locationUrl, icon.url)),
    controlUrl: resolveUrl(urlBase, controlPath),
    unitDescriptionUrl: resolveUrl(urlBase, unitDescriptionPath),
  };
  logger.debug(`parseDeviceDescriptor: Parsed ${descriptor.modelName} (${descriptor.deviceId})`, { controlUrl: descriptor.controlUrl });
  return descriptor;
}

const putTexts = (node: XmlElement): string[] =>
  findAll(node, byName('Put_1')).map(put => put.text).filter(text => text !== '');

function buildSurroundPrograms(zoneNode: XmlElement): string[] {
  const setup = findFirst(zoneNode, byAttr('Title_1', 'Setup', 'Menu'));
  if (!setup) {
    return [];
  }
  const programs: string[] = [];
  const hasToggle = (title: string) =>
    findAll(setup, byAttr('Title_1', title)).some(toggle => childNamed(toggle, 'Put_1') !== undefined);
  if (hasToggle('Straight')) {
    programs.push('Straight');
  }
  if (hasToggle('Direct')) {
    programs.push('Direct');
  }
  const selector = findAll(setup, byAttr('Title_1', 'Program'))
    .map(program => childAt(program, ['Put_2', 'Param_1']))
    .find(param => param !== undefined);
  if (selector) {
    programs.push(...findAll(selector, byName('Direct')).map(direct => direct.text).filter(text => text !== ''));
  }
  return programs;
}

/**
 * @hebrew מנתח את קובץ תיאור היחידה (unit descriptor) לסט יכולות חלקי.
 * יכולת אופציונלית שחסרה מניבה אוסף ריק ולא שגיאה.
 * @throws DescriptorError אם המסמך פגום או שאינו Unit_Description.
 */
export async function parseUnitDescriptor(xml: string): Promise<UnitCapabilities> {
  const root = await parseDescriptorXml(xml, 'unit descriptor');
  if (root.name !== 'Unit_Description') {
    throw new DescriptorError(`Unexpected unit descriptor root <${root.name}>`);
  }

  const zoneNodes = findAll(root, byAttr('Func', 'Subunit'))
    .filter(node => node.attrs.YNC_Tag !== undefined);
  const zones = zoneNodes.map(node => node.attrs.YNC_Tag ?? '');

  const commands = findAll(root, byName('Cmd_List'))
    .flatMap(list => list.children.filter(child => child.name === 'Define'))
    .map(define => define.text)
    .filter(text => text !== '');

  const zoneSurroundPrograms: Record<string, string[]> = {};
  for (const zoneNode of zoneNodes) {
    zoneSurroundPrograms[zoneNode.attrs.YNC_Tag ?? ''] = buildSurroundPrograms(zoneNode);
  }

  const sourcePlayMethods: Record<string, string[]> = {};
  const sourceCursorActions: Record<string, string[]> = {};
  for (const node of findAll(root, element => element.attrs.YNC_Tag !== undefined)) {
    const tag = node.attrs.YNC_Tag ?? '';
    const playControl = findFirst(node, byAttr('Func', 'Play_Control'));
    if (playControl) {
      sourcePlayMethods[tag] = putTexts(playControl);
    }
    const cursor = findFirst(node, byAttr('Func', 'Cursor', 'Menu'));
    if (cursor) {
      sourceCursorActions[tag] = putTexts(cursor);
    }
  }

  logger.debug(`parseUnitDescriptor: ${zones.length} zones, ${commands.length} commands`, {
    zones,
    playSources: Object.keys(sourcePlayMethods),
    cursorSources: Object.keys(sourceCursorActions),
  });

  return { zones, commands, zoneSurroundPrograms, sourcePlayMethods, sourceCursorActions };
}
