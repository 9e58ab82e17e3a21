import { create } from 'xmlbuilder2';
import { ProtocolError, ResponseParseError } from './errors';
import type { BasicStatus, MenuStatus, PlayStatus } from './types';
import {
  byName,
  childAt,
  findFirst,
  parseXmlDocument,
  unescapeEntities,
  type XmlElement,
} from './xmlTree';

/**
 * # Command Codec
 * בניית מעטפות `<YAMAHA_AV cmd="GET|PUT">` ופענוח התגובות לרשומות מטופסות.
 */

export type CommandMethod = 'GET' | 'PUT';

type XMLBuilder = ReturnType<typeof create>;

export const GET_PARAM = 'GetParam';

/** @hebrew מקטע XML: שם תגית לטקסט או למקטע מקונן. סדר המפתחות הוא סדר האלמנטים. */
export interface XmlFragment {
  [tag: string]: string | XmlFragment;
}

/**
 * @hebrew פקודה לוגית. `zoned` קובע אם המטען נעטף בתגית האזור של הבקר.
 */
export interface Command {
  method: CommandMethod;
  payload: XmlFragment;
  zoned: boolean;
}

function appendFragment(parent: XMLBuilder, fragment: XmlFragment): void {
  for (const [tag, value] of Object.entries(fragment)) {
    const element = parent.ele(tag);
    if (typeof value === 'string') {
      element.txt(value);
    } else {
      appendFragment(element, value);
    }
  }
}

/**
 * @hebrew מקודד פקודה למעטפת XML. אותו קלט תמיד מפיק אותה מחרוזת.
 * @param command - הפקודה הלוגית.
 * @param zone - תגית האזור (נדרשת כש-`command.zoned`).
 */
export function encodeCommand(command: Command, zone?: string): string {
  const doc = create({ version: '1.0' });
  const envelope = doc.ele('YAMAHA_AV', { cmd: command.method });
  appendFragment(envelope, command.zoned && zone ? { [zone]: command.payload } : command.payload);
  return doc.end({ headless: true, prettyPrint: false });
}

// --- עוצמה ---

export const VOLUME_EXPONENT = 1;
export const VOLUME_UNIT = 'dB';

/**
 * @hebrew ממיר דציבלים לערך השלם שההתקן מקבל: ‎trunc(db*2)*5‎ (צעדים של 0.5 dB, Exp=1).
 */
export function encodeVolume(db: number): number {
  const encoded = Math.trunc(db * 2) * 5;
  // Math.trunc(-0.4) מחזיר -0
  return encoded === 0 ? 0 : encoded;
}

export function decodeVolume(value: string, exponent: string = String(VOLUME_EXPONENT)): number {
  const raw = parseInt(value, 10);
  const exp = parseInt(exponent, 10);
  if (Number.isNaN(raw) || Number.isNaN(exp)) {
    throw new RangeError(`Invalid volume value "${value}" (Exp "${exponent}")`);
  }
  return raw / 10 ** exp;
}

// --- בוני פקודות ---

const zoneGet = (payload: XmlFragment): Command => ({ method: 'GET', payload, zoned: true });
const zonePut = (payload: XmlFragment): Command => ({ method: 'PUT', payload, zoned: true });
const deviceGet = (payload: XmlFragment): Command => ({ method: 'GET', payload, zoned: false });
const devicePut = (payload: XmlFragment): Command => ({ method: 'PUT', payload, zoned: false });

const onOff = (value: boolean): string => (value ? 'On' : 'Off');

export const Commands = {
  basicStatus: () => zoneGet({ Basic_Status: GET_PARAM }),

  getPower: () => zoneGet({ Power_Control: { Power: GET_PARAM } }),
  setPower: (on: boolean) => zonePut({ Power_Control: { Power: on ? 'On' : 'Standby' } }),
  getSleep: () => zoneGet({ Power_Control: { Sleep: GET_PARAM } }),
  setSleep: (value: string) => zonePut({ Power_Control: { Sleep: value } }),

  getVolume: () => zoneGet({ Volume: { Lvl: GET_PARAM } }),
  setVolume: (db: number) => zonePut({
    Volume: {
      Lvl: {
        Val: String(encodeVolume(db)),
        Exp: String(VOLUME_EXPONENT),
        Unit: VOLUME_UNIT,
      },
    },
  }),
  getMute: () => zoneGet({ Volume: { Mute: GET_PARAM } }),
  setMute: (muted: boolean) => zonePut({ Volume: { Mute: onOff(muted) } }),

  getInput: () => zoneGet({ Input: { Input_Sel: GET_PARAM } }),
  setInput: (input: string) => zonePut({ Input: { Input_Sel: input } }),
  getInputList: () => zoneGet({ Input: { Input_Sel_Item: GET_PARAM } }),

  getZoneConfig: () => zoneGet({ Config: GET_PARAM }),
  setScene: (sceneCode: string) => zonePut({ Scene: { Scene_Sel: sceneCode } }),

  getDirectMode: () => zoneGet({ Sound_Video: { Direct: { Mode: GET_PARAM } } }),
  setDirectMode: (on: boolean) => zonePut({ Sound_Video: { Direct: { Mode: onOff(on) } } }),
  getSurroundProgram: () => zoneGet({ Surround: { Program_Sel: { Current: GET_PARAM } } }),
  setStraight: () => zonePut({ Surround: { Program_Sel: { Current: { Straight: 'On' } } } }),
  setSoundProgram: (program: string) => zonePut({ Surround: { Program_Sel: { Current: { Sound_Program: program } } } }),
  getAdaptiveDrc: () => zoneGet({ Sound_Video: { Adaptive_DRC: GET_PARAM } }),
  setAdaptiveDrc: (value: string) => zonePut({ Sound_Video: { Adaptive_DRC: value } }),
  getDialogueLevel: () => zoneGet({ Sound_Video: { Dialogue_Adjust: { Dialogue_Lvl: GET_PARAM } } }),
  setDialogueLevel: (level: number) => zonePut({ Sound_Video: { Dialogue_Adjust: { Dialogue_Lvl: String(level) } } }),

  getPlayInfo: (source: string) => deviceGet({ [source]: { Play_Info: GET_PARAM } }),
  playback: (source: string, action: string) => devicePut({ [source]: { Play_Control: { Playback: action } } }),
  getSourceConfig: (source: string) => deviceGet({ [source]: { Config: GET_PARAM } }),

  getListInfo: (source: string) => deviceGet({ [source]: { List_Info: GET_PARAM } }),
  jumpLine: (source: string, line: number) => devicePut({ [source]: { List_Control: { Jump_Line: String(line) } } }),
  directSelect: (source: string, line: number) => devicePut({ [source]: { List_Control: { Direct_Sel: `Line_${line}` } } }),
  listCursor: (source: string, action: string) => devicePut({ [source]: { List_Control: { Cursor: action } } }),
  cursorControl: (source: string, action: string) => devicePut({ [source]: { Cursor_Control: { Cursor: action } } }),

  getPartyMode: () => deviceGet({ System: { Party_Mode: { Mode: GET_PARAM } } }),
  setPartyMode: (on: boolean) => devicePut({ System: { Party_Mode: { Mode: onOff(on) } } }),
  getHdmiOutput: (port: number) => deviceGet({ System: { Sound_Video: { HDMI: { Output: { [`OUT_${port}`]: GET_PARAM } } } } }),
  setHdmiOutput: (port: number, enabled: boolean) =>
    devicePut({ System: { Sound_Video: { HDMI: { Output: { [`OUT_${port}`]: onOff(enabled) } } } } }),
} satisfies Record<string, (...args: never[]) => Command>;

// --- פענוח תגובות ---

/**
 * @hebrew תגובה מפוענחת של ההתקן, עם גישה לשדות לפי נתיב.
 */
export class ResponseDocument {
  constructor(readonly root: XmlElement, readonly raw: string) {}

  element(path: readonly string[]): XmlElement | undefined {
    return childAt(this.root, path);
  }

  text(path: readonly string[]): string | undefined {
    return this.element(path)?.text;
  }

  /**
   * @throws ResponseParseError אם הנתיב חסר בתגובה.
   */
  requireElement(path: readonly string[]): XmlElement {
    const element = this.element(path);
    if (!element) {
      throw new ResponseParseError(`Response is missing ${path.join('/')}`, this.raw);
    }
    return element;
  }

  requireText(path: readonly string[]): string {
    return this.requireElement(path).text;
  }

  /** @hebrew טקסט הצאצא הראשון בשם הנתון, בכל עומק. */
  firstText(name: string): string | undefined {
    return findFirst(this.root, byName(name))?.text;
  }

  requireFirstText(name: string): string {
    const text = this.firstText(name);
    if (text === undefined) {
      throw new ResponseParseError(`Response has no ${name} element`, this.raw);
    }
    return text;
  }
}

/**
 * @hebrew מפענח תגובה גולמית ומוודא את קוד התוצאה.
 * @throws ResponseParseError עבור XML פגום או שורש לא צפוי.
 * @throws ProtocolError עבור RC שאינו 0.
 */
export async function decodeResponse(raw: string): Promise<ResponseDocument> {
  let root: XmlElement;
  try {
    root = await parseXmlDocument(raw);
  } catch (error) {
    throw new ResponseParseError('Malformed XML in receiver response', raw, { cause: error });
  }
  if (root.name !== 'YAMAHA_AV') {
    throw new ResponseParseError(`Unexpected response root <${root.name}>`, raw);
  }
  const resultCode = root.attrs.RC;
  if (resultCode !== '0') {
    throw new ProtocolError(resultCode ?? 'missing', raw);
  }
  return new ResponseDocument(root, raw);
}

const parseInteger = (doc: ResponseDocument, name: string, text: string): number => {
  const value = parseInt(text, 10);
  if (Number.isNaN(value)) {
    throw new ResponseParseError(`${name} is not a number: "${text}"`, doc.raw);
  }
  return value;
};

export function decodeVolumeLevel(doc: ResponseDocument, path: readonly string[]): number {
  const level = doc.requireElement(path);
  const value = childAt(level, ['Val'])?.text;
  if (value === undefined) {
    throw new ResponseParseError(`Response is missing ${path.join('/')}/Val`, doc.raw);
  }
  try {
    return decodeVolume(value, childAt(level, ['Exp'])?.text || String(VOLUME_EXPONENT));
  } catch (error) {
    throw new ResponseParseError(`Invalid volume in ${path.join('/')}`, doc.raw, { cause: error });
  }
}

/**
 * @hebrew Direct מסתיר את בורר התוכנית, ו-Straight גובר על שם התוכנית.
 */
export function resolveSoundProgram(state: { direct?: string; straight?: string; program?: string }): string | undefined {
  if (state.direct === 'On') {
    return 'Direct';
  }
  if (state.straight === 'On') {
    return 'Straight';
  }
  return state.program || undefined;
}

export function decodeBasicStatus(doc: ResponseDocument, zone: string): BasicStatus {
  const base = [zone, 'Basic_Status'];
  const soundProgram = resolveSoundProgram({
    direct: doc.text([...base, 'Sound_Video', 'Direct', 'Mode']),
    straight: doc.text([...base, 'Surround', 'Program_Sel', 'Current', 'Straight']),
    program: doc.text([...base, 'Surround', 'Program_Sel', 'Current', 'Sound_Program']),
  });
  const status: BasicStatus = {
    on: doc.requireText([...base, 'Power_Control', 'Power']) === 'On',
    volume: decodeVolumeLevel(doc, [...base, 'Volume', 'Lvl']),
    muted: doc.requireText([...base, 'Volume', 'Mute']) === 'On',
    input: doc.requireText([...base, 'Input', 'Input_Sel']),
  };
  if (soundProgram !== undefined) {
    status.soundProgram = soundProgram;
  }
  return status;
}

const PLAY_INFO_FIELDS = {
  artist: ['Artist', 'Program_Type'],
  album: ['Album', 'Radio_Text_A'],
  song: ['Song', 'Track', 'Radio_Text_B'],
  station: ['Station', 'Program_Service'],
} as const;

function firstNonEmpty(doc: ResponseDocument, names: readonly string[]): string | undefined {
  for (const name of names) {
    const text = doc.firstText(name);
    if (text) {
      // Tuner ו-Net Radio שולחים לעיתים ישויות מקודדות פעמיים
      const value = unescapeEntities(text).trim();
      if (value) {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * @hebrew מפענח Play_Info. כל שדה נלקח מהתגית הראשונה ברשימת החלופות שאינה ריקה.
 * @param source - שם המקור; Tuner נחשב תמיד כמנגן.
 */
export function decodePlayStatus(doc: ResponseDocument, source: string): PlayStatus {
  return {
    playing: doc.firstText('Playback_Info') === 'Play' || source === 'Tuner',
    artist: firstNonEmpty(doc, PLAY_INFO_FIELDS.artist),
    album: firstNonEmpty(doc, PLAY_INFO_FIELDS.album),
    song: firstNonEmpty(doc, PLAY_INFO_FIELDS.song),
    station: firstNonEmpty(doc, PLAY_INFO_FIELDS.station),
  };
}

export function decodeMenuStatus(doc: ResponseDocument): MenuStatus {
  const listNode = findFirst(doc.root, byName('Current_List'));
  if (!listNode) {
    throw new ResponseParseError('Response has no Current_List element', doc.raw);
  }
  const currentList = new Map<string, string>();
  for (const line of listNode.children) {
    if (childAt(line, ['Attribute'])?.text !== 'Unselectable') {
      currentList.set(line.name, childAt(line, ['Txt'])?.text ?? '');
    }
  }
  return {
    ready: doc.requireFirstText('Menu_Status') === 'Ready',
    layer: parseInteger(doc, 'Menu_Layer', doc.requireFirstText('Menu_Layer')),
    name: doc.requireFirstText('Menu_Name'),
    currentLine: parseInteger(doc, 'Current_Line', doc.requireFirstText('Current_Line')),
    maxLine: parseInteger(doc, 'Max_Line', doc.requireFirstText('Max_Line')),
    currentList,
  };
}

/**
 * @hebrew רשימת הקלטים מ-Input_Sel_Item: שם הקלט לשם המקור הפנימי (או מחרוזת ריקה).
 */
export function decodeInputList(doc: ResponseDocument, zone: string): Record<string, string> {
  const items = doc.requireElement([zone, 'Input', 'Input_Sel_Item']);
  const inputs: Record<string, string> = {};
  for (const item of items.children) {
    const param = childAt(item, ['Param'])?.text;
    if (param) {
      inputs[param] = childAt(item, ['Src_Name'])?.text ?? '';
    }
  }
  return inputs;
}

/**
 * @hebrew רשימת הסצנות מתוך Config של האזור: שם הסצנה לקוד (`Scene_1` → `Scene 1`).
 */
export function decodeScenes(doc: ResponseDocument): Record<string, string> {
  const scenes: Record<string, string> = {};
  const sceneNode = findFirst(doc.root, byName('Scene'));
  for (const scene of sceneNode?.children ?? []) {
    if (scene.text) {
      scenes[scene.text] = scene.name.replace(/_/g, ' ');
    }
  }
  return scenes;
}
