import { readFileSync } from 'fs';
import { TransportError } from '../errors';
import type { HttpRequestOptions, HttpTransport } from '../types';
import { parseXmlDocument, type XmlElement } from '../xmlTree';

/**
 * מקלט מדומה בתוך התהליך: מגיש את קבצי התיאור, מפענח מעטפות YAMAHA_AV,
 * מחזיק מצב לכל אזור ולכל תפריט מקור, ומתעד כל בקשה.
 */

export const DEVICE_DESCRIPTION_URL = 'http://192.168.1.50:8080/MediaRenderer/desc.xml';
export const UNIT_DESCRIPTION_URL = 'http://192.168.1.50/YamahaRemoteControl/desc.xml';
export const CONTROL_URL = 'http://192.168.1.50/YamahaRemoteControl/ctrl';

export const readFixture = (name: string): string =>
  readFileSync(new URL(`../__fixtures__/${name}`, import.meta.url), 'utf-8');

export interface FakeZoneState {
  power: string;
  sleep: string;
  volume: number;
  mute: string;
  input: string;
  direct: string;
  straight: string;
  program: string;
  adaptiveDrc: string;
  dialogueLevel: string;
}

export interface FakeMenuNode {
  name: string;
  children?: FakeMenuNode[];
  unselectable?: boolean;
}

export interface FakeMenuState {
  root: FakeMenuNode;
  /** השכבות שנבחרו מתחת לשורש. */
  stack: FakeMenuNode[];
  /** מספר דגימות List_Info שיחזירו Busy אחרי כל בחירה. */
  busyAfterSelect: number;
  busyPolls: number;
  neverReady: boolean;
  /** הפריט האחרון שנבחר בשכבה הסופית. */
  selected?: string;
}

export interface RecordedRequest {
  method: string;
  path: string[];
  value: string;
  body: string;
}

const createZone = (overrides: Partial<FakeZoneState> = {}): FakeZoneState => ({
  power: 'On',
  sleep: 'Off',
  volume: -450,
  mute: 'Off',
  input: 'HDMI1',
  direct: 'Off',
  straight: 'Off',
  program: 'Standard',
  adaptiveDrc: 'Auto',
  dialogueLevel: '1',
  ...overrides,
});

const radioMenu = (): FakeMenuNode => ({
  name: 'NET RADIO',
  children: [
    {
      name: 'Bookmarks',
      children: [
        {
          name: 'Internet',
          children: [{ name: 'Jazz FM' }, { name: 'Radio Paradise' }],
        },
      ],
    },
    { name: 'Locations', children: [{ name: 'Europe' }] },
    { name: 'Help', unselectable: true },
  ],
});

const serverMenu = (): FakeMenuNode => ({
  name: 'SERVER',
  children: [
    { name: 'NAS', children: [{ name: 'Music', children: [{ name: 'Albums' }] }] },
  ],
});

const createMenu = (root: FakeMenuNode): FakeMenuState => ({
  root,
  stack: [],
  busyAfterSelect: 0,
  busyPolls: 0,
  neverReady: false,
});

function leafOf(element: XmlElement, path: string[] = []): { path: string[]; value: string } {
  const [first] = element.children;
  if (!first) {
    return { path, value: element.text };
  }
  return leafOf(first, [...path, first.name]);
}

const escapeXml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const wrap = (path: readonly string[], inner: string): string =>
  path.reduceRight((acc, tag) => `<${tag}>${acc}</${tag}>`, inner);

export class FakeReceiver implements HttpTransport {
  readonly zones: Record<string, FakeZoneState> = {
    Main_Zone: createZone(),
    Zone_2: createZone({ power: 'Standby', input: 'AV1', volume: -300 }),
  };
  readonly menus: Record<string, FakeMenuState> = {
    NET_RADIO: createMenu(radioMenu()),
    SERVER: createMenu(serverMenu()),
  };
  readonly documents = new Map<string, string>([
    [DEVICE_DESCRIPTION_URL, readFixture('deviceDescription.xml')],
    [UNIT_DESCRIPTION_URL, readFixture('unitDescription.xml')],
  ]);
  readonly requests: RecordedRequest[] = [];
  readonly gets: string[] = [];

  partyMode = 'Off';
  hdmiOutputs: Record<string, string> = { OUT_1: 'On', OUT_2: 'Off' };
  playback: Record<string, string> = { NET_RADIO: 'Stop', SERVER: 'Stop', Main_Zone: 'Stop' };
  playInfo: Record<string, string> = {
    NET_RADIO: '<Meta_Info><Station>Radio Paradise</Station><Album></Album><Song>Rock &amp;amp; Roll</Song></Meta_Info>',
    Tuner: '<Meta_Info><Program_Type>Jazz</Program_Type><Program_Service>FM JAZZ</Program_Service>'
      + '<Radio_Text_A>Live</Radio_Text_A><Radio_Text_B>Blue Train</Radio_Text_B></Meta_Info>',
    SERVER: '<Meta_Info><Artist>Miles Davis</Artist><Album>Kind of Blue</Album><Song>So What</Song></Meta_Info>',
  };
  featureAvailability: Record<string, string> = { NET_RADIO: 'Ready', SERVER: 'Not Ready', Tuner: 'Ready' };

  /** קוד RC שיוחזר לבקשת ה-POST הבאה. */
  nextResultCode: string | null = null;
  /** גוף גולמי שיוחזר לבקשת ה-POST הבאה. */
  nextRawResponse: string | null = null;
  /** מספר הבקשות הבאות שייכשלו ב-TransportError. */
  transportFailures = 0;
  /** בקשות POST לא חוזרות עד שה-signal מבוטל. */
  hang = false;

  get puts(): string[] {
    return this.requests
      .filter(request => request.method === 'PUT')
      .map(request => `${request.path.join(',')}=${request.value}`);
  }

  get log(): string[] {
    return this.requests.map(request =>
      request.method === 'GET'
        ? `GET ${request.path.join(',')}`
        : `PUT ${request.path.join(',')}=${request.value}`);
  }

  clear(): void {
    this.requests.length = 0;
    this.gets.length = 0;
  }

  async get(url: string, options: HttpRequestOptions): Promise<string> {
    options.signal?.throwIfAborted();
    this.gets.push(url);
    this.failIfScheduled(url);
    const document = this.documents.get(url);
    if (document === undefined) {
      throw new TransportError(`Request to ${url} failed with HTTP 404`, { url, statusCode: 404 });
    }
    return document;
  }

  async post(url: string, body: string, options: HttpRequestOptions): Promise<string> {
    options.signal?.throwIfAborted();
    const envelope = await parseXmlDocument(body);
    const method = envelope.attrs.cmd ?? '';
    const [payload] = envelope.children;
    const { path, value } = payload ? leafOf(payload, [payload.name]) : { path: [], value: '' };
    this.requests.push({ method, path, value, body });

    if (this.hang) {
      return new Promise<string>((_resolve, reject) => {
        const signal = options.signal;
        if (!signal) {
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    }
    this.failIfScheduled(url);

    if (this.nextRawResponse !== null) {
      const raw = this.nextRawResponse;
      this.nextRawResponse = null;
      return raw;
    }
    if (this.nextResultCode !== null) {
      const code = this.nextResultCode;
      this.nextResultCode = null;
      return `<YAMAHA_AV rsp="${method}" RC="${code}"></YAMAHA_AV>`;
    }

    if (method === 'PUT') {
      this.applyPut(path, value);
      return `<YAMAHA_AV rsp="PUT" RC="0">${wrap(path.slice(0, -1), '')}</YAMAHA_AV>`;
    }
    return `<YAMAHA_AV rsp="GET" RC="0">${wrap(path, this.answerGet(path))}</YAMAHA_AV>`;
  }

  private failIfScheduled(url: string): void {
    if (this.transportFailures > 0) {
      this.transportFailures--;
      throw new TransportError(`Request to ${url} timed out`, { url, code: 'ETIMEDOUT' });
    }
  }

  private answerGet(path: string[]): string {
    const [target = '', ...rest] = path;
    const key = rest.join(',');
    if (key === 'Play_Info') {
      return `<Feature_Availability>Ready</Feature_Availability>`
        + `<Playback_Info>${this.playback[target] ?? 'Stop'}</Playback_Info>${this.playInfo[target] ?? ''}`;
    }
    const zone = this.zones[target];
    if (zone) {
      return this.answerZoneGet(zone, key);
    }
    if (target === 'System') {
      if (key === 'Party_Mode,Mode') {
        return this.partyMode;
      }
      const output = /^Sound_Video,HDMI,Output,(OUT_\d+)$/.exec(key)?.[1];
      if (output) {
        return this.hdmiOutputs[output] ?? 'Off';
      }
    }
    if (key === 'Config') {
      return `<Feature_Availability>${this.featureAvailability[target] ?? 'Ready'}</Feature_Availability>`;
    }
    const menu = this.menus[target];
    if (menu && key === 'List_Info') {
      return this.answerListInfo(menu);
    }
    return '';
  }

  private answerZoneGet(zone: FakeZoneState, key: string): string {
    const level = `<Val>${zone.volume}</Val><Exp>1</Exp><Unit>dB</Unit>`;
    const current = `<Straight>${zone.straight}</Straight><Enhancer>Off</Enhancer>`
      + `<Sound_Program>${zone.program}</Sound_Program>`;
    switch (key) {
      case 'Basic_Status':
        return `<Power_Control><Power>${zone.power}</Power><Sleep>${zone.sleep}</Sleep></Power_Control>`
          + `<Volume><Lvl>${level}</Lvl><Mute>${zone.mute}</Mute></Volume>`
          + `<Input><Input_Sel>${escapeXml(zone.input)}</Input_Sel></Input>`
          + `<Surround><Program_Sel><Current>${current}</Current></Program_Sel></Surround>`
          + `<Sound_Video><Direct><Mode>${zone.direct}</Mode></Direct></Sound_Video>`;
      case 'Power_Control,Power':
        return zone.power;
      case 'Power_Control,Sleep':
        return zone.sleep;
      case 'Volume,Lvl':
        return level;
      case 'Volume,Mute':
        return zone.mute;
      case 'Input,Input_Sel':
        return escapeXml(zone.input);
      case 'Input,Input_Sel_Item':
        return [
          ['HDMI1', ''],
          ['TUNER', 'Tuner'],
          ['NET RADIO', 'NET_RADIO'],
          ['SERVER', 'SERVER'],
          ['AV1', ''],
        ].map(([param = '', source = ''], index) =>
          `<Item_${index + 1}><Param>${param}</Param><RW>RW</RW><Title>${param}</Title>`
          + `<Src_Name>${source}</Src_Name><Src_Number>1</Src_Number></Item_${index + 1}>`).join('');
      case 'Config':
        return '<Feature_Existence>1</Feature_Existence><Name><Zone>Main</Zone></Name>'
          + '<Scene><Scene_1>BD/DVD</Scene_1><Scene_2>TV</Scene_2><Scene_3></Scene_3></Scene>';
      case 'Sound_Video,Direct,Mode':
        return zone.direct;
      case 'Surround,Program_Sel,Current':
        return current;
      case 'Sound_Video,Adaptive_DRC':
        return zone.adaptiveDrc;
      case 'Sound_Video,Dialogue_Adjust,Dialogue_Lvl':
        return zone.dialogueLevel;
      default:
        return '';
    }
  }

  private answerListInfo(menu: FakeMenuState): string {
    const node = menu.stack[menu.stack.length - 1] ?? menu.root;
    const ready = !menu.neverReady && menu.busyPolls === 0;
    if (menu.busyPolls > 0) {
      menu.busyPolls--;
    }
    const lines = (node.children ?? []).map((child, index) => {
      const attribute = child.unselectable ? 'Unselectable' : child.children ? 'Container' : 'Item';
      return `<Line_${index + 1}><Txt>${escapeXml(child.name)}</Txt><Attribute>${attribute}</Attribute></Line_${index + 1}>`;
    });
    for (let index = lines.length; index < 8; index++) {
      lines.push(`<Line_${index + 1}><Txt></Txt><Attribute>Unselectable</Attribute></Line_${index + 1}>`);
    }
    return `<Menu_Status>${ready ? 'Ready' : 'Busy'}</Menu_Status>`
      + `<Menu_Layer>${menu.stack.length + 1}</Menu_Layer>`
      + `<Menu_Name>${escapeXml(node.name)}</Menu_Name>`
      + `<Current_List>${lines.join('')}</Current_List>`
      + `<Cursor_Position><Current_Line>1</Current_Line><Max_Line>${node.children?.length ?? 0}</Max_Line></Cursor_Position>`;
  }

  private applyPut(path: string[], value: string): void {
    const [target = '', ...rest] = path;
    const key = rest.join(',');
    const zone = this.zones[target];
    if (zone) {
      this.applyZonePut(zone, key, value);
      return;
    }
    if (target === 'System') {
      if (key === 'Party_Mode,Mode') {
        this.partyMode = value;
      }
      const output = /^Sound_Video,HDMI,Output,(OUT_\d+)$/.exec(key)?.[1];
      if (output) {
        this.hdmiOutputs[output] = value;
      }
      return;
    }
    if (key === 'Play_Control,Playback') {
      this.playback[target] = value;
      return;
    }
    const menu = this.menus[target];
    if (!menu) {
      return;
    }
    if (key === 'List_Control,Direct_Sel') {
      const node = menu.stack[menu.stack.length - 1] ?? menu.root;
      const line = parseInt(value.replace('Line_', ''), 10);
      const chosen = node.children?.[line - 1];
      if (chosen?.children) {
        menu.stack.push(chosen);
      } else if (chosen) {
        menu.selected = chosen.name;
      }
      menu.busyPolls = menu.busyAfterSelect;
    } else if (key === 'List_Control,Cursor' && value === 'Return') {
      menu.stack.pop();
    } else if (key === 'List_Control,Cursor' && value === 'Return to Home') {
      menu.stack.length = 0;
    }
  }

  private applyZonePut(zone: FakeZoneState, key: string, value: string): void {
    switch (key) {
      case 'Power_Control,Power':
        zone.power = value;
        break;
      case 'Power_Control,Sleep':
        zone.sleep = value;
        break;
      case 'Volume,Lvl,Val':
        zone.volume = parseInt(value, 10);
        break;
      case 'Volume,Mute':
        zone.mute = value;
        break;
      case 'Input,Input_Sel':
        zone.input = value;
        break;
      case 'Sound_Video,Direct,Mode':
        zone.direct = value;
        break;
      case 'Surround,Program_Sel,Current,Straight':
        zone.straight = value;
        break;
      case 'Surround,Program_Sel,Current,Sound_Program':
        zone.straight = 'Off';
        zone.program = value;
        break;
      case 'Sound_Video,Adaptive_DRC':
        zone.adaptiveDrc = value;
        break;
      case 'Sound_Video,Dialogue_Adjust,Dialogue_Lvl':
        zone.dialogueLevel = value;
        break;
      default:
        break;
    }
  }
}
