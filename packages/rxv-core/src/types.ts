// הגדרות הממשקים והטיפוסים של שכבת השליטה ב-YAMAHA_AV.

/**
 * # Device Types
 */

/**
 * @hebrew תיאור ההתקן כפי שנבנה מקובץ ה-device descriptor (UPnP).
 * נבנה פעם אחת בזמן הגילוי ולא משתנה לאחר מכן.
 */
export interface DeviceDescriptor {
  /** @hebrew מזהה יציב שנגזר מה-UDN (ללא הקידומת `uuid:`). */
  deviceId: string;
  udn: string;
  friendlyName: string;
  manufacturer: string;
  modelName: string;
  serialNumber: string;
  /** @hebrew כתובות האייקונים, ממוינות מהרוחב הגדול לקטן. */
  iconUrls: string[];
  /** @hebrew כתובת ה-control endpoint (POST של מעטפות YAMAHA_AV). */
  controlUrl: string;
  /** @hebrew כתובת קובץ תיאור היחידה (unit descriptor). */
  unitDescriptionUrl: string;
}

/**
 * @hebrew סט היכולות של ההתקן, כרשומה פשוטה הניתנת לסריאליזציה ל-JSON.
 */
export interface CapabilitySet {
  zones: string[];
  /** @hebrew תוכניות הסראונד לכל אזור, כולל Straight ו-Direct כשהן מוצהרות. */
  zoneSurroundPrograms: Record<string, string[]>;
  /** @hebrew נתיבי פקודות מלאים, מופרדים בפסיקים (למשל `Main_Zone,Volume,Lvl`). */
  commands: string[];
  sourcePlayMethods: Record<string, string[]>;
  sourceCursorActions: Record<string, string[]>;
  /** @hebrew שם הקלט המוצג (למשל `NET RADIO`) לשם המקור הפנימי (`NET_RADIO`), או מחרוזת ריקה. */
  inputsSource: Record<string, string>;
  /** @hebrew שם הסצנה לקוד הסצנה (למשל `Scene 1`). */
  scenesNumber: Record<string, string>;
}

/**
 * @hebrew החלק שנגזר מקובץ תיאור היחידה בלבד (ללא קלטים וסצנות, שמגיעים משאילתות control).
 */
export type UnitCapabilities = Omit<CapabilitySet, 'inputsSource' | 'scenesNumber'>;

/**
 * @hebrew הרשומה הנשמרת בין הפעלות כדי לדלג על גילוי מחדש.
 */
export interface RxvDeviceInfo {
  version: 1;
  descriptor: DeviceDescriptor;
  capabilities: CapabilitySet;
}

/**
 * # Status Types
 */

export interface BasicStatus {
  on: boolean;
  /** @hebrew עוצמה בדציבלים, בצעדים של 0.5. */
  volume: number;
  muted: boolean;
  input: string;
  /** @hebrew תוכנית הסראונד הפעילה, כשהיא מדווחת במצב הבסיסי. */
  soundProgram?: string;
}

export interface PlayStatus {
  playing: boolean;
  artist?: string;
  album?: string;
  song?: string;
  station?: string;
}

export interface PlaybackSupport {
  play: boolean;
  pause: boolean;
  stop: boolean;
  skipForward: boolean;
  skipReverse: boolean;
}

export interface MenuStatus {
  ready: boolean;
  layer: number;
  name: string;
  currentLine: number;
  maxLine: number;
  /** @hebrew מזהה שורה (`Line_1`) לטקסט המוצג, לפי סדר המסמך. שורות Unselectable מושמטות. */
  currentList: Map<string, string>;
}

/**
 * @hebrew צילום מצב מנורמל שהפולר מפרסם למארח.
 */
export interface StatusSnapshot {
  zone: string;
  on: boolean;
  muted: boolean;
  volume: number;
  /** @hebrew עוצמה מנורמלת 0..1 על פני הטווח -80..+15 dB. */
  volumeLevel: number;
  input: string;
  soundProgram?: string;
  playStatus: PlayStatus | null;
  playbackSupport: PlaybackSupport;
  updatedAt: Date;
}

/**
 * # Enumerations
 */

export enum PlaybackAction {
  Play = 'Play',
  Pause = 'Pause',
  Stop = 'Stop',
  SkipForward = 'Skip Fwd',
  SkipReverse = 'Skip Rev',
}

export enum CursorAction {
  Up = 'Up',
  Down = 'Down',
  Left = 'Left',
  Right = 'Right',
  Select = 'Sel',
  Return = 'Return',
  ReturnToHome = 'Return to Home',
  OnScreen = 'On Screen',
  TopMenu = 'Top Menu',
  Menu = 'Menu',
  Option = 'Option',
  Display = 'Display',
}

export type PartyMode = 'On' | 'Off';

export const SLEEP_TIMER_VALUES = ['Off', '30 min', '60 min', '90 min', '120 min', 'Last'] as const;
export type SleepTimer = typeof SLEEP_TIMER_VALUES[number];

export type AdaptiveDrc = 'Auto' | 'Off';

/**
 * # Transport Types
 */

export interface HttpRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * @hebrew לקוח ה-HTTP שהמארח מספק. מחזיר את גוף התגובה כטקסט.
 * כשלי רשת/זמן קצוב נזרקים כ-TransportError.
 */
export interface HttpTransport {
  get(url: string, options: HttpRequestOptions): Promise<string>;
  post(url: string, body: string, options: HttpRequestOptions): Promise<string>;
}

/**
 * @hebrew אחסון מפתח/ערך אסינכרוני שהמארח מספק.
 */
export interface KeyValueStore<T> {
  load(key: string): Promise<T | undefined>;
  save(key: string, value: T): Promise<void>;
  remove(key: string): Promise<void>;
}
