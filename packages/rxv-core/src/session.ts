import { Capabilities } from './capabilities';
import type { Command, ResponseDocument } from './commandCodec';
import { ControlChannel } from './controlChannel';
import { loadConfig, type RxvConfig } from './config';
import { createAxiosTransport } from './httpTransport';
import { createModuleLogger } from './logger';
import type {
  BasicStatus,
  CursorAction,
  DeviceDescriptor,
  HttpTransport,
  MenuStatus,
  PlaybackAction,
  PlaybackSupport,
  PlayStatus,
  RxvDeviceInfo,
  SleepTimer,
} from './types';
import * as audio from './controls/audio';
import * as input from './controls/input';
import * as menu from './controls/menu';
import * as playback from './controls/playback';
import * as power from './controls/power';
import * as sound from './controls/sound';
import * as system from './controls/system';

const logger = createModuleLogger('RxvSession');

export interface SessionSettings {
  menuMaxAttempts: number;
  menuRetryDelayMs: number;
  volumeFadeStepDelayMs: number;
}

export interface RxvSessionInit {
  channel: ControlChannel;
  capabilities: Capabilities;
  zone?: string;
  descriptor?: DeviceDescriptor;
  settings?: Partial<SessionSettings>;
  signal?: AbortSignal;
}

const settingsFromConfig = (config: RxvConfig): SessionSettings => ({
  menuMaxAttempts: config.menu.maxAttempts,
  menuRetryDelayMs: config.menu.retryDelayMs,
  volumeFadeStepDelayMs: config.volumeFade.stepDelayMs,
});

/**
 * # RxvSession
 * בקר של אזור אחד במקלט. מחזיק את בחירת האזור, והפניה לסט היכולות ולערוץ השליטה
 * המשותפים לכל הבקרים של אותו התקן.
 */
export class RxvSession {
  readonly capabilities: Capabilities;
  readonly descriptor?: DeviceDescriptor;
  readonly settings: Readonly<SessionSettings>;
  readonly signal?: AbortSignal;
  private readonly channel: ControlChannel;
  private currentZone: string;

  constructor(init: RxvSessionInit) {
    this.channel = init.channel;
    this.capabilities = init.capabilities;
    this.descriptor = init.descriptor;
    this.signal = init.signal;
    this.settings = Object.freeze({
      ...settingsFromConfig(loadConfig()),
      ...init.settings,
    });
    const zone = init.zone ?? init.capabilities.zones[0];
    if (zone === undefined) {
      throw new Error('Cannot create a session for a device without zones');
    }
    init.capabilities.assertZone(zone);
    this.currentZone = zone;
  }

  get zone(): string {
    return this.currentZone;
  }

  /**
   * @hebrew משנה את האזור של הבקר הזה בלבד.
   * @throws ValidationError אם האזור אינו קיים בסט היכולות.
   */
  setZone(zone: string): void {
    this.capabilities.assertZone(zone);
    this.currentZone = zone;
  }

  /**
   * @hebrew בקר חדש לאזור אחר, החולק את היכולות ואת ערוץ השליטה.
   */
  forZone(zone: string): RxvSession {
    return new RxvSession({
      channel: this.channel,
      capabilities: this.capabilities,
      descriptor: this.descriptor,
      settings: this.settings,
      signal: this.signal,
      zone,
    });
  }

  /**
   * @hebrew תצוגה של אותו בקר שכל הבקשות שלה מבוטלות יחד עם ה-signal.
   */
  withSignal(signal: AbortSignal): RxvSession {
    return new RxvSession({
      channel: this.channel,
      capabilities: this.capabilities,
      descriptor: this.descriptor,
      settings: this.settings,
      zone: this.currentZone,
      signal,
    });
  }

  get controlUrl(): string {
    return this.channel.controlUrl;
  }

  /**
   * @hebrew שולח פקודה לוגית דרך ערוץ השליטה המשותף.
   */
  request(command: Command): Promise<ResponseDocument> {
    logger.debug(`request: ${command.method} ${Object.keys(command.payload).join(',')}`, {
      zone: command.zoned ? this.currentZone : undefined,
    });
    return this.channel.send(command, this.currentZone, this.signal);
  }

  // --- Power ---
  public getPower = (): Promise<boolean> => power.getPower(this);
  public setPower = (on: boolean): Promise<void> => power.setPower(this, on);
  public turnOn = (): Promise<void> => power.setPower(this, true);
  public turnOff = (): Promise<void> => power.setPower(this, false);
  public getSleep = (): Promise<string> => power.getSleep(this);
  public setSleep = (value: SleepTimer): Promise<void> => power.setSleep(this, value);
  public getBasicStatus = (): Promise<BasicStatus> => power.getBasicStatus(this);

  // --- Audio ---
  public getVolume = (): Promise<number> => audio.getVolume(this);
  public setVolume = (db: number): Promise<void> => audio.setVolume(this, db);
  public setVolumeLevel = (level: number): Promise<void> => audio.setVolumeLevel(this, level);
  public fadeVolume = (targetDb: number): Promise<void> => audio.fadeVolume(this, targetDb);
  public getMute = (): Promise<boolean> => audio.getMute(this);
  public setMute = (muted: boolean): Promise<void> => audio.setMute(this, muted);

  // --- Sound ---
  public getSurroundPrograms = (): readonly string[] => sound.getSurroundPrograms(this);
  public getSurroundProgram = (): Promise<string | undefined> => sound.getSurroundProgram(this);
  public setSurroundProgram = (program: string): Promise<void> => sound.setSurroundProgram(this, program);
  public getDirectMode = (): Promise<boolean> => sound.getDirectMode(this);
  public setDirectMode = (on: boolean): Promise<void> => sound.setDirectMode(this, on);
  public getAdaptiveDrc = (): Promise<boolean> => sound.getAdaptiveDrc(this);
  public setAdaptiveDrc = (auto: boolean): Promise<void> => sound.setAdaptiveDrc(this, auto);
  public getDialogueLevel = (): Promise<number> => sound.getDialogueLevel(this);
  public setDialogueLevel = (level: number): Promise<void> => sound.setDialogueLevel(this, level);

  // --- Input ---
  public getInputs = (): readonly string[] => input.getInputs(this);
  public getInput = (): Promise<string> => input.getInput(this);
  public setInput = (name: string): Promise<void> => input.setInput(this, name);
  public isReady = (): Promise<boolean> => input.isReady(this);
  public getScenes = (): readonly string[] => input.getScenes(this);
  public setScene = (scene: string): Promise<void> => input.setScene(this, scene);

  // --- Playback ---
  public getPlayStatus = (inputName?: string): Promise<PlayStatus | null> => playback.getPlayStatus(this, inputName);
  public getPlaybackSupport = (inputName?: string): Promise<PlaybackSupport> => playback.getPlaybackSupport(this, inputName);
  public playbackControl = (action: PlaybackAction): Promise<void> => playback.playbackControl(this, action);
  public play = (): Promise<void> => playback.play(this);
  public pause = (): Promise<void> => playback.pause(this);
  public stop = (): Promise<void> => playback.stop(this);
  public next = (): Promise<void> => playback.next(this);
  public previous = (): Promise<void> => playback.previous(this);

  // --- Menu ---
  public getMenuStatus = (): Promise<MenuStatus> => menu.getMenuStatus(this);
  public getCursorActions = (): Promise<readonly string[]> => menu.getCursorActions(this);
  public menuCursor = (action: CursorAction): Promise<void> => menu.menuCursor(this, action);
  public menuJumpLine = (line: number): Promise<void> => menu.menuJumpLine(this, line);
  public menuReset = (): Promise<MenuStatus> => menu.menuReset(this);
  public navigateMenu = (inputName: string, path: string): Promise<menu.MenuNavigationResult> =>
    menu.navigateMenuPath(this, inputName, path);
  public setNetRadio = (path: string): Promise<menu.MenuNavigationResult> => menu.setNetRadio(this, path);
  public setServer = (path: string): Promise<menu.MenuNavigationResult> => menu.setServer(this, path);

  // --- System ---
  public getPartyMode = (): Promise<boolean> => system.getPartyMode(this);
  public setPartyMode = (on: boolean): Promise<void> => system.setPartyMode(this, on);
  public getOutputs = (): Promise<Record<string, string>> => system.getOutputs(this);
  public enableOutput = (port: string, enabled: boolean): Promise<void> => system.enableOutput(this, port, enabled);
}

export interface OpenSessionOptions {
  transport?: HttpTransport;
  config?: RxvConfig;
  zone?: string;
}

/**
 * @hebrew פותח בקר מתוך רשומת התקן שמורה (ללא גילוי מחדש).
 */
export function openSession(info: RxvDeviceInfo, options: OpenSessionOptions = {}): RxvSession {
  const config = options.config ?? loadConfig();
  const channel = new ControlChannel(info.descriptor.controlUrl, {
    transport: options.transport ?? createAxiosTransport(),
    timeoutMs: config.http.timeoutMs,
  });
  return new RxvSession({
    channel,
    capabilities: Capabilities.from(info.capabilities),
    descriptor: info.descriptor,
    settings: settingsFromConfig(config),
    zone: options.zone,
  });
}
