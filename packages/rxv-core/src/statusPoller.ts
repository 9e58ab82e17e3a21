import { EventEmitter } from 'events';
import { loadConfig } from './config';
import { TransportError } from './errors';
import { createModuleLogger } from './logger';
import type { RxvSession } from './session';
import type { StatusSnapshot } from './types';
import { volumeToLevel } from './volumeScale';

const logger = createModuleLogger('StatusPoller');

export interface StatusPollerOptions {
  /** @hebrew מרווח בין סוף סבב לתחילת הבא. ברירת מחדל: `poller.intervalMs` מהתצורה. */
  intervalMs?: number;
  /** @hebrew זמן קצוב לסבב שלם. ברירת מחדל: `poller.tickTimeoutMs` מהתצורה. */
  tickTimeoutMs?: number;
}

/**
 * @hebrew דוגם את מצב האזור במרווח קבוע ומפרסם צילום מצב מנורמל.
 *
 * אירועים:
 * - `update` (snapshot) - סבב הצליח.
 * - `updateFailed` (error) - סבב נכשל; הצילום האחרון נשאר בתוקף.
 * - `started` / `stopped`.
 *
 * סבב שבוטל (stop) או שחרג מהזמן הקצוב לא מפרסם צילום חלקי.
 */
export class StatusPoller extends EventEmitter {
  private readonly session: RxvSession;
  private readonly options: Required<StatusPollerOptions>;
  private timerId: NodeJS.Timeout | null = null;
  private isRunning = false;
  // מתקדם בכל start; טיימר או סבב של הרצה קודמת לא מתזמן המשך
  private generation = 0;
  private pending: Promise<StatusSnapshot | null> | null = null;
  private currentTick: AbortController | null = null;
  private lastSnapshot: StatusSnapshot | null = null;

  constructor(session: RxvSession, options?: StatusPollerOptions) {
    super();
    this.session = session;
    const { poller } = loadConfig();
    this.options = {
      intervalMs: options?.intervalMs ?? poller.intervalMs,
      tickTimeoutMs: options?.tickTimeoutMs ?? poller.tickTimeoutMs,
    };
  }

  /** @hebrew הצילום האחרון שפורסם בהצלחה. */
  get snapshot(): StatusSnapshot | null {
    return this.lastSnapshot;
  }

  get running(): boolean {
    return this.isRunning;
  }

  start(): void {
    if (this.isRunning) {
      logger.warn('start: StatusPoller is already running.');
      return;
    }
    this.isRunning = true;
    this.generation++;
    logger.info(`start: Polling zone ${this.session.zone} every ${this.options.intervalMs}ms`);
    this.emit('started');
    this.scheduleNext(0);
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.currentTick?.abort(new Error('StatusPoller stopped'));
    this.emit('stopped');
    logger.info('stop: StatusPoller stopped.');
  }

  private scheduleNext(delayMs: number): void {
    const generation = this.generation;
    this.timerId = setTimeout(() => {
      if (!this.isCurrentRun(generation)) {
        return;
      }
      this.timerId = null;
      this.refresh().then(
        () => {
          if (this.isCurrentRun(generation)) {
            this.scheduleNext(this.options.intervalMs);
          }
        },
        (error: unknown) => logger.error('scheduleNext: Unexpected refresh failure', { error }),
      );
    }, delayMs);
  }

  private isCurrentRun(generation: number): boolean {
    return this.isRunning && generation === this.generation;
  }

  /**
   * @hebrew מריץ סבב עדכון אחד. קריאה בזמן שסבב אחר רץ מחזירה את אותו סבב.
   * @returns הצילום החדש, או null אם הסבב נכשל או בוטל. לעולם לא נדחית.
   */
  refresh(): Promise<StatusSnapshot | null> {
    if (!this.pending) {
      this.pending = this.runTick().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async runTick(): Promise<StatusSnapshot | null> {
    const controller = new AbortController();
    this.currentTick = controller;
    let timedOut = false;
    const timeoutError = new TransportError(`Status update timed out after ${this.options.tickTimeoutMs}ms`, {
      url: this.session.controlUrl,
      code: 'ETIMEDOUT',
    });
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort(timeoutError);
    }, this.options.tickTimeoutMs);

    try {
      const snapshot = await this.buildSnapshot(controller.signal);
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }
      this.lastSnapshot = snapshot;
      this.emit('update', snapshot);
      return snapshot;
    } catch (error) {
      if (controller.signal.aborted && !timedOut) {
        logger.debug('runTick: Tick cancelled, nothing published.');
        return null;
      }
      const failure = timedOut ? timeoutError : error instanceof Error ? error : new Error(String(error));
      logger.warn(`runTick: Status update failed: ${failure.message}`, { zone: this.session.zone });
      this.emit('updateFailed', failure);
      return null;
    } finally {
      clearTimeout(timeout);
      if (this.currentTick === controller) {
        this.currentTick = null;
      }
    }
  }

  private async buildSnapshot(signal: AbortSignal): Promise<StatusSnapshot> {
    const view = this.session.withSignal(signal);
    const basic = await view.getBasicStatus();
    const playStatus = await view.getPlayStatus(basic.input);
    const playbackSupport = await view.getPlaybackSupport(basic.input);
    return {
      zone: view.zone,
      on: basic.on,
      muted: basic.muted,
      volume: basic.volume,
      volumeLevel: volumeToLevel(basic.volume),
      input: basic.input,
      soundProgram: basic.soundProgram,
      playStatus,
      playbackSupport,
      updatedAt: new Date(),
    };
  }
}
