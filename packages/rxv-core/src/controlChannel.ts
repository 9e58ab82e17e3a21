import { decodeResponse, encodeCommand, type Command, type ResponseDocument } from './commandCodec';
import { createModuleLogger } from './logger';
import type { HttpTransport } from './types';

const logger = createModuleLogger('ControlChannel');

export interface ControlChannelOptions {
  transport: HttpTransport;
  timeoutMs: number;
}

/**
 * @hebrew ערוץ השליטה של מקלט אחד. כל הבקשות נשלחות ברצף (המקלט הוא שרת HTTP חד-הליכי),
 * גם כשהן מגיעות מבקרי אזורים שונים.
 */
export class ControlChannel {
  readonly controlUrl: string;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(controlUrl: string, options: ControlChannelOptions) {
    this.controlUrl = controlUrl;
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * @hebrew שולח פקודה ומחזיר את התגובה המפוענחת.
   * @param command - הפקודה הלוגית.
   * @param zone - תגית האזור לפקודות תלויות-אזור.
   * @param signal - ביטול הבקשה (למשל כשסבב עדכון מבוטל).
   */
  send(command: Command, zone: string, signal?: AbortSignal): Promise<ResponseDocument> {
    const body = encodeCommand(command, zone);
    const run = this.tail.then(() => this.post(body, signal));
    // השרשרת ממשיכה גם אחרי כישלון; השגיאה עצמה מגיעה לקורא דרך run
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  private async post(body: string, signal?: AbortSignal): Promise<ResponseDocument> {
    signal?.throwIfAborted();
    logger.trace(`post: ${body}`);
    const raw = await this.transport.post(this.controlUrl, body, {
      timeoutMs: this.timeoutMs,
      signal,
      headers: { 'Content-Type': 'text/xml' },
    });
    logger.trace(`post: response ${raw}`);
    return decodeResponse(raw);
  }
}
