import type { MenuStatus } from './types';

export type RxvErrorKind =
  | 'descriptor'
  | 'protocol'
  | 'response-parse'
  | 'transport'
  | 'validation'
  | 'unsupported'
  | 'menu-traversal';

/**
 * @hebrew מחלקת הבסיס לכל השגיאות של הספרייה. `kind` מאפשר הבחנה בלי instanceof.
 */
export abstract class RxvError extends Error {
  abstract readonly kind: RxvErrorKind;
  /** @hebrew האם הקורא יכול לנסות שוב את אותה פעולה. */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    // שחזור הפרוטוטייפ כדי ש-instanceof יעבוד כראוי עם מחלקות מובנות
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * @hebrew קובץ תיאור (device/unit) חסר או פגום. לא ניתן לניסיון חוזר.
 */
export class DescriptorError extends RxvError {
  readonly kind = 'descriptor';
}

/**
 * @hebrew ההתקן החזיר קוד תוצאה (RC) שאינו 0.
 */
export class ProtocolError extends RxvError {
  readonly kind = 'protocol';
  readonly resultCode: string;
  readonly rawResponse: string;

  constructor(resultCode: string, rawResponse: string) {
    super(`Receiver responded with RC=${resultCode}`);
    this.resultCode = resultCode;
    this.rawResponse = rawResponse;
  }
}

/**
 * @hebrew תגובה שאינה XML תקין או שחסר בה שדה צפוי.
 */
export class ResponseParseError extends RxvError {
  readonly kind = 'response-parse';
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rawResponse = rawResponse;
  }
}

/**
 * @hebrew כשל חיבור, DNS, זמן קצוב או סטטוס HTTP לא תקין.
 */
export class TransportError extends RxvError {
  readonly kind = 'transport';
  override readonly retryable = true;
  readonly url: string;
  readonly statusCode?: number;
  readonly code?: string;

  constructor(message: string, details: { url: string; statusCode?: number; code?: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.code = details.code;
  }
}

/**
 * @hebrew בקשה לאזור/קלט/מקור/סצנה/פעולה שאינם קיימים בסט היכולות. לא נשלח דבר לרשת.
 */
export class ValidationError extends RxvError {
  readonly kind = 'validation';
}

/**
 * @hebrew בקשה תקינה מבנית ליכולת שהמקור או האזור הנוכחי אינם חושפים.
 */
export class UnsupportedOperationError extends RxvError {
  readonly kind = 'unsupported';
  readonly target: string;
  readonly operation: string;

  constructor(target: string, operation: string) {
    super(`${target} does not support ${operation}`);
    this.target = target;
    this.operation = operation;
  }
}

/**
 * @hebrew ניווט בתפריט לא הגיע לשכבה האחרונה בתוך מספר הניסיונות המותר.
 */
export class MenuTraversalError extends RxvError {
  readonly kind = 'menu-traversal';
  readonly path: string;
  readonly attempts: number;
  readonly lastMenuStatus: MenuStatus | null;

  constructor(path: string, attempts: number, lastMenuStatus: MenuStatus | null) {
    const where = lastMenuStatus
      ? `layer ${lastMenuStatus.layer} (${lastMenuStatus.name || 'unnamed'}, ready=${lastMenuStatus.ready})`
      : 'unknown menu state';
    super(`Could not reach "${path}" after ${attempts} attempts; last seen ${where}`);
    this.path = path;
    this.attempts = attempts;
    this.lastMenuStatus = lastMenuStatus;
  }
}

export const isRxvError = (error: unknown): error is RxvError => error instanceof RxvError;
