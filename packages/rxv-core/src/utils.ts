import { createModuleLogger, type ModuleLogger } from './logger';
import { isRxvError } from './errors';

const defaultLogger = createModuleLogger('Utils');

/**
 * @hebrew פונקציית עזר להמתנה. ביטול דרך ה-signal דוחה את ההבטחה עם סיבת הביטול.
 * @param ms - זמן המתנה במילישניות.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * @hebrew מריץ פונקציה אסינכרונית עם ניסיונות חוזרים.
 * שגיאה שאינה מסומנת כ-retryable נזרקת מיד.
 * @param fn - הפונקציה להרצה; זורקת במקרה של כישלון.
 * @param options.retries - מספר הניסיונות הכולל. ברירת מחדל: 3.
 * @param options.delayMs - זמן המתנה בין ניסיונות. ברירת מחדל: 1000.
 * @returns תוצאת הניסיון המוצלח.
 * @throws השגיאה האחרונה אם כל הניסיונות נכשלו.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    retries?: number;
    delayMs?: number;
    logger?: ModuleLogger;
    onRetry?: (error: Error, attempt: number) => void;
  } = {}
): Promise<T> {
  const {
    retries = 3,
    delayMs = 1000,
    logger = defaultLogger,
    onRetry,
  } = options;

  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));
      const retryable = !isRxvError(lastError) || lastError.retryable;
      if (!retryable || attempt >= retries) {
        logger.warn(`retry: Giving up after attempt ${attempt} of ${retries}: ${lastError.message}`);
        throw lastError;
      }
      logger.warn(`retry: Attempt ${attempt} of ${retries} failed: ${lastError.message}`);
      onRetry?.(lastError, attempt);
      await delay(delayMs);
      attempt++;
    }
  }
}

/**
 * @hebrew מגביל ערך לטווח.
 */
export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));
