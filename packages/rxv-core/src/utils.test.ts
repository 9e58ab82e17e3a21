import { describe, expect, it, vi } from 'vitest';
import { TransportError, ValidationError } from './errors';
import { clamp, delay, retry } from './utils';

describe('retry', () => {
  it('מחזיר את תוצאת הניסיון המוצלח', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransportError('Request timed out', { url: 'http://receiver', code: 'ETIMEDOUT' }))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { retries: 3, delayMs: 0, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
  });

  it('זורק את השגיאה האחרונה אחרי שהניסיונות נגמרו', async () => {
    let calls = 0;
    const fn = vi.fn(async (): Promise<string> => {
      calls++;
      throw new Error(`failure ${calls}`);
    });

    await expect(retry(fn, { retries: 2, delayMs: 0 })).rejects.toThrow('failure 2');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('שגיאה שאינה retryable נזרקת מיד', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new ValidationError('Unknown zone "Zone_9"');
    });

    await expect(retry(fn, { retries: 5, delayMs: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('delay', () => {
  it('ביטול דוחה עם סיבת הביטול', async () => {
    const controller = new AbortController();
    const waiting = delay(10_000, controller.signal);

    controller.abort(new Error('stopped'));

    await expect(waiting).rejects.toThrow('stopped');
  });

  it('signal שכבר בוטל דוחה מיד', async () => {
    await expect(delay(10, AbortSignal.abort(new Error('already')))).rejects.toThrow('already');
  });
});

describe('clamp', () => {
  it('מגביל לטווח', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.25, 0, 1)).toBe(0.25);
  });
});
