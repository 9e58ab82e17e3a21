import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { TransportError } from './errors';
import { createModuleLogger } from './logger';
import type { HttpRequestOptions, HttpTransport } from './types';

const logger = createModuleLogger('HttpTransport');

/**
 * @hebrew ממפה שגיאת axios (או כל שגיאה אחרת) ל-TransportError.
 */
export function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new TransportError(`Request to ${url} was canceled`, { url, code: 'ERR_CANCELED', cause: error });
  }
  if (axios.isAxiosError(error)) {
    const statusCode = error.response?.status;
    const code = error.code;
    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT' || statusCode === 408) {
      return new TransportError(`Request to ${url} timed out`, { url, statusCode, code, cause: error });
    }
    if (statusCode !== undefined) {
      return new TransportError(`Request to ${url} failed with HTTP ${statusCode}`, { url, statusCode, code, cause: error });
    }
    return new TransportError(`Request to ${url} failed: ${error.message}`, { url, code, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request to ${url} failed: ${message}`, { url, cause: error });
}

/**
 * @hebrew מימוש HttpTransport מעל axios. התגובה תמיד מתקבלת כטקסט.
 * @param client - מופע axios (ברירת מחדל: מופע חדש).
 */
export function createAxiosTransport(client: AxiosInstance = axios.create()): HttpTransport {
  const buildConfig = (options: HttpRequestOptions): AxiosRequestConfig<string> => ({
    responseType: 'text',
    timeout: options.timeoutMs,
    signal: options.signal,
    headers: options.headers,
    // תגובה נשארת מחרוזת גם אם נראית כמו JSON
    transformResponse: [(data: unknown) => data],
  });

  const asText = (data: unknown): string => (typeof data === 'string' ? data : String(data ?? ''));

  return {
    async get(url, options) {
      logger.trace(`get: GET ${url}`);
      try {
        const response = await client.get<string>(url, buildConfig(options));
        return asText(response.data);
      } catch (error) {
        const transportError = toTransportError(error, url);
        logger.warn(`get: ${transportError.message}`, { code: transportError.code });
        throw transportError;
      }
    },

    async post(url, body, options) {
      logger.trace(`post: POST ${url}`, { body });
      try {
        const response = await client.post<string>(url, body, buildConfig(options));
        return asText(response.data);
      } catch (error) {
        const transportError = toTransportError(error, url);
        logger.warn(`post: ${transportError.message}`, { code: transportError.code });
        throw transportError;
      }
    },
  };
}
