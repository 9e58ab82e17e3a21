import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { TransportError } from './errors';
import { createAxiosTransport, toTransportError } from './httpTransport';

const CONTROL_URL = 'http://192.168.1.50/YamahaRemoteControl/ctrl';

function createClient(respond: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>) {
  const adapter = vi.fn(respond);
  return { adapter, client: axios.create({ adapter }) };
}

const reply = (config: InternalAxiosRequestConfig, data: string, status = 200): AxiosResponse => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config,
});

describe('createAxiosTransport', () => {
  it('מחזיר את גוף התגובה כטקסט גם כשהוא נראה כמו JSON', async () => {
    const { adapter, client } = createClient(async (config) => reply(config, '{"not":"parsed"}'));
    const transport = createAxiosTransport(client);

    const body = await transport.get(CONTROL_URL, { timeoutMs: 1500 });

    expect(body).toBe('{"not":"parsed"}');
    const config = adapter.mock.calls[0]?.[0];
    expect(config?.timeout).toBe(1500);
    expect(config?.responseType).toBe('text');
  });

  it('שולח POST עם הגוף והכותרות', async () => {
    const { adapter, client } = createClient(async (config) => reply(config, '<YAMAHA_AV RC="0"/>'));
    const transport = createAxiosTransport(client);

    const body = await transport.post(CONTROL_URL, '<YAMAHA_AV cmd="GET"/>', {
      timeoutMs: 1000,
      headers: { 'Content-Type': 'text/xml' },
    });

    expect(body).toBe('<YAMAHA_AV RC="0"/>');
    const config = adapter.mock.calls[0]?.[0];
    expect(config?.method).toBe('post');
    expect(config?.data).toBe('<YAMAHA_AV cmd="GET"/>');
    expect(config?.headers.get('Content-Type')).toBe('text/xml');
  });

  it('ממפה זמן קצוב ל-TransportError שניתן לנסות שוב', async () => {
    const { client } = createClient(async (config) => {
      throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config);
    });
    const transport = createAxiosTransport(client);

    const error = await transport.post(CONTROL_URL, '<x/>', { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: `Request to ${CONTROL_URL} timed out`,
      code: 'ECONNABORTED',
      url: CONTROL_URL,
      retryable: true,
    });
  });

  it('ממפה סטטוס HTTP לא תקין', async () => {
    const { client } = createClient(async (config) => {
      throw new AxiosError('Request failed with status code 500', AxiosError.ERR_BAD_RESPONSE, config, null,
        reply(config, 'Internal Server Error', 500));
    });
    const transport = createAxiosTransport(client);

    await expect(transport.get(CONTROL_URL, { timeoutMs: 1000 })).rejects.toMatchObject({
      message: `Request to ${CONTROL_URL} failed with HTTP 500`,
      statusCode: 500,
    });
  });

  it('ממפה ביטול ל-ERR_CANCELED בלי לפנות לרשת', async () => {
    const { adapter, client } = createClient(async (config) => reply(config, ''));
    const transport = createAxiosTransport(client);
    const controller = new AbortController();
    controller.abort();

    await expect(transport.get(CONTROL_URL, { timeoutMs: 1000, signal: controller.signal }))
      .rejects.toMatchObject({ code: 'ERR_CANCELED' });
    expect(adapter).not.toHaveBeenCalled();
  });
});

describe('toTransportError', () => {
  it('מחזיר TransportError קיים כמו שהוא', () => {
    const original = new TransportError('down', { url: CONTROL_URL });

    expect(toTransportError(original, CONTROL_URL)).toBe(original);
  });

  it('עוטף שגיאה כללית ושומר את הסיבה', () => {
    const cause = new Error('socket hang up');
    const error = toTransportError(cause, CONTROL_URL);

    expect(error.message).toBe(`Request to ${CONTROL_URL} failed: socket hang up`);
    expect(error.cause).toBe(cause);
  });
});
