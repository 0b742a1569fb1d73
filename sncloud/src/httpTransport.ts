import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Logger } from 'pino';

import { ENDPOINTS } from './endpoints.js';
import { TransportError } from './errors.js';
import type { Session } from './session.js';
import type { ApiTransport, JsonPayload } from './types.js';

type HttpConfig = {
  baseUrl: string;
  timeoutMs: number;
};

const BROWSER_HEADERS: Record<string, string> = {
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  Origin: 'https://cloud.supernote.com',
  Referer: 'https://cloud.supernote.com/',
};

export class HttpTransport implements ApiTransport {
  private readonly http: AxiosInstance;

  constructor(
    config: HttpConfig,
    private readonly session: Session,
    private readonly logger: Logger,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
      });
  }

  async call(endpoint: string, payload: JsonPayload): Promise<unknown> {
    await this.session.ensureInitialized(() => this.fetchXsrfToken());

    const headers: Record<string, string> = {
      ...BROWSER_HEADERS,
      'Content-Type': 'application/json',
      'X-XSRF-TOKEN': this.session.antiForgeryToken ?? '',
    };
    if (this.session.accessToken) {
      headers['x-access-token'] = this.session.accessToken;
    }
    const cookie = this.session.cookieHeader();
    if (cookie) {
      headers.Cookie = cookie;
    }

    this.logger.debug({ endpoint }, 'api call');
    const response = await this.send(`POST ${endpoint}`, () => this.http.post<unknown>(endpoint, payload, { headers }));
    this.session.rememberCookies(response.headers['set-cookie']);
    return response.data;
  }

  async download(url: string): Promise<Buffer> {
    this.logger.debug({ url: redactQuery(url) }, 'download');
    const response = await this.send(`GET ${redactQuery(url)}`, () =>
      this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' }),
    );
    return Buffer.from(response.data);
  }

  async upload(url: string, body: Buffer, headers: Record<string, string>): Promise<number> {
    this.logger.debug({ url: redactQuery(url), size: body.length }, 'upload');
    const response = await this.send(`PUT ${redactQuery(url)}`, () =>
      this.http.put<unknown>(url, body, { headers, validateStatus: () => true }),
    );
    return response.status;
  }

  private async fetchXsrfToken(): Promise<string> {
    this.logger.debug('fetching anti-forgery token');
    const response = await this.send(`GET ${ENDPOINTS.csrf}`, () =>
      this.http.get<unknown>(ENDPOINTS.csrf, { headers: BROWSER_HEADERS }),
    );
    this.session.rememberCookies(response.headers['set-cookie']);
    const token: unknown = response.headers['x-xsrf-token'];
    if (typeof token !== 'string' || token.length === 0) {
      throw new TransportError('Failed to get XSRF token');
    }
    return token;
  }

  private async send<T>(label: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new TransportError(`${label} failed: ${status ? `HTTP ${status}` : error.message}`, {
          status,
          cause: error,
        });
      }
      throw error;
    }
  }
}

function redactQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
