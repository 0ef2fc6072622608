import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { ITransport, QueryParams, TransportOptions } from '../interfaces/Transport';
import { ErrorCode } from '../types';
import { PrinterError } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export class HttpTransport implements ITransport {
  private http: AxiosInstance;
  private logger = new Logger('HttpTransport');

  /**
   * @param http - preconfigured axios instance; built from `options` when omitted.
   */
  constructor(private options: TransportOptions, http?: AxiosInstance) {
    this.http = http ?? axios.create();
  }

  get baseUrl(): string {
    return this.options.baseUrl.replace(/\/+$/, '');
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['X-Api-Key'] = this.options.apiKey;
    }
    return headers;
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    this.logger.debug(`GET ${path}`, params ?? '');
    const response = await this.request('GET', path, () =>
      this.http.get<unknown>(this.baseUrl + path, this.requestConfig(params))
    );
    return response.data;
  }

  async post(path: string, payload: unknown): Promise<unknown> {
    this.logger.debug(`POST ${path}`, payload);
    const response = await this.request('POST', path, () =>
      this.http.post<unknown>(this.baseUrl + path, payload, this.requestConfig())
    );
    return response.data;
  }

  private requestConfig(params?: QueryParams) {
    return {
      params,
      headers: this.headers(),
      timeout: this.options.timeoutMs,
      // Status is checked in request() so every non-2xx maps to one error shape
      validateStatus: () => true,
    };
  }

  private async request(
    method: string,
    path: string,
    send: () => Promise<AxiosResponse<unknown>>
  ): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await send();
    } catch (error) {
      throw this.translateError(method, path, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new PrinterError(
        ErrorCode.TransportFailed,
        `${method} ${path} failed: ${response.status} ${HttpTransport.bodyText(response.data)}`,
        { details: { status: response.status, body: response.data } }
      );
    }
    return response;
  }

  private translateError(method: string, path: string, error: unknown): PrinterError {
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
      return new PrinterError(
        ErrorCode.RequestTimeout,
        `${method} ${path} timed out after ${this.options.timeoutMs}ms`,
        { cause: error }
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new PrinterError(ErrorCode.ConnectionFailed, `${method} ${path} failed: ${reason}`, { cause: error });
  }

  static bodyText(body: unknown): string {
    if (typeof body === 'string') return body;
    if (body === undefined || body === null) return '';
    return JSON.stringify(body);
  }
}
