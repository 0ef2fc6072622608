export type QueryParams = Record<string, string>;

export interface TransportOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Request/response access to the Moonraker HTTP API. Implementations reject
 * with a PrinterError for non-2xx responses and network failures. Bodies are
 * returned as parsed JSON and narrowed by the caller.
 */
export interface ITransport {
  get(path: string, params?: QueryParams): Promise<unknown>;
  post(path: string, payload: unknown): Promise<unknown>;
}
