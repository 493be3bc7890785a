import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

/**
 * axios-based HTTP transport.
 * Every status is returned as a response; classification happens in the proxy.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    // Normalize headers to plain object
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      headers[key] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    // axios yields a Buffer under Node and an ArrayBuffer in browsers.
    const data = response.data;
    const body = data instanceof ArrayBuffer || data instanceof Uint8Array ? data : new Uint8Array(0);

    return {
      status: response.status,
      headers,
      body,
    };
  };
};
