import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosInstanceLike {
  request<T = unknown>(config: {
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
    data: T;
  }>;
}

const toBytes = (data: unknown): Uint8Array => {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return new TextEncoder().encode(data);
  return new Uint8Array();
};

/**
 * axios-based HTTP transport.
 * Wraps an axios instance and converts its responses to RawHttpResponse. Every status is
 * handed back as a response; classifying it is the client's job.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request<unknown>({
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

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
    };
  };
};
