import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and converts the Response to a RawHttpResponse.
 * Node's fetch keeps no HTTP cache; wrap it with createCachingTransport to honour cache policies.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const init: RequestInit = {
    method: req.method,
    headers: req.headers,
    // Copy into an ArrayBuffer-backed view, which is what fetch accepts.
    body: req.body?.slice(),
    signal,
  };

  const response = await fetch(req.url, init);
  const body = new Uint8Array(await response.arrayBuffer());

  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
  };
};
