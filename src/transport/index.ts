/**
 * HTTP transport
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { FetchTransport, createFetchTransport, type FetchTransportOptions } from './fetch-transport.js';
