/**
 * HTTP transport type definitions
 */

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method; every requester API call is a GET */
  method: 'GET';
  /** Full URL including the signed query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
}

/**
 * HTTP response with text body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body as text */
  body: string;
}

/**
 * HTTP transport interface
 *
 * Implementations return every HTTP status as a response; only failures to
 * complete the exchange (timeouts, refused connections, DNS) are thrown, as
 * NetworkError.
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}
