/**
 * Base error class for the Mechanical Turk requester client
 * @module errors/error
 */

/**
 * Error categories surfaced by the client.
 *
 * - `config_error`: the client configuration is invalid
 * - `missing_parameter`: a required parameter is absent after merging defaults
 * - `invalid_parameter`: a parameter is present but has the wrong shape
 * - `not_authorized`: the service rejected the credentials
 * - `request_invalid`: the service rejected the request itself
 * - `unclassified`: the response matched no known success or error pattern
 * - `network_error`: the transport could not complete the request
 */
export type MTurkErrorType =
  | 'config_error'
  | 'missing_parameter'
  | 'invalid_parameter'
  | 'not_authorized'
  | 'request_invalid'
  | 'unclassified'
  | 'network_error';

/**
 * Parameters for creating an MTurkError
 */
export interface MTurkErrorParams {
  /**
   * Error type/category
   */
  readonly type: MTurkErrorType;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Machine-readable error code (service code such as `AWS.NotAuthorized`,
   * or a client code such as `MISSING_PARAMETER`)
   */
  readonly code?: string;

  /**
   * HTTP status code of the response, when one was received
   */
  readonly status?: number;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all client failures
 *
 * Every failure the client raises is an MTurkError whose `type` names the
 * category, so callers can branch on `error.type` or on the subclass.
 */
export class MTurkError extends Error {
  /**
   * Error type/category
   */
  readonly type: MTurkErrorType;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: MTurkErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, MTurkError.prototype);

    this.name = 'MTurkError';
    this.type = params.type;
    this.code = params.code;
    this.status = params.status;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MTurkError);
    }
  }

  /**
   * Converts the error to a JSON representation
   * @returns JSON object with error details
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      code: this.code,
      status: this.status,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
