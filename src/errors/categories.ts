/**
 * Specific error categories for the Mechanical Turk requester client
 * @module errors/categories
 */

import type { ResponseNode } from '../xml/types.js';
import { MTurkError, type MTurkErrorParams } from './error.js';

type CategoryParams = Omit<MTurkErrorParams, 'type'>;

/**
 * Configuration and initialization errors
 */
export class ConfigError extends MTurkError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'config_error' });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Missing access key or secret key
   */
  static missingCredentials(message?: string): ConfigError {
    return new ConfigError({
      message: message ?? 'An access key ID and a secret access key are required',
      code: 'MISSING_CREDENTIALS',
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * A required request parameter is absent.
 *
 * Raised before anything is sent; the request never reaches the transport.
 */
export class MissingParameterError extends MTurkError {
  /**
   * Name of the missing parameter
   */
  readonly parameter: string;

  constructor(parameter: string, operation?: string) {
    super({
      type: 'missing_parameter',
      message: `The ${parameter} parameter is required.`,
      code: 'MISSING_PARAMETER',
      details: operation ? { parameter, operation } : { parameter },
    });
    this.name = 'MissingParameterError';
    this.parameter = parameter;
    Object.setPrototypeOf(this, MissingParameterError.prototype);
  }
}

/**
 * A request parameter is present but cannot be encoded
 */
export class InvalidParameterError extends MTurkError {
  /**
   * Name of the offending parameter
   */
  readonly parameter: string;

  constructor(parameter: string, message: string, issues?: string[]) {
    super({
      type: 'invalid_parameter',
      message: `Invalid ${parameter} parameter: ${message}`,
      code: 'INVALID_PARAMETER',
      details: issues ? { parameter, issues } : { parameter },
    });
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    Object.setPrototypeOf(this, InvalidParameterError.prototype);
  }

  /**
   * A structured value was supplied where a scalar is expected
   */
  static notScalar(parameter: string): InvalidParameterError {
    return new InvalidParameterError(parameter, 'expected a string, number or boolean');
  }
}

/**
 * The service rejected the request credentials
 */
export class NotAuthorizedError extends MTurkError {
  /**
   * Raw `Errors` node from the response
   */
  readonly errors: ResponseNode;

  constructor(errors: ResponseNode, status?: number) {
    super({
      type: 'not_authorized',
      message: 'AWS credentials rejected.',
      code: 'AWS.NotAuthorized',
      status,
    });
    this.name = 'NotAuthorizedError';
    this.errors = errors;
    Object.setPrototypeOf(this, NotAuthorizedError.prototype);
  }
}

/**
 * The service rejected the request (malformed request, business rule such as
 * insufficient funds). `errors` holds the raw `{ Code, Message }` records.
 */
export class RequestValidationError extends MTurkError {
  /**
   * Raw `Errors` node from the response
   */
  readonly errors: ResponseNode;

  constructor(errors: ResponseNode, options?: { code?: string; status?: number }) {
    super({
      type: 'request_invalid',
      message: 'Request returned error. See errors for context.',
      code: options?.code,
      status: options?.status,
    });
    this.name = 'RequestValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, RequestValidationError.prototype);
  }
}

/**
 * The response matched neither the success shape nor a known error shape
 */
export class UnclassifiedError extends MTurkError {
  constructor(params?: { message?: string; status?: number; cause?: unknown }) {
    super({
      type: 'unclassified',
      message: params?.message ?? 'Request returned error. No context available.',
      code: 'UNCLASSIFIED',
      status: params?.status,
      cause: params?.cause,
    });
    this.name = 'UnclassifiedError';
    Object.setPrototypeOf(this, UnclassifiedError.prototype);
  }

  /**
   * The response body could not be decoded as XML
   */
  static undecodable(cause: unknown, status?: number): UnclassifiedError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new UnclassifiedError({
      message: `Response body could not be decoded: ${reason}`,
      status,
      cause,
    });
  }
}

/**
 * Network-related errors raised by the transport
 */
export class NetworkError extends MTurkError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'network_error' });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  /**
   * Request timeout
   */
  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timeout after ${timeoutMs}ms`,
      code: 'RequestTimeout',
      details: { timeoutMs },
    });
  }

  /**
   * Connection failed
   */
  static connectionFailed(message?: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: message ?? 'Failed to connect to the requester endpoint',
      code: 'ConnectionFailed',
      cause,
    });
  }

  /**
   * DNS resolution failed
   */
  static dnsError(url: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `DNS resolution failed for: ${new URL(url).host}`,
      code: 'DNSError',
      details: { host: new URL(url).host },
      cause,
    });
  }
}
