/**
 * Request builder
 * @module request/builder
 */

import { MissingParameterError } from '../errors/index.js';
import type { OperationSpec } from '../operations/types.js';
import { encodeStructured, readScalar } from '../params/encoders.js';
import type { EncodedPair, ParameterBag } from '../params/types.js';
import { SERVICE_NAME } from '../signing/signer.js';
import { toQueryString } from './encoding.js';
import type { BuildContext, SignedRequest } from './types.js';

/**
 * API version sent with every request
 */
export const API_VERSION = '2014-08-15';

/**
 * Merges caller parameters over defaults.
 * A caller value of `undefined` or `null` leaves the default in place.
 */
export function mergeParameters(
  defaults: Readonly<ParameterBag> | undefined,
  params: ParameterBag
): ParameterBag {
  const merged: ParameterBag = { ...defaults };
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Collects the operation's own fields: required scalars, present optional
 * scalars, then structured fields, each group in declared order.
 *
 * @throws {MissingParameterError} If a required key or structured field is absent
 * @throws {InvalidParameterError} If a value has the wrong shape
 */
export function collectParameters(spec: OperationSpec, params: ParameterBag): EncodedPair[] {
  const pairs: EncodedPair[] = [];

  for (const key of spec.required) {
    const value = params[key];
    if (value === undefined || value === null) {
      throw new MissingParameterError(key, spec.operation);
    }
    pairs.push([key, readScalar(key, value)]);
  }

  for (const key of spec.optional) {
    const value = params[key];
    if (value !== undefined && value !== null) {
      pairs.push([key, readScalar(key, value)]);
    }
  }

  for (const field of spec.structured) {
    pairs.push(...encodeStructured(field, params));
  }

  return pairs;
}

/**
 * Builds the signed request URL for one operation.
 *
 * Query order: Service, AWSAccessKeyId, Version, Operation, Signature,
 * Timestamp, then the operation's fields.
 *
 * @example
 * ```typescript
 * const request = buildRequest(GET_HIT, { HITId: 'h-1' }, { endpoint, signer });
 * request.url;
 * // https://...?Service=AWSMechanicalTurkRequester&AWSAccessKeyId=...&HITId=h-1
 * ```
 */
export function buildRequest(
  spec: OperationSpec,
  params: ParameterBag,
  context: BuildContext
): SignedRequest {
  const effective = mergeParameters(context.defaults, params);
  const fields = collectParameters(spec, effective);
  const { accessKeyId, timestamp, signature } = context.signer.signOperation(spec.operation);

  const query = toQueryString([
    ['Service', SERVICE_NAME],
    ['AWSAccessKeyId', accessKeyId],
    ['Version', API_VERSION],
    ['Operation', spec.operation],
    ['Signature', signature],
    ['Timestamp', timestamp],
    ...fields,
  ]);

  return {
    url: `${context.endpoint}?${query}`,
    operation: spec.operation,
    timestamp,
    signature,
  };
}
