/**
 * Error classifier for decoded responses
 * @module response/classifier
 */

import {
  NotAuthorizedError,
  RequestValidationError,
  UnclassifiedError,
} from '../errors/index.js';
import { getNode, getText, normalizeArray } from '../xml/parser.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * Service error code for rejected credentials
 */
export const NOT_AUTHORIZED_CODE = 'AWS.NotAuthorized';

/**
 * Checks whether a decoded response is a success for its operation
 */
export function isValidResponse(status: number, tree: ResponseTree, resultKey: string): boolean {
  return status === 200 && getText(tree, resultKey, 'Request', 'IsValid') === 'True';
}

/**
 * Classifies a decoded response.
 *
 * Success requires HTTP 200 and `<resultKey>.Request.IsValid` equal to
 * "True"; the tree is then returned unchanged. Otherwise, in order:
 *
 * 1. an `OperationRequest.Errors.Error` with code `AWS.NotAuthorized`
 *    raises NotAuthorizedError
 * 2. `<resultKey>.Request.Errors.Error` raises RequestValidationError
 * 3. anything else raises UnclassifiedError
 *
 * @throws {NotAuthorizedError | RequestValidationError | UnclassifiedError}
 */
export function classifyResponse(
  status: number,
  tree: ResponseTree | undefined,
  resultKey: string
): ResponseTree {
  if (tree === undefined) {
    throw new UnclassifiedError({ status });
  }

  if (isValidResponse(status, tree, resultKey)) {
    return tree;
  }

  const operationErrors = getNode(tree, 'OperationRequest', 'Errors');
  const notAuthorized = normalizeArray(getNode(operationErrors, 'Error')).some(
    (record) => getText(record, 'Code') === NOT_AUTHORIZED_CODE
  );
  if (operationErrors !== undefined && notAuthorized) {
    throw new NotAuthorizedError(operationErrors, status);
  }

  const requestErrors = getNode(tree, resultKey, 'Request', 'Errors');
  const firstError = normalizeArray(getNode(requestErrors, 'Error'))[0];
  if (requestErrors !== undefined && firstError !== undefined) {
    throw new RequestValidationError(requestErrors, {
      code: getText(firstError, 'Code'),
      status,
    });
  }

  throw new UnclassifiedError({ status });
}
