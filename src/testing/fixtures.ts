/**
 * XML response fixtures
 * @module testing/fixtures
 */

/**
 * A service error record
 */
export interface ErrorRecord {
  code: string;
  message: string;
}

function errorsXml(errors: ErrorRecord[]): string {
  const records = errors
    .map((e) => `<Error><Code>${e.code}</Code><Message>${e.message}</Message></Error>`)
    .join('');
  return `<Errors>${records}</Errors>`;
}

/**
 * Successful response for an operation.
 *
 * @param operation - Operation name; the root element is `<operation>Response`
 * @param resultKey - Element carrying `Request.IsValid`
 * @param body - Extra XML placed inside the result element
 */
export function successResponse(operation: string, resultKey: string, body = ''): string {
  return (
    `<?xml version="1.0"?>` +
    `<${operation}Response>` +
    `<OperationRequest><RequestId>test-request-id</RequestId></OperationRequest>` +
    `<${resultKey}><Request><IsValid>True</IsValid></Request>${body}</${resultKey}>` +
    `</${operation}Response>`
  );
}

/**
 * Response rejecting the credentials
 */
export function notAuthorizedResponse(operation: string): string {
  return (
    `<${operation}Response>` +
    `<OperationRequest><RequestId>test-request-id</RequestId>` +
    errorsXml([
      {
        code: 'AWS.NotAuthorized',
        message: 'The identity contained in the request is not authorized to use this AWSAccessKeyId',
      },
    ]) +
    `</OperationRequest>` +
    `</${operation}Response>`
  );
}

/**
 * Response rejecting the request itself
 */
export function requestErrorResponse(
  operation: string,
  resultKey: string,
  errors: ErrorRecord[]
): string {
  return (
    `<${operation}Response>` +
    `<OperationRequest><RequestId>test-request-id</RequestId></OperationRequest>` +
    `<${resultKey}><Request><IsValid>False</IsValid>${errorsXml(errors)}</Request></${resultKey}>` +
    `</${operation}Response>`
  );
}
