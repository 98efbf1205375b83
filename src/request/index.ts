/**
 * Signed request assembly
 */

export type { BuildContext, SignedRequest } from './types.js';
export { buildRequest, collectParameters, mergeParameters, API_VERSION } from './builder.js';
export { formUrlEncode, toQueryString } from './encoding.js';
