/**
 * Signing types for the legacy query-string authentication
 */

/**
 * Source of the current time; injectable so signatures can be reproduced
 */
export type Clock = () => Date;

/**
 * The authentication fields a signed request carries
 */
export interface RequestSignature {
  /** Access key sent as AWSAccessKeyId */
  accessKeyId: string;
  /** Operation the signature covers */
  operation: string;
  /** YYYY-MM-DDTHH:mm:ssZ timestamp the signature covers */
  timestamp: string;
  /** base64 HMAC-SHA1 over service + operation + timestamp */
  signature: string;
}
