/**
 * Response classification
 */

export { classifyResponse, isValidResponse, NOT_AUTHORIZED_CODE } from './classifier.js';
