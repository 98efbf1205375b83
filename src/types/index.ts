/**
 * Public request types
 */

export * from './requests.js';
