/**
 * Client module
 * @module client
 */

export type { MTurkClient, OperationInvoker } from './interface.js';
export { MTurkClientImpl, type ClientDependencies } from './client.js';
export { createClient, createClientFromEnv, type ClientOptions } from './factory.js';
