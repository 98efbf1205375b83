/**
 * Response decoding
 * @module xml
 */

export type { ResponseNode, ResponseTree } from './types.js';

export {
  createXmlParser,
  decodeResponse,
  getNode,
  getText,
  isResponseTree,
  normalizeArray,
} from './parser.js';
