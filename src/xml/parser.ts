/**
 * XML decoding for requester API responses
 * @module xml/parser
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { UnclassifiedError } from '../errors/index.js';
import type { ResponseNode, ResponseTree } from './types.js';

/**
 * Parser options for the requester API format.
 *
 * Values stay strings (`IsValid` is compared as the text "True"), attributes
 * carry nothing the client reads, and repeated siblings become arrays.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  textNodeName: '#text',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Creates a configured XML parser instance
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Checks if a value is a decoded element (not text, not a sibling list)
 */
export function isResponseTree(value: ResponseNode | undefined): value is ResponseTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts parser output into a ResponseNode.
 * Numbers and booleans only appear if the parser options change; they are
 * turned back into text.
 */
function toResponseNode(value: unknown): ResponseNode {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toResponseNode(item));
  }

  if (typeof value === 'object' && value !== null) {
    const tree: ResponseTree = {};
    for (const [key, child] of Object.entries(value)) {
      tree[key] = toResponseNode(child);
    }
    return tree;
  }

  if (value === undefined || value === null) {
    return '';
  }

  return String(value);
}

/**
 * Decodes an XML response body into a generic tree.
 *
 * The document's root element is unwrapped, so the returned keys are the
 * root's children:
 *
 * ```typescript
 * decodeResponse(
 *   '<GetHITResponse><OperationRequest><RequestId>r-1</RequestId></OperationRequest></GetHITResponse>'
 * );
 * // { OperationRequest: { RequestId: 'r-1' } }
 * ```
 *
 * @param xml - Raw response body
 * @param status - HTTP status of the response, attached to any error
 * @throws {UnclassifiedError} If the body is empty or not well-formed XML
 */
export function decodeResponse(xml: string, status?: number): ResponseTree {
  if (xml.trim() === '') {
    throw UnclassifiedError.undecodable(new Error('empty response body'), status);
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw UnclassifiedError.undecodable(
      new Error(`${msg} (line ${line}, column ${col})`),
      status
    );
  }

  let parsed: unknown;
  try {
    parsed = createXmlParser().parse(xml);
  } catch (error) {
    throw UnclassifiedError.undecodable(error, status);
  }

  const document = toResponseNode(parsed);
  if (!isResponseTree(document)) {
    throw UnclassifiedError.undecodable(new Error('no root element'), status);
  }

  const roots = Object.values(document);
  if (roots.length !== 1) {
    throw UnclassifiedError.undecodable(
      new Error(`expected one root element, found ${roots.length}`),
      status
    );
  }

  const root = roots[0];
  return isResponseTree(root) ? root : {};
}

/**
 * Normalizes array-or-single-item decoding behavior.
 * One child decodes as the child itself, several as an array.
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray(value: ResponseNode | undefined): ResponseNode[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Follows a path of element names through a tree.
 *
 * @returns The node at the path, or undefined when any step is missing or
 * is not an element
 *
 * @example
 * ```typescript
 * getNode(tree, 'HIT', 'Request', 'IsValid'); // 'True'
 * ```
 */
export function getNode(tree: ResponseNode | undefined, ...path: string[]): ResponseNode | undefined {
  let current: ResponseNode | undefined = tree;
  for (const key of path) {
    if (!isResponseTree(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Like getNode, but only returns text nodes
 */
export function getText(tree: ResponseNode | undefined, ...path: string[]): string | undefined {
  const node = getNode(tree, ...path);
  return typeof node === 'string' ? node : undefined;
}
