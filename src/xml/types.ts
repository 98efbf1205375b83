/**
 * Decoded response tree types
 * @module xml/types
 */

/**
 * A node of a decoded response: element text, a nested element, or the list
 * of same-named sibling elements.
 */
export type ResponseNode = string | ResponseTree | ResponseNode[];

/**
 * A decoded element. Keys are child element names in document order.
 */
export interface ResponseTree {
  [key: string]: ResponseNode;
}
