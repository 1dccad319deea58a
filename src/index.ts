// ============================================================================
// cst-tree - Mutable concrete syntax tree with lossless round trip
// ============================================================================
//
// A ParentNode owns a doubly-linked list of children and a map of named
// property bindings that point at some of those children. Insert, remove,
// replace and merge keep the sibling chain, parent links, head/tail/count
// and property map consistent in one step.
//
// Leaves carry verbatim source text. Because the tokenizer drops nothing,
// serializing an untouched tree reproduces the input byte for byte, and a
// refactoring only changes the text of the nodes it touches.
//
// ============================================================================

export { Node, isA, hasKind } from "./node.js";
export type { NodeTest, NodeClass } from "./node.js";

export { ParentNode } from "./parent-node.js";
export { PropertyMap } from "./property-map.js";
export type { PropertyValue } from "./property-map.js";

export { TokenNode, isToken, tokenOfType } from "./token-node.js";
export type { SourcePosition } from "./source-position.js";
export { formatPosition } from "./source-position.js";

export {
  TreeError, NotAChildError, AlreadyAttachedError, EmptySubtreeError, SelfReferenceError,
} from "./errors.js";

export { tokenize } from "./tokenizer.js";
export type { Token, TokenType } from "./tokenizer.js";

export { Parser, ParseError } from "./parser.js";
export { SourceFileNode, GroupNode, isGroup } from "./cst.js";
export type { Bracket } from "./cst.js";

export { stripComments, renameWord, unwrapGroup } from "./transforms.js";

import { tokenize } from "./tokenizer.js";
import { Parser } from "./parser.js";
import type { SourceFileNode } from "./cst.js";

/**
 * Tokenize and parse `source` into a tree whose `toString()` is `source`.
 *
 * @example
 * ```ts
 * const root = parseTree("total = add(a, b); // sum");
 * stripComments(root);
 * root.toString(); // "total = add(a, b); "
 * ```
 */
export function parseTree(source: string): SourceFileNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens);
  return parser.parse();
}
