// ============================================================================
// Errors - Contract violations raised by tree mutation and query
// ============================================================================
//
// Every check runs before the operation touches a link, a count or a
// property binding, so a caught TreeError leaves the tree unchanged.

import type { Node } from "./node.js";
import type { ParentNode } from "./parent-node.js";

const PREVIEW_LENGTH = 24;

export function describeNode(node: Node): string {
  const text = node.toString();
  const preview = text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
  return `${node.kind} ${JSON.stringify(preview)}`;
}

export class TreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The referenced node is not linked under the expected parent. */
export class NotAChildError extends TreeError {
  constructor(public readonly child: Node, public readonly parent: ParentNode | null) {
    super(
      parent === null
        ? `${describeNode(child)} is not attached to a parent`
        : `${describeNode(child)} is not a child of ${describeNode(parent)}`
    );
  }
}

/** A node handed to an insertion already has a parent. Detach it first. */
export class AlreadyAttachedError extends TreeError {
  constructor(public readonly node: Node) {
    super(`${describeNode(node)} is already attached to a parent`);
  }
}

/** A composite with no children was reached where a leaf was expected. */
export class EmptySubtreeError extends TreeError {
  constructor(public readonly node: ParentNode) {
    super(`${node.kind} has no children to take a token from`);
  }
}

/** The insertion would make a node its own ancestor. */
export class SelfReferenceError extends TreeError {
  constructor(public readonly parent: ParentNode, public readonly node: Node) {
    super(
      node === parent
        ? `Cannot insert ${node.kind} into itself`
        : `Cannot insert ${node.kind} into its own descendant ${parent.kind}`
    );
  }
}
