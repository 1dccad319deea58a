// ============================================================================
// Node - Capabilities shared by every member of the tree
// ============================================================================

import { NotAChildError } from "./errors.js";
import type { ParentNode } from "./parent-node.js";
import type { SourcePosition } from "./source-position.js";

/** Type-guard predicate used by filter(), find() and closest(). */
export type NodeTest<T extends Node = Node> = (node: Node) => node is T;

/** Any node class, abstract or concrete, usable as a type tag. */
export type NodeClass<T extends Node> = abstract new (...args: never[]) => T;

/** Matches instances of `type` and its subclasses. */
export function isA<T extends Node>(type: NodeClass<T>): NodeTest<T> {
  return (node: Node): node is T => node instanceof type;
}

/** Matches nodes whose `kind` tag equals `kind` exactly. */
export function hasKind(kind: string): NodeTest {
  return (node: Node): node is Node => node.kind === kind;
}

export abstract class Node {
  // Sibling and parent links. Only ParentNode writes these; they never own
  // the node they point at.
  /** @internal */
  _parent: ParentNode | null = null;
  /** @internal */
  _previous: Node | null = null;
  /** @internal */
  _next: Node | null = null;

  /** Tag naming what this node represents, e.g. "token" or "group". */
  abstract readonly kind: string;

  abstract getSourcePosition(): SourcePosition;

  /** The exact source text this node covers. */
  abstract toString(): string;

  get parent(): ParentNode | null {
    return this._parent;
  }

  get previous(): Node | null {
    return this._previous;
  }

  get next(): Node | null {
    return this._next;
  }

  isAttached(): boolean {
    return this._parent !== null;
  }

  /** Position among the parent's children, or -1 when detached. */
  index(): number {
    if (this._parent === null) return -1;
    let index = 0;
    let sibling = this._previous;
    while (sibling) {
      index++;
      sibling = sibling._previous;
    }
    return index;
  }

  isDescendantOf(ancestor: Node): boolean {
    let current = this._parent;
    while (current) {
      if (current === ancestor) return true;
      current = current._parent;
    }
    return false;
  }

  /** Nearest node matching `test`, starting with this node and walking up. */
  closest<T extends Node>(test: NodeTest<T>): T | null {
    let current: Node | null = this;
    while (current) {
      if (test(current)) return current;
      current = current._parent;
    }
    return null;
  }

  /** Detach from the parent. Does nothing on a detached node. */
  remove(): this {
    if (this._parent) {
      this._parent.removeChild(this);
    }
    return this;
  }

  /**
   * Put `replacement` where this node is, taking over its property bindings.
   * Returns this node, now detached.
   */
  replaceWith(replacement: Node): this {
    this.requireParent().replaceChild(this, replacement);
    return this;
  }

  /** Insert `node` as the previous sibling of this node. */
  before(node: Node): this {
    this.requireParent().insertBefore(this, node);
    return this;
  }

  /** Insert `node` as the next sibling of this node. */
  after(node: Node): this {
    this.requireParent().insertAfter(this, node);
    return this;
  }

  private requireParent(): ParentNode {
    if (this._parent === null) {
      throw new NotAChildError(this, null);
    }
    return this._parent;
  }
}
