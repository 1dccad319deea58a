// ============================================================================
// ParentNode - A node owning an ordered, doubly-linked list of children
// ============================================================================
//
// Four views of the children are kept in step by every public operation:
//   - the sibling chain (previous / next)
//   - each child's parent back-reference
//   - head, tail and childCount
//   - the name-indexed property map
//
// Preconditions are checked first. A method either throws with the tree
// untouched or completes every update before returning.

import {
  AlreadyAttachedError, EmptySubtreeError, NotAChildError, SelfReferenceError,
} from "./errors.js";
import { Node, type NodeTest } from "./node.js";
import { PropertyMap, type PropertyValue } from "./property-map.js";
import type { SourcePosition } from "./source-position.js";

export abstract class ParentNode extends Node {
  protected head: Node | null = null;
  protected tail: Node | null = null;
  protected childCount = 0;
  protected properties = new PropertyMap();

  // ---------------------------------------------------------------------------
  // Child access
  // ---------------------------------------------------------------------------

  getChildCount(): number {
    return this.childCount;
  }

  getFirst(): Node | null {
    return this.head;
  }

  getLast(): Node | null {
    return this.tail;
  }

  isEmpty(): boolean {
    return this.head === null;
  }

  hasChild(node: Node): boolean {
    return node._parent === this;
  }

  /** Snapshot of the children in document order. */
  getChildren(): Node[] {
    const children: Node[] = [];
    let child = this.head;
    while (child) {
      children.push(child);
      child = child._next;
    }
    return children;
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  prependChild(node: Node): this {
    this.assertAttachable(node);
    if (this.head === null) {
      this.linkOnly(node);
    } else {
      this.insertBeforeChild(this.head, node);
    }
    return this;
  }

  /**
   * Append `node` as the last child. With `propertyName`, also bind it: pushed
   * onto the sequence if that name holds one, otherwise bound as the single
   * value, replacing whatever the name held.
   */
  appendChild(node: Node, propertyName?: string): this {
    this.assertAttachable(node);
    if (this.tail === null) {
      this.linkOnly(node);
    } else {
      this.insertAfterChild(this.tail, node);
    }
    if (propertyName !== undefined) {
      this.properties.append(propertyName, node);
    }
    return this;
  }

  appendChildren(nodes: Iterable<Node>): this {
    const list = [...nodes];
    const seen = new Set<Node>();
    for (const node of list) {
      this.assertAttachable(node);
      if (seen.has(node)) {
        throw new AlreadyAttachedError(node);
      }
      seen.add(node);
    }
    for (const node of list) {
      this.appendChild(node);
    }
    return this;
  }

  /**
   * Move every child of `other` to the end of this node, then copy its
   * property bindings over ours. `other` is left with no children and no
   * bindings.
   */
  mergeNode(other: ParentNode): this {
    if (other === this || this.isDescendantOf(other)) {
      throw new SelfReferenceError(this, other);
    }
    let child = other.head;
    while (child) {
      const next = child._next;
      other.unlink(child);
      if (this.tail === null) {
        this.linkOnly(child);
      } else {
        this.insertAfterChild(this.tail, child);
      }
      child = next;
    }
    this.properties.assign(other.properties);
    other.properties.clear();
    return this;
  }

  insertBefore(existing: Node, node: Node): this {
    this.assertChild(existing);
    this.assertAttachable(node);
    this.insertBeforeChild(existing, node);
    return this;
  }

  insertAfter(existing: Node, node: Node): this {
    this.assertChild(existing);
    this.assertAttachable(node);
    this.insertAfterChild(existing, node);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Removal and replacement
  // ---------------------------------------------------------------------------

  /** Unlink `child` and clear every property binding that references it. */
  removeChild(child: Node): this {
    this.assertChild(child);
    this.properties.detach(child);
    this.unlink(child);
    return this;
  }

  /** Remove and return the first child, or null when there is none. */
  removeFirst(): Node | null {
    const head = this.head;
    if (head) {
      this.removeChild(head);
    }
    return head;
  }

  /**
   * Put `replacement` at `child`'s position. Bindings that referenced `child`
   * now reference `replacement`; `child` comes back fully detached.
   */
  replaceChild(child: Node, replacement: Node): this {
    this.assertChild(child);
    this.assertAttachable(replacement);
    this.properties.substitute(child, replacement);

    replacement._parent = this;
    replacement._previous = child._previous;
    replacement._next = child._next;
    if (child._previous === null) {
      this.head = replacement;
    } else {
      child._previous._next = replacement;
    }
    if (child._next === null) {
      this.tail = replacement;
    } else {
      child._next._previous = replacement;
    }
    child._parent = null;
    child._previous = null;
    child._next = null;
    return this;
  }

  // ---------------------------------------------------------------------------
  // Properties
  // ---------------------------------------------------------------------------

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  getProperty(name: string): PropertyValue | undefined {
    return this.properties.get(name);
  }

  getPropertyNames(): string[] {
    return this.properties.names();
  }

  setProperty(name: string, node: Node): this {
    this.assertChild(node);
    this.properties.bind(name, node);
    return this;
  }

  /** Bind `name` to a sequence so later appendChild(node, name) calls push onto it. */
  setPropertyList(name: string, nodes: Iterable<Node> = []): this {
    const list = [...nodes];
    for (const node of list) {
      this.assertChild(node);
    }
    this.properties.bindList(name, list);
    return this;
  }

  deleteProperty(name: string): boolean {
    return this.properties.delete(name);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Direct children matching `test`, in document order. */
  filter<T extends Node>(test: NodeTest<T>): T[] {
    const matches: T[] = [];
    let child = this.head;
    while (child) {
      if (test(child)) {
        matches.push(child);
      }
      child = child._next;
    }
    return matches;
  }

  /** This node and all descendants matching `test`, in pre-order. */
  find<T extends Node>(test: NodeTest<T>): T[] {
    const matches: T[] = [];
    const self: Node = this;
    if (test(self)) {
      matches.push(self);
    }
    this.walk(node => {
      if (test(node)) {
        matches.push(node);
      }
      return false;
    });
    return matches;
  }

  /**
   * Leftmost leaf, reached by following the first child down. The leaf is
   * usually a `TokenNode`, but any non-composite node can end the descent.
   */
  getFirstToken(): Node {
    let node: ParentNode = this;
    while (node.head instanceof ParentNode) {
      node = node.head;
    }
    if (node.head === null) {
      throw new EmptySubtreeError(node);
    }
    return node.head;
  }

  /** Rightmost leaf, reached by following the last child down. */
  getLastToken(): Node {
    let node: ParentNode = this;
    while (node.tail instanceof ParentNode) {
      node = node.tail;
    }
    if (node.tail === null) {
      throw new EmptySubtreeError(node);
    }
    return node.tail;
  }

  /**
   * Position of the first leaf under this node. An empty node sits where
   * its nearest ancestor with any leaf starts.
   */
  getSourcePosition(): SourcePosition {
    let leaf = this.firstLeaf(null);
    let scanned: ParentNode = this;
    let scope = this._parent;
    while (leaf === null && scope) {
      leaf = scope.firstLeaf(scanned);
      scanned = scope;
      scope = scope._parent;
    }
    if (leaf === null) {
      throw new EmptySubtreeError(this);
    }
    return leaf.getSourcePosition();
  }

  toString(): string {
    let text = "";
    this.walk(node => {
      if (!(node instanceof ParentNode)) {
        text += node.toString();
      }
      return false;
    });
    return text;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Visits every descendant in pre-order without recursing: down through
   * `head`, across through `_next`, back up through `_parent`. Stops at and
   * returns the first node `stop` accepts. The subtree under `skip` is not
   * entered.
   */
  private walk(stop: (node: Node) => boolean, skip: Node | null = null): Node | null {
    let node: Node | null = this.head;
    while (node) {
      if (stop(node)) return node;
      if (node instanceof ParentNode && node.head && node !== skip) {
        node = node.head;
        continue;
      }
      while (node !== this && node._next === null) {
        if (node._parent === null) return null;
        node = node._parent;
      }
      if (node === this) return null;
      node = node._next;
    }
    return null;
  }

  /** First leaf in document order, skipping empty composites and `skip`. */
  private firstLeaf(skip: Node | null): Node | null {
    return this.walk(node => !(node instanceof ParentNode), skip);
  }

  private assertChild(node: Node): void {
    if (node._parent !== this) {
      throw new NotAChildError(node, this);
    }
  }

  private assertAttachable(node: Node): void {
    if (node === this || this.isDescendantOf(node)) {
      throw new SelfReferenceError(this, node);
    }
    if (node._parent !== null) {
      throw new AlreadyAttachedError(node);
    }
  }

  private linkOnly(node: Node): void {
    this.childCount++;
    node._parent = this;
    node._previous = null;
    node._next = null;
    this.head = this.tail = node;
  }

  private insertBeforeChild(child: Node, node: Node): void {
    this.childCount++;
    node._parent = this;
    if (child._previous === null) {
      this.head = node;
    } else {
      child._previous._next = node;
    }
    node._previous = child._previous;
    node._next = child;
    child._previous = node;
  }

  private insertAfterChild(child: Node, node: Node): void {
    this.childCount++;
    node._parent = this;
    if (child._next === null) {
      this.tail = node;
    } else {
      child._next._previous = node;
    }
    node._previous = child;
    node._next = child._next;
    child._next = node;
  }

  /** Structural removal only; property bindings are the caller's concern. */
  private unlink(child: Node): void {
    this.childCount--;
    if (child._previous === null) {
      this.head = child._next;
    } else {
      child._previous._next = child._next;
    }
    if (child._next === null) {
      this.tail = child._previous;
    } else {
      child._next._previous = child._previous;
    }
    child._parent = null;
    child._previous = null;
    child._next = null;
  }
}
