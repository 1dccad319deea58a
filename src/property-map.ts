// ============================================================================
// PropertyMap - Named slots pointing at a composite's own children
// ============================================================================
//
// A binding holds either a single node or an ordered sequence of nodes. A
// reverse index from node to the names that mention it lets removal and
// replacement touch only the affected bindings.

import type { Node } from "./node.js";

export type PropertyValue = Node | Node[];

export class PropertyMap {
  private values = new Map<string, PropertyValue>();
  private referrers = new Map<Node, Set<string>>();

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** The bound node, a copy of the bound sequence, or undefined. */
  get(name: string): PropertyValue | undefined {
    const value = this.values.get(name);
    return Array.isArray(value) ? [...value] : value;
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  /** Names whose binding references `node`, in no particular order. */
  namesOf(node: Node): string[] {
    return [...(this.referrers.get(node) ?? [])];
  }

  references(node: Node): boolean {
    return this.referrers.has(node);
  }

  bind(name: string, node: Node): void {
    this.delete(name);
    this.values.set(name, node);
    this.track(node, name);
  }

  bindList(name: string, nodes: Iterable<Node>): void {
    this.delete(name);
    const list = [...nodes];
    this.values.set(name, list);
    for (const node of list) {
      this.track(node, name);
    }
  }

  /** Push onto a sequence binding; anything else is rebound to `node`. */
  append(name: string, node: Node): void {
    const value = this.values.get(name);
    if (Array.isArray(value)) {
      value.push(node);
      this.track(node, name);
    } else {
      this.bind(name, node);
    }
  }

  delete(name: string): boolean {
    const value = this.values.get(name);
    if (value === undefined) return false;
    this.values.delete(name);
    for (const node of Array.isArray(value) ? value : [value]) {
      this.untrack(node, name);
    }
    return true;
  }

  /**
   * Drop every reference to `node`: single bindings disappear, sequence
   * entries are spliced out and the sequence keeps its name.
   */
  detach(node: Node): void {
    const names = this.referrers.get(node);
    if (!names) return;
    this.referrers.delete(node);
    for (const name of names) {
      const value = this.values.get(name);
      if (Array.isArray(value)) {
        this.values.set(name, value.filter(entry => entry !== node));
      } else {
        this.values.delete(name);
      }
    }
  }

  /** Point every reference to `node` at `replacement` instead. */
  substitute(node: Node, replacement: Node): void {
    const names = this.referrers.get(node);
    if (!names) return;
    this.referrers.delete(node);
    for (const name of names) {
      const value = this.values.get(name);
      if (Array.isArray(value)) {
        this.values.set(name, value.map(entry => (entry === node ? replacement : entry)));
      } else {
        this.values.set(name, replacement);
      }
      this.track(replacement, name);
    }
  }

  /** Copy every binding of `other` into this map, overwriting on collision. */
  assign(other: PropertyMap): void {
    for (const [name, value] of other.values) {
      if (Array.isArray(value)) {
        this.bindList(name, value);
      } else {
        this.bind(name, value);
      }
    }
  }

  clear(): void {
    this.values.clear();
    this.referrers.clear();
  }

  private track(node: Node, name: string): void {
    let names = this.referrers.get(node);
    if (!names) {
      names = new Set();
      this.referrers.set(node, names);
    }
    names.add(name);
  }

  private untrack(node: Node, name: string): void {
    const names = this.referrers.get(node);
    if (!names) return;
    names.delete(name);
    if (names.size === 0) {
      this.referrers.delete(node);
    }
  }
}
