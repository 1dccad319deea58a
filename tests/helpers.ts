/**
 * Shared builders and invariant checks for tree tests
 */

import { ParentNode, TokenNode, type Node, type SourcePosition, type TokenType } from "../src/index.js";

/** A plain composite with no syntax of its own. */
export class Box extends ParentNode {
  readonly kind = "box";
}

const START: SourcePosition = { line: 1, col: 1, offset: 0 };

export function leaf(text: string, type: TokenType = "word", position: SourcePosition = START): TokenNode {
  return new TokenNode(type, text, position);
}

export function box(...children: Node[]): Box {
  return new Box().appendChildren(children);
}

/** Child texts in document order. */
export function texts(nodes: Node[]): string[] {
  return nodes.map(node => node.toString());
}

/**
 * Walks `root` and every composite below it, describing each broken link,
 * count or property binding. An empty result means the tree is consistent.
 */
export function invariantViolations(root: ParentNode): string[] {
  const problems: string[] = [];
  const pending: [ParentNode, string][] = [[root, root.kind]];
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const [node, label] = entry;
    let count = 0;
    let previous: Node | null = null;
    let child = node.getFirst();
    while (child) {
      if (child.parent !== node) problems.push(`${label}[${count}] has the wrong parent`);
      if (child.previous !== previous) problems.push(`${label}[${count}] has the wrong previous`);
      if (child instanceof ParentNode) pending.push([child, `${label}[${count}]`]);
      previous = child;
      child = child.next;
      count++;
    }
    if (previous !== node.getLast()) problems.push(`${label} tail is not the last child`);
    if (count !== node.getChildCount()) {
      problems.push(`${label} counts ${node.getChildCount()} children but links ${count}`);
    }
    for (const name of node.getPropertyNames()) {
      const value = node.getProperty(name);
      const bound = value === undefined ? [] : Array.isArray(value) ? value : [value];
      for (const target of bound) {
        if (target.parent !== node) problems.push(`${label}.${name} references a non-child`);
      }
    }
  }
  return problems;
}
