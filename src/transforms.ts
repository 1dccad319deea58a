// ============================================================================
// Transforms - Refactorings expressed as in-place tree mutations
// ============================================================================

import { NotAChildError } from "./errors.js";
import type { Node } from "./node.js";
import type { ParentNode } from "./parent-node.js";
import { TokenNode, tokenOfType } from "./token-node.js";
import type { GroupNode } from "./cst.js";

/** Remove every comment token under `root`. Returns how many were removed. */
export function stripComments(root: ParentNode): number {
  const comments = root.find(tokenOfType("comment"));
  for (const comment of comments) {
    comment.remove();
  }
  return comments.length;
}

/**
 * Replace each word token spelled `from` with a fresh token spelled `to`.
 * Replacements keep the original position and property bindings.
 */
export function renameWord(root: ParentNode, from: string, to: string): number {
  const matches = root.find(tokenOfType("word", from));
  for (const token of matches) {
    token.replaceWith(new TokenNode("word", to, token.getSourcePosition()));
  }
  return matches.length;
}

/**
 * Drop a group's brackets and splice its contents into the parent where the
 * group stood. The group's elements take its place in the parent's
 * "elements" sequence. Returns the moved nodes in document order.
 */
export function unwrapGroup(group: GroupNode): Node[] {
  const parent = group.parent;
  if (parent === null) {
    throw new NotAChildError(group, null);
  }

  group.getOpen()?.remove();
  group.getClose()?.remove();
  const inner = group.getElements();

  const moved: Node[] = [];
  for (let child = group.removeFirst(); child; child = group.removeFirst()) {
    group.before(child);
    moved.push(child);
  }

  const elements = parent.getProperty("elements");
  if (Array.isArray(elements)) {
    const at = elements.indexOf(group);
    if (at !== -1) {
      elements.splice(at, 1, ...inner);
      parent.setPropertyList("elements", elements);
    }
  }
  group.remove();
  return moved;
}
