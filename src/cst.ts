// ============================================================================
// CST node kinds produced by the Parser
// ============================================================================

import { ParentNode } from "./parent-node.js";
import type { Node, NodeTest } from "./node.js";
import { TokenNode } from "./token-node.js";

export type Bracket = "(" | "[" | "{";

export const CLOSING_BRACKET: Record<Bracket, string> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

export function isOpeningBracket(value: string): value is Bracket {
  return value === "(" || value === "[" || value === "{";
}

export function isClosingBracket(value: string): boolean {
  return value === ")" || value === "]" || value === "}";
}

/** Non-trivia children, kept in the "elements" sequence binding. */
function elementsOf(node: ParentNode): Node[] {
  const value = node.getProperty("elements");
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function tokenProperty(node: ParentNode, name: string): TokenNode | undefined {
  const value = node.getProperty(name);
  return value instanceof TokenNode ? value : undefined;
}

/** Root of a parsed document. */
export class SourceFileNode extends ParentNode {
  readonly kind = "source_file";

  getElements(): Node[] {
    return elementsOf(this);
  }
}

/** A bracketed region: its opening token, contents and closing token. */
export class GroupNode extends ParentNode {
  readonly kind = "group";

  constructor(public readonly bracket: Bracket) {
    super();
  }

  getOpen(): TokenNode | undefined {
    return tokenProperty(this, "open");
  }

  getClose(): TokenNode | undefined {
    return tokenProperty(this, "close");
  }

  getElements(): Node[] {
    return elementsOf(this);
  }
}

export const isGroup: NodeTest<GroupNode> = (node: Node): node is GroupNode => node instanceof GroupNode;
