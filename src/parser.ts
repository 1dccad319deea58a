// ============================================================================
// Parser - Builds a concrete syntax tree from a lossless token stream
// ============================================================================
//
// The tree is built bottom-up: a group is completed before it is appended to
// its parent. Every token, trivia included, ends up as a leaf, so the root
// serializes back to the exact input.

import type { Token } from "./tokenizer.js";
import { TokenNode } from "./token-node.js";
import {
  CLOSING_BRACKET, GroupNode, SourceFileNode, isClosingBracket, isOpeningBracket,
} from "./cst.js";

export class ParseError extends Error {
  constructor(message: string, public token: Token) {
    super(`${message} at line ${token.line}:${token.col} (got ${token.type}: "${token.value}")`);
  }
}

export class Parser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  // ---------------------------------------------------------------------------
  // Token navigation
  // ---------------------------------------------------------------------------

  private peek(): Token {
    return this.tokens[this.pos] ?? this.endOfInput();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.pos++;
    return token;
  }

  private endOfInput(): Token {
    const last = this.tokens[this.tokens.length - 1];
    return last?.type === "eof" ? last : { type: "eof", value: "", line: 0, col: 0, offset: 0 };
  }

  // ---------------------------------------------------------------------------
  // Tree building
  // ---------------------------------------------------------------------------

  parse(): SourceFileNode {
    const root = new SourceFileNode();
    root.setPropertyList("elements");
    // Groups whose closing bracket has not been seen yet, innermost last.
    const open: GroupNode[] = [];

    for (let token = this.advance(); token.type !== "eof"; token = this.advance()) {
      if (token.type === "punctuation" && isOpeningBracket(token.value)) {
        const group = new GroupNode(token.value);
        group.appendChild(toTokenNode(token), "open");
        group.setPropertyList("elements");
        open.push(group);
        continue;
      }

      if (token.type === "punctuation" && isClosingBracket(token.value)) {
        const group = open.pop();
        if (!group || CLOSING_BRACKET[group.bracket] !== token.value) {
          throw new ParseError(`Unexpected "${token.value}"`, token);
        }
        group.appendChild(toTokenNode(token), "close");
        (open.length > 0 ? open[open.length - 1] : root).appendChild(group, "elements");
        continue;
      }

      const leaf = toTokenNode(token);
      const parent = open.length > 0 ? open[open.length - 1] : root;
      parent.appendChild(leaf, leaf.isTrivia() ? undefined : "elements");
    }

    const unclosed = open.pop();
    if (unclosed) {
      throw new ParseError(`Expected punctuation "${CLOSING_BRACKET[unclosed.bracket]}"`, this.peek());
    }
    return root;
  }
}

export function toTokenNode(token: Token): TokenNode {
  return new TokenNode(token.type, token.value, {
    line: token.line,
    col: token.col,
    offset: token.offset,
  });
}
