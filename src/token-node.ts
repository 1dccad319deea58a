import { Node, type NodeTest } from "./node.js";
import type { SourcePosition } from "./source-position.js";
import type { TokenType } from "./tokenizer.js";

const TRIVIA: ReadonlySet<TokenType> = new Set<TokenType>(["whitespace", "newline", "comment"]);

/** A leaf holding one token's verbatim text. */
export class TokenNode extends Node {
  readonly kind = "token";

  constructor(
    public readonly type: TokenType,
    private text: string,
    private readonly position: SourcePosition
  ) {
    super();
  }

  getText(): string {
    return this.text;
  }

  /** Edit the token in place. The node keeps its links and bindings. */
  setText(text: string): this {
    this.text = text;
    return this;
  }

  /** Whitespace, newlines and comments: text that carries layout, not syntax. */
  isTrivia(): boolean {
    return TRIVIA.has(this.type);
  }

  getSourcePosition(): SourcePosition {
    return this.position;
  }

  toString(): string {
    return this.text;
  }
}

export const isToken: NodeTest<TokenNode> = (node: Node): node is TokenNode => node instanceof TokenNode;

/** Matches tokens of the given type, optionally with exactly the given text. */
export function tokenOfType(type: TokenType, text?: string): NodeTest<TokenNode> {
  return (node: Node): node is TokenNode =>
    node instanceof TokenNode && node.type === type && (text === undefined || node.getText() === text);
}
