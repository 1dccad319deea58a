// ============================================================================
// Tokenizer - Splits source text into a lossless stream of tokens
// ============================================================================
//
// Nothing is skipped: whitespace, newlines and comments become tokens of
// their own, and a character the tokenizer does not recognise becomes an
// "unknown" token. Joining every token's value gives back the input.

export type TokenType =
  | "whitespace"    // spaces, tabs, lone carriage returns
  | "newline"       // \n or \r\n
  | "comment"       // // ... and /* ... */
  | "string"        // "..." '...' `...`, quotes included
  | "number"        // 42, 3.14, 0xff, 1_000
  | "word"          // identifiers and keywords
  | "punctuation"   // one operator or bracket character
  | "unknown"       // anything else, one character at a time
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  col: number;
  offset: number;
}

const PUNCTUATION = new Set([
  "{", "}", "(", ")", "[", "]", ":", ";", ",", "?", "|", "&", "=", "<", ">", ".",
  "*", "+", "-", "/", "%", "!", "~", "^", "@", "#", "\\",
]);

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let col = 1;

  function peek(offset = 0): string {
    return source[i + offset] ?? "";
  }

  function advance(count = 1): string {
    let result = "";
    for (let j = 0; j < count && i < source.length; j++) {
      const ch = source[i];
      if (ch === "\n") { line++; col = 1; }
      else { col++; }
      result += ch;
      i++;
    }
    return result;
  }

  function readWhile(pattern: RegExp): string {
    let value = "";
    while (i < source.length && pattern.test(peek())) {
      value += advance();
    }
    return value;
  }

  function readString(quote: string): string {
    let value = advance(); // opening quote
    while (i < source.length && peek() !== quote) {
      if (peek() === "\\") {
        value += advance(2);
      } else if (peek() === "\n" && quote !== "`") {
        // Unterminated: the newline belongs to the next token
        return value;
      } else {
        value += advance();
      }
    }
    if (i < source.length) value += advance(); // closing quote
    return value;
  }

  function readLineComment(): string {
    let value = "";
    while (i < source.length && peek() !== "\n" && !(peek() === "\r" && peek(1) === "\n")) {
      value += advance();
    }
    return value;
  }

  function readBlockComment(): string {
    let value = advance(2); // /*
    while (i < source.length) {
      if (peek() === "*" && peek(1) === "/") {
        return value + advance(2);
      }
      value += advance();
    }
    return value;
  }

  while (i < source.length) {
    const start = { line, col, offset: i };
    const ch = peek();
    let type: TokenType;
    let value: string;

    if (ch === "\n") {
      type = "newline";
      value = advance();
    } else if (ch === "\r" && peek(1) === "\n") {
      type = "newline";
      value = advance(2);
    } else if (/[ \t\r\f\v]/.test(ch)) {
      type = "whitespace";
      value = readWhile(/[ \t\r\f\v]/);
      // A run ending in \r leaves it for the following \r\n newline
      if (value.endsWith("\r") && peek() === "\n") {
        value = value.slice(0, -1);
        i--;
        col--;
      }
    } else if (ch === "/" && peek(1) === "/") {
      type = "comment";
      value = readLineComment();
    } else if (ch === "/" && peek(1) === "*") {
      type = "comment";
      value = readBlockComment();
    } else if (ch === '"' || ch === "'" || ch === "`") {
      type = "string";
      value = readString(ch);
    } else if (/[0-9]/.test(ch)) {
      type = "number";
      value = readWhile(/[0-9a-zA-Z._]/);
    } else if (/[a-zA-Z_$]/.test(ch)) {
      type = "word";
      value = readWhile(/[a-zA-Z0-9_$]/);
    } else if (PUNCTUATION.has(ch)) {
      type = "punctuation";
      value = advance();
    } else {
      type = "unknown";
      value = advance();
    }

    tokens.push({ type, value, ...start });
  }

  tokens.push({ type: "eof", value: "", line, col, offset: i });
  return tokens;
}
