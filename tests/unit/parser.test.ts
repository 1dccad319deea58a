import { describe, it, expect } from "@jest/globals";
import {
  GroupNode, ParseError, Parser, SourceFileNode, isGroup, parseTree, tokenize,
} from "../../src/index.js";
import { invariantViolations, texts } from "../helpers.js";

describe("Parser", () => {
  it("should turn a bracket pair into a group with open and close bindings", () => {
    const root = parseTree("f(a, b)");
    const [name, group] = root.getChildren();

    expect(root).toBeInstanceOf(SourceFileNode);
    expect(name.toString()).toBe("f");
    expect(group).toBeInstanceOf(GroupNode);
    if (!(group instanceof GroupNode)) return;

    expect(group.bracket).toBe("(");
    expect(group.getOpen()?.getText()).toBe("(");
    expect(group.getClose()?.getText()).toBe(")");
    expect(group.getChildCount()).toBe(6);
    expect(texts(group.getElements())).toEqual(["a", ",", "b"]);
    expect(root.getElements()).toEqual([name, group]);
  });

  it("should leave trivia out of the elements sequence", () => {
    const root = parseTree("x /* note */ y\n");

    expect(texts(root.getElements())).toEqual(["x", "y"]);
    expect(root.getChildCount()).toBe(6);
  });

  it("should nest groups in document order", () => {
    const root = parseTree("{ [x] (y) }");
    const groups = root.find(isGroup);

    expect(groups.map(group => group.bracket)).toEqual(["{", "[", "("]);
    expect(groups[1].parent).toBe(groups[0]);
    expect(groups[2].parent).toBe(groups[0]);
    expect(groups[0].getElements()).toEqual([groups[1], groups[2]]);
  });

  it("should ignore brackets inside strings and comments", () => {
    const root = parseTree('s = "(" // )\n');

    expect(root.find(isGroup)).toEqual([]);
    expect(root.toString()).toBe('s = "(" // )\n');
  });

  it("should produce an empty root for empty input", () => {
    const root = parseTree("");

    expect(root.getChildCount()).toBe(0);
    expect(root.getElements()).toEqual([]);
  });

  it("should build consistent links everywhere", () => {
    const root = parseTree("if (a[i] > 0) { call(a, { k: [1, 2] }); }\n");

    expect(invariantViolations(root)).toEqual([]);
    expect(root.find(isGroup)).toHaveLength(6);
  });

  it("should report an unclosed bracket at end of input", () => {
    expect(() => parseTree("f(a")).toThrow(ParseError);
    expect(() => parseTree("f(a")).toThrow('Expected punctuation ")" at line 1:4 (got eof: "")');
  });

  it("should report a stray closing bracket", () => {
    expect(() => parseTree("a)")).toThrow('Unexpected ")" at line 1:2 (got punctuation: ")")');
  });

  it("should report mismatched brackets", () => {
    expect(() => parseTree("(]")).toThrow('Unexpected "]" at line 1:2 (got punctuation: "]")');
  });

  it("should parse groups nested twenty thousand deep", () => {
    const depth = 20_000;
    const source = "(".repeat(depth) + ")".repeat(depth);
    const root = parseTree(source);
    const groups = root.find(isGroup);
    const innermost = groups[depth - 1];

    expect(root.toString()).toBe(source);
    expect(groups).toHaveLength(depth);
    expect(innermost.getChildCount()).toBe(2);
    expect(innermost.getSourcePosition()).toEqual({ line: 1, col: depth, offset: depth - 1 });
    expect(root.getLastToken().toString()).toBe(")");
    expect(invariantViolations(root)).toEqual([]);
  });

  it("should report the unclosed bracket of a deep nesting at end of input", () => {
    expect(() => parseTree("(".repeat(20_000))).toThrow('Expected punctuation ")" at line 1:20001 (got eof: "")');
  });

  it("should accept a token list without a trailing eof", () => {
    const tokens = tokenize("a b").filter(token => token.type !== "eof");
    const root = new Parser(tokens).parse();

    expect(root.toString()).toBe("a b");
  });
});
