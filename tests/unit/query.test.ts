import { describe, it, expect } from "@jest/globals";
import {
  EmptySubtreeError, Node, hasKind, isA, isToken, tokenOfType, type SourcePosition,
} from "../../src/index.js";
import { Box, box, leaf, texts } from "../helpers.js";

/** A leaf that is not a token, such as an editor cursor. */
class Marker extends Node {
  readonly kind = "marker";

  getSourcePosition(): SourcePosition {
    return { line: 9, col: 9, offset: 99 };
  }

  toString(): string {
    return "";
  }
}

/** Wraps `innermost` in `depth - 1` further boxes, building from the bottom up. */
function nest(innermost: Box, depth: number): Box {
  let outer = innermost;
  for (let level = 1; level < depth; level++) {
    outer = box(outer);
  }
  return outer;
}

const DEPTH = 20_000;

describe("filter", () => {
  it("should return matching direct children only", () => {
    const a = leaf("a"), c = leaf("c");
    const root = box(a, box(leaf("nested")), c);

    expect(root.filter(isToken)).toEqual([a, c]);
  });

  it("should return an empty list when nothing matches", () => {
    expect(box(leaf("a")).filter(isA(Box))).toEqual([]);
  });
});

describe("find", () => {
  it("should search depth-first in document order", () => {
    const a = leaf("A"), c = leaf("C"), d = leaf("D");
    const root = box(a, box(c, d));

    expect(root.find(isToken)).toEqual([a, c, d]);
  });

  it("should include the node itself and list each composite once", () => {
    const b2 = box();
    const b1 = box(b2);
    const b3 = box(leaf("x"));
    const root = box(b1, b3);

    expect(root.find(isA(Box))).toEqual([root, b1, b2, b3]);
  });

  it("should match by kind tag", () => {
    const root = box(leaf("a"), box(leaf("b")));

    expect(root.find(hasKind("box"))).toHaveLength(2);
    expect(texts(root.find(hasKind("token")))).toEqual(["a", "b"]);
  });

  it("should match tokens by type and text", () => {
    const root = box(leaf("x"), leaf(" ", "whitespace"), box(leaf("x"), leaf("y")));

    expect(root.find(tokenOfType("word", "x"))).toHaveLength(2);
    expect(root.find(tokenOfType("whitespace"))).toHaveLength(1);
  });
});

describe("getFirstToken / getLastToken", () => {
  it("should descend to the leftmost and rightmost leaves", () => {
    const first = leaf("first"), last = leaf("last");
    const root = box(box(box(first), leaf("mid")), box(last));

    expect(root.getFirstToken()).toBe(first);
    expect(root.getLastToken()).toBe(last);
  });

  it("should throw on an empty node", () => {
    expect(() => new Box().getFirstToken()).toThrow(EmptySubtreeError);
    expect(() => new Box().getLastToken()).toThrow(EmptySubtreeError);
  });

  it("should name the empty composite met on the way down", () => {
    const empty = new Box();
    const root = box(empty, leaf("x"));

    let caught: unknown;
    try {
      root.getFirstToken();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EmptySubtreeError);
    expect(caught instanceof EmptySubtreeError && caught.node).toBe(empty);
    expect(root.getLastToken().toString()).toBe("x");
  });

  it("should return a leaf that is not a token", () => {
    const first = new Marker(), last = new Marker();
    const root = box(box(first), leaf("x"), box(last));

    expect(root.getFirstToken()).toBe(first);
    expect(root.getLastToken()).toBe(last);
  });
});

describe("getSourcePosition", () => {
  it("should report the first leaf's position", () => {
    const root = box(
      leaf("a", "word", { line: 3, col: 5, offset: 40 }),
      leaf("b", "word", { line: 3, col: 6, offset: 41 })
    );

    expect(root.getSourcePosition()).toEqual({ line: 3, col: 5, offset: 40 });
  });

  it("should skip empty composites when looking for the first leaf", () => {
    const root = box(new Box(), leaf("x", "word", { line: 2, col: 1, offset: 9 }));

    expect(root.getSourcePosition()).toEqual({ line: 2, col: 1, offset: 9 });
  });

  it("should place an empty node where its parent starts", () => {
    const empty = new Box();
    box(leaf("x", "word", { line: 7, col: 2, offset: 60 }), empty);

    expect(empty.getSourcePosition()).toEqual({ line: 7, col: 2, offset: 60 });
  });

  it("should find the ancestor's first leaf after the empty node", () => {
    const empty = new Box();
    box(box(empty), leaf("y", "word", { line: 4, col: 1, offset: 30 }));

    expect(empty.getSourcePosition()).toEqual({ line: 4, col: 1, offset: 30 });
  });

  it("should throw when no leaf exists anywhere above", () => {
    const empty = new Box();
    box(box(), empty);

    expect(() => empty.getSourcePosition()).toThrow(EmptySubtreeError);
  });
});

describe("toString", () => {
  it("should concatenate leaves in document order", () => {
    const root = box(leaf("if"), leaf(" ", "whitespace"), box(leaf("("), leaf("x"), leaf(")")), leaf(";"));

    expect(root.toString()).toBe("if (x);");
    expect(String(root)).toBe("if (x);");
  });

  it("should be empty for an empty node", () => {
    expect(new Box().toString()).toBe("");
  });
});

describe("deeply nested trees", () => {
  it("should serialize, search and descend through a long chain of composites", () => {
    const x = leaf("x", "word", { line: 2, col: 3, offset: 10 });
    const chain = nest(box(x), DEPTH);
    const root = box(leaf("<"), chain, leaf(">"));

    expect(root.toString()).toBe("<x>");
    expect(root.find(isA(Box))).toHaveLength(DEPTH + 1);
    const words = root.find(tokenOfType("word", "x"));
    expect(words).toHaveLength(1);
    expect(words[0]).toBe(x);
    expect(chain.getFirstToken()).toBe(x);
    expect(chain.getLastToken()).toBe(x);
    expect(chain.getSourcePosition()).toEqual({ line: 2, col: 3, offset: 10 });
    expect(x.closest(isA(Box))?.isDescendantOf(root)).toBe(true);
  });

  it("should place a deeply buried empty node at the next leaf above it", () => {
    const empty = new Box();
    const chain = nest(empty, DEPTH);
    box(chain, leaf("y", "word", { line: 4, col: 1, offset: 30 }));

    expect(chain.toString()).toBe("");
    expect(empty.getSourcePosition()).toEqual({ line: 4, col: 1, offset: 30 });
    expect(() => chain.getFirstToken()).toThrow(EmptySubtreeError);
  });
});
