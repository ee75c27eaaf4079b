/**
 * Tests for capture-group analysis and boundary pattern compilation.
 */

import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import {
  analyzeCaptureGroups,
  compileBoundaryPattern,
  statelessFlags,
} from "../patterns.js";

describe("analyzeCaptureGroups", () => {
  it("counts a nested alternation as part of the outer step group", () => {
    expect(
      analyzeCaptureGroups(String.raw`running step (.*\b(install|deploy)\w*)`)
    ).toEqual({ total: 2, outermost: [1] });
  });

  it("ignores groups inside a negative lookahead nested in the step group", () => {
    expect(
      analyzeCaptureGroups(
        String.raw`running step ((?!.*\b(install|deploy|orion)\w*)[\w-]+)`
      )
    ).toEqual({ total: 2, outermost: [1] });
  });

  it("reports sibling groups separately", () => {
    expect(analyzeCaptureGroups("(a)(b)")).toEqual({
      total: 2,
      outermost: [1, 2],
    });
  });

  it("finds no groups in plain text", () => {
    expect(analyzeCaptureGroups("running step")).toEqual({
      total: 0,
      outermost: [],
    });
  });

  it("skips escaped parentheses and character classes", () => {
    expect(analyzeCaptureGroups(String.raw`\(x\)`)).toEqual({
      total: 0,
      outermost: [],
    });
    expect(analyzeCaptureGroups("[(]x(y)")).toEqual({
      total: 1,
      outermost: [1],
    });
  });

  it("treats non-capturing groups as transparent", () => {
    expect(analyzeCaptureGroups("(?:a(b))")).toEqual({
      total: 1,
      outermost: [1],
    });
  });

  it("counts named groups", () => {
    expect(analyzeCaptureGroups("step (?<name>\\w+)")).toEqual({
      total: 1,
      outermost: [1],
    });
  });

  it("excludes groups inside lookarounds but keeps their numbering", () => {
    expect(analyzeCaptureGroups("(?=(a))(b)")).toEqual({
      total: 2,
      outermost: [2],
    });
    expect(analyzeCaptureGroups("(?<=(a))b(c)")).toEqual({
      total: 2,
      outermost: [2],
    });
  });
});

describe("statelessFlags", () => {
  it("drops global and sticky flags", () => {
    expect(statelessFlags("gimy")).toBe("im");
    expect(statelessFlags("")).toBe("");
  });
});

describe("compileBoundaryPattern", () => {
  it("returns the regex and the step group number", () => {
    const compiled = compileBoundaryPattern("ORION", "(?=(x))step (x\\w*)", "i");

    expect(compiled.stepGroup).toBe(2);
    expect(compiled.regex.flags).toBe("i");
  });

  it("rejects an invalid pattern source", () => {
    expect(() => compileBoundaryPattern("BAD", "step (", "i")).toThrow(
      ConfigurationError
    );
    expect(() => compileBoundaryPattern("BAD", "step (", "i")).toThrow(
      'Boundary rule "BAD" has an invalid pattern'
    );
  });

  it("rejects a pattern without a capturing group", () => {
    expect(() => compileBoundaryPattern("NONE", "running step", "i")).toThrow(
      'Boundary rule "NONE" must have exactly one capturing group for the step name, found 0: /running step/'
    );
  });

  it("rejects a pattern with two outermost capturing groups", () => {
    try {
      compileBoundaryPattern("TWO", "(step) (\\w+)", "i");
      expect.unreachable("expected a ConfigurationError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.label).toBe("TWO");
        expect(err.pattern).toBe("(step) (\\w+)");
      }
    }
  });
});
