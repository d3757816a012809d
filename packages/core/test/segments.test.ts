import { describe, expect, it } from "vitest";
import {
  formatPattern,
  parsePattern,
  splitPath,
} from "~/router/segments.ts";
import { Variables } from "~/router/variables.ts";
import { ConflictingPatternError } from "~/errors/build.ts";

describe("splitPath()", () => {
  it("should return no segments for the root", () => {
    expect(splitPath("/")).toEqual([]);
    expect(splitPath("")).toEqual([]);
  });

  it("should drop one trailing slash when normalizing", () => {
    expect(splitPath("/a/b/")).toEqual(["a", "b"]);
  });

  it("should keep the trailing empty segment in strict mode", () => {
    expect(splitPath("/a/b/", { trailingSlash: "strict" })).toEqual([
      "a",
      "b",
      "",
    ]);
  });

  it("should keep empty middle segments", () => {
    expect(splitPath("/a//b")).toEqual(["a", "", "b"]);
  });
});

describe("parsePattern()", () => {
  it("should decompose static, variable and wildcard segments", () => {
    expect(parsePattern("/user/:id/*rest")).toEqual([
      { kind: "static", text: "user" },
      { kind: "variable", name: "id" },
      { kind: "wildcard", name: "rest" },
    ]);
  });

  it("should parse the root as zero segments", () => {
    expect(parsePattern("/")).toEqual([]);
  });

  it("should require a leading slash", () => {
    expect(() => parsePattern("users")).toThrow(ConflictingPatternError);
    expect(() => parsePattern("users")).toThrow("pattern must start with /");
  });

  it("should reject invalid variable names", () => {
    expect(() => parsePattern("/a/:")).toThrow('invalid variable name ""');
    expect(() => parsePattern("/a/:1x")).toThrow('invalid variable name "1x"');
  });

  it("should reject a name used twice", () => {
    expect(() => parsePattern("/a/:id/b/:id")).toThrow(
      'variable name "id" is used twice',
    );
  });

  it("should carry the code CONFLICTING_PATTERN", () => {
    try {
      parsePattern("/a/*x/b");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConflictingPatternError);
      expect(error).toHaveProperty("code", "CONFLICTING_PATTERN");
    }
  });
});

describe("formatPattern()", () => {
  it("should render segments back into pattern syntax", () => {
    expect(formatPattern(parsePattern("/user/:id/*rest"))).toBe(
      "/user/:id/*rest",
    );
    expect(formatPattern(parsePattern("/static/*"))).toBe("/static/*");
    expect(formatPattern([])).toBe("/");
  });
});

describe("Variables", () => {
  const variables = new Variables([["id", "42"], ["slug", "intro"]]);

  it("should keep bindings in order", () => {
    expect([...variables]).toEqual([["id", "42"], ["slug", "intro"]]);
    expect(variables.size).toBe(2);
  });

  it("should return undefined for absent names", () => {
    expect(variables.get("missing")).toBeUndefined();
    expect(variables.has("missing")).toBe(false);
  });

  it("should parse with a parser", () => {
    expect(variables.parse("id", Number)).toBe(42);
    expect(variables.parse("missing", Number)).toBeUndefined();
    expect(
      variables.parse("slug", (text) => {
        throw new Error(`not a number: ${text}`);
      }),
    ).toBeUndefined();
  });
});
