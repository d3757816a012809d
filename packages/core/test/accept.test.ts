import { describe, expect, it } from "vitest";
import {
  negotiate,
  normalizeMediaType,
  parseAccept,
} from "~/endpoint/accept.ts";

describe("normalizeMediaType()", () => {
  it("should lower-case and drop parameters", () => {
    expect(normalizeMediaType("Text/HTML; charset=utf-8")).toBe("text/html");
  });

  it("should reject values that are not media types", () => {
    expect(normalizeMediaType("json")).toBeUndefined();
    expect(normalizeMediaType("text/")).toBeUndefined();
    expect(normalizeMediaType("/html")).toBeUndefined();
    expect(normalizeMediaType("a/b/c")).toBeUndefined();
  });
});

describe("parseAccept()", () => {
  it("should parse ranges with qualities in header order", () => {
    expect(parseAccept("text/html, application/json;q=0.8, */*;q=0.1"))
      .toEqual([
        { type: "text", subtype: "html", quality: 1, index: 0 },
        { type: "application", subtype: "json", quality: 0.8, index: 1 },
        { type: "*", subtype: "*", quality: 0.1, index: 2 },
      ]);
  });

  it("should skip malformed entries and read a bare *", () => {
    expect(parseAccept("garbage, , *;q=0.5")).toEqual([
      { type: "*", subtype: "*", quality: 0.5, index: 0 },
    ]);
  });

  it("should clamp qualities and ignore unreadable ones", () => {
    expect(parseAccept("a/b;q=2, c/d;q=-1, e/f;q=abc").map((r) => r.quality))
      .toEqual([1, 0, 1]);
  });

  it("should read an empty q as 1", () => {
    expect(parseAccept("text/html;q=, application/json;q= ").map((r) =>
      r.quality
    )).toEqual([1, 1]);
    expect(negotiate("text/html;q=", ["text/html"])).toBe("text/html");
  });
});

describe("negotiate()", () => {
  const available = ["text/html", "application/json"];

  it("should pick the highest quality", () => {
    expect(negotiate("text/html;q=0.5, application/json", available)).toBe(
      "application/json",
    );
  });

  it("should weigh a type by its most specific matching range", () => {
    expect(
      negotiate("text/*;q=0.9, text/html;q=0.1, */*;q=0.5", available),
    ).toBe("application/json");
  });

  it("should exclude types weighted q=0", () => {
    expect(negotiate("text/html;q=0, */*", available)).toBe(
      "application/json",
    );
    expect(negotiate("*/*;q=0", available)).toBeUndefined();
  });

  it("should break quality ties by specificity", () => {
    expect(negotiate("*/*, application/json", available)).toBe(
      "application/json",
    );
  });

  it("should break remaining ties by Accept order", () => {
    expect(negotiate("application/json, text/html", available)).toBe(
      "application/json",
    );
  });

  it("should break full ties by registration order", () => {
    expect(negotiate("*/*", available)).toBe("text/html");
    expect(negotiate("*/*", ["application/json", "text/html"])).toBe(
      "application/json",
    );
  });

  it("should return undefined when nothing matches", () => {
    expect(negotiate("image/png", available)).toBeUndefined();
  });
});
