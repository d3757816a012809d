import { describe, expect, it } from "vitest";
import { resolveConfig } from "~/config/config.ts";
import { ConfigError } from "~/errors/build.ts";

describe("resolveConfig()", () => {
  it("should fill every default", () => {
    expect(resolveConfig()).toEqual({
      prefix: "/",
      development: false,
      serverName: "switchyard",
      defaultContentType: "text/plain; charset=utf-8",
      router: {
        caseSensitive: true,
        trailingSlash: "normalize",
        allowWildcards: true,
      },
      log: { level: "info", json: false, timestamp: true },
    });
  });

  it("should keep given values and fill the rest", () => {
    const config = resolveConfig({
      prefix: "/api",
      router: { caseSensitive: false },
      log: { level: "debug", name: "svc" },
    });

    expect(config.prefix).toBe("/api");
    expect(config.router).toEqual({
      caseSensitive: false,
      trailingSlash: "normalize",
      allowWildcards: true,
    });
    expect(config.log).toEqual({
      level: "debug",
      name: "svc",
      json: false,
      timestamp: true,
    });
  });

  it("should not mutate the input", () => {
    const input = { router: { caseSensitive: false } };
    resolveConfig(input);

    expect(input).toEqual({ router: { caseSensitive: false } });
  });

  it("should throw a ConfigError listing the issues", () => {
    let caught: unknown;
    try {
      resolveConfig({ prefix: "api" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe("INVALID_CONFIG");
      expect(caught.issues[0].startsWith("/prefix: ")).toBe(true);
    }
  });
});
