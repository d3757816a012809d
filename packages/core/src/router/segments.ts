import { ConflictingPatternError } from "~/errors/build.ts";
import {
  DEFAULT_ROUTER_OPTIONS,
  type RouterOptions,
  type Segment,
} from "~/router/types.ts";

const SLASH = 47;
const COLON = 58;
const STAR = 42;

const NAME_PATTERN = /^[A-Za-z_$][\w$-]*$/;

/**
 * Split a request path into its segments.
 *
 * The root path has no segments. In `normalize` mode a single trailing
 * slash is ignored; in `strict` mode it yields a trailing empty segment.
 */
export function splitPath(
  path: string,
  options: Pick<RouterOptions, "trailingSlash"> = DEFAULT_ROUTER_OPTIONS,
): string[] {
  const start = path.charCodeAt(0) === SLASH ? 1 : 0;
  let end = path.length;

  if (
    options.trailingSlash === "normalize" &&
    end > start &&
    path.charCodeAt(end - 1) === SLASH
  ) {
    end--;
  }

  if (start >= end) return [];
  return path.slice(start, end).split("/");
}

/**
 * Decompose a route pattern such as `/user/:id/*rest` into segments.
 *
 * @throws {ConflictingPatternError} When the pattern is malformed.
 */
export function parsePattern(
  pattern: string,
  options: RouterOptions = DEFAULT_ROUTER_OPTIONS,
): Segment[] {
  if (pattern.charCodeAt(0) !== SLASH) {
    throw new ConflictingPatternError(pattern, "pattern must start with /");
  }

  const parts = splitPath(pattern, options);
  const segments: Segment[] = [];
  const names = new Set<string>();

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    const firstChar = part.charCodeAt(0);

    if (firstChar !== COLON && firstChar !== STAR) {
      segments.push({ kind: "static", text: part });
      continue;
    }

    const isWildcard = firstChar === STAR;
    const name = part.slice(1) || (isWildcard ? "*" : "");

    if (isWildcard) {
      if (!options.allowWildcards) {
        throw new ConflictingPatternError(pattern, "wildcards are disabled");
      }
      if (i !== parts.length - 1) {
        throw new ConflictingPatternError(
          pattern,
          `wildcard *${name} must be the last segment`,
        );
      }
    }

    if (name !== "*" && !NAME_PATTERN.test(name)) {
      throw new ConflictingPatternError(
        pattern,
        `invalid variable name "${name}"`,
      );
    }
    if (names.has(name)) {
      throw new ConflictingPatternError(
        pattern,
        `variable name "${name}" is used twice`,
      );
    }
    names.add(name);

    segments.push(
      isWildcard ? { kind: "wildcard", name } : { kind: "variable", name },
    );
  }

  return segments;
}

/**
 * Render segments back into pattern syntax.
 */
export function formatPattern(segments: readonly Segment[]): string {
  const parts = segments.map((segment) => {
    switch (segment.kind) {
      case "static":
        return segment.text;
      case "variable":
        return `:${segment.name}`;
      case "wildcard":
        return segment.name === "*" ? "*" : `*${segment.name}`;
    }
  });
  return `/${parts.join("/")}`;
}
