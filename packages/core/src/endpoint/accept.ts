/**
 * Accept header parsing and content negotiation.
 */

export interface MediaRange {
  /** Lower-cased main type, `*` for any. */
  type: string;
  /** Lower-cased subtype, `*` for any. */
  subtype: string;
  /** Weight between 0 and 1 (`q` parameter). */
  quality: number;
  /** Position in the header, used to break ties. */
  index: number;
}

/**
 * Reduce a content type to its lower-cased `type/subtype`, dropping
 * parameters. Returns `undefined` for anything that is not a media type.
 *
 * @example
 * normalizeMediaType("Application/JSON; charset=utf-8") // "application/json"
 */
export function normalizeMediaType(contentType: string): string | undefined {
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  const slash = mediaType.indexOf("/");
  if (slash <= 0 || slash === mediaType.length - 1) return undefined;
  if (mediaType.indexOf("/", slash + 1) !== -1) return undefined;
  return mediaType;
}

/**
 * Read a `q` value. Numbers are clamped to [0, 1]; an empty or unreadable
 * value counts as 1, so only an explicit zero excludes a range.
 */
function parseQuality(value: string): number {
  if (value === "") return 1;
  const quality = Number(value);
  if (!Number.isFinite(quality)) return 1;
  return Math.min(Math.max(quality, 0), 1);
}

/**
 * Parse an Accept header into media ranges, in header order.
 * Malformed entries are skipped; a bare `*` is read as `*\/*`.
 */
export function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const entry of header.split(",")) {
    const [rawType, ...rawParams] = entry.split(";");
    const trimmed = rawType.trim();
    if (!trimmed) continue;

    const mediaType = trimmed === "*" ? "*/*" : normalizeMediaType(trimmed);
    if (!mediaType) continue;

    let quality = 1;
    for (const param of rawParams) {
      const eq = param.indexOf("=");
      if (eq === -1) continue;
      if (param.slice(0, eq).trim().toLowerCase() === "q") {
        quality = parseQuality(param.slice(eq + 1).trim());
      }
    }

    const slash = mediaType.indexOf("/");
    ranges.push({
      type: mediaType.slice(0, slash),
      subtype: mediaType.slice(slash + 1),
      quality,
      index: ranges.length,
    });
  }

  return ranges;
}

function specificity(range: MediaRange, type: string, subtype: string): number {
  if (range.type === type && range.subtype === subtype) return 2;
  if (range.type === type && range.subtype === "*") return 1;
  if (range.type === "*" && range.subtype === "*") return 0;
  return -1;
}

interface Candidate {
  mediaType: string;
  quality: number;
  specificity: number;
  rangeIndex: number;
  order: number;
}

/**
 * Pick the available media type the client prefers most.
 *
 * Each available type takes the weight of the most specific range that
 * matches it. The highest weight wins; ties go to the more specific range,
 * then to the range listed first, then to the type listed first in
 * `available`. Types weighted `q=0` are never chosen.
 *
 * @example
 * negotiate("text/html;q=0.5, application/json", ["text/html", "application/json"])
 * // "application/json"
 */
export function negotiate(
  accept: string | readonly MediaRange[],
  available: readonly string[],
): string | undefined {
  const ranges = typeof accept === "string" ? parseAccept(accept) : accept;
  let best: Candidate | undefined;

  for (let order = 0; order < available.length; order++) {
    const mediaType = available[order];
    const slash = mediaType.indexOf("/");
    const type = mediaType.slice(0, slash);
    const subtype = mediaType.slice(slash + 1);

    let matched: MediaRange | undefined;
    let matchedSpecificity = -1;
    for (const range of ranges) {
      const score = specificity(range, type, subtype);
      if (score > matchedSpecificity) {
        matched = range;
        matchedSpecificity = score;
      }
    }

    if (!matched || matched.quality <= 0) continue;

    const candidate: Candidate = {
      mediaType,
      quality: matched.quality,
      specificity: matchedSpecificity,
      rangeIndex: matched.index,
      order,
    };

    if (!best || isPreferred(candidate, best)) {
      best = candidate;
    }
  }

  return best?.mediaType;
}

function isPreferred(candidate: Candidate, current: Candidate): boolean {
  if (candidate.quality !== current.quality) {
    return candidate.quality > current.quality;
  }
  if (candidate.specificity !== current.specificity) {
    return candidate.specificity > current.specificity;
  }
  if (candidate.rangeIndex !== current.rangeIndex) {
    return candidate.rangeIndex < current.rangeIndex;
  }
  return candidate.order < current.order;
}
