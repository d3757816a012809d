/**
 * Join a prefix and a pattern into one pattern.
 */
export function joinPath(base: string, path: string): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  if (base === "/" || base === "") {
    return normalizedPath;
  }
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;
  if (normalizedPath === "/") {
    return normalizedBase;
  }
  return `${normalizedBase}${normalizedPath}`;
}

/**
 * Raw path of a request URL, without query or fragment.
 */
export function rawPathOf(url: string): string {
  const schemeEnd = url.indexOf("://");
  const pathStart = url.indexOf("/", schemeEnd === -1 ? 0 : schemeEnd + 3);
  if (pathStart === -1) {
    return "/";
  }
  let pathEnd = url.indexOf("?", pathStart);
  if (pathEnd === -1) pathEnd = url.indexOf("#", pathStart);
  if (pathEnd === -1) pathEnd = url.length;
  return url.slice(pathStart, pathEnd);
}

/**
 * Percent-decode a path. `%2F` stays encoded so it never splits a
 * segment; malformed escapes leave the path as it was.
 */
export function decodePath(path: string): string {
  if (!path.includes("%")) return path;
  try {
    return decodeURI(path);
  } catch {
    return path;
  }
}
