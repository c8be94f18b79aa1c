export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Address one object below a collection endpoint
 */
export function joinUrl(collectionUrl: string, id: string): string {
  return `${trimTrailingSlash(collectionUrl)}/${encodeURIComponent(id)}`;
}

export function lastPathSegment(location: string): string | undefined {
  const path = location.split(/[?#]/)[0] ?? "";
  const segment = path.split("/").filter(Boolean).pop();
  return segment ? decodeURIComponent(segment) : undefined;
}

function versionParts(version: string): number[] {
  return version
    .trim()
    .split(".")
    .map((part) => Number.parseInt(part, 10))
    .map((part) => (Number.isNaN(part) ? 0 : part));
}

/**
 * Numeric, segment-wise comparison of dotted versions ("1.10" > "1.9").
 * Missing segments count as 0.
 */
export function compareVersions(a: string, b: string): number {
  const left = versionParts(a);
  const right = versionParts(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff > 0 ? 1 : -1;
  }
  return 0;
}
