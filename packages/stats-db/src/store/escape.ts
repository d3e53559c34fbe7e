// Identifiers become file and directory names: percent-encode everything
// outside [A-Za-z0-9_.~-] and write "%" as "=".

const RESERVED = /[!'()*]/g;

export function escapePathSegment(id: string): string {
  const escaped = encodeURIComponent(id)
    .replace(
      RESERVED,
      (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
    )
    .replace(/%/g, "=");
  return escaped === "." || escaped === ".."
    ? escaped.replace(/\./g, "=2E")
    : escaped;
}

export function unescapePathSegment(segment: string): string {
  return decodeURIComponent(segment.replace(/=/g, "%"));
}
