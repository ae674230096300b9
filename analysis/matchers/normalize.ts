const NON_ALNUM = /[^a-z0-9]+/g;

/**
 * Lowercase, collapse every run of non-alphanumerics to one space, trim.
 * Total over null/undefined and idempotent.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return "";
  return text.toLowerCase().replace(NON_ALNUM, " ").trim();
}

/**
 * Title and description joined by one space before normalizing. A word cut
 * at the end of the title is not re-joined, but two whole words on either
 * side of the boundary can still read as one phrase ("... deep" + "learning ...").
 */
export function courseText(title: string | null | undefined, description: string | null | undefined): string {
  return normalize(`${title ?? ""} ${description ?? ""}`);
}
