export const DEFAULT_SECTION_ORDER: readonly string[] = [
  "Anime",
  "Japani",
  "Korea",
  "Kiina",
  "My Little Pony",
  "Disney",
  "Englanti",
  "Suomi",
  "Muut",
];

/**
 * Sheets named in `order` come first, in that order; the rest follow in workbook order.
 * Names in `order` that are not sheets are ignored.
 */
export function sequenceSections(
  sheetNames: readonly string[],
  order: readonly string[] = DEFAULT_SECTION_ORDER
): string[] {
  const available = new Set(sheetNames);
  const sequenced: string[] = [];
  const seen = new Set<string>();

  for (const name of [...order, ...sheetNames]) {
    if (!available.has(name) || seen.has(name)) continue;
    seen.add(name);
    sequenced.push(name);
  }
  return sequenced;
}
