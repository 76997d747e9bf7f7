import type { CellValue, SongRecord, Worksheet } from "./model/index.js";

type SongColumn = "artist" | "title" | "source";

export type ColumnMap = Record<SongColumn, number | undefined>;

export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

/**
 * Locate the artist/title/source columns. Header cells are matched
 * case-insensitively and the first match wins.
 */
export function resolveColumns(header: CellValue[]): ColumnMap {
  const names = header.map(cell => cellText(cell).toLowerCase());
  const find = (column: SongColumn) => {
    const index = names.indexOf(column);
    return index === -1 ? undefined : index;
  };
  return { artist: find("artist"), title: find("title"), source: find("source") };
}

export function parseWorksheet(worksheet: Worksheet): SongRecord[] {
  const [header, ...dataRows] = worksheet.rows;
  if (!header) return [];

  const columns = resolveColumns(header);
  const read = (row: CellValue[], index: number | undefined) =>
    index === undefined ? "" : cellText(row[index]);

  const songs: SongRecord[] = [];
  for (const row of dataRows) {
    const rawTitle = columns.title === undefined ? null : row[columns.title];
    // A 0 or FALSE title cell counts as blank
    if (rawTitle === 0 || rawTitle === false) continue;
    const title = cellText(rawTitle);
    if (!title) continue;
    songs.push({
      artist: read(row, columns.artist),
      title,
      source: read(row, columns.source),
    });
  }
  return songs;
}
