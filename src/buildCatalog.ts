import type { Catalog, CatalogSection, IndexEntry, Workbook } from "./model/index.js";
import { groupSongsBySource } from "./groupSongsBySource.js";
import { parseWorksheet } from "./parseWorksheet.js";
import { DEFAULT_SECTION_ORDER, sequenceSections } from "./sequenceSections.js";

export interface BuildCatalogOptions {
  order?: readonly string[];
}

export function buildCatalog(workbook: Workbook, opts?: BuildCatalogOptions): Catalog {
  const sheetsByName = new Map(workbook.sheets.map(sheet => [sheet.name, sheet]));
  const names = sequenceSections(
    workbook.sheets.map(sheet => sheet.name),
    opts?.order ?? DEFAULT_SECTION_ORDER
  );

  const sections: CatalogSection[] = [];
  const index: IndexEntry[] = [];

  for (const name of names) {
    const sheet = sheetsByName.get(name);
    if (!sheet) continue;
    const songs = parseWorksheet(sheet);
    if (!songs.length) continue;

    songs.forEach(song => index.push({ title: song.title, artist: song.artist, section: name }));
    sections.push({ name, songCount: songs.length, groups: groupSongsBySource(songs) });
  }

  return { sections, index };
}
