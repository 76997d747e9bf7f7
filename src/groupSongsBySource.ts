import type { SongEntry, SongRecord, SourceGroup } from "./model/index.js";
import { compareIgnoreCase } from "./utils/compareText.js";

/**
 * Group songs by source. Groups are ordered by source and songs inside a
 * group by artist, both case-insensitive; equal keys keep row order.
 */
export function groupSongsBySource(songs: SongRecord[]): SourceGroup[] {
  const bySource = new Map<string, SongEntry[]>();
  for (const { artist, title, source } of songs) {
    const group = bySource.get(source);
    if (group) {
      group.push({ artist, title });
    } else {
      bySource.set(source, [{ artist, title }]);
    }
  }

  return Array.from(bySource, ([source, entries]) => ({
    source,
    songs: [...entries].sort((a, b) => compareIgnoreCase(a.artist, b.artist)),
  })).sort((a, b) => compareIgnoreCase(a.source, b.source));
}
