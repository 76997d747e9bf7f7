import type { SongEntry } from "./SongEntry.js";

export interface SourceGroup {
  source: string; // "" for songs without a source
  songs: SongEntry[];
}
