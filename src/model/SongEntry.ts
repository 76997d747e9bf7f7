export interface SongEntry {
  artist: string;
  title: string;
}
