export interface SongRecord {
  artist: string;
  title: string;
  source: string;
}
