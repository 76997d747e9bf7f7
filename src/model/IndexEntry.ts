export interface IndexEntry {
  title: string;
  artist: string;
  section: string;
}
