export type OutputFormat = "html" | "typst";

export type SongbookLanguage = "fi" | "en";

export interface LayoutOptions {
  columnThreshold: number; // sections with at least this many songs use 3 columns
  keepTogetherThreshold: number; // groups with fewer songs are kept in one unbreakable block
}

export interface SongbookConfig {
  order?: string[];
  language?: SongbookLanguage;
  indexHeading?: string;
  layout?: Partial<LayoutOptions>;
}
