import type { SourceGroup } from "./SourceGroup.js";

export interface CatalogSection {
  name: string;
  songCount: number; // records in the sheet, before grouping
  groups: SourceGroup[];
}
