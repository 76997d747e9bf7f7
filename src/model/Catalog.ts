import type { CatalogSection } from "./CatalogSection.js";
import type { IndexEntry } from "./IndexEntry.js";

export interface Catalog {
  sections: CatalogSection[];
  index: IndexEntry[];
}
