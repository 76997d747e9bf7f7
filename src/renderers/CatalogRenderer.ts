import type { Catalog, CatalogSection, IndexEntry, SongEntry, SourceGroup } from "../model/index.js";

/**
 * One output format. Each method returns output lines; `renderCatalog`
 * joins them with newlines.
 */
export interface CatalogRenderer {
  renderPreamble(): string[];
  /** `position` is the index among rendered (non-empty) sections. */
  renderSection(section: CatalogSection, position: number): string[];
  renderGroup(group: SourceGroup, section: CatalogSection): string[];
  renderSong(song: SongEntry): string;
  renderIndex(entries: IndexEntry[]): string[];
}

export function renderCatalog(catalog: Catalog, renderer: CatalogRenderer): string {
  const lines = renderer.renderPreamble();
  catalog.sections.forEach((section, position) => {
    lines.push(...renderer.renderSection(section, position));
  });
  lines.push(...renderer.renderIndex(catalog.index));
  return lines.join("\n");
}
