import type { Catalog } from "../model/index.js";
import { escapeHtml } from "../utils/escape.js";
import { renderCatalog, type CatalogRenderer } from "./CatalogRenderer.js";

export function createHtmlRenderer(): CatalogRenderer {
  const renderer: CatalogRenderer = {
    renderPreamble: () => [],

    renderSection: section => [
      `<h2>${escapeHtml(section.name)}</h2>`,
      ...section.groups.flatMap(group => renderer.renderGroup(group, section)),
    ],

    renderGroup: group => {
      const lines: string[] = [];
      if (group.source) lines.push(`<h3>${escapeHtml(group.source)}</h3>`);
      lines.push("<ul>");
      group.songs.forEach(song => lines.push(renderer.renderSong(song)));
      lines.push("</ul>");
      return lines;
    },

    renderSong: ({ artist, title }) =>
      artist
        ? `<li>${escapeHtml(artist)} – ${escapeHtml(title)}</li>`
        : `<li>${escapeHtml(title)}</li>`,

    // The HTML fragment has no index
    renderIndex: () => [],
  };
  return renderer;
}

export function renderHtml(catalog: Catalog): string {
  return renderCatalog(catalog, createHtmlRenderer());
}
