import type { Catalog, LayoutOptions } from "../model/index.js";
import { escapeTypst } from "../utils/escape.js";
import { indexHeadingFor } from "../utils/headings.js";
import { renderCatalog, type CatalogRenderer } from "./CatalogRenderer.js";
import { renderTypstIndex } from "./renderTypstIndex.js";
import { TYPST_PREAMBLE } from "./typstPreamble.js";

export const DEFAULT_LAYOUT: LayoutOptions = {
  columnThreshold: 100,
  keepTogetherThreshold: 30,
};

export interface TypstRendererOptions {
  indexHeading?: string;
  layout?: Partial<LayoutOptions>;
}

export function createTypstRenderer(opts?: TypstRendererOptions): CatalogRenderer {
  const layout: LayoutOptions = { ...DEFAULT_LAYOUT, ...opts?.layout };
  const indexHeading = opts?.indexHeading ?? indexHeadingFor(undefined);

  const renderer: CatalogRenderer = {
    renderPreamble: () => [TYPST_PREAMBLE],

    renderSection: (section, position) => {
      const lines: string[] = [];
      if (position > 0) lines.push("#pagebreak()", "");
      lines.push(`= ${escapeTypst(section.name)}`, "");

      const useColumns = section.songCount >= layout.columnThreshold;
      if (useColumns) lines.push("#columns(3, gutter: 1cm)[");
      section.groups.forEach(group => lines.push(...renderer.renderGroup(group, section)));
      if (useColumns) lines.push("]");
      lines.push("");
      return lines;
    },

    renderGroup: group => {
      // Short groups must not split across a page or column break
      const keepTogether = group.songs.length < layout.keepTogetherThreshold;
      const lines: string[] = [];
      if (keepTogether) lines.push("#block(breakable: false)[");
      if (group.source) lines.push(`== ${escapeTypst(group.source)}`, "");
      group.songs.forEach(song => lines.push(renderer.renderSong(song)));
      if (keepTogether) lines.push("]");
      lines.push("");
      return lines;
    },

    renderSong: ({ artist, title }) =>
      artist
        ? `- ${escapeTypst(artist)} – ${escapeTypst(title)}`
        : `- ${escapeTypst(title)}`,

    renderIndex: entries => renderTypstIndex(entries, { heading: indexHeading }),
  };
  return renderer;
}

export function renderTypst(catalog: Catalog, opts?: TypstRendererOptions): string {
  return renderCatalog(catalog, createTypstRenderer(opts));
}
