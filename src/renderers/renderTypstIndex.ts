import type { IndexEntry } from "../model/index.js";
import { compareIgnoreCase } from "../utils/compareText.js";
import { escapeTypst } from "../utils/escape.js";

const LETTER = /^\p{L}+$/u;

export interface TypstIndexOptions {
  heading: string;
}

/** Bucket for the letter headers: the upper-cased first character, or `#` when it is not a letter. */
export function indexBucket(title: string): string {
  const first = Array.from(title)[0];
  if (first === undefined) return "#";
  const upper = first.toUpperCase();
  return LETTER.test(upper) ? upper : "#";
}

function dedupKey(entry: IndexEntry): string {
  return JSON.stringify([entry.title, entry.artist]).toLowerCase();
}

/**
 * Alphabetical title index laid out as a two-column table inside three page columns.
 * Entries equal to the previous one by (title, artist), ignoring case, are dropped.
 */
export function renderTypstIndex(entries: IndexEntry[], opts: TypstIndexOptions): string[] {
  if (!entries.length) return [];

  const sorted = [...entries].sort((a, b) => compareIgnoreCase(a.title, b.title));

  const lines = [
    "#pagebreak()",
    "",
    `= ${escapeTypst(opts.heading)}`,
    "",
    "#set text(size: 6pt)",
    "#set par(leading: 0.3em)",
    "#columns(3, gutter: 0.25cm)[",
    "#table(",
    "  columns: (1.5fr, 1fr),",
    "  stroke: none,",
    "  inset: 1.5pt,",
    "  row-gutter: 0pt,",
  ];

  let currentBucket: string | undefined;
  let lastKey: string | undefined;
  for (const entry of sorted) {
    const key = dedupKey(entry);
    if (key === lastKey) continue;
    lastKey = key;

    const bucket = indexBucket(entry.title);
    if (bucket !== currentBucket) {
      currentBucket = bucket;
      lines.push(
        `  table.cell(colspan: 2, align: center, inset: 3pt, fill: luma(80%))[#text(weight: "bold")[${escapeTypst(bucket)}]],`
      );
    }

    lines.push(`  [${escapeTypst(entry.title)}], [${escapeTypst(entry.artist)}],`);
  }

  lines.push(")", "]", "");
  return lines;
}
