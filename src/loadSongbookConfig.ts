import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { SongbookConfigError, type LayoutOptions, type SongbookConfig } from "./model/index.js";
import { isSongbookLanguage } from "./utils/headings.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse songbook settings from YAML text. Every key is optional:
 *
 * ```yaml
 * order: [Anime, Disney]
 * language: en
 * index:
 *   heading: Songs A-Z
 * layout:
 *   columnThreshold: 100
 *   keepTogetherThreshold: 30
 * ```
 */
export function parseSongbookConfig(raw: string, filePath?: string): SongbookConfig {
  const fail = (message: string, key?: string): never => {
    throw new SongbookConfigError(message, { filePath, key });
  };

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return fail(`YAML parse error: ${msg}`);
  }

  // An empty file is a valid, empty configuration
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) return fail("expected a mapping at the top level");

  const config: SongbookConfig = {};

  const order = parsed.order;
  if (order !== undefined) {
    if (!Array.isArray(order) || !order.every((v): v is string => typeof v === "string")) {
      return fail("order must be a list of sheet names", "order");
    }
    config.order = order.map(name => name.trim()).filter(Boolean);
  }

  if (parsed.language !== undefined) {
    const language = typeof parsed.language === "string" ? parsed.language.trim().toLowerCase() : "";
    if (!isSongbookLanguage(language)) {
      return fail(`unsupported language: ${String(parsed.language)} (expected fi or en)`, "language");
    }
    config.language = language;
  }

  const index = parsed.index;
  if (index !== undefined) {
    if (!isRecord(index)) return fail("index must be a mapping", "index");
    const heading = index.heading;
    if (heading !== undefined) {
      if (typeof heading !== "string" || !heading.trim()) {
        return fail("index.heading must be a non-empty string", "index.heading");
      }
      config.indexHeading = heading.trim();
    }
  }

  const rawLayout = parsed.layout;
  if (rawLayout !== undefined) {
    if (!isRecord(rawLayout)) return fail("layout must be a mapping", "layout");
    const layout: Partial<LayoutOptions> = {};
    for (const key of ["columnThreshold", "keepTogetherThreshold"] as const) {
      const value = rawLayout[key];
      if (value === undefined) continue;
      if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
        return fail(`layout.${key} must be a positive integer`, `layout.${key}`);
      }
      layout[key] = value;
    }
    config.layout = layout;
  }

  return config;
}

export async function loadSongbookConfig(filePath: string): Promise<SongbookConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SongbookConfigError(`cannot read config: ${msg}`, { filePath });
  }
  return parseSongbookConfig(raw, filePath);
}
