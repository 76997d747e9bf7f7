#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  defaultOutputPath,
  generateSongbook,
  isOutputFormat,
  resolveSongbookOptions,
} from "../services/generateSongbook.js";
import { loadSongbookConfig } from "../loadSongbookConfig.js";
import type { OutputFormat, SongbookLanguage } from "../model/index.js";
import { isSongbookLanguage } from "../utils/headings.js";

export const DEFAULT_INPUT = "from-google-docs/Frostbite_2026_Karaoke.xlsx";

export interface CliOptions {
  input: string;
  output?: string;
  format: OutputFormat;
  order?: string[];
  config?: string;
  language?: SongbookLanguage;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    input: DEFAULT_INPUT,
    format: "html",
  };
  let input: string | undefined;

  const readValue = (arg: string, next: () => string | undefined) => {
    const eqIndex = arg.indexOf("=");
    if (eqIndex !== -1) {
      return arg.slice(eqIndex + 1) || undefined;
    }
    return next();
  };

  const requireValue = (arg: string, value: string | undefined) => {
    if (value === undefined) throw new Error(`Missing value for ${arg.split("=")[0]}`);
    return value;
  };

  const readFormat = (value: string): OutputFormat => {
    if (!isOutputFormat(value)) {
      throw new Error(`Invalid format: ${value} (choose from html, typst)`);
    }
    return value;
  };

  const readLanguage = (value: string): SongbookLanguage => {
    const normalized = value.trim().toLowerCase();
    if (!isSongbookLanguage(normalized)) {
      throw new Error(`Unsupported language: ${value} (choose from fi, en)`);
    }
    return normalized;
  };

  let index = 0;
  while (index < argv.length) {
    const arg = argv[index++];
    const nextValue = () => argv[index++];

    if (arg === "--output" || arg === "-o" || arg.startsWith("--output=")) {
      options.output = requireValue(arg, readValue(arg, nextValue));
    } else if (arg === "--format" || arg === "-f" || arg.startsWith("--format=")) {
      options.format = readFormat(requireValue(arg, readValue(arg, nextValue)));
    } else if (arg === "--config" || arg === "-c" || arg.startsWith("--config=")) {
      options.config = requireValue(arg, readValue(arg, nextValue));
    } else if (arg === "--lang" || arg === "-l" || arg.startsWith("--lang=")) {
      options.language = readLanguage(requireValue(arg, readValue(arg, nextValue)));
    } else if (arg.startsWith("--order=")) {
      // The inline form names a single sheet
      const name = readValue(arg, () => undefined);
      if (!name) throw new Error("--order expects at least one sheet name");
      options.order = [name];
    } else if (arg === "--order") {
      // Sheet names follow until the next option
      const names: string[] = [];
      while (index < argv.length && !argv[index].startsWith("-")) {
        names.push(argv[index++]);
      }
      if (!names.length) throw new Error("--order expects at least one sheet name");
      options.order = names;
    } else if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    } else {
      if (arg.startsWith("-")) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (input !== undefined) {
        throw new Error(`Unexpected argument: ${arg}`);
      }
      input = arg;
    }
  }

  if (input !== undefined) options.input = input;
  return options;
}

function printUsage() {
  const message = `Usage: karaoke-songbook [input.xlsx] [options]\n\n` +
    `Options:\n` +
    `  -o, --output   Output file (default: karaoke.html or karaoke.typ).\n` +
    `  -f, --format   Output format: html or typst (default: html).\n` +
    `      --order    Sheet names to put first, in order.\n` +
    `  -c, --config   YAML file with order, language, index and layout settings.\n` +
    `  -l, --lang     Index heading language: fi or en (default: fi).\n` +
    `  -h, --help     Show this help message.\n`;
  console.log(message);
}

export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const options = parseArgs(argv);
    const config = options.config ? await loadSongbookConfig(options.config) : undefined;
    const songbookOptions = resolveSongbookOptions(options, config);

    const content = await generateSongbook(options.input, songbookOptions);

    const output = options.output ?? defaultOutputPath(options.format);
    const targetPath = path.resolve(process.cwd(), output);
    await mkdir(path.dirname(targetPath), { recursive: true });
    await writeFile(targetPath, content, "utf8");

    console.log(`Wrote ${output}`);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
}

const isMainModule = (() => {
  if (typeof process === "undefined") return false;
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink
  try {
    return fileURLToPath(import.meta.url) === realpathSync(path.resolve(entry));
  } catch {
    return false;
  }
})();

if (isMainModule) {
  void run();
}
