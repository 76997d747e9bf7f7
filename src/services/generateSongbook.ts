import { buildCatalog } from '../buildCatalog.js'
import { loadWorkbook } from '../loadWorkbook.js'
import type {
  LayoutOptions,
  OutputFormat,
  SongbookConfig,
  SongbookLanguage,
  Workbook,
} from '../model/index.js'
import { renderHtml } from '../renderers/renderHtml.js'
import { renderTypst } from '../renderers/renderTypst.js'
import { indexHeadingFor } from '../utils/headings.js'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['html', 'typst']

export type SongbookOptions = {
  format: OutputFormat
  order?: readonly string[]
  language?: SongbookLanguage
  indexHeading?: string
  layout?: Partial<LayoutOptions>
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

export function defaultOutputPath(format: OutputFormat): string {
  return format === 'html' ? 'karaoke.html' : 'karaoke.typ'
}

// Command-line choices win; anything left out falls back to the config file
export function resolveSongbookOptions(
  cli: { format: OutputFormat; order?: string[]; language?: SongbookLanguage },
  config: SongbookConfig = {},
): SongbookOptions {
  return {
    format: cli.format,
    order: cli.order?.length ? cli.order : config.order,
    language: cli.language ?? config.language,
    indexHeading: config.indexHeading,
    layout: config.layout,
  }
}

export function renderSongbook(workbook: Workbook, options: SongbookOptions): string {
  const catalog = buildCatalog(workbook, { order: options.order })
  if (options.format === 'html') return renderHtml(catalog)
  return renderTypst(catalog, {
    indexHeading: options.indexHeading ?? indexHeadingFor(options.language),
    layout: options.layout,
  })
}

export async function generateSongbook(inputPath: string, options: SongbookOptions): Promise<string> {
  const workbook = await loadWorkbook(inputPath)
  return renderSongbook(workbook, options)
}
