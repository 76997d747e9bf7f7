export type { CellValue } from "./CellValue.js";
export type { Worksheet } from "./Worksheet.js";
export type { Workbook } from "./Workbook.js";
export type { SongRecord } from "./SongRecord.js";
export type { SongEntry } from "./SongEntry.js";
export type { SourceGroup } from "./SourceGroup.js";
export type { CatalogSection } from "./CatalogSection.js";
export type { IndexEntry } from "./IndexEntry.js";
export type { Catalog } from "./Catalog.js";
export type { OutputFormat, SongbookLanguage, LayoutOptions, SongbookConfig } from "./SongbookConfig.js";
export { WorkbookReadError } from "./WorkbookReadError.js";
export { SongbookConfigError } from "./SongbookConfigError.js";
