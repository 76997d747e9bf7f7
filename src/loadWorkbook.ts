import ExcelJS from "exceljs";
import type {
  CellRichTextValue,
  CellValue as ExcelCellValue,
  Workbook as ExcelWorkbook,
  Worksheet as ExcelWorksheet,
} from "exceljs";
import { WorkbookReadError, type CellValue, type Workbook, type Worksheet } from "./model/index.js";

/**
 * Read an .xlsx file into plain worksheets.
 * Throws WorkbookReadError when the file is missing or is not a readable workbook.
 */
export async function loadWorkbook(filePath: string): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (err: unknown) {
    throw new WorkbookReadError(filePath, err);
  }
  return toWorkbook(workbook);
}

export function toWorkbook(workbook: ExcelWorkbook): Workbook {
  return { sheets: workbook.worksheets.map(toWorksheet) };
}

function toWorksheet(sheet: ExcelWorksheet): Worksheet {
  const rows: CellValue[][] = [];
  const columnCount = sheet.columnCount;

  // Walk the whole used range so blank rows keep their position
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: CellValue[] = [];
    for (let c = 1; c <= columnCount; c++) {
      const cell = row.getCell(c);
      // Only the top-left cell of a merged range holds the value
      cells.push(cell.isMerged && cell.master !== cell ? null : normalizeCell(cell.value));
    }
    rows.push(cells);
  }

  return { name: sheet.name, rows };
}

// Hyperlink cells with formatted link text carry rich text in `text`
interface RichHyperlinkValue {
  text: CellRichTextValue;
  hyperlink: string;
  tooltip?: string;
}

export function normalizeCell(value: ExcelCellValue | RichHyperlinkValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value;
  if ("richText" in value) return value.richText.map(run => run.text).join("");
  if ("hyperlink" in value) return normalizeCell(value.text);
  if ("error" in value) return value.error;
  // Formula cells carry their last computed result
  return normalizeCell(value.result ?? null);
}
