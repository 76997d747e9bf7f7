import type { Worksheet } from "./Worksheet.js";

export interface Workbook {
  sheets: Worksheet[]; // workbook order
}
