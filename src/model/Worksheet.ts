import type { CellValue } from "./CellValue.js";

export interface Worksheet {
  name: string;
  rows: CellValue[][]; // rows[0] is the header row
}
