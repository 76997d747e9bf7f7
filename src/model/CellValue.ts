// Plain cell content after rich text, hyperlinks and formulas are flattened
export type CellValue = string | number | boolean | Date | null;
