export class WorkbookReadError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read workbook ${filePath}: ${details}`, { cause });
    this.name = "WorkbookReadError";
    this.filePath = filePath;
  }
}
