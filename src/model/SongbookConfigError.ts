export class SongbookConfigError extends Error {
  public readonly filePath?: string;
  public readonly key?: string;

  constructor(message: string, opts?: { filePath?: string; key?: string }) {
    super(opts?.filePath ? `${opts.filePath}: ${message}` : message);
    this.name = "SongbookConfigError";
    this.filePath = opts?.filePath;
    this.key = opts?.key;
  }
}
