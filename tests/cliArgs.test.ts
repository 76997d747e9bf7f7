import { describe, expect, it } from "vitest";
import { DEFAULT_INPUT, parseArgs } from "../src/cli/generate-songbook.js";

describe("parseArgs", () => {
  it("falls back to defaults", () => {
    const parsed = parseArgs([]);
    expect(parsed).toEqual({ input: DEFAULT_INPUT, format: "html" });
    expect(DEFAULT_INPUT).toBe("from-google-docs/Frostbite_2026_Karaoke.xlsx");
  });

  it("supports --opt value format", () => {
    const parsed = parseArgs([
      "songs.xlsx",
      "--format",
      "typst",
      "--output",
      "out/book.typ",
      "--config",
      "songbook.yaml",
      "--lang",
      "en",
    ]);

    expect(parsed).toEqual({
      input: "songs.xlsx",
      format: "typst",
      output: "out/book.typ",
      config: "songbook.yaml",
      language: "en",
    });
  });

  it("supports --opt=value format and short flags", () => {
    const parsed = parseArgs(["-f", "typst", "--output=book.typ", "-c", "cfg.yaml", "--lang=FI", "list.xlsx"]);
    expect(parsed.format).toBe("typst");
    expect(parsed.output).toBe("book.typ");
    expect(parsed.config).toBe("cfg.yaml");
    expect(parsed.language).toBe("fi");
    expect(parsed.input).toBe("list.xlsx");
  });

  it("reads --order names until the next option", () => {
    const parsed = parseArgs(["--order", "Disney", "My Little Pony", "-o", "x.html"]);
    expect(parsed.order).toEqual(["Disney", "My Little Pony"]);
    expect(parsed.output).toBe("x.html");
    expect(parsed.input).toBe(DEFAULT_INPUT);
  });

  it("takes --order= as a single sheet name, commas included", () => {
    expect(parseArgs(["--order=Rock, Pop"]).order).toEqual(["Rock, Pop"]);
  });

  it("rejects --order without names", () => {
    expect(() => parseArgs(["--order", "-f", "html"])).toThrow("--order expects at least one sheet name");
    expect(() => parseArgs(["--order="])).toThrow("--order expects at least one sheet name");
  });

  it("rejects an invalid format", () => {
    expect(() => parseArgs(["--format", "pdf"])).toThrow("Invalid format: pdf (choose from html, typst)");
  });

  it("rejects unknown options and extra positionals", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseArgs(["a.xlsx", "b.xlsx"])).toThrow("Unexpected argument: b.xlsx");
  });

  it("rejects an option without its value", () => {
    expect(() => parseArgs(["--output"])).toThrow("Missing value for --output");
    expect(() => parseArgs(["--lang=sv"])).toThrow("Unsupported language: sv (choose from fi, en)");
  });
});
