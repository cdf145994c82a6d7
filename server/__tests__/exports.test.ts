import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildWorkbook, chunkLines, exportFileName, toSpreadsheet } from "../services/spreadsheetExport";
import {
  buildDocumentBlocks,
  escapeMarkup,
  parseMarkupRuns,
  toDocument,
  toPdfText,
  DOCUMENT_TITLE,
} from "../services/documentExport";
import { RESEARCH_SECTION_TITLES } from "../config/prompts";

const FIXED_NOW = new Date(2024, 5, 15, 9, 5);

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join("\n");
}

describe("exportFileName", () => {
  it("embeds the code and date", () => {
    expect(exportFileName("29881", "xlsx", FIXED_NOW)).toBe("apc_research_29881_20240615.xlsx");
    expect(exportFileName("29881", "pdf", FIXED_NOW)).toBe("apc_research_29881_20240615.pdf");
  });

  it("replaces characters that do not belong in a file name", () => {
    expect(exportFileName("C1713/A", "pdf", FIXED_NOW)).toBe("apc_research_C1713_A_20240615.pdf");
  });
});

describe("spreadsheet export", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("chunks text into 50-line blocks", () => {
    const chunks = chunkLines(numberedLines(120));
    expect(chunks.map(c => c.length)).toEqual([50, 50, 20]);
    expect(chunks[1][0]).toBe("line 51");
  });

  it("lays out summary, sections and analysis sheets", () => {
    const workbook = buildWorkbook(numberedLines(120), "29881", FIXED_NOW);

    expect(workbook.worksheets.map(ws => ws.name)).toEqual([
      "Summary",
      "Sections",
      "Analysis_Part1",
      "Analysis_Part2",
      "Analysis_Part3",
    ]);

    const summary = workbook.getWorksheet("Summary");
    expect(summary?.getCell("A1").value).toBe("Field");
    expect(summary?.getCell("B1").value).toBe("Value");
    expect(summary?.getCell("A2").value).toBe("Report Date");
    expect(summary?.getCell("B2").value).toBe("2024-06-15 09:05");
    expect(summary?.getCell("B3").value).toBe("29881");
    expect(summary?.getCell("B4").value).toBe("2021-06-16");
    expect(summary?.getCell("B5").value).toBe("2024-06-15");

    const sections = workbook.getWorksheet("Sections");
    expect(sections?.rowCount).toBe(7);
    expect(sections?.getCell("A2").value).toBe(RESEARCH_SECTION_TITLES[0]);
    expect(sections?.getCell("A7").value).toBe(RESEARCH_SECTION_TITLES[5]);
    expect(sections?.getCell("B7").value).toBe("Completed");

    const lastPart = workbook.getWorksheet("Analysis_Part3");
    expect(lastPart?.getCell("A1").value).toBe("Content");
    expect(lastPart?.getCell("A2").value).toBe("line 101");
    expect(lastPart?.rowCount).toBe(21);
  });

  it("writes an xlsx archive", async () => {
    const bytes = await toSpreadsheet("SECTION 1 - Codes\nbody", "29881", FIXED_NOW);
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});

describe("document export", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("replaces symbols the PDF font cannot draw", () => {
    expect(toPdfText("Matching rates \u2192 No audit opportunity")).toBe("Matching rates -> No audit opportunity");
    expect(toPdfText("\u2022 \u2265 2 units \u2013 \u201Ccaf\u00E9\u201D \u2713")).toBe(
      "\u2022 >= 2 units \u2013 \u201Ccaf\u00E9\u201D [x]",
    );
    expect(toPdfText("\u6F22 \u{1F600}")).toBe("? ?");
  });

  it("builds a PDF from text with arrows", () => {
    const bytes = toDocument("SECTION 3 - Payment Rate Comparison\nMatching rates \u2192 No audit opportunity", "29881", FIXED_NOW);
    expect(bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("escapes markup-significant characters", () => {
    expect(escapeMarkup("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");
  });

  it("splits bold runs and decodes entities", () => {
    expect(parseMarkupRuns("<b>CPT Code:</b> 29881")).toEqual([
      { text: "CPT Code:", bold: true },
      { text: " 29881", bold: false },
    ]);
    expect(parseMarkupRuns(escapeMarkup("Use <b>&</b> here"))).toEqual([
      { text: "Use <b>&</b> here", bold: false },
    ]);
  });

  it("turns SECTION and FINAL lines into headings and escapes the rest", () => {
    const text = "SECTION 1 - Codes\nUse <b>&</b> here\n\n  FINAL ASSESSMENT\nLow";

    expect(buildDocumentBlocks(text, "29881", FIXED_NOW)).toEqual([
      { kind: "title", text: DOCUMENT_TITLE },
      { kind: "heading", text: "Report Details" },
      { kind: "paragraph", markup: "<b>CPT Code:</b> 29881" },
      { kind: "paragraph", markup: "<b>Report Date:</b> 2024-06-15 09:05" },
      { kind: "paragraph", markup: "<b>Audit Window:</b> 2021-06-16 to 2024-06-15" },
      { kind: "spacer" },
      { kind: "heading", text: "Analysis Report" },
      { kind: "heading", text: "SECTION 1 - Codes" },
      { kind: "paragraph", markup: "Use &lt;b&gt;&amp;&lt;/b&gt; here" },
      { kind: "spacer" },
      { kind: "heading", text: "FINAL ASSESSMENT" },
      { kind: "paragraph", markup: "Low" },
    ]);
  });

  it("writes a PDF across pages", () => {
    const bytes = toDocument(numberedLines(200), "29881", FIXED_NOW);
    expect(bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^\[Export\] Document for 29881 built in \d+ms \([2-9] page\(s\)\)$/));
  });
});
