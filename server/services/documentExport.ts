import { jsPDF } from "jspdf";
import { format } from "date-fns";
import { computeAuditWindow } from "../research/auditWindow";
import { EXPORT_CONSTANTS } from "../config/constants";

export const PDF_MIME_TYPE = "application/pdf";

export const DOCUMENT_TITLE = "APC Code Research Report";

// Points; 72pt to the inch.
const MARGINS = { top: 72, right: 54, bottom: 54, left: 54 } as const;

const FONT_SIZES = { title: 18, heading: 13, paragraph: 10 } as const;
const LINE_HEIGHT_FACTOR = 1.35;
const SPACER_HEIGHT = 8;

// Symbols the model tends to emit that the standard fonts cannot encode.
const PDF_SUBSTITUTIONS: Record<string, string> = {
  "\u2192": "->",
  "\u2190": "<-",
  "\u2194": "<->",
  "\u21D2": "=>",
  "\u2265": ">=",
  "\u2264": "<=",
  "\u2260": "!=",
  "\u2248": "~",
  "\u2212": "-",
  "\u2713": "[x]",
  "\u2714": "[x]",
  "\u2717": "[ ]",
  "\u2718": "[ ]",
  "\u00A0": " ",
};

// Characters beyond Latin-1 that WinAnsiEncoding still carries.
const WIN_ANSI_EXTRAS = new Set("\u20AC\u201A\u0192\u201E\u2026\u2020\u2021\u02C6\u2030\u0160\u2039\u0152\u017D\u2018\u2019\u201C\u201D\u2022\u2013\u2014\u02DC\u2122\u0161\u203A\u0153\u017E\u0178");

/**
 * Maps text onto what Helvetica's WinAnsi encoding can draw: known symbols
 * get an ASCII stand-in, anything else outside the encoding becomes "?".
 */
export function toPdfText(text: string): string {
  let out = "";
  for (const char of text) {
    const substitute = PDF_SUBSTITUTIONS[char];
    if (substitute !== undefined) {
      out += substitute;
    } else if (char.charCodeAt(0) <= 0xff || WIN_ANSI_EXTRAS.has(char)) {
      out += char;
    } else {
      out += "?";
    }
  }
  return out;
}

export type DocumentBlock =
  | { kind: "title"; text: string }
  | { kind: "heading"; text: string }
  | { kind: "paragraph"; markup: string }
  | { kind: "spacer" };

export interface MarkupRun {
  text: string;
  bold: boolean;
}

export function escapeMarkup(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function unescapeMarkup(text: string): string {
  return text.replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&amp;/g, "&");
}

/**
 * Splits paragraph markup into bold and regular runs. Only `<b>` and `</b>`
 * are tags; everything else is text with entities decoded.
 */
export function parseMarkupRuns(markup: string): MarkupRun[] {
  const runs: MarkupRun[] = [];
  let bold = false;

  for (const part of markup.split(/(<\/?b>)/)) {
    if (part === "<b>") {
      bold = true;
    } else if (part === "</b>") {
      bold = false;
    } else if (part) {
      runs.push({ text: unescapeMarkup(part), bold });
    }
  }

  return runs;
}

export function buildDocumentBlocks(resultText: string, code: string, now: Date = new Date()): DocumentBlock[] {
  const window = computeAuditWindow(now);
  const blocks: DocumentBlock[] = [
    { kind: "title", text: DOCUMENT_TITLE },
    { kind: "heading", text: "Report Details" },
    { kind: "paragraph", markup: `<b>CPT Code:</b> ${escapeMarkup(code)}` },
    { kind: "paragraph", markup: `<b>Report Date:</b> ${format(now, EXPORT_CONSTANTS.REPORT_DATE_FORMAT)}` },
    { kind: "paragraph", markup: `<b>Audit Window:</b> ${window.start} to ${window.end}` },
    { kind: "spacer" },
    { kind: "heading", text: "Analysis Report" },
  ];

  for (const line of resultText.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      blocks.push({ kind: "spacer" });
    } else if (trimmed.startsWith("SECTION") || trimmed.startsWith("FINAL")) {
      blocks.push({ kind: "heading", text: trimmed });
    } else {
      blocks.push({ kind: "paragraph", markup: escapeMarkup(trimmed) });
    }
  }

  return blocks;
}

interface PlacedWord {
  text: string;
  bold: boolean;
  width: number;
}

class PdfWriter {
  private y: number = MARGINS.top;
  private readonly contentWidth: number;
  private readonly bottomLimit: number;

  constructor(private readonly doc: jsPDF) {
    this.contentWidth = doc.internal.pageSize.getWidth() - MARGINS.left - MARGINS.right;
    this.bottomLimit = doc.internal.pageSize.getHeight() - MARGINS.bottom;
  }

  write(block: DocumentBlock): void {
    switch (block.kind) {
      case "title":
        this.writeRuns([{ text: block.text, bold: true }], FONT_SIZES.title);
        this.y += SPACER_HEIGHT;
        break;
      case "heading":
        this.y += SPACER_HEIGHT / 2;
        this.writeRuns([{ text: block.text, bold: true }], FONT_SIZES.heading);
        break;
      case "paragraph":
        this.writeRuns(parseMarkupRuns(block.markup), FONT_SIZES.paragraph);
        break;
      case "spacer":
        this.y += SPACER_HEIGHT;
        break;
      default: {
        const unreachable: never = block;
        throw new Error(`Unknown document block: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private setFont(bold: boolean, size: number): void {
    this.doc.setFont("helvetica", bold ? "bold" : "normal");
    this.doc.setFontSize(size);
  }

  private ensureSpace(height: number): void {
    if (this.y + height > this.bottomLimit) {
      this.doc.addPage();
      this.y = MARGINS.top;
    }
  }

  private writeRuns(runs: MarkupRun[], size: number): void {
    const lineHeight = size * LINE_HEIGHT_FACTOR;
    const words: PlacedWord[] = [];

    for (const run of runs) {
      this.setFont(run.bold, size);
      for (const piece of toPdfText(run.text).split(/(\s+)/)) {
        if (!piece) continue;
        const text = /^\s+$/.test(piece) ? " " : piece;
        words.push({ text, bold: run.bold, width: this.doc.getTextWidth(text) });
      }
    }

    let line: PlacedWord[] = [];
    let lineWidth = 0;
    const flush = () => {
      while (line.length > 0 && line[line.length - 1].text === " ") {
        line.pop();
      }
      this.ensureSpace(lineHeight);
      let x = MARGINS.left;
      for (const word of line) {
        this.setFont(word.bold, size);
        this.doc.text(word.text, x, this.y + size);
        x += word.width;
      }
      this.y += lineHeight;
      line = [];
      lineWidth = 0;
    };

    for (const word of words) {
      if (line.length === 0 && word.text === " ") continue;
      if (line.length > 0 && lineWidth + word.width > this.contentWidth) {
        flush();
        if (word.text === " ") continue;
      }
      line.push(word);
      lineWidth += word.width;
    }
    if (line.length > 0) flush();
  }
}

export function toDocument(resultText: string, code: string, now: Date = new Date()): Buffer {
  const started = Date.now();
  const doc = new jsPDF({ unit: "pt", format: "letter" });
  doc.setProperties({ title: `${DOCUMENT_TITLE} - ${code}` });

  const writer = new PdfWriter(doc);
  for (const block of buildDocumentBlocks(resultText, code, now)) {
    writer.write(block);
  }

  const bytes = Buffer.from(doc.output("arraybuffer"));
  console.log(`[Export] Document for ${code} built in ${Date.now() - started}ms (${doc.getNumberOfPages()} page(s))`);
  return bytes;
}
