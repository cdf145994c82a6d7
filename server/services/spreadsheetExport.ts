import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import { format } from "date-fns";
import { computeAuditWindow } from "../research/auditWindow";
import { RESEARCH_SECTION_TITLES } from "../config/prompts";
import { EXPORT_CONSTANTS } from "../config/constants";

export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export function exportFileName(code: string, extension: "xlsx" | "pdf", now: Date = new Date()): string {
  const safeCode = code.replace(/[^A-Za-z0-9_-]+/g, "_");
  return `${EXPORT_CONSTANTS.FILE_PREFIX}_${safeCode}_${format(now, EXPORT_CONSTANTS.FILE_DATE_FORMAT)}.${extension}`;
}

export function chunkLines(text: string, size: number = EXPORT_CONSTANTS.LINES_PER_SHEET): string[][] {
  const lines = text.split("\n");
  const chunks: string[][] = [];
  for (let i = 0; i < lines.length; i += size) {
    chunks.push(lines.slice(i, i + size));
  }
  return chunks;
}

/**
 * Workbook layout: Summary, Sections, then Analysis_Part1..N holding the
 * result text 50 lines per sheet.
 */
export function buildWorkbook(resultText: string, code: string, now: Date = new Date()): Workbook {
  const window = computeAuditWindow(now);
  const workbook = new ExcelJS.Workbook();
  workbook.created = now;

  const summary = workbook.addWorksheet("Summary");
  summary.columns = [
    { header: "Field", key: "field", width: 22 },
    { header: "Value", key: "value", width: 28 },
  ];
  summary.addRows([
    { field: "Report Date", value: format(now, EXPORT_CONSTANTS.REPORT_DATE_FORMAT) },
    { field: "CPT Code", value: code },
    { field: "Audit Window Start", value: window.start },
    { field: "Audit Window End", value: window.end },
  ]);

  const sections = workbook.addWorksheet("Sections");
  sections.columns = [
    { header: "Section", key: "section", width: 32 },
    { header: "Status", key: "status", width: 14 },
  ];
  sections.addRows(RESEARCH_SECTION_TITLES.map(section => ({ section, status: "Completed" })));

  chunkLines(resultText).forEach((chunk, idx) => {
    const sheet = workbook.addWorksheet(`Analysis_Part${idx + 1}`);
    sheet.columns = [{ header: "Content", key: "content", width: 120 }];
    sheet.addRows(chunk.map(content => ({ content })));
  });

  return workbook;
}

export async function toSpreadsheet(resultText: string, code: string, now: Date = new Date()): Promise<Buffer> {
  const started = Date.now();
  const data = await buildWorkbook(resultText, code, now).xlsx.writeBuffer();
  console.log(`[Export] Spreadsheet for ${code} built in ${Date.now() - started}ms`);
  return Buffer.from(data);
}
