/**
 * Response Parser
 *
 * Turns loosely structured model output into typed values. Both parsers are
 * total: malformed input degrades to an empty list or to placeholder
 * sections, never to an exception.
 */

import type {
  CandidateCode,
  ParsedResearch,
  ResearchSection,
  ResearchSectionId,
} from "@shared/schema";
import { RESEARCH_SECTION_TITLES } from "../config/prompts/research";

const CODE_MARKER = "CODE:";
const DESCRIPTION_MARKER = "DESCRIPTION:";

export const SECTION_PLACEHOLDER = "WARNING: This section was not generated by the model.";
export const FINAL_ASSESSMENT_PLACEHOLDER = "WARNING: The final assessment was not generated by the model.";

const SECTION_NUMBERS = [1, 2, 3, 4, 5, 6] as const;
type SectionNumber = typeof SECTION_NUMBERS[number];

function textAfter(haystack: string, marker: string): string | null {
  const idx = haystack.indexOf(marker);
  if (idx === -1) return null;
  return haystack.slice(idx + marker.length).trim();
}

/**
 * Reads `CODE: x | DESCRIPTION: y` lines. Lines missing either marker, the
 * pipe, or a code are skipped.
 */
export function parseCandidateCodes(text: string): CandidateCode[] {
  const codes: CandidateCode[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (!line.includes(CODE_MARKER) || !line.includes(DESCRIPTION_MARKER)) continue;

    const pipe = line.indexOf("|");
    if (pipe === -1) continue;

    const code = textAfter(line.slice(0, pipe), CODE_MARKER);
    const description = textAfter(line.slice(pipe + 1), DESCRIPTION_MARKER);
    if (!code || description === null) continue;

    codes.push({ code, description });
  }

  return codes;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Content between the first `<tag>` and the first `</tag>` after it, tag
 * names matched case-insensitively. Both scans move forward only, so the
 * cost stays linear in the input.
 */
function extractTag(source: string, tag: string): string | null {
  const name = escapeRegExp(tag);
  const open = new RegExp(`<${name}\\s*>`, "i").exec(source);
  if (!open) return null;

  const start = open.index + open[0].length;
  const close = new RegExp(`</${name}\\s*>`, "gi");
  close.lastIndex = start;
  const end = close.exec(source);
  return end ? source.slice(start, end.index) : null;
}

function sectionIdFor(n: SectionNumber): ResearchSectionId {
  switch (n) {
    case 1: return "section_1";
    case 2: return "section_2";
    case 3: return "section_3";
    case 4: return "section_4";
    case 5: return "section_5";
    case 6: return "section_6";
  }
}

function parseSection(text: string, n: SectionNumber): ResearchSection {
  const id = sectionIdFor(n);
  const outlineTitle = RESEARCH_SECTION_TITLES[n - 1];
  const block = extractTag(text, id);

  if (block === null) {
    return { number: n, id, title: outlineTitle, content: SECTION_PLACEHOLDER, generated: false };
  }

  const title = extractTag(block, "title")?.trim();
  const content = extractTag(block, "content")?.trim() ?? "";

  return { number: n, id, title: title || outlineTitle, content, generated: true };
}

/**
 * Splits research output into its six sections and the final assessment.
 * Always returns six sections and one assessment string.
 */
export function parseStructuredSections(text: string): ParsedResearch {
  const sections = SECTION_NUMBERS.map(n => parseSection(text, n));
  const final = extractTag(text, "final_assessment");

  return {
    sections,
    finalAssessment: final === null ? FINAL_ASSESSMENT_PLACEHOLDER : final.trim(),
    finalAssessmentGenerated: final !== null,
  };
}

/**
 * Plain-text rendering with `SECTION N - Title` and `FINAL ASSESSMENT`
 * headings, the form the export formatters read.
 */
export function renderSectionsAsText(parsed: ParsedResearch): string {
  const blocks = parsed.sections.map(
    section => `SECTION ${section.number} - ${section.title}\n${section.content}`,
  );
  blocks.push(`FINAL ASSESSMENT\n${parsed.finalAssessment}`);
  return blocks.join("\n\n");
}
