import { describe, it, expect } from "vitest";
import { computeAuditWindow } from "../research/auditWindow";
import { buildResearchPrompt, buildCodeDiscoveryPrompt, RESEARCH_SECTION_TITLES } from "../config/prompts";

describe("computeAuditWindow", () => {
  it("spans 1095 days ending today", () => {
    // 2024 is a leap year, so 1095 days back lands on the 16th.
    expect(computeAuditWindow(new Date(2024, 5, 15, 10, 30))).toEqual({
      start: "2021-06-16",
      end: "2024-06-15",
    });
  });

  it("is recomputed for each date", () => {
    expect(computeAuditWindow(new Date(2023, 0, 1))).toEqual({
      start: "2020-01-02",
      end: "2023-01-01",
    });
  });
});

describe("research prompts", () => {
  it("embeds the code, window and context", () => {
    const prompt = buildResearchPrompt("29881", "Outpatient knee", "2021-06-16", "2024-06-15");

    expect(prompt).toContain("for CPT code: 29881");
    expect(prompt).toContain("Audit Window: 2021-06-16 through 2024-06-15");
    expect(prompt).toContain("Context Information: Outpatient knee");
    for (const title of RESEARCH_SECTION_TITLES) {
      expect(prompt).toContain(title);
    }
    expect(prompt).toContain("<final_assessment>");
  });

  it("marks blank context as not specified", () => {
    const prompt = buildResearchPrompt("29881", "   ", "2021-06-16", "2024-06-15");
    expect(prompt).toContain("Context Information: Not specified");
  });

  it("asks for five codes in the line format", () => {
    const prompt = buildCodeDiscoveryPrompt("knee arthroscopy");
    expect(prompt).toContain("Topic: knee arthroscopy");
    expect(prompt).toContain("top 5 most relevant CPT codes");
    expect(prompt).toContain("CODE: [5-digit code] | DESCRIPTION: [brief description]");
  });
});
