import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { ConversationTurn } from "@shared/schema";
import { ResearchService, type ModelInvoker } from "../research/researchService";
import { MemStorage } from "../storage";
import { ConfigurationError } from "../utils/errorHandler";
import { CODE_DISCOVERY_SYSTEM_PROMPT, RESEARCH_SYSTEM_PROMPT } from "../config/prompts";
import { SECTION_PLACEHOLDER } from "../research/responseParser";

const FIXED_NOW = new Date(2024, 5, 15, 9, 5, 7);

function fakeModel(reply: string | Error) {
  return vi.fn<ModelInvoker>(async () => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
}

describe("ResearchService", () => {
  let store: MemStorage;

  beforeEach(() => {
    store = new MemStorage();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("discoverCodes", () => {
    it("parses candidate codes from the reply", async () => {
      const model = fakeModel("CODE: 10021 | DESCRIPTION: Fine needle aspiration\nCODE: 10022 | DESCRIPTION: FNA, each additional");
      const service = new ResearchService(store, model);

      const { candidates } = await service.discoverCodes("thyroid biopsy", "gpt-4.1-mini");

      expect(candidates.map(c => c.code)).toEqual(["10021", "10022"]);
      const [turns, modelName] = model.mock.calls[0];
      expect(modelName).toBe("gpt-4.1-mini");
      expect(turns[0]).toEqual({ role: "system", content: CODE_DISCOVERY_SYSTEM_PROMPT });
      expect(turns[1].content).toContain("Topic: thyroid biopsy");
    });

    it("turns a gateway failure into an error payload with no codes", async () => {
      const service = new ResearchService(store, fakeModel(new ConfigurationError("Missing API key for model: gpt-4.1-mini (set AZURE_OPENAI_API_KEY)")));

      await expect(service.discoverCodes("thyroid biopsy", "gpt-4.1-mini")).resolves.toEqual({
        candidates: [],
        rawText: "Error: Missing API key for model: gpt-4.1-mini (set AZURE_OPENAI_API_KEY)",
      });
    });
  });

  describe("runResearch", () => {
    it("builds the prompt with the audit window and parses the sections", async () => {
      const reply = "<section_1><title>Codes</title><content>29880, 29881</content></section_1><final_assessment>Low</final_assessment>";
      const model = fakeModel(reply);
      const service = new ResearchService(store, model, () => FIXED_NOW);

      const { result, parsed } = await service.runResearch({
        code: "29881",
        context: "Outpatient",
        topic: "knee",
        model: "gpt-4.1",
      });

      expect(result).toEqual({
        cptCode: "29881",
        context: "Outpatient",
        model: "gpt-4.1",
        rawText: reply,
        timestamp: "2024-06-15 09:05:07",
        topic: "knee",
      });
      expect(parsed.sections[0].content).toBe("29880, 29881");
      expect(parsed.sections[1].content).toBe(SECTION_PLACEHOLDER);
      expect(parsed.finalAssessment).toBe("Low");

      const [turns] = model.mock.calls[0];
      expect(turns[0]).toEqual({ role: "system", content: RESEARCH_SYSTEM_PROMPT });
      expect(turns[1].content).toContain("Audit Window: 2021-06-16 through 2024-06-15");
    });

    it("lets gateway errors propagate", async () => {
      const service = new ResearchService(store, fakeModel(new ConfigurationError("Missing endpoint")));
      await expect(
        service.runResearch({ code: "29881", context: "", topic: "", model: "gpt-4.1" }),
      ).rejects.toThrow("Missing endpoint");
    });
  });

  describe("askSection", () => {
    const input = {
      sessionId: "research-1",
      code: "29881",
      sectionTitle: "Payment Rate Comparison",
      sectionContent: "| 29881 | 5114 |",
      question: "Which APC applies?",
      model: "gpt-4.1-mini",
    };

    it("sends prior turns and stores both new turns", async () => {
      await store.appendSectionChat({ sessionId: "research-1", code: "29881", sectionId: "section_3", role: "user", content: "Earlier question" });
      await store.appendSectionChat({ sessionId: "research-1", code: "29881", sectionId: "section_3", role: "assistant", content: "Earlier answer" });
      const model = fakeModel("APC 5114.");
      const service = new ResearchService(store, model);

      const { answer } = await service.askSection("section_3", input);

      expect(answer.content).toBe("APC 5114.");
      const [turns] = model.mock.calls[0];
      expect(turns.slice(1)).toEqual<ConversationTurn[]>([
        { role: "user", content: "Earlier question" },
        { role: "assistant", content: "Earlier answer" },
        { role: "user", content: "Which APC applies?" },
      ]);
      expect(turns[0].role).toBe("system");
      expect(turns[0].content).toContain("| 29881 | 5114 |");

      const stored = await store.getSectionChat("research-1", "29881", "section_3");
      expect(stored.map(t => t.content)).toEqual(["Earlier question", "Earlier answer", "Which APC applies?", "APC 5114."]);
    });

    it("stores the error text as the answer when the call fails", async () => {
      const service = new ResearchService(store, fakeModel(new Error("socket hang up")));

      const { question, answer } = await service.askSection("section_3", input);

      expect(question.role).toBe("user");
      expect(answer).toMatchObject({ role: "assistant", content: "Error: socket hang up" });
    });
  });
});
