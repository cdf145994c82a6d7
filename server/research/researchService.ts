/**
 * Research Service
 *
 * The three model-backed research actions. Discovery and section chat turn
 * gateway failures into an "Error: ..." payload; the full research run lets
 * them propagate to the route.
 */

import type {
  CandidateCode,
  ParsedResearch,
  ResearchResult,
  RunResearchInput,
  SectionChatInput,
  SectionChatTurn,
  ResearchSectionId,
} from "@shared/schema";
import { format } from "date-fns";
import { invoke } from "../llm/client";
import type { IStorage } from "../storage";
import {
  CODE_DISCOVERY_SYSTEM_PROMPT,
  RESEARCH_SYSTEM_PROMPT,
  buildCodeDiscoveryPrompt,
  buildResearchPrompt,
  buildSectionChatConversation,
} from "../config/prompts";
import { computeAuditWindow } from "./auditWindow";
import { parseCandidateCodes, parseStructuredSections } from "./responseParser";
import { logError, toErrorPayload } from "../utils/errorHandler";

export type ModelInvoker = typeof invoke;

export interface CodeDiscoveryResult {
  candidates: CandidateCode[];
  /** Raw model reply, or the error payload when the call failed. */
  rawText: string;
}

export interface ResearchRunResult {
  result: ResearchResult;
  parsed: ParsedResearch;
}

export interface SectionChatResult {
  question: SectionChatTurn;
  answer: SectionChatTurn;
}

export class ResearchService {
  constructor(
    private readonly store: IStorage,
    private readonly callModel: ModelInvoker = invoke,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async discoverCodes(topic: string, model: string): Promise<CodeDiscoveryResult> {
    let rawText: string;
    try {
      rawText = await this.callModel([
        { role: "system", content: CODE_DISCOVERY_SYSTEM_PROMPT },
        { role: "user", content: buildCodeDiscoveryPrompt(topic) },
      ], model);
    } catch (error) {
      logError("Research", error);
      rawText = toErrorPayload(error);
    }

    const candidates = parseCandidateCodes(rawText);
    console.log(`[Research] Code discovery for "${topic}" returned ${candidates.length} candidate(s)`);
    return { candidates, rawText };
  }

  async runResearch(input: RunResearchInput): Promise<ResearchRunResult> {
    const now = this.clock();
    const window = computeAuditWindow(now);
    const prompt = buildResearchPrompt(input.code, input.context, window.start, window.end);

    const rawText = await this.callModel([
      { role: "system", content: RESEARCH_SYSTEM_PROMPT },
      { role: "user", content: prompt },
    ], input.model);

    const parsed = parseStructuredSections(rawText);
    const missing = parsed.sections.filter(s => !s.generated).length + (parsed.finalAssessmentGenerated ? 0 : 1);
    if (missing > 0) {
      console.warn(`[Research] ${missing} block(s) missing from ${input.model} output for ${input.code}`);
    }

    return {
      result: {
        cptCode: input.code,
        context: input.context,
        model: input.model,
        rawText,
        timestamp: format(now, "yyyy-MM-dd HH:mm:ss"),
        topic: input.topic,
      },
      parsed,
    };
  }

  /**
   * Answers a follow-up about one section. The question and the answer (or
   * the error payload) are both appended to the section's chat history.
   */
  async askSection(sectionId: ResearchSectionId, input: SectionChatInput): Promise<SectionChatResult> {
    const history = await this.store.getSectionChat(input.sessionId, input.code, sectionId);

    const conversation = buildSectionChatConversation({
      code: input.code,
      sectionTitle: input.sectionTitle,
      sectionContent: input.sectionContent,
      history,
      question: input.question,
    });

    let answerText: string;
    try {
      answerText = await this.callModel(conversation, input.model);
    } catch (error) {
      logError("Research", error);
      answerText = toErrorPayload(error);
    }

    const key = { sessionId: input.sessionId, code: input.code, sectionId };
    const question = await this.store.appendSectionChat({ ...key, role: "user", content: input.question });
    const answer = await this.store.appendSectionChat({ ...key, role: "assistant", content: answerText });

    return { question, answer };
  }
}
