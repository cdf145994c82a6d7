import type { CandidateCode, ParsedResearch, ResearchResult } from "./schema";

/**
 * Code research workflow.
 *
 * One state struct owned by the page and advanced only through
 * {@link workflowReducer}. Actions that do not apply to the current step
 * return the state unchanged.
 */

export type WorkflowStep = "TopicInput" | "CodeSelection" | "ResearchParams" | "Results";

export interface WorkflowState {
  step: WorkflowStep;
  /** Research session id used to key notes, section chats and ratings. */
  sessionId: string;
  topic: string;
  candidates: CandidateCode[];
  selectedCode: string | null;
  context: string;
  result: ResearchResult | null;
  parsed: ParsedResearch | null;
  error: string | null;
}

export type WorkflowAction =
  | { type: "CODES_DISCOVERED"; topic: string; candidates: CandidateCode[]; rawText: string }
  | { type: "CODE_SELECTED"; code: string }
  | { type: "CONTEXT_CHANGED"; context: string }
  | { type: "RESEARCH_COMPLETED"; result: ResearchResult; parsed: ParsedResearch }
  | { type: "FAILED"; error: string }
  | { type: "BACK" }
  | { type: "RESET"; sessionId: string };

export const NO_CODES_MESSAGE =
  "No relevant CPT codes found. Please try a different topic or be more specific.";

/** Prefix of the text a failed model call is turned into. */
export const MODEL_ERROR_PREFIX = "Error:";

export function createInitialState(sessionId: string): WorkflowState {
  return {
    step: "TopicInput",
    sessionId,
    topic: "",
    candidates: [],
    selectedCode: null,
    context: "",
    result: null,
    parsed: null,
    error: null,
  };
}

export function defaultContextFor(topic: string): string {
  return `Related to ${topic}`;
}

export function workflowReducer(state: WorkflowState, action: WorkflowAction): WorkflowState {
  switch (action.type) {
    case "CODES_DISCOVERED": {
      if (state.step !== "TopicInput") return state;
      if (action.candidates.length === 0) {
        const failed = action.rawText.trim().startsWith(MODEL_ERROR_PREFIX);
        return { ...state, error: failed ? action.rawText.trim() : NO_CODES_MESSAGE };
      }
      return {
        ...state,
        step: "CodeSelection",
        topic: action.topic,
        candidates: action.candidates,
        error: null,
      };
    }

    case "CODE_SELECTED": {
      if (state.step !== "CodeSelection") return state;
      return {
        ...state,
        step: "ResearchParams",
        selectedCode: action.code,
        context: defaultContextFor(state.topic),
        error: null,
      };
    }

    case "CONTEXT_CHANGED": {
      if (state.step !== "ResearchParams") return state;
      return { ...state, context: action.context };
    }

    case "RESEARCH_COMPLETED": {
      if (state.step !== "ResearchParams") return state;
      return { ...state, step: "Results", result: action.result, parsed: action.parsed, error: null };
    }

    case "FAILED":
      return { ...state, error: action.error };

    case "BACK": {
      if (state.step === "CodeSelection") {
        return { ...state, step: "TopicInput", candidates: [], error: null };
      }
      if (state.step === "ResearchParams") {
        return { ...state, step: "CodeSelection", error: null };
      }
      return state;
    }

    case "RESET":
      return createInitialState(action.sessionId);

    default: {
      const _exhaustive: never = action;
      return _exhaustive;
    }
  }
}
