/**
 * System-Level Prompts
 *
 * Base system turns and the chat-research personas.
 */

/** First turn of every reconstructed chat-research conversation. */
export const CHAT_HISTORY_SYSTEM_PROMPT = "You are an APC research assistant.";

/** System turn for a fresh chat-research session. */
export const CHAT_RESEARCH_SYSTEM_PROMPT =
  "You are a helpful assistant with the persona of a CCV Researcher.";

export const CODE_DISCOVERY_SYSTEM_PROMPT =
  "You are an expert medical coding specialist with deep knowledge of CPT codes.";

export const RESEARCH_SYSTEM_PROMPT =
  "You are an expert medical coding analyst specializing in APC research.";

export const PERSONAS = [
  "Analysts",
  "CDAs",
  "SMEs",
  "Product Owners",
  "Data Analysts",
  "Clinical Reviewers",
  "Audit Leads",
  "IT/Engineers",
] as const;

export type Persona = typeof PERSONAS[number];

const PERSONA_PROMPTS: Record<Persona, string> = {
  "Analysts": "You are an APC research assistant helping analysts with coding, reimbursement and claims insights.",
  "CDAs": "You are a clinical documentation assistant helping reviewers align documentation with coded procedures.",
  "SMEs": "You are a subject-matter research assistant helping experts validate coding guidance in depth.",
  "Product Owners": "You are a strategic assistant helping with summaries, timelines, and decisions.",
  "Data Analysts": "You are an APC research assistant helping with clinical and data insights.",
  "Clinical Reviewers": "You are a clinical assistant helping with patient data and medical literature.",
  "Audit Leads": "You are an audit assistant helping prioritize billing findings and validation steps.",
  "IT/Engineers": "You are a technical assistant helping with code, architecture, and debugging.",
};

export const DEFAULT_PERSONA_PROMPT = "You are a helpful general-purpose assistant.";

export function getPersonaPrompt(persona: string): string {
  const known = PERSONAS.find(name => name === persona);
  return known ? PERSONA_PROMPTS[known] : DEFAULT_PERSONA_PROMPT;
}

/**
 * System turn for a chat-research request: the session's base prompt
 * followed by the persona framing.
 */
export function buildChatSystemPrompt(persona: string): string {
  return `${CHAT_RESEARCH_SYSTEM_PROMPT}\n\n${getPersonaPrompt(persona)}`;
}
