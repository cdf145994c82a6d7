/**
 * Model Registry
 *
 * Single source of truth for every model the UI can select. Each entry names
 * its provider and the environment variables holding its credential and
 * endpoint, so the gateway can fail fast when one is missing.
 *
 * PROVIDERS:
 *
 * azure-openai - Azure-hosted deployments (gpt-4.1 and gpt-5 families).
 *   The gpt-5 family lives on separate resources with their own keys and
 *   API versions, and only accepts the default temperature.
 *
 * openai / gemini / claude - direct provider APIs, keyed by a single
 *   credential each.
 *
 * custom-http - a bare JSON endpoint taking {"messages": [...]} (MedGemma).
 */

export type Provider = "azure-openai" | "openai" | "gemini" | "claude" | "custom-http";

export interface ModelConfig {
  provider: Provider;
  /** Deployment or provider-side model id. */
  deployment: string;
  apiKeyEnv: string;
  /** Absent for providers with a fixed public endpoint. */
  endpointEnv?: string;
  apiVersion?: string;
  temperature?: number;
  label: string;
}

const AZURE_GPT_4_1_API_VERSION = "2024-12-01-preview";

export const MODEL_CONFIGS = {
  "gpt-4.1": {
    provider: "azure-openai",
    deployment: "gpt-4.1",
    apiKeyEnv: "AZURE_OPENAI_API_KEY",
    endpointEnv: "AZURE_OPENAI_ENDPOINT",
    apiVersion: AZURE_GPT_4_1_API_VERSION,
    temperature: 0.7,
    label: "GPT-4.1",
  },
  "gpt-4.1-mini": {
    provider: "azure-openai",
    deployment: "gpt-4.1-mini",
    apiKeyEnv: "AZURE_OPENAI_API_KEY",
    endpointEnv: "AZURE_OPENAI_ENDPOINT",
    apiVersion: AZURE_GPT_4_1_API_VERSION,
    temperature: 0.7,
    label: "GPT-4.1 mini",
  },
  "gpt-4.1-nano": {
    provider: "azure-openai",
    deployment: "gpt-4.1-nano",
    apiKeyEnv: "AZURE_OPENAI_API_KEY",
    endpointEnv: "AZURE_OPENAI_ENDPOINT",
    apiVersion: AZURE_GPT_4_1_API_VERSION,
    temperature: 0.7,
    label: "GPT-4.1 nano",
  },
  "gpt-5": {
    provider: "azure-openai",
    deployment: "gpt-5",
    apiKeyEnv: "AZURE_OPENAI_API_KEY_GPT_5",
    endpointEnv: "AZURE_OPENAI_ENDPOINT_GPT_5",
    apiVersion: "2025-01-01-preview",
    label: "GPT-5",
  },
  "gpt-5-mini": {
    provider: "azure-openai",
    deployment: "gpt-5-mini",
    apiKeyEnv: "AZURE_OPENAI_API_KEY_GPT_5_MINI",
    endpointEnv: "AZURE_OPENAI_ENDPOINT_GPT_5_MINI",
    apiVersion: "2025-04-01-preview",
    label: "GPT-5 mini",
  },
  "gpt-5-nano": {
    provider: "azure-openai",
    deployment: "gpt-5-nano",
    apiKeyEnv: "AZURE_OPENAI_API_KEY_GPT_5_NANO",
    endpointEnv: "AZURE_OPENAI_ENDPOINT_GPT_5_NANO",
    apiVersion: "2025-01-01-preview",
    label: "GPT-5 nano",
  },
  "gpt-4o": {
    provider: "openai",
    deployment: "gpt-4o",
    apiKeyEnv: "OPENAI_API_KEY",
    temperature: 0.7,
    label: "GPT-4o (OpenAI)",
  },
  "gemini-2.5-flash": {
    provider: "gemini",
    deployment: "gemini-2.5-flash",
    apiKeyEnv: "GEMINI_API_KEY",
    label: "Gemini 2.5 Flash",
  },
  "claude-sonnet-4-5": {
    provider: "claude",
    deployment: "claude-sonnet-4-5",
    apiKeyEnv: "ANTHROPIC_API_KEY",
    label: "Claude Sonnet 4.5",
  },
  "medgemma-27b-multimodal7": {
    provider: "custom-http",
    deployment: "medgemma-27b-multimodal7",
    apiKeyEnv: "MEDGEMMA_API_KEY",
    endpointEnv: "MEDGEMMA_ENDPOINT",
    label: "MedGEMMA 27b",
  },
} as const satisfies Record<string, ModelConfig>;

export type ModelName = keyof typeof MODEL_CONFIGS;

export function isModelName(name: string): name is ModelName {
  return Object.prototype.hasOwnProperty.call(MODEL_CONFIGS, name);
}

export function getModelConfig(name: string): ModelConfig | undefined {
  return isModelName(name) ? MODEL_CONFIGS[name] : undefined;
}

/**
 * Default model per task. Code discovery is a short structured answer, so it
 * runs on the cheaper tier.
 */
export const MODEL_ASSIGNMENTS = {
  CODE_DISCOVERY: "gpt-4.1-mini",
  RESEARCH_ANALYSIS: "gpt-4.1",
  SECTION_CHAT: "gpt-4.1-mini",
  CHAT_RESEARCH: "gpt-4.1-mini",
} as const satisfies Record<string, ModelName>;

/** Models offered in the research workflow selectors. */
export const RESEARCH_MODELS: readonly ModelName[] = ["gpt-4.1", "gpt-4.1-mini", "gpt-5", "gpt-5-mini"];

/** Models offered in chat research. */
export const CHAT_MODELS: readonly ModelName[] = [
  "gpt-4.1-mini",
  "gpt-4.1-nano",
  "gpt-4.1",
  "gpt-5",
  "gpt-5-mini",
  "gpt-5-nano",
  "medgemma-27b-multimodal7",
  "gpt-4o",
  "gemini-2.5-flash",
  "claude-sonnet-4-5",
];

export function listModelOptions(names: readonly ModelName[]): { id: ModelName; label: string }[] {
  return names.map(id => ({ id, label: MODEL_CONFIGS[id].label }));
}
