import { OpenAI, AzureOpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import Anthropic from "@anthropic-ai/sdk";
import type { ConversationTurn } from "@shared/schema";
import { getModelConfig, type Provider } from "../config/models";
import { ConfigurationError, ExternalServiceError } from "../utils/errorHandler";

/**
 * Resolved connection settings for one call. Read from the environment on
 * every call so configuration changes apply without a restart.
 */
export interface ModelConnection {
  provider: Provider;
  deployment: string;
  apiKey: string;
  endpoint?: string;
  apiVersion?: string;
  temperature?: number;
}

export function resolveConnection(modelName: string): ModelConnection {
  const config = getModelConfig(modelName);
  if (!config) {
    throw new ConfigurationError(`Unknown model "${modelName}". Add it to the model registry in server/config/models.ts`);
  }

  const apiKey = process.env[config.apiKeyEnv];
  if (!apiKey) {
    throw new ConfigurationError(`Missing API key for model: ${modelName} (set ${config.apiKeyEnv})`);
  }

  let endpoint: string | undefined;
  if (config.endpointEnv) {
    endpoint = process.env[config.endpointEnv];
    if (!endpoint) {
      throw new ConfigurationError(`Missing endpoint for model: ${modelName} (set ${config.endpointEnv})`);
    }
  }

  return {
    provider: config.provider,
    deployment: config.deployment,
    apiKey,
    endpoint,
    apiVersion: config.apiVersion,
    temperature: config.temperature,
  };
}

// SDK clients are cached per credential set; nothing else survives a call.
const azureClients = new Map<string, AzureOpenAI>();
const openaiClients = new Map<string, OpenAI>();
const geminiClients = new Map<string, GoogleGenAI>();
const claudeClients = new Map<string, Anthropic>();

function getAzure(conn: ModelConnection): AzureOpenAI {
  const key = `${conn.endpoint}|${conn.apiVersion}|${conn.apiKey}`;
  let client = azureClients.get(key);
  if (!client) {
    client = new AzureOpenAI({
      apiKey: conn.apiKey,
      endpoint: conn.endpoint,
      apiVersion: conn.apiVersion,
    });
    azureClients.set(key, client);
  }
  return client;
}

function getOpenAI(conn: ModelConnection): OpenAI {
  let client = openaiClients.get(conn.apiKey);
  if (!client) {
    client = new OpenAI({ apiKey: conn.apiKey });
    openaiClients.set(conn.apiKey, client);
  }
  return client;
}

function getGemini(conn: ModelConnection): GoogleGenAI {
  let client = geminiClients.get(conn.apiKey);
  if (!client) {
    client = new GoogleGenAI({ apiKey: conn.apiKey });
    geminiClients.set(conn.apiKey, client);
  }
  return client;
}

function getClaude(conn: ModelConnection): Anthropic {
  let client = claudeClients.get(conn.apiKey);
  if (!client) {
    client = new Anthropic({ apiKey: conn.apiKey });
    claudeClients.set(conn.apiKey, client);
  }
  return client;
}

/**
 * Sends `conversation` to `modelName` and returns the reply text.
 *
 * Throws ConfigurationError before any network I/O when the model's
 * settings are incomplete. Provider errors propagate unchanged.
 */
export async function invoke(conversation: ConversationTurn[], modelName: string): Promise<string> {
  const conn = resolveConnection(modelName);
  const started = Date.now();

  let text: string;
  switch (conn.provider) {
    case "azure-openai":
      text = await callAzure(conn, conversation);
      break;
    case "openai":
      text = await callOpenAI(conn, conversation);
      break;
    case "gemini":
      text = await callGemini(conn, conversation);
      break;
    case "claude":
      text = await callClaude(conn, conversation);
      break;
    case "custom-http":
      text = await callCustomEndpoint(conn, conversation);
      break;
    default: {
      const _exhaustive: never = conn.provider;
      throw new ConfigurationError(`[LLM Client] Unhandled provider: ${_exhaustive}`);
    }
  }

  console.log(`[LLM Client] ${modelName} (${conn.provider}) answered in ${Date.now() - started}ms`);
  return text;
}

async function callAzure(conn: ModelConnection, conversation: ConversationTurn[]): Promise<string> {
  const response = await getAzure(conn).chat.completions.create({
    model: conn.deployment,
    messages: conversation,
    ...(conn.temperature !== undefined && { temperature: conn.temperature }),
  });
  return response.choices[0]?.message?.content || "";
}

async function callOpenAI(conn: ModelConnection, conversation: ConversationTurn[]): Promise<string> {
  const response = await getOpenAI(conn).chat.completions.create({
    model: conn.deployment,
    messages: conversation,
    ...(conn.temperature !== undefined && { temperature: conn.temperature }),
  });
  return response.choices[0]?.message?.content || "";
}

function systemText(conversation: ConversationTurn[]): string {
  return conversation
    .filter(m => m.role === "system")
    .map(m => m.content)
    .join("\n\n");
}

async function callGemini(conn: ModelConnection, conversation: ConversationTurn[]): Promise<string> {
  const systemInstruction = systemText(conversation);

  const contents = conversation
    .filter(m => m.role !== "system")
    .map(m => ({
      role: m.role === "assistant" ? "model" as const : "user" as const,
      parts: [{ text: m.content }],
    }));

  const response = await getGemini(conn).models.generateContent({
    model: conn.deployment,
    config: {
      ...(systemInstruction ? { systemInstruction } : {}),
      ...(conn.temperature !== undefined && { temperature: conn.temperature }),
    },
    contents,
  });

  return response.text || "";
}

async function callClaude(conn: ModelConnection, conversation: ConversationTurn[]): Promise<string> {
  const system = systemText(conversation);

  const messages: Anthropic.MessageParam[] = [];
  for (const m of conversation) {
    if (m.role === "user" || m.role === "assistant") {
      messages.push({ role: m.role, content: m.content });
    }
  }

  const response = await getClaude(conn).messages.create({
    model: conn.deployment,
    max_tokens: 8192,
    ...(system ? { system } : {}),
    messages,
    ...(conn.temperature !== undefined && { temperature: conn.temperature }),
  });

  const textBlock = response.content.find(b => b.type === "text");
  return textBlock?.type === "text" ? textBlock.text : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the reply out of a custom endpoint body: OpenAI-shaped
 * `choices[0].message.content`, then `output`, then the whole body as JSON.
 */
export function extractCustomEndpointText(body: unknown): string {
  if (isRecord(body)) {
    const choices = body.choices;
    if (Array.isArray(choices) && choices.length > 0) {
      const first: unknown = choices[0];
      if (isRecord(first) && isRecord(first.message) && typeof first.message.content === "string") {
        return first.message.content;
      }
    }
    if (typeof body.output === "string") {
      return body.output;
    }
  }
  return JSON.stringify(body);
}

async function callCustomEndpoint(conn: ModelConnection, conversation: ConversationTurn[]): Promise<string> {
  if (!conn.endpoint) {
    throw new ConfigurationError(`Missing endpoint for model: ${conn.deployment}`);
  }

  const response = await fetch(conn.endpoint, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "Authorization": `Bearer ${conn.apiKey}`,
    },
    body: JSON.stringify({ messages: conversation }),
  });

  if (!response.ok) {
    const detail = await response.text();
    throw new ExternalServiceError(conn.deployment, `HTTP ${response.status}${detail ? `: ${detail}` : ""}`);
  }

  const body: unknown = await response.json();
  return extractCustomEndpointText(body);
}
