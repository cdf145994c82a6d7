import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { ConversationTurn } from "@shared/schema";

const { createCompletion, generateContent, createMessage, clientOptions } = vi.hoisted(() => ({
  createCompletion: vi.fn(),
  generateContent: vi.fn(),
  createMessage: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock("openai", () => {
  class FakeClient {
    chat = { completions: { create: createCompletion } };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }
  return { OpenAI: FakeClient, AzureOpenAI: FakeClient };
});

vi.mock("@google/genai", () => {
  class FakeGemini {
    models = { generateContent };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }
  return { GoogleGenAI: FakeGemini };
});

vi.mock("@anthropic-ai/sdk", () => {
  class FakeClaude {
    messages = { create: createMessage };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }
  return { default: FakeClaude };
});

import { invoke, resolveConnection, extractCustomEndpointText } from "../llm/client";
import { ConfigurationError, ExternalServiceError } from "../utils/errorHandler";

const MANAGED_ENV = [
  "AZURE_OPENAI_API_KEY",
  "AZURE_OPENAI_ENDPOINT",
  "AZURE_OPENAI_API_KEY_GPT_5",
  "AZURE_OPENAI_ENDPOINT_GPT_5",
  "MEDGEMMA_API_KEY",
  "MEDGEMMA_ENDPOINT",
  "GEMINI_API_KEY",
  "ANTHROPIC_API_KEY",
];

const conversation: ConversationTurn[] = [
  { role: "system", content: "You are an APC research assistant." },
  { role: "user", content: "What is 29881?" },
];

const multiTurn: ConversationTurn[] = [
  { role: "system", content: "Base prompt." },
  { role: "system", content: "Persona prompt." },
  { role: "user", content: "Q1" },
  { role: "assistant", content: "A1" },
  { role: "user", content: "Q2" },
];

describe("LLM client", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of MANAGED_ENV) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    createCompletion.mockReset();
    generateContent.mockReset();
    createMessage.mockReset();
    clientOptions.length = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    for (const name of MANAGED_ENV) {
      if (saved[name] === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = saved[name];
      }
    }
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe("resolveConnection", () => {
    it("rejects unknown models", () => {
      expect(() => resolveConnection("gpt-99")).toThrow(ConfigurationError);
    });

    it("names the missing key", () => {
      expect(() => resolveConnection("gpt-4.1")).toThrow(
        "Missing API key for model: gpt-4.1 (set AZURE_OPENAI_API_KEY)",
      );
    });

    it("names the missing endpoint", () => {
      process.env.AZURE_OPENAI_API_KEY = "test-secret";
      expect(() => resolveConnection("gpt-4.1")).toThrow(
        "Missing endpoint for model: gpt-4.1 (set AZURE_OPENAI_ENDPOINT)",
      );
    });

    it("reads the per-model settings", () => {
      process.env.AZURE_OPENAI_API_KEY = "test-secret";
      process.env.AZURE_OPENAI_ENDPOINT = "https://azure.example.test";
      expect(resolveConnection("gpt-4.1")).toEqual({
        provider: "azure-openai",
        deployment: "gpt-4.1",
        apiKey: "test-secret",
        endpoint: "https://azure.example.test",
        apiVersion: "2024-12-01-preview",
        temperature: 0.7,
      });
    });
  });

  describe("invoke", () => {
    it("fails before any call when configuration is missing", async () => {
      await expect(invoke(conversation, "gpt-4.1")).rejects.toBeInstanceOf(ConfigurationError);
      expect(createCompletion).not.toHaveBeenCalled();
    });

    it("sends the conversation to the Azure deployment", async () => {
      process.env.AZURE_OPENAI_API_KEY = "test-secret";
      process.env.AZURE_OPENAI_ENDPOINT = "https://azure.example.test";
      createCompletion.mockResolvedValue({ choices: [{ message: { content: "Knee arthroscopy." } }] });

      await expect(invoke(conversation, "gpt-4.1")).resolves.toBe("Knee arthroscopy.");
      expect(createCompletion).toHaveBeenCalledWith({
        model: "gpt-4.1",
        messages: conversation,
        temperature: 0.7,
      });
      expect(clientOptions).toContainEqual({
        apiKey: "test-secret",
        endpoint: "https://azure.example.test",
        apiVersion: "2024-12-01-preview",
      });
    });

    it("omits temperature for models that take none", async () => {
      process.env.AZURE_OPENAI_API_KEY_GPT_5 = "test-secret-5";
      process.env.AZURE_OPENAI_ENDPOINT_GPT_5 = "https://gpt5.example.test";
      createCompletion.mockResolvedValue({ choices: [{ message: { content: "ok" } }] });

      await invoke(conversation, "gpt-5");
      expect(createCompletion).toHaveBeenCalledWith({ model: "gpt-5", messages: conversation });
    });

    it("returns an empty string when the provider sends no content", async () => {
      process.env.AZURE_OPENAI_API_KEY = "test-secret";
      process.env.AZURE_OPENAI_ENDPOINT = "https://azure.example.test";
      createCompletion.mockResolvedValue({ choices: [] });

      await expect(invoke(conversation, "gpt-4.1")).resolves.toBe("");
    });

    it("folds system turns into the Gemini system instruction", async () => {
      process.env.GEMINI_API_KEY = "test-secret";
      generateContent.mockResolvedValue({ text: "Gemini answer" });

      await expect(invoke(multiTurn, "gemini-2.5-flash")).resolves.toBe("Gemini answer");
      expect(generateContent).toHaveBeenCalledWith({
        model: "gemini-2.5-flash",
        config: { systemInstruction: "Base prompt.\n\nPersona prompt." },
        contents: [
          { role: "user", parts: [{ text: "Q1" }] },
          { role: "model", parts: [{ text: "A1" }] },
          { role: "user", parts: [{ text: "Q2" }] },
        ],
      });
      expect(clientOptions).toContainEqual({ apiKey: "test-secret" });
    });

    it("sends no Gemini system instruction without system turns", async () => {
      process.env.GEMINI_API_KEY = "test-secret";
      generateContent.mockResolvedValue({ text: undefined });

      await expect(invoke([{ role: "user", content: "Q" }], "gemini-2.5-flash")).resolves.toBe("");
      expect(generateContent).toHaveBeenCalledWith({
        model: "gemini-2.5-flash",
        config: {},
        contents: [{ role: "user", parts: [{ text: "Q" }] }],
      });
    });

    it("folds system turns into the Claude system field", async () => {
      process.env.ANTHROPIC_API_KEY = "test-secret";
      createMessage.mockResolvedValue({
        content: [
          { type: "tool_use", id: "t1", name: "lookup", input: {} },
          { type: "text", text: "Claude answer" },
        ],
      });

      await expect(invoke(multiTurn, "claude-sonnet-4-5")).resolves.toBe("Claude answer");
      expect(createMessage).toHaveBeenCalledWith({
        model: "claude-sonnet-4-5",
        max_tokens: 8192,
        system: "Base prompt.\n\nPersona prompt.",
        messages: [
          { role: "user", content: "Q1" },
          { role: "assistant", content: "A1" },
          { role: "user", content: "Q2" },
        ],
      });
    });

    it("omits the Claude system field without system turns", async () => {
      process.env.ANTHROPIC_API_KEY = "test-secret";
      createMessage.mockResolvedValue({ content: [] });

      await expect(invoke([{ role: "user", content: "Q" }], "claude-sonnet-4-5")).resolves.toBe("");
      expect(createMessage).toHaveBeenCalledWith({
        model: "claude-sonnet-4-5",
        max_tokens: 8192,
        messages: [{ role: "user", content: "Q" }],
      });
    });

    it("posts bare messages to the custom endpoint", async () => {
      process.env.MEDGEMMA_API_KEY = "test-secret";
      process.env.MEDGEMMA_ENDPOINT = "https://medgemma.example.test/v1/chat";
      const fetchMock = vi.fn().mockResolvedValue(
        new Response(JSON.stringify({ output: "Custom answer" }), { status: 200 }),
      );
      vi.stubGlobal("fetch", fetchMock);

      await expect(invoke(conversation, "medgemma-27b-multimodal7")).resolves.toBe("Custom answer");
      expect(fetchMock).toHaveBeenCalledWith("https://medgemma.example.test/v1/chat", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": "Bearer test-secret",
        },
        body: JSON.stringify({ messages: conversation }),
      });
    });

    it("turns a failed custom endpoint response into an ExternalServiceError", async () => {
      process.env.MEDGEMMA_API_KEY = "test-secret";
      process.env.MEDGEMMA_ENDPOINT = "https://medgemma.example.test/v1/chat";
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("overloaded", { status: 503 })));

      const error = await invoke(conversation, "medgemma-27b-multimodal7").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).toHaveProperty("message", "medgemma-27b-multimodal7 error: HTTP 503: overloaded");
    });
  });

  describe("extractCustomEndpointText", () => {
    it("prefers the chat-completion shape", () => {
      expect(extractCustomEndpointText({ choices: [{ message: { content: "from choices" } }], output: "x" })).toBe(
        "from choices",
      );
    });

    it("falls back to output", () => {
      expect(extractCustomEndpointText({ output: "from output" })).toBe("from output");
    });

    it("stringifies anything else", () => {
      expect(extractCustomEndpointText({ result: 42 })).toBe('{"result":42}');
      expect(extractCustomEndpointText(["a"])).toBe('["a"]');
    });
  });
});
