import { describe, it, expect, vi, beforeEach } from "vitest";
import { ChatService } from "../services/chatService";
import { MemStorage } from "../storage";
import type { invoke } from "../llm/client";
import { CHAT_HISTORY_SYSTEM_PROMPT, buildChatSystemPrompt } from "../config/prompts";
import { ExternalServiceError } from "../utils/errorHandler";

describe("ChatService", () => {
  let store: MemStorage;

  beforeEach(async () => {
    store = new MemStorage();
    await store.createSession("chat-1", "New Research", "CDAs");
  });

  it("sends history with the persona prompt and saves the turn", async () => {
    await store.saveInteraction({ sessionId: "chat-1", topic: "New Research", persona: "CDAs", question: "Q1", response: "A1" });
    const model = vi.fn<typeof invoke>().mockResolvedValue("A2");
    const service = new ChatService(store, model);

    const reply = await service.sendMessage("chat-1", {
      message: "Q2",
      topic: "New Research",
      persona: "CDAs",
      model: "gpt-4.1-mini",
    });

    expect(model).toHaveBeenCalledWith(
      [
        { role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT },
        { role: "system", content: buildChatSystemPrompt("CDAs") },
        { role: "user", content: "Q1" },
        { role: "assistant", content: "A1" },
        { role: "user", content: "Q2" },
      ],
      "gpt-4.1-mini",
    );
    expect(reply.interaction).toMatchObject({ sessionId: "chat-1", question: "Q2", response: "A2" });
    expect(reply.history.slice(-2)).toEqual([
      { role: "user", content: "Q2" },
      { role: "assistant", content: "A2" },
    ]);
  });

  it("saves nothing when the model call fails", async () => {
    const model = vi.fn<typeof invoke>().mockRejectedValue(new ExternalServiceError("gpt-4.1", "timeout"));
    const service = new ChatService(store, model);

    await expect(
      service.sendMessage("chat-1", { message: "Q", topic: "New Research", persona: "CDAs", model: "gpt-4.1" }),
    ).rejects.toThrow("gpt-4.1 error: timeout");
    expect(await store.getSessionHistory("chat-1")).toEqual([{ role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT }]);
  });

  it("keeps a renamed topic on the next message", async () => {
    await store.renameSession("chat-1", "Knee coding");
    const service = new ChatService(store, vi.fn<typeof invoke>().mockResolvedValue("A1"));

    const reply = await service.sendMessage("chat-1", {
      message: "Q1",
      topic: "New Research",
      persona: "Analysts",
      model: "gpt-4.1",
    });

    expect(reply.interaction).toMatchObject({ topic: "Knee coding", persona: "CDAs" });
    expect(await store.getSession("chat-1")).toMatchObject({ topic: "Knee coding", persona: "CDAs" });
    const [latest] = await store.getSessions();
    expect(latest.topic).toBe("Knee coding");
  });

  it("starts a session from its first message", async () => {
    const model = vi.fn<typeof invoke>().mockResolvedValue("Hello");
    const service = new ChatService(store, model);

    const reply = await service.sendMessage("chat-2", {
      message: "Hi",
      topic: "New Research",
      persona: "SMEs",
      model: "gpt-4.1",
    });

    expect(model).toHaveBeenCalledWith(
      [
        { role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT },
        { role: "system", content: buildChatSystemPrompt("SMEs") },
        { role: "user", content: "Hi" },
      ],
      "gpt-4.1",
    );
    expect(reply.interaction).toMatchObject({ sessionId: "chat-2", topic: "New Research", persona: "SMEs" });
    expect(reply.history).toEqual([
      { role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT },
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello" },
    ]);
  });
});
