import type { ConversationTurn, Interaction } from "@shared/schema";
import { invoke } from "../llm/client";
import type { IStorage } from "../storage";
import { buildChatSystemPrompt } from "../config/prompts";

export interface ChatMessageInput {
  message: string;
  topic: string;
  persona: string;
  model: string;
}

export interface ChatReply {
  interaction: Interaction;
  history: ConversationTurn[];
}

/**
 * Free-form chat research. One call per user turn; the turn is persisted only
 * after the model answers, so a failed call leaves no row behind.
 *
 * A session's stored topic and persona win over the ones in the request. The
 * request's values only apply to the first message of a new session.
 */
export class ChatService {
  constructor(
    private readonly store: IStorage,
    private readonly callModel: typeof invoke = invoke,
  ) {}

  async sendMessage(sessionId: string, input: ChatMessageInput): Promise<ChatReply> {
    const session = await this.store.getSession(sessionId);
    const topic = session?.topic ?? input.topic;
    const persona = session?.persona ?? input.persona;
    const [baseSystem, ...previous] = await this.store.getSessionHistory(sessionId);

    const conversation: ConversationTurn[] = [
      baseSystem,
      { role: "system", content: buildChatSystemPrompt(persona) },
      ...previous,
      { role: "user", content: input.message },
    ];

    const response = await this.callModel(conversation, input.model);

    const interaction = await this.store.saveInteraction({
      sessionId,
      topic,
      persona,
      question: input.message,
      response,
    });

    return {
      interaction,
      history: await this.store.getSessionHistory(sessionId),
    };
  }
}
