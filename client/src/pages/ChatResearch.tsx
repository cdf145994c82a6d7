import { useState, type FormEvent } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { Send } from "lucide-react";
import { SESSION_DEFAULTS, type ConversationTurn, type Interaction, type SessionSummary } from "@shared/schema";
import SessionSidebar from "@/components/SessionSidebar";
import ModelSelect from "@/components/ModelSelect";
import { Button } from "@/components/ui/button";
import { Label } from "@/components/ui/label";
import { Textarea } from "@/components/ui/textarea";
import { useModels } from "@/hooks/useModels";
import { apiJson, queryClient } from "@/lib/queryClient";
import { cn } from "@/lib/utils";

type ActiveSession = Pick<SessionSummary, "sessionId" | "topic" | "persona">;

interface ChatReply {
  interaction: Interaction;
  history: ConversationTurn[];
}

function historyKey(sessionId: string) {
  return ["/api/sessions", sessionId, "history"];
}

export default function ChatResearch() {
  const [active, setActive] = useState<ActiveSession | null>(null);
  const [persona, setPersona] = useState<string>(SESSION_DEFAULTS.PERSONA);
  const [model, setModel] = useState("");
  const [message, setMessage] = useState("");

  const { data: catalog } = useModels();
  const { data: personaData } = useQuery<{ personas: string[] }>({
    queryKey: ["/api/personas"],
    staleTime: Infinity,
  });

  const selectedModel = model || catalog?.defaults.CHAT_RESEARCH || "";

  const { data: historyData } = useQuery<{ messages: ConversationTurn[] }>({
    queryKey: active ? historyKey(active.sessionId) : ["/api/sessions", "none"],
    enabled: active !== null,
  });
  const turns = (historyData?.messages ?? []).filter((turn) => turn.role !== "system");

  const createMutation = useMutation({
    mutationFn: () => apiJson<ActiveSession>("POST", "/api/sessions", { persona }),
    onSuccess: (session) => {
      setActive(session);
      return queryClient.invalidateQueries({ queryKey: ["/api/sessions"], exact: true });
    },
  });

  const sendMutation = useMutation({
    mutationFn: (session: ActiveSession) =>
      apiJson<ChatReply>("POST", `/api/sessions/${encodeURIComponent(session.sessionId)}/messages`, {
        message,
        topic: session.topic,
        persona: session.persona,
        model: selectedModel,
      }),
    onSuccess: (reply, session) => {
      setMessage("");
      setActive({
        sessionId: session.sessionId,
        topic: reply.interaction.topic,
        persona: reply.interaction.persona,
      });
      queryClient.setQueryData(historyKey(session.sessionId), { messages: reply.history });
      return queryClient.invalidateQueries({ queryKey: ["/api/sessions"], exact: true });
    },
  });

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    if (!message.trim() || !selectedModel) return;
    // The first message of a fresh page starts a session.
    const session = active ?? { sessionId: crypto.randomUUID(), topic: SESSION_DEFAULTS.TOPIC, persona };
    setActive(session);
    sendMutation.mutate(session);
  };

  return (
    <div className="flex min-h-[calc(100vh-4rem)]">
      <SessionSidebar
        activeSessionId={active?.sessionId ?? null}
        onSelect={(session) => setActive(session)}
        onCreate={() => createMutation.mutate()}
        onRenamed={(sessionId, topic) => {
          setActive((current) => (current?.sessionId === sessionId ? { ...current, topic } : current));
        }}
        onDeleted={(sessionId) => {
          if (active?.sessionId === sessionId) setActive(null);
        }}
      />

      <section className="flex-1 flex flex-col p-6 gap-4">
        <div className="flex flex-wrap items-end gap-4">
          <div className="space-y-1">
            <Label htmlFor="persona">Persona</Label>
            <select
              id="persona"
              value={active?.persona ?? persona}
              disabled={active !== null}
              onChange={(e) => setPersona(e.target.value)}
              className="h-9 block rounded-md border border-input bg-surface px-3 text-sm"
              data-testid="select-persona"
            >
              {(personaData?.personas ?? [persona]).map((name) => (
                <option key={name} value={name}>
                  {name}
                </option>
              ))}
            </select>
          </div>
          <div className="space-y-1">
            <Label htmlFor="chat-model">Model</Label>
            <ModelSelect
              id="chat-model"
              value={selectedModel}
              options={catalog?.chat ?? []}
              onChange={setModel}
              className="block"
            />
          </div>
          {active && <h2 className="ml-auto text-lg font-semibold">{active.topic}</h2>}
        </div>

        <div className="flex-1 space-y-3 overflow-y-auto" data-testid="chat-messages">
          {!active && (
            <p className="text-muted-foreground">Send a message to start a session, or pick one from the list.</p>
          )}
          {turns.map((turn, idx) => (
            <div
              key={idx}
              className={cn(
                "max-w-3xl rounded-lg px-4 py-3 whitespace-pre-wrap text-sm",
                turn.role === "user" ? "ml-auto bg-primary/20" : "bg-surface",
              )}
            >
              {turn.content}
            </div>
          ))}
          {sendMutation.isPending && <p className="text-sm text-muted-foreground">Thinking...</p>}
        </div>

        {(sendMutation.error || createMutation.error) && (
          <p className="text-sm text-destructive" data-testid="text-chat-error">
            {(sendMutation.error ?? createMutation.error)?.message}
          </p>
        )}

        <form onSubmit={handleSubmit} className="flex gap-2">
          <Textarea
            value={message}
            onChange={(e) => setMessage(e.target.value)}
            placeholder="Ask about APC coding, reimbursement or claims..."
            disabled={sendMutation.isPending}
            data-testid="input-chat-message"
          />
          <Button
            type="submit"
            disabled={!message.trim() || !selectedModel || sendMutation.isPending}
            data-testid="button-send"
          >
            <Send className="h-4 w-4" />
          </Button>
        </form>
      </section>
    </div>
  );
}
