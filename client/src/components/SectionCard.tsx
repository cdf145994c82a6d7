import { useState, type FormEvent } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { AlertTriangle, MessageCircle } from "lucide-react";
import {
  ACCURACY_RATINGS,
  ACCURACY_RATING_LABELS,
  type AccuracyFeedback,
  type AccuracyRating,
  type ResearchSectionId,
  type SectionChatTurn,
} from "@shared/schema";
import { Badge } from "@/components/ui/badge";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { apiJson, queryClient } from "@/lib/queryClient";
import { cn } from "@/lib/utils";

interface SectionCardProps {
  sessionId: string;
  code: string;
  sectionId: ResearchSectionId;
  title: string;
  content: string;
  generated: boolean;
  chatModel: string;
  rating: AccuracyFeedback | undefined;
}

export default function SectionCard({
  sessionId,
  code,
  sectionId,
  title,
  content,
  generated,
  chatModel,
  rating,
}: SectionCardProps) {
  const [chatOpen, setChatOpen] = useState(false);
  const [question, setQuestion] = useState("");
  const [reason, setReason] = useState(rating?.reason ?? "");

  const chatKey = ["/api/research/sections", sectionId, "chat", { sessionId, code }];

  const { data: chatData } = useQuery<{ messages: SectionChatTurn[] }>({
    queryKey: chatKey,
    enabled: chatOpen,
  });

  const askMutation = useMutation({
    mutationFn: () =>
      apiJson<{ question: SectionChatTurn; answer: SectionChatTurn }>(
        "POST",
        `/api/research/sections/${sectionId}/chat`,
        { sessionId, code, sectionTitle: title, sectionContent: content, question, model: chatModel },
      ),
    onSuccess: () => {
      setQuestion("");
      return queryClient.invalidateQueries({ queryKey: chatKey });
    },
  });

  const rateMutation = useMutation({
    mutationFn: (value: AccuracyRating) =>
      apiJson<{ rating: AccuracyFeedback }>("PUT", "/api/research/accuracy", {
        sessionId,
        code,
        sectionId,
        rating: value,
        reason: reason.trim() || undefined,
      }),
    onSuccess: () => queryClient.invalidateQueries({ queryKey: ["/api/research/accuracy", { sessionId, code }] }),
  });

  const handleAsk = (e: FormEvent) => {
    e.preventDefault();
    if (question.trim()) askMutation.mutate();
  };

  return (
    <Card data-testid={`card-${sectionId}`}>
      <CardHeader className="flex-row items-center justify-between space-y-0">
        <CardTitle className="text-base">{title}</CardTitle>
        {!generated && (
          <Badge variant="destructive" className="gap-1">
            <AlertTriangle className="h-3 w-3" />
            Not generated
          </Badge>
        )}
      </CardHeader>
      <CardContent className="space-y-4">
        <p className="whitespace-pre-wrap text-sm leading-relaxed">{content}</p>

        <div className="space-y-2 border-t border-border pt-3">
          <p className="text-xs text-muted-foreground">How accurate is this section?</p>
          <div className="flex flex-wrap items-center gap-2">
            {ACCURACY_RATINGS.map((value) => (
              <Button
                key={value}
                size="sm"
                variant={rating?.rating === value ? "default" : "outline"}
                disabled={rateMutation.isPending}
                onClick={() => rateMutation.mutate(value)}
                data-testid={`button-rate-${sectionId}-${value}`}
              >
                {ACCURACY_RATING_LABELS[value]}
              </Button>
            ))}
            <Input
              value={reason}
              onChange={(e) => setReason(e.target.value)}
              placeholder="Reason (optional)"
              className="h-8 max-w-xs"
            />
          </div>
          {rateMutation.error && <p className="text-xs text-destructive">{rateMutation.error.message}</p>}
        </div>

        <div className="border-t border-border pt-3">
          <Button size="sm" variant="ghost" onClick={() => setChatOpen((open) => !open)}>
            <MessageCircle className="h-4 w-4" />
            {chatOpen ? "Hide follow-up chat" : "Ask about this section"}
          </Button>

          {chatOpen && (
            <div className="mt-3 space-y-2">
              {(chatData?.messages ?? []).map((turn) => (
                <div
                  key={turn.id}
                  className={cn(
                    "rounded-md px-3 py-2 text-sm whitespace-pre-wrap",
                    turn.role === "user" ? "bg-primary/20" : "bg-surface",
                  )}
                >
                  {turn.content}
                </div>
              ))}
              <form onSubmit={handleAsk} className="flex gap-2">
                <Input
                  value={question}
                  onChange={(e) => setQuestion(e.target.value)}
                  placeholder="Ask a follow-up question..."
                  disabled={askMutation.isPending}
                />
                <Button type="submit" size="sm" disabled={!question.trim() || askMutation.isPending}>
                  {askMutation.isPending ? "Asking..." : "Ask"}
                </Button>
              </form>
              {askMutation.error && <p className="text-xs text-destructive">{askMutation.error.message}</p>}
            </div>
          )}
        </div>
      </CardContent>
    </Card>
  );
}
