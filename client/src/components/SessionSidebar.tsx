import { useState } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { formatDistanceToNow } from "date-fns";
import { Check, MessageSquarePlus, Pencil, Trash2, X } from "lucide-react";
import type { SessionSummary } from "@shared/schema";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { apiRequest, queryClient } from "@/lib/queryClient";
import { cn } from "@/lib/utils";

interface SessionSidebarProps {
  activeSessionId: string | null;
  onSelect: (session: SessionSummary) => void;
  onCreate: () => void;
  onRenamed: (sessionId: string, topic: string) => void;
  onDeleted: (sessionId: string) => void;
}

export default function SessionSidebar({ activeSessionId, onSelect, onCreate, onRenamed, onDeleted }: SessionSidebarProps) {
  const [editingId, setEditingId] = useState<string | null>(null);
  const [draftTopic, setDraftTopic] = useState("");

  const { data: sessions = [], isLoading } = useQuery<SessionSummary[]>({
    queryKey: ["/api/sessions"],
  });

  const renameMutation = useMutation({
    mutationFn: ({ sessionId, topic }: { sessionId: string; topic: string }) =>
      apiRequest("PATCH", `/api/sessions/${encodeURIComponent(sessionId)}`, { topic }),
    onSuccess: (_res, { sessionId, topic }) => {
      setEditingId(null);
      onRenamed(sessionId, topic);
      return queryClient.invalidateQueries({ queryKey: ["/api/sessions"] });
    },
  });

  const deleteMutation = useMutation({
    mutationFn: (sessionId: string) =>
      apiRequest("DELETE", `/api/sessions/${encodeURIComponent(sessionId)}`),
    onSuccess: (_res, sessionId) => {
      onDeleted(sessionId);
      return queryClient.invalidateQueries({ queryKey: ["/api/sessions"] });
    },
  });

  return (
    <aside className="w-72 shrink-0 border-r border-border p-4 space-y-3">
      <Button className="w-full" onClick={onCreate} data-testid="button-new-session">
        <MessageSquarePlus className="h-4 w-4" />
        New Session
      </Button>

      {isLoading && <p className="text-sm text-muted-foreground">Loading sessions...</p>}

      <ul className="space-y-1">
        {sessions.map((session) => (
          <li
            key={session.sessionId}
            className={cn(
              "group rounded-md px-2 py-2 text-sm cursor-pointer hover:bg-accent",
              session.sessionId === activeSessionId && "bg-accent",
            )}
            onClick={() => onSelect(session)}
            data-testid={`session-${session.sessionId}`}
          >
            {editingId === session.sessionId ? (
              <div className="flex items-center gap-1" onClick={(e) => e.stopPropagation()}>
                <Input
                  value={draftTopic}
                  onChange={(e) => setDraftTopic(e.target.value)}
                  className="h-7"
                  autoFocus
                />
                <Button
                  size="icon"
                  variant="ghost"
                  disabled={!draftTopic.trim() || renameMutation.isPending}
                  onClick={() => renameMutation.mutate({ sessionId: session.sessionId, topic: draftTopic.trim() })}
                >
                  <Check className="h-4 w-4" />
                </Button>
                <Button size="icon" variant="ghost" onClick={() => setEditingId(null)}>
                  <X className="h-4 w-4" />
                </Button>
              </div>
            ) : (
              <div className="flex items-start justify-between gap-2">
                <div className="min-w-0">
                  <p className="truncate font-medium">{session.topic}</p>
                  <p className="text-xs text-muted-foreground">
                    {session.persona} · {formatDistanceToNow(new Date(session.lastActivity), { addSuffix: true })}
                  </p>
                </div>
                <div className="hidden group-hover:flex" onClick={(e) => e.stopPropagation()}>
                  <Button
                    size="icon"
                    variant="ghost"
                    onClick={() => {
                      setEditingId(session.sessionId);
                      setDraftTopic(session.topic);
                    }}
                  >
                    <Pencil className="h-3.5 w-3.5" />
                  </Button>
                  <Button
                    size="icon"
                    variant="ghost"
                    disabled={deleteMutation.isPending}
                    onClick={() => deleteMutation.mutate(session.sessionId)}
                  >
                    <Trash2 className="h-3.5 w-3.5" />
                  </Button>
                </div>
              </div>
            )}
          </li>
        ))}
      </ul>

      {renameMutation.error && (
        <p className="text-xs text-destructive">{renameMutation.error.message}</p>
      )}
      {deleteMutation.error && (
        <p className="text-xs text-destructive">{deleteMutation.error.message}</p>
      )}
    </aside>
  );
}
