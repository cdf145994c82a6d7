import { useEffect, useState } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import type { Note } from "@shared/schema";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Textarea } from "@/components/ui/textarea";
import { apiJson, queryClient } from "@/lib/queryClient";

interface NotesPanelProps {
  sessionId: string;
  code: string;
}

export default function NotesPanel({ sessionId, code }: NotesPanelProps) {
  const noteKey = ["/api/research/notes", { sessionId, code }];
  const [draft, setDraft] = useState("");

  const { data } = useQuery<{ note: Note | null }>({ queryKey: noteKey });

  useEffect(() => {
    setDraft(data?.note?.content ?? "");
  }, [data]);

  const saveMutation = useMutation({
    mutationFn: () => apiJson<{ note: Note }>("PUT", "/api/research/notes", { sessionId, code, content: draft }),
    onSuccess: (saved) => {
      queryClient.setQueryData(noteKey, saved);
    },
  });

  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-base">Notes</CardTitle>
      </CardHeader>
      <CardContent className="space-y-2">
        <Textarea
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          rows={6}
          placeholder={`Notes for ${code}`}
          data-testid="input-notes"
        />
        <div className="flex items-center gap-3">
          <Button size="sm" onClick={() => saveMutation.mutate()} disabled={saveMutation.isPending}>
            {saveMutation.isPending ? "Saving..." : "Save Notes"}
          </Button>
          {saveMutation.isSuccess && <span className="text-xs text-muted-foreground">Saved</span>}
          {saveMutation.error && <span className="text-xs text-destructive">{saveMutation.error.message}</span>}
        </div>
      </CardContent>
    </Card>
  );
}
