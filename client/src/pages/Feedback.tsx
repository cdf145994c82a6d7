import { useState, type FormEvent } from "react";
import { useMutation } from "@tanstack/react-query";
import { Star } from "lucide-react";
import { RESEARCH_TYPES, type UserFeedback } from "@shared/schema";
import ModelSelect from "@/components/ModelSelect";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Textarea } from "@/components/ui/textarea";
import { useModels } from "@/hooks/useModels";
import { apiJson } from "@/lib/queryClient";
import { cn } from "@/lib/utils";

const MAX_RATING = 3;

function RatingInput({ id, value, onChange }: { id: string; value: number; onChange: (value: number) => void }) {
  return (
    <div className="flex gap-1" data-testid={`rating-${id}`}>
      {Array.from({ length: MAX_RATING }, (_, idx) => idx + 1).map((star) => (
        <button
          key={star}
          type="button"
          aria-label={`${star} star${star > 1 ? "s" : ""}`}
          onClick={() => onChange(value === star ? 0 : star)}
        >
          <Star className={cn("h-5 w-5", star <= value ? "fill-primary text-primary" : "text-muted-foreground")} />
        </button>
      ))}
    </div>
  );
}

export default function Feedback() {
  const { data: catalog } = useModels();
  const [modelUsed, setModelUsed] = useState("");
  const [researchType, setResearchType] = useState<string>(RESEARCH_TYPES[0]);
  const [topic, setTopic] = useState("");
  const [uiRating, setUiRating] = useState(0);
  const [contentRating, setContentRating] = useState(0);
  const [feedbackText, setFeedbackText] = useState("");

  const submitMutation = useMutation({
    mutationFn: () =>
      apiJson<{ feedback: UserFeedback }>("POST", "/api/feedback", {
        modelUsed,
        researchType,
        topic,
        uiRating,
        contentRating,
        feedbackText,
      }),
    onSuccess: () => {
      setTopic("");
      setUiRating(0);
      setContentRating(0);
      setFeedbackText("");
    },
  });

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    submitMutation.mutate();
  };

  return (
    <div className="container mx-auto max-w-2xl px-6 py-8">
      <Card>
        <CardHeader>
          <CardTitle>Share your feedback</CardTitle>
        </CardHeader>
        <CardContent>
          <form onSubmit={handleSubmit} className="space-y-4">
            <div className="grid grid-cols-2 gap-4">
              <div className="space-y-1">
                <Label htmlFor="feedback-model">Model used</Label>
                <ModelSelect
                  id="feedback-model"
                  value={modelUsed}
                  options={[{ id: "", label: "Not specified" }, ...(catalog?.chat ?? [])]}
                  onChange={setModelUsed}
                  className="block w-full"
                />
              </div>
              <div className="space-y-1">
                <Label htmlFor="research-type">Research type</Label>
                <select
                  id="research-type"
                  value={researchType}
                  onChange={(e) => setResearchType(e.target.value)}
                  className="h-9 block w-full rounded-md border border-input bg-surface px-3 text-sm"
                >
                  {RESEARCH_TYPES.map((type) => (
                    <option key={type} value={type}>
                      {type}
                    </option>
                  ))}
                </select>
              </div>
            </div>

            <div className="space-y-1">
              <Label htmlFor="feedback-topic">Topic</Label>
              <Input id="feedback-topic" value={topic} onChange={(e) => setTopic(e.target.value)} />
            </div>

            <div className="grid grid-cols-2 gap-4">
              <div className="space-y-1">
                <Label>Interface</Label>
                <RatingInput id="ui" value={uiRating} onChange={setUiRating} />
              </div>
              <div className="space-y-1">
                <Label>Content quality</Label>
                <RatingInput id="content" value={contentRating} onChange={setContentRating} />
              </div>
            </div>

            <div className="space-y-1">
              <Label htmlFor="feedback-text">Comments</Label>
              <Textarea
                id="feedback-text"
                value={feedbackText}
                onChange={(e) => setFeedbackText(e.target.value)}
                rows={5}
              />
            </div>

            <div className="flex items-center gap-3">
              <Button type="submit" disabled={submitMutation.isPending} data-testid="button-submit-feedback">
                {submitMutation.isPending ? "Submitting..." : "Submit Feedback"}
              </Button>
              {submitMutation.isSuccess && <span className="text-sm text-primary">Thank you for your feedback!</span>}
              {submitMutation.error && (
                <span className="text-sm text-destructive">{submitMutation.error.message}</span>
              )}
            </div>
          </form>
        </CardContent>
      </Card>
    </div>
  );
}
