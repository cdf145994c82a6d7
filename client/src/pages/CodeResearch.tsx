import { useReducer, useState, type FormEvent } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { ArrowLeft, FileSpreadsheet, FileText, RotateCcw, Search } from "lucide-react";
import type {
  AccuracyFeedback,
  AuditWindow,
  CandidateCode,
  ParsedResearch,
  ResearchResult,
} from "@shared/schema";
import { createInitialState, workflowReducer } from "@shared/workflow";
import ModelSelect from "@/components/ModelSelect";
import NotesPanel from "@/components/NotesPanel";
import SectionCard from "@/components/SectionCard";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Textarea } from "@/components/ui/textarea";
import { useModels } from "@/hooks/useModels";
import { apiJson, apiRequest } from "@/lib/queryClient";
import { cn } from "@/lib/utils";

type ExportFormat = "xlsx" | "pdf";

function fileNameFrom(res: Response, fallback: string): string {
  const disposition = res.headers.get("Content-Disposition") ?? "";
  const match = /filename="([^"]+)"/.exec(disposition);
  return match ? match[1] : fallback;
}

async function downloadExport(format: ExportFormat, code: string, rawText: string): Promise<void> {
  const res = await apiRequest("POST", `/api/research/export/${format}`, { code, rawText });
  const blob = await res.blob();
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileNameFrom(res, `apc_research_${code}.${format}`);
  link.click();
  URL.revokeObjectURL(url);
}

export default function CodeResearch() {
  const [state, dispatch] = useReducer(workflowReducer, crypto.randomUUID(), createInitialState);
  const [topicDraft, setTopicDraft] = useState("");
  const [pickedCode, setPickedCode] = useState("");
  const [researchModel, setResearchModel] = useState("");
  const [discoveryModel, setDiscoveryModel] = useState("");

  const { data: catalog } = useModels();
  const { data: auditWindow } = useQuery<AuditWindow>({ queryKey: ["/api/audit-window"] });

  const model = researchModel || catalog?.defaults.RESEARCH_ANALYSIS || "";
  const codeModel = discoveryModel || catalog?.defaults.CODE_DISCOVERY || model;
  const chatModel = catalog?.defaults.SECTION_CHAT ?? model;

  const { data: ratingData } = useQuery<{ ratings: AccuracyFeedback[] }>({
    queryKey: ["/api/research/accuracy", { sessionId: state.sessionId, code: state.selectedCode ?? "" }],
    enabled: state.step === "Results" && state.selectedCode !== null,
  });
  const ratings = ratingData?.ratings ?? [];

  const discoverMutation = useMutation({
    mutationFn: (topic: string) =>
      apiJson<{ candidates: CandidateCode[]; rawText: string }>("POST", "/api/research/codes", {
        topic,
        model: codeModel,
      }),
    onSuccess: ({ candidates, rawText }, topic) => {
      setPickedCode(candidates[0]?.code ?? "");
      dispatch({ type: "CODES_DISCOVERED", topic, candidates, rawText });
    },
    onError: (error) => dispatch({ type: "FAILED", error: error.message }),
  });

  const researchMutation = useMutation({
    mutationFn: () =>
      apiJson<{ result: ResearchResult; parsed: ParsedResearch }>("POST", "/api/research/run", {
        code: state.selectedCode,
        context: state.context,
        topic: state.topic,
        model,
      }),
    onSuccess: ({ result, parsed }) => dispatch({ type: "RESEARCH_COMPLETED", result, parsed }),
    onError: (error) => dispatch({ type: "FAILED", error: error.message }),
  });

  const exportMutation = useMutation({
    mutationFn: (format: ExportFormat) => {
      if (!state.result) throw new Error("No research result to export");
      return downloadExport(format, state.result.cptCode, state.result.rawText);
    },
    onError: (error) => dispatch({ type: "FAILED", error: error.message }),
  });

  const handleDiscover = (e: FormEvent) => {
    e.preventDefault();
    const topic = topicDraft.trim();
    if (!topic) {
      dispatch({ type: "FAILED", error: "Please enter a medical topic to generate CPT codes" });
      return;
    }
    discoverMutation.mutate(topic);
  };

  const handleReset = () => {
    setTopicDraft("");
    setPickedCode("");
    discoverMutation.reset();
    researchMutation.reset();
    dispatch({ type: "RESET", sessionId: crypto.randomUUID() });
  };

  return (
    <div className="container mx-auto max-w-5xl px-6 py-8 space-y-6">
      <div className="flex items-center justify-between">
        <h2 className="text-2xl font-semibold">CPT Code Research</h2>
        {auditWindow && (
          <span className="text-sm text-muted-foreground" data-testid="text-audit-window">
            Audit window: {auditWindow.start} to {auditWindow.end}
          </span>
        )}
      </div>

      {state.error && (
        <p className="rounded-md border border-destructive/50 px-4 py-3 text-sm text-destructive" data-testid="text-error">
          {state.error}
        </p>
      )}

      {state.step === "TopicInput" && (
        <Card>
          <CardHeader>
            <CardTitle>1. Enter a medical topic</CardTitle>
          </CardHeader>
          <CardContent className="space-y-4">
            <div className="space-y-1">
              <Label htmlFor="discovery-model">Model</Label>
              <ModelSelect
                id="discovery-model"
                value={codeModel}
                options={catalog?.research ?? []}
                onChange={setDiscoveryModel}
                disabled={discoverMutation.isPending}
                className="block"
              />
            </div>
            <form onSubmit={handleDiscover} className="flex gap-2">
              <Input
                value={topicDraft}
                onChange={(e) => setTopicDraft(e.target.value)}
                placeholder="e.g. knee arthroscopy"
                disabled={discoverMutation.isPending}
                data-testid="input-topic"
              />
              <Button type="submit" disabled={discoverMutation.isPending} data-testid="button-discover">
                <Search className="h-4 w-4" />
                {discoverMutation.isPending ? "Searching..." : "Find CPT Codes"}
              </Button>
            </form>
          </CardContent>
        </Card>
      )}

      {state.step === "CodeSelection" && (
        <Card>
          <CardHeader>
            <CardTitle>2. Select a CPT code for "{state.topic}"</CardTitle>
          </CardHeader>
          <CardContent className="space-y-3">
            {state.candidates.map((candidate) => (
              <label
                key={candidate.code}
                className={cn(
                  "flex cursor-pointer items-start gap-3 rounded-md border border-border p-3",
                  pickedCode === candidate.code && "border-primary",
                )}
              >
                <input
                  type="radio"
                  name="cpt-code"
                  value={candidate.code}
                  checked={pickedCode === candidate.code}
                  onChange={() => setPickedCode(candidate.code)}
                  className="mt-1"
                />
                <span>
                  <span className="font-mono font-semibold">{candidate.code}</span>
                  <span className="block text-sm text-muted-foreground">{candidate.description}</span>
                </span>
              </label>
            ))}
            <div className="flex gap-2">
              <Button variant="outline" onClick={() => dispatch({ type: "BACK" })}>
                <ArrowLeft className="h-4 w-4" />
                Back
              </Button>
              <Button
                disabled={!pickedCode}
                onClick={() => dispatch({ type: "CODE_SELECTED", code: pickedCode })}
                data-testid="button-select-code"
              >
                Continue
              </Button>
            </div>
          </CardContent>
        </Card>
      )}

      {state.step === "ResearchParams" && (
        <Card>
          <CardHeader>
            <CardTitle>3. Research parameters for {state.selectedCode}</CardTitle>
          </CardHeader>
          <CardContent className="space-y-4">
            <div className="space-y-1">
              <Label htmlFor="context">Context</Label>
              <Textarea
                id="context"
                value={state.context}
                onChange={(e) => dispatch({ type: "CONTEXT_CHANGED", context: e.target.value })}
                rows={3}
                data-testid="input-context"
              />
            </div>
            <div className="space-y-1">
              <Label htmlFor="research-model">Model</Label>
              <ModelSelect
                id="research-model"
                value={model}
                options={catalog?.research ?? []}
                onChange={setResearchModel}
                className="block"
              />
            </div>
            <div className="flex gap-2">
              <Button variant="outline" onClick={() => dispatch({ type: "BACK" })} disabled={researchMutation.isPending}>
                <ArrowLeft className="h-4 w-4" />
                Back
              </Button>
              <Button
                onClick={() => researchMutation.mutate()}
                disabled={researchMutation.isPending || !model}
                data-testid="button-run-research"
              >
                {researchMutation.isPending ? "Researching..." : "Run Research"}
              </Button>
            </div>
          </CardContent>
        </Card>
      )}

      {state.step === "Results" && state.result && state.parsed && (
        <div className="space-y-4">
          <div className="flex flex-wrap items-center justify-between gap-2">
            <div>
              <h3 className="text-xl font-semibold">Results for {state.result.cptCode}</h3>
              <p className="text-xs text-muted-foreground">
                {state.result.model} · {state.result.timestamp}
              </p>
            </div>
            <div className="flex gap-2">
              <Button variant="outline" onClick={() => exportMutation.mutate("xlsx")} disabled={exportMutation.isPending}>
                <FileSpreadsheet className="h-4 w-4" />
                Excel
              </Button>
              <Button variant="outline" onClick={() => exportMutation.mutate("pdf")} disabled={exportMutation.isPending}>
                <FileText className="h-4 w-4" />
                PDF
              </Button>
              <Button variant="secondary" onClick={handleReset} data-testid="button-reset">
                <RotateCcw className="h-4 w-4" />
                New Research
              </Button>
            </div>
          </div>

          {state.parsed.sections.map((section) => (
            <SectionCard
              key={`${state.sessionId}-${section.id}`}
              sessionId={state.sessionId}
              code={state.result?.cptCode ?? ""}
              sectionId={section.id}
              title={`Section ${section.number}: ${section.title}`}
              content={section.content}
              generated={section.generated}
              chatModel={chatModel}
              rating={ratings.find((r) => r.sectionId === section.id)}
            />
          ))}

          <SectionCard
            key={`${state.sessionId}-final_assessment`}
            sessionId={state.sessionId}
            code={state.result.cptCode}
            sectionId="final_assessment"
            title="Final Assessment"
            content={state.parsed.finalAssessment}
            generated={state.parsed.finalAssessmentGenerated}
            chatModel={chatModel}
            rating={ratings.find((r) => r.sectionId === "final_assessment")}
          />

          <NotesPanel key={`${state.sessionId}-notes`} sessionId={state.sessionId} code={state.result.cptCode} />
        </div>
      )}
    </div>
  );
}
