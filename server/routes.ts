import type { Express } from "express";
import { createServer, type Server } from "http";
import { randomUUID } from "crypto";
import type { z } from "zod";
import {
  apiSchemas,
  insertUserFeedbackSchema,
  type InsertUserFeedback,
  type RunResearchInput,
  type SaveAccuracyInput,
  type SectionChatInput,
} from "@shared/schema";
import { storage, type IStorage } from "./storage";
import { validate, commonSchemas } from "./middleware/validation";
import { handleRouteError, NotFoundError } from "./utils/errorHandler";
import { ResearchService } from "./research/researchService";
import { ChatService, type ChatMessageInput } from "./services/chatService";
import { computeAuditWindow } from "./research/auditWindow";
import { parseStructuredSections, renderSectionsAsText } from "./research/responseParser";
import { toSpreadsheet, exportFileName, XLSX_MIME_TYPE } from "./services/spreadsheetExport";
import { toDocument, PDF_MIME_TYPE } from "./services/documentExport";
import { CHAT_MODELS, MODEL_ASSIGNMENTS, RESEARCH_MODELS, listModelOptions } from "./config/models";
import { PERSONAS } from "./config/prompts";

export function registerRoutes(app: Express, store: IStorage = storage): Server {
  const research = new ResearchService(store);
  const chat = new ChatService(store);

  // ─── Reference data ────────────────────────────────────────────────────────

  app.get("/api/models", (_req, res) => {
    res.json({
      research: listModelOptions(RESEARCH_MODELS),
      chat: listModelOptions(CHAT_MODELS),
      defaults: MODEL_ASSIGNMENTS,
    });
  });

  app.get("/api/personas", (_req, res) => {
    res.json({ personas: PERSONAS });
  });

  app.get("/api/audit-window", (_req, res) => {
    res.json(computeAuditWindow());
  });

  // ─── Chat research sessions ────────────────────────────────────────────────

  app.get("/api/sessions", async (_req, res) => {
    try {
      res.json(await store.getSessions());
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.post("/api/sessions", validate({ body: apiSchemas.createSession }), async (req, res) => {
    try {
      const { sessionId, topic, persona }: z.infer<typeof apiSchemas.createSession> = req.body;
      const interaction = await store.createSession(sessionId ?? randomUUID(), topic, persona);
      res.status(201).json({
        sessionId: interaction.sessionId,
        topic: interaction.topic,
        persona: interaction.persona,
      });
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.get("/api/sessions/:id/history", validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      res.json({ messages: await store.getSessionHistory(req.params.id) });
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.patch(
    "/api/sessions/:id",
    validate({ params: commonSchemas.id, body: apiSchemas.renameSession }),
    async (req, res) => {
      try {
        const { topic }: z.infer<typeof apiSchemas.renameSession> = req.body;
        const updated = await store.renameSession(req.params.id, topic);
        if (updated === 0) {
          throw new NotFoundError("Session");
        }
        res.json({ sessionId: req.params.id, topic, updated });
      } catch (error) {
        handleRouteError(res, error, "Sessions");
      }
    },
  );

  app.delete("/api/sessions/:id", validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const deleted = await store.deleteSession(req.params.id);
      if (deleted === 0) {
        throw new NotFoundError("Session");
      }
      res.json({ deleted });
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.post(
    "/api/sessions/:id/messages",
    validate({ params: commonSchemas.id, body: apiSchemas.chatMessage }),
    async (req, res) => {
      try {
        const input: ChatMessageInput = req.body;
        res.json(await chat.sendMessage(req.params.id, input));
      } catch (error) {
        handleRouteError(res, error, "Chat");
      }
    },
  );

  // ─── Code research workflow ────────────────────────────────────────────────

  app.post("/api/research/codes", validate({ body: apiSchemas.discoverCodes }), async (req, res) => {
    try {
      const { topic, model }: z.infer<typeof apiSchemas.discoverCodes> = req.body;
      res.json(await research.discoverCodes(topic, model));
    } catch (error) {
      handleRouteError(res, error, "Research");
    }
  });

  app.post("/api/research/run", validate({ body: apiSchemas.runResearch }), async (req, res) => {
    try {
      const input: RunResearchInput = req.body;
      res.json(await research.runResearch(input));
    } catch (error) {
      handleRouteError(res, error, "Research");
    }
  });

  app.get(
    "/api/research/sections/:sectionId/chat",
    validate({ params: commonSchemas.sectionId, query: apiSchemas.sectionKey }),
    async (req, res) => {
      try {
        const { sessionId, code } = req.query;
        res.json({ messages: await store.getSectionChat(sessionId, code, req.params.sectionId) });
      } catch (error) {
        handleRouteError(res, error, "Research");
      }
    },
  );

  app.post(
    "/api/research/sections/:sectionId/chat",
    validate({ params: commonSchemas.sectionId, body: apiSchemas.sectionChat }),
    async (req, res) => {
      try {
        const input: SectionChatInput = req.body;
        res.json(await research.askSection(req.params.sectionId, input));
      } catch (error) {
        handleRouteError(res, error, "Research");
      }
    },
  );

  app.get("/api/research/notes", validate({ query: apiSchemas.sectionKey }), async (req, res) => {
    try {
      const { sessionId, code } = req.query;
      const note = await store.getNote(sessionId, code);
      res.json({ note: note ?? null });
    } catch (error) {
      handleRouteError(res, error, "Notes");
    }
  });

  app.put("/api/research/notes", validate({ body: apiSchemas.saveNote }), async (req, res) => {
    try {
      const { sessionId, code, content }: z.infer<typeof apiSchemas.saveNote> = req.body;
      res.json({ note: await store.saveNote(sessionId, code, content) });
    } catch (error) {
      handleRouteError(res, error, "Notes");
    }
  });

  app.get("/api/research/accuracy", validate({ query: apiSchemas.sectionKey }), async (req, res) => {
    try {
      const { sessionId, code } = req.query;
      res.json({ ratings: await store.getAccuracyFeedback(sessionId, code) });
    } catch (error) {
      handleRouteError(res, error, "Accuracy");
    }
  });

  app.put("/api/research/accuracy", validate({ body: apiSchemas.saveAccuracy }), async (req, res) => {
    try {
      const input: SaveAccuracyInput = req.body;
      const rating = await store.saveAccuracyFeedback({ ...input, reason: input.reason || null });
      res.json({ rating });
    } catch (error) {
      handleRouteError(res, error, "Accuracy");
    }
  });

  app.post(
    "/api/research/export/:format",
    validate({ params: commonSchemas.exportFormat, body: apiSchemas.exportResult }),
    async (req, res) => {
      try {
        const { format } = req.params;
        const { code, rawText }: z.infer<typeof apiSchemas.exportResult> = req.body;
        const resultText = renderSectionsAsText(parseStructuredSections(rawText));
        const now = new Date();

        const [body, mimeType]: [Buffer, string] = format === "xlsx"
          ? [await toSpreadsheet(resultText, code, now), XLSX_MIME_TYPE]
          : [toDocument(resultText, code, now), PDF_MIME_TYPE];

        res.setHeader("Content-Type", mimeType);
        res.setHeader("Content-Disposition", `attachment; filename="${exportFileName(code, format, now)}"`);
        res.send(body);
      } catch (error) {
        handleRouteError(res, error, "Export");
      }
    },
  );

  // ─── Product feedback ──────────────────────────────────────────────────────

  app.get("/api/feedback", async (_req, res) => {
    try {
      res.json({ feedback: await store.getUserFeedback() });
    } catch (error) {
      handleRouteError(res, error, "Feedback");
    }
  });

  app.post("/api/feedback", validate({ body: insertUserFeedbackSchema }), async (req, res) => {
    try {
      const input: InsertUserFeedback = req.body;
      res.status(201).json({ feedback: await store.saveUserFeedback(input) });
    } catch (error) {
      handleRouteError(res, error, "Feedback");
    }
  });

  return createServer(app);
}
