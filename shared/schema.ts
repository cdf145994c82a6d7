import { integer, sqliteTable, text, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Each table lives in its own SQLite file; see server/db.ts for the DDL.

export const interactions = sqliteTable("interactions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: text("session_id").notNull(),
  topic: text("topic").notNull(),
  persona: text("persona").notNull(),
  question: text("question").notNull(),
  response: text("response").notNull(),
  timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
  sessionIdx: index("interactions_session_idx").on(table.sessionId),
}));

export const notes = sqliteTable("notes", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: text("session_id").notNull(),
  code: text("code").notNull(),
  content: text("content").notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
  keyIdx: uniqueIndex("notes_session_code_idx").on(table.sessionId, table.code),
}));

export const sectionChats = sqliteTable("chat_history", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: text("session_id").notNull(),
  code: text("code").notNull(),
  sectionId: text("section_id").notNull(),
  role: text("role", { enum: ["user", "assistant"] }).notNull(),
  content: text("content").notNull(),
  timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
  keyIdx: index("chat_history_key_idx").on(table.sessionId, table.code, table.sectionId),
}));

export const ACCURACY_RATINGS = ["accurate", "partially_accurate", "inaccurate"] as const;
export type AccuracyRating = typeof ACCURACY_RATINGS[number];

export const ACCURACY_RATING_LABELS: Record<AccuracyRating, string> = {
  accurate: "Accurate",
  partially_accurate: "Partially Accurate",
  inaccurate: "Inaccurate",
};

export const accuracyFeedback = sqliteTable("accuracy_feedback", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sessionId: text("session_id").notNull(),
  code: text("code").notNull(),
  sectionId: text("section_id").notNull(),
  rating: text("rating", { enum: ACCURACY_RATINGS }).notNull(),
  reason: text("reason"),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
  keyIdx: uniqueIndex("accuracy_feedback_key_idx").on(table.sessionId, table.code, table.sectionId),
}));

export const RESEARCH_TYPES = ["APC Research", "Chat Research"] as const;

export const userFeedback = sqliteTable("feedback", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  modelUsed: text("model_used").notNull(),
  researchType: text("research_type").notNull(),
  topic: text("topic").notNull(),
  uiRating: integer("ui_rating").notNull(),
  contentRating: integer("content_rating").notNull(),
  feedbackText: text("feedback_text").notNull(),
  submittedAt: integer("submitted_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
});

export const insertInteractionSchema = createInsertSchema(interactions).omit({
  id: true,
  timestamp: true,
});

export const insertSectionChatSchema = createInsertSchema(sectionChats).omit({
  id: true,
  timestamp: true,
});

// 0 means "not rated"
export const insertUserFeedbackSchema = z.object({
  modelUsed: z.string().default(""),
  researchType: z.string().default(""),
  topic: z.string().default(""),
  uiRating: z.number().int().min(0).max(3).default(0),
  contentRating: z.number().int().min(0).max(3).default(0),
  feedbackText: z.string().default(""),
}).refine(
  (data) =>
    Boolean(data.modelUsed || data.researchType || data.topic || data.feedbackText) ||
    data.uiRating > 0 ||
    data.contentRating > 0,
  { message: "Please provide at least some feedback before submitting" },
);

export type Interaction = typeof interactions.$inferSelect;
export type InsertInteraction = z.infer<typeof insertInteractionSchema>;

export type Note = typeof notes.$inferSelect;

export type SectionChatTurn = typeof sectionChats.$inferSelect;
export type InsertSectionChatTurn = z.infer<typeof insertSectionChatSchema>;

export type AccuracyFeedback = typeof accuracyFeedback.$inferSelect;

export type UserFeedback = typeof userFeedback.$inferSelect;
export type InsertUserFeedback = z.infer<typeof insertUserFeedbackSchema>;

export type ChatRole = "system" | "user" | "assistant";

export type ConversationTurn = {
  role: ChatRole;
  content: string;
};

export type SessionSummary = {
  sessionId: string;
  topic: string;
  persona: string;
  lastActivity: Date;
};

export type CandidateCode = {
  code: string;
  description: string;
};

export type ResearchSectionId =
  | "section_1"
  | "section_2"
  | "section_3"
  | "section_4"
  | "section_5"
  | "section_6"
  | "final_assessment";

export type ResearchSection = {
  number: 1 | 2 | 3 | 4 | 5 | 6;
  id: ResearchSectionId;
  title: string;
  content: string;
  /** False when the model output had no block for this section. */
  generated: boolean;
};

export type ParsedResearch = {
  sections: ResearchSection[];
  finalAssessment: string;
  finalAssessmentGenerated: boolean;
};

export type ResearchResult = {
  cptCode: string;
  context: string;
  model: string;
  rawText: string;
  timestamp: string;
  topic: string;
};

export type AuditWindow = {
  start: string;
  end: string;
};

// ─── API request schemas ─────────────────────────────────────────────────────

export const sectionIdSchema = z.enum([
  "section_1",
  "section_2",
  "section_3",
  "section_4",
  "section_5",
  "section_6",
  "final_assessment",
]);

/** Topic and persona a chat session starts with when none is given. */
export const SESSION_DEFAULTS = {
  TOPIC: "New Research",
  PERSONA: "Analysts",
} as const;

export const apiSchemas = {
  createSession: z.object({
    sessionId: z.string().min(1).optional(),
    topic: z.string().min(1).default(SESSION_DEFAULTS.TOPIC),
    persona: z.string().min(1).default(SESSION_DEFAULTS.PERSONA),
  }),
  renameSession: z.object({
    topic: z.string().trim().min(1, "Topic is required"),
  }),
  chatMessage: z.object({
    message: z.string().trim().min(1, "Message is required"),
    topic: z.string().min(1).default(SESSION_DEFAULTS.TOPIC),
    persona: z.string().min(1).default(SESSION_DEFAULTS.PERSONA),
    model: z.string().min(1),
  }),
  discoverCodes: z.object({
    topic: z.string().trim().min(1, "Please enter a medical topic to generate CPT codes"),
    model: z.string().min(1),
  }),
  runResearch: z.object({
    code: z.string().trim().min(1, "CPT code is required"),
    context: z.string().default(""),
    topic: z.string().default(""),
    model: z.string().min(1),
  }),
  sectionKey: z.object({
    sessionId: z.string().min(1),
    code: z.string().min(1),
  }),
  sectionChat: z.object({
    sessionId: z.string().min(1),
    code: z.string().min(1),
    sectionTitle: z.string().min(1),
    sectionContent: z.string(),
    question: z.string().trim().min(1, "Question is required"),
    model: z.string().min(1),
  }),
  saveNote: z.object({
    sessionId: z.string().min(1),
    code: z.string().min(1),
    content: z.string(),
  }),
  saveAccuracy: z.object({
    sessionId: z.string().min(1),
    code: z.string().min(1),
    sectionId: sectionIdSchema,
    rating: z.enum(ACCURACY_RATINGS),
    reason: z.string().trim().optional(),
  }),
  exportResult: z.object({
    code: z.string().min(1),
    rawText: z.string(),
  }),
};

export type RunResearchInput = z.infer<typeof apiSchemas.runResearch>;
export type SectionChatInput = z.infer<typeof apiSchemas.sectionChat>;
export type SaveAccuracyInput = z.infer<typeof apiSchemas.saveAccuracy>;
