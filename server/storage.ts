import {
  type Interaction,
  type InsertInteraction,
  type Note,
  type SectionChatTurn,
  type InsertSectionChatTurn,
  type AccuracyFeedback,
  type AccuracyRating,
  type UserFeedback,
  type InsertUserFeedback,
  type ConversationTurn,
  type SessionSummary,
  interactions as interactionsTable,
  notes as notesTable,
  sectionChats as sectionChatsTable,
  accuracyFeedback as accuracyFeedbackTable,
  userFeedback as userFeedbackTable,
} from "@shared/schema";
import { and, asc, desc, eq, sql } from "drizzle-orm";
import { createStores, type StoreSet } from "./db";
import { STORE_LIMITS } from "./config/constants";
import { CHAT_HISTORY_SYSTEM_PROMPT } from "./config/prompts/system";

export type SaveAccuracyFeedback = {
  sessionId: string;
  code: string;
  sectionId: string;
  rating: AccuracyRating;
  reason?: string | null;
};

export interface IStorage {
  // Interactions (chat research sessions)
  createSession(sessionId: string, topic: string, persona: string): Promise<Interaction>;
  saveInteraction(interaction: InsertInteraction): Promise<Interaction>;
  getSessions(): Promise<SessionSummary[]>;
  getSession(sessionId: string): Promise<SessionSummary | undefined>;
  getSessionHistory(sessionId: string): Promise<ConversationTurn[]>;
  renameSession(sessionId: string, topic: string): Promise<number>;
  deleteSession(sessionId: string): Promise<number>;

  // Notes
  saveNote(sessionId: string, code: string, content: string): Promise<Note>;
  getNote(sessionId: string, code: string): Promise<Note | undefined>;

  // Per-section chat
  appendSectionChat(turn: InsertSectionChatTurn): Promise<SectionChatTurn>;
  getSectionChat(sessionId: string, code: string, sectionId: string): Promise<SectionChatTurn[]>;

  // Accuracy ratings
  saveAccuracyFeedback(feedback: SaveAccuracyFeedback): Promise<AccuracyFeedback>;
  getAccuracyFeedback(sessionId: string, code: string): Promise<AccuracyFeedback[]>;

  // General product feedback
  saveUserFeedback(feedback: InsertUserFeedback): Promise<UserFeedback>;
  getUserFeedback(): Promise<UserFeedback[]>;
}

/**
 * A new session is recorded as an interaction with an empty question and
 * response, since sessions have no header table.
 */
function isSessionMarker(row: Pick<Interaction, "question" | "response">): boolean {
  return row.question === "" && row.response === "";
}

function toConversation(rows: Interaction[]): ConversationTurn[] {
  const messages: ConversationTurn[] = [{ role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT }];
  for (const row of rows) {
    if (isSessionMarker(row)) continue;
    messages.push({ role: "user", content: row.question });
    messages.push({ role: "assistant", content: row.response });
  }
  return messages;
}

export class MemStorage implements IStorage {
  private interactions: Interaction[] = [];
  private notes: Note[] = [];
  private sectionChats: SectionChatTurn[] = [];
  private accuracy: AccuracyFeedback[] = [];
  private feedback: UserFeedback[] = [];
  private nextId = 1;

  async createSession(sessionId: string, topic: string, persona: string): Promise<Interaction> {
    return this.saveInteraction({ sessionId, topic, persona, question: "", response: "" });
  }

  async saveInteraction(insert: InsertInteraction): Promise<Interaction> {
    const row: Interaction = { ...insert, id: this.nextId++, timestamp: new Date() };
    this.interactions.push(row);
    return row;
  }

  async getSessions(): Promise<SessionSummary[]> {
    const latest = new Map<string, Interaction>();
    for (const row of this.interactions) {
      const current = latest.get(row.sessionId);
      if (!current || row.timestamp.getTime() >= current.timestamp.getTime()) {
        latest.set(row.sessionId, row);
      }
    }
    return Array.from(latest.values())
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.id - a.id)
      .slice(0, STORE_LIMITS.MAX_SESSIONS)
      .map(row => ({
        sessionId: row.sessionId,
        topic: row.topic,
        persona: row.persona,
        lastActivity: row.timestamp,
      }));
  }

  async getSession(sessionId: string): Promise<SessionSummary | undefined> {
    let latest: Interaction | undefined;
    for (const row of this.interactions) {
      if (row.sessionId === sessionId && (!latest || row.timestamp.getTime() >= latest.timestamp.getTime())) {
        latest = row;
      }
    }
    if (!latest) return undefined;
    return { sessionId, topic: latest.topic, persona: latest.persona, lastActivity: latest.timestamp };
  }

  async getSessionHistory(sessionId: string): Promise<ConversationTurn[]> {
    return toConversation(this.interactions.filter(row => row.sessionId === sessionId));
  }

  async renameSession(sessionId: string, topic: string): Promise<number> {
    let changed = 0;
    for (const row of this.interactions) {
      if (row.sessionId === sessionId) {
        row.topic = topic;
        changed++;
      }
    }
    return changed;
  }

  async deleteSession(sessionId: string): Promise<number> {
    const before = this.interactions.length;
    this.interactions = this.interactions.filter(row => row.sessionId !== sessionId);
    return before - this.interactions.length;
  }

  async saveNote(sessionId: string, code: string, content: string): Promise<Note> {
    const existing = this.notes.find(n => n.sessionId === sessionId && n.code === code);
    if (existing) {
      existing.content = content;
      existing.updatedAt = new Date();
      return existing;
    }
    const note: Note = { id: this.nextId++, sessionId, code, content, updatedAt: new Date() };
    this.notes.push(note);
    return note;
  }

  async getNote(sessionId: string, code: string): Promise<Note | undefined> {
    return this.notes.find(n => n.sessionId === sessionId && n.code === code);
  }

  async appendSectionChat(turn: InsertSectionChatTurn): Promise<SectionChatTurn> {
    const row: SectionChatTurn = { ...turn, id: this.nextId++, timestamp: new Date() };
    this.sectionChats.push(row);
    return row;
  }

  async getSectionChat(sessionId: string, code: string, sectionId: string): Promise<SectionChatTurn[]> {
    return this.sectionChats.filter(
      t => t.sessionId === sessionId && t.code === code && t.sectionId === sectionId,
    );
  }

  async saveAccuracyFeedback(feedback: SaveAccuracyFeedback): Promise<AccuracyFeedback> {
    const existing = this.accuracy.find(
      f => f.sessionId === feedback.sessionId && f.code === feedback.code && f.sectionId === feedback.sectionId,
    );
    if (existing) {
      existing.rating = feedback.rating;
      existing.reason = feedback.reason ?? null;
      existing.updatedAt = new Date();
      return existing;
    }
    const row: AccuracyFeedback = {
      id: this.nextId++,
      sessionId: feedback.sessionId,
      code: feedback.code,
      sectionId: feedback.sectionId,
      rating: feedback.rating,
      reason: feedback.reason ?? null,
      updatedAt: new Date(),
    };
    this.accuracy.push(row);
    return row;
  }

  async getAccuracyFeedback(sessionId: string, code: string): Promise<AccuracyFeedback[]> {
    return this.accuracy
      .filter(f => f.sessionId === sessionId && f.code === code)
      .sort((a, b) => a.sectionId.localeCompare(b.sectionId));
  }

  async saveUserFeedback(feedback: InsertUserFeedback): Promise<UserFeedback> {
    const row: UserFeedback = { ...feedback, id: this.nextId++, submittedAt: new Date() };
    this.feedback.push(row);
    return row;
  }

  async getUserFeedback(): Promise<UserFeedback[]> {
    return [...this.feedback].reverse();
  }
}

/**
 * SQLite-backed storage. Each concern is a separate store file opened on
 * first use; see server/db.ts.
 */
export class DbStorage implements IStorage {
  private stores: StoreSet;

  constructor(stores: StoreSet = createStores()) {
    this.stores = stores;
  }

  // Interactions
  async createSession(sessionId: string, topic: string, persona: string): Promise<Interaction> {
    return this.saveInteraction({ sessionId, topic, persona, question: "", response: "" });
  }

  async saveInteraction(insert: InsertInteraction): Promise<Interaction> {
    return this.stores.INTERACTIONS.db
      .insert(interactionsTable)
      .values(insert)
      .returning()
      .get();
  }

  async getSessions(): Promise<SessionSummary[]> {
    // SQLite returns the bare columns of the row holding max(timestamp).
    const lastActivity = sql<number>`max(${interactionsTable.timestamp})`;
    const rows = this.stores.INTERACTIONS.db
      .select({
        sessionId: interactionsTable.sessionId,
        topic: interactionsTable.topic,
        persona: interactionsTable.persona,
        lastActivity: lastActivity.mapWith(Number),
      })
      .from(interactionsTable)
      .groupBy(interactionsTable.sessionId)
      .orderBy(desc(lastActivity), desc(sql`max(${interactionsTable.id})`))
      .limit(STORE_LIMITS.MAX_SESSIONS)
      .all();

    return rows.map(row => ({ ...row, lastActivity: new Date(row.lastActivity) }));
  }

  async getSession(sessionId: string): Promise<SessionSummary | undefined> {
    const row = this.stores.INTERACTIONS.db
      .select()
      .from(interactionsTable)
      .where(eq(interactionsTable.sessionId, sessionId))
      .orderBy(desc(interactionsTable.timestamp), desc(interactionsTable.id))
      .limit(1)
      .get();
    if (!row) return undefined;
    return { sessionId, topic: row.topic, persona: row.persona, lastActivity: row.timestamp };
  }

  async getSessionHistory(sessionId: string): Promise<ConversationTurn[]> {
    const rows = this.stores.INTERACTIONS.db
      .select()
      .from(interactionsTable)
      .where(eq(interactionsTable.sessionId, sessionId))
      .orderBy(asc(interactionsTable.timestamp), asc(interactionsTable.id))
      .all();
    return toConversation(rows);
  }

  async renameSession(sessionId: string, topic: string): Promise<number> {
    const result = this.stores.INTERACTIONS.db
      .update(interactionsTable)
      .set({ topic })
      .where(eq(interactionsTable.sessionId, sessionId))
      .run();
    return result.changes;
  }

  async deleteSession(sessionId: string): Promise<number> {
    const result = this.stores.INTERACTIONS.db
      .delete(interactionsTable)
      .where(eq(interactionsTable.sessionId, sessionId))
      .run();
    return result.changes;
  }

  // Notes
  async saveNote(sessionId: string, code: string, content: string): Promise<Note> {
    const updatedAt = new Date();
    return this.stores.NOTES.db
      .insert(notesTable)
      .values({ sessionId, code, content, updatedAt })
      .onConflictDoUpdate({
        target: [notesTable.sessionId, notesTable.code],
        set: { content, updatedAt },
      })
      .returning()
      .get();
  }

  async getNote(sessionId: string, code: string): Promise<Note | undefined> {
    return this.stores.NOTES.db
      .select()
      .from(notesTable)
      .where(and(eq(notesTable.sessionId, sessionId), eq(notesTable.code, code)))
      .get();
  }

  // Per-section chat
  async appendSectionChat(turn: InsertSectionChatTurn): Promise<SectionChatTurn> {
    return this.stores.CHAT_HISTORY.db
      .insert(sectionChatsTable)
      .values(turn)
      .returning()
      .get();
  }

  async getSectionChat(sessionId: string, code: string, sectionId: string): Promise<SectionChatTurn[]> {
    return this.stores.CHAT_HISTORY.db
      .select()
      .from(sectionChatsTable)
      .where(and(
        eq(sectionChatsTable.sessionId, sessionId),
        eq(sectionChatsTable.code, code),
        eq(sectionChatsTable.sectionId, sectionId),
      ))
      .orderBy(asc(sectionChatsTable.timestamp), asc(sectionChatsTable.id))
      .all();
  }

  // Accuracy ratings
  async saveAccuracyFeedback(feedback: SaveAccuracyFeedback): Promise<AccuracyFeedback> {
    const updatedAt = new Date();
    const reason = feedback.reason ?? null;
    return this.stores.ACCURACY_FEEDBACK.db
      .insert(accuracyFeedbackTable)
      .values({
        sessionId: feedback.sessionId,
        code: feedback.code,
        sectionId: feedback.sectionId,
        rating: feedback.rating,
        reason,
        updatedAt,
      })
      .onConflictDoUpdate({
        target: [accuracyFeedbackTable.sessionId, accuracyFeedbackTable.code, accuracyFeedbackTable.sectionId],
        set: { rating: feedback.rating, reason, updatedAt },
      })
      .returning()
      .get();
  }

  async getAccuracyFeedback(sessionId: string, code: string): Promise<AccuracyFeedback[]> {
    return this.stores.ACCURACY_FEEDBACK.db
      .select()
      .from(accuracyFeedbackTable)
      .where(and(eq(accuracyFeedbackTable.sessionId, sessionId), eq(accuracyFeedbackTable.code, code)))
      .orderBy(asc(accuracyFeedbackTable.sectionId))
      .all();
  }

  // General product feedback
  async saveUserFeedback(feedback: InsertUserFeedback): Promise<UserFeedback> {
    return this.stores.USER_FEEDBACK.db
      .insert(userFeedbackTable)
      .values(feedback)
      .returning()
      .get();
  }

  async getUserFeedback(): Promise<UserFeedback[]> {
    return this.stores.USER_FEEDBACK.db
      .select()
      .from(userFeedbackTable)
      .orderBy(desc(userFeedbackTable.submittedAt), desc(userFeedbackTable.id))
      .all();
  }
}

export const storage: IStorage = new DbStorage();
