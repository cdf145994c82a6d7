import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { notes } from "@shared/schema";
import { DbStorage } from "../storage";
import { createStores, IN_MEMORY, type StoreSet } from "../db";
import { CHAT_HISTORY_SYSTEM_PROMPT } from "../config/prompts";

describe("DbStorage", () => {
  let stores: StoreSet;
  let storage: DbStorage;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    stores = createStores(IN_MEMORY);
    storage = new DbStorage(stores);
  });

  afterEach(() => {
    for (const store of Object.values(stores)) {
      store.close();
    }
    vi.restoreAllMocks();
  });

  describe("stores", () => {
    it("opens nothing until first use", async () => {
      expect(stores.NOTES.isOpen).toBe(false);
      await storage.getNote("s1", "29881");
      expect(stores.NOTES.isOpen).toBe(true);
      expect(stores.INTERACTIONS.isOpen).toBe(false);
    });
  });

  describe("interactions", () => {
    it("rebuilds history after the fixed system turn, skipping the session marker", async () => {
      await storage.createSession("s1", "New Research", "Analysts");
      await storage.saveInteraction({ sessionId: "s1", topic: "New Research", persona: "Analysts", question: "Q1", response: "A1" });
      await storage.saveInteraction({ sessionId: "s1", topic: "New Research", persona: "Analysts", question: "Q2", response: "A2" });

      expect(await storage.getSessionHistory("s1")).toEqual([
        { role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT },
        { role: "user", content: "Q1" },
        { role: "assistant", content: "A1" },
        { role: "user", content: "Q2" },
        { role: "assistant", content: "A2" },
      ]);
    });

    it("returns only the system turn for an unknown session", async () => {
      expect(await storage.getSessionHistory("missing")).toEqual([
        { role: "system", content: CHAT_HISTORY_SYSTEM_PROMPT },
      ]);
    });

    it("renames every row of one session and leaves others alone", async () => {
      await storage.createSession("s1", "Old", "Analysts");
      await storage.saveInteraction({ sessionId: "s1", topic: "Old", persona: "Analysts", question: "Q", response: "A" });
      await storage.createSession("s2", "Other", "SMEs");

      expect(await storage.renameSession("s1", "Knee coding")).toBe(2);

      const sessions = await storage.getSessions();
      expect(sessions.find(s => s.sessionId === "s1")?.topic).toBe("Knee coding");
      expect(sessions.find(s => s.sessionId === "s2")?.topic).toBe("Other");
    });

    it("reads a session's current topic and persona", async () => {
      await storage.createSession("s1", "New Research", "CDAs");
      await storage.saveInteraction({ sessionId: "s1", topic: "New Research", persona: "CDAs", question: "Q", response: "A" });
      await storage.renameSession("s1", "Knee coding");

      expect(await storage.getSession("s1")).toMatchObject({ sessionId: "s1", topic: "Knee coding", persona: "CDAs" });
      expect(await storage.getSession("missing")).toBeUndefined();
    });

    it("lists sessions most recent first", async () => {
      await storage.createSession("a", "A", "Analysts");
      await storage.createSession("b", "B", "Analysts");
      await storage.saveInteraction({ sessionId: "a", topic: "A", persona: "Analysts", question: "Q", response: "R" });

      const sessions = await storage.getSessions();
      expect(sessions.map(s => s.sessionId)).toEqual(["a", "b"]);
      expect(sessions[0].lastActivity).toBeInstanceOf(Date);
    });

    it("caps the session list at 50", async () => {
      for (let i = 0; i < 55; i++) {
        await storage.createSession(`s${i}`, `Topic ${i}`, "Analysts");
      }
      const sessions = await storage.getSessions();
      expect(sessions).toHaveLength(50);
      expect(sessions[0].sessionId).toBe("s54");
    });

    it("deletes all rows of a session", async () => {
      await storage.createSession("s1", "T", "Analysts");
      await storage.saveInteraction({ sessionId: "s1", topic: "T", persona: "Analysts", question: "Q", response: "A" });

      expect(await storage.deleteSession("s1")).toBe(2);
      expect(await storage.getSessions()).toEqual([]);
    });
  });

  describe("notes", () => {
    it("keeps one row per key with the latest text", async () => {
      await storage.saveNote("s1", "29881", "first");
      await storage.saveNote("s1", "29881", "second");

      const rows = stores.NOTES.db.select({ content: notes.content }).from(notes).all();
      expect(rows).toEqual([{ content: "second" }]);
      expect((await storage.getNote("s1", "29881"))?.content).toBe("second");
    });

    it("keeps separate notes per code", async () => {
      await storage.saveNote("s1", "29881", "knee");
      await storage.saveNote("s1", "29877", "cartilage");

      expect((await storage.getNote("s1", "29881"))?.content).toBe("knee");
      expect((await storage.getNote("s1", "29877"))?.content).toBe("cartilage");
      expect(await storage.getNote("s2", "29881")).toBeUndefined();
    });
  });

  describe("section chat", () => {
    it("appends turns in order", async () => {
      const key = { sessionId: "s1", code: "29881", sectionId: "section_3" };
      await storage.appendSectionChat({ ...key, role: "user", content: "Why differ?" });
      await storage.appendSectionChat({ ...key, role: "assistant", content: "Different APCs." });
      await storage.appendSectionChat({ ...key, sectionId: "section_4", role: "user", content: "Other section" });

      const turns = await storage.getSectionChat("s1", "29881", "section_3");
      expect(turns.map(t => [t.role, t.content])).toEqual([
        ["user", "Why differ?"],
        ["assistant", "Different APCs."],
      ]);
    });
  });

  describe("accuracy feedback", () => {
    it("upserts by session, code and section", async () => {
      await storage.saveAccuracyFeedback({ sessionId: "s1", code: "29881", sectionId: "section_1", rating: "accurate" });
      await storage.saveAccuracyFeedback({
        sessionId: "s1",
        code: "29881",
        sectionId: "section_1",
        rating: "inaccurate",
        reason: "Wrong neighbor codes",
      });
      await storage.saveAccuracyFeedback({ sessionId: "s1", code: "29881", sectionId: "final_assessment", rating: "partially_accurate" });

      const ratings = await storage.getAccuracyFeedback("s1", "29881");
      expect(ratings.map(r => [r.sectionId, r.rating, r.reason])).toEqual([
        ["final_assessment", "partially_accurate", null],
        ["section_1", "inaccurate", "Wrong neighbor codes"],
      ]);
    });
  });

  describe("user feedback", () => {
    it("stores submissions newest first", async () => {
      const base = { modelUsed: "gpt-4.1", researchType: "APC Research", topic: "", uiRating: 0, contentRating: 0, feedbackText: "" };
      await storage.saveUserFeedback({ ...base, feedbackText: "first" });
      await storage.saveUserFeedback({ ...base, feedbackText: "second", uiRating: 3 });

      const rows = await storage.getUserFeedback();
      expect(rows.map(r => r.feedbackText)).toEqual(["second", "first"]);
      expect(rows[0].uiRating).toBe(3);
    });
  });
});
