// src/api/reading-api.ts
import { Router } from "express";
import type { ProgressEngine } from "../services/progressEngine";
import type { ReadingSessionService } from "../services/readingSession.service";
import { isObjectId, sendError, toOptionalInt } from "./respond";

type ReadingRouterDeps = {
  engine: ProgressEngine;
  sessions: ReadingSessionService;
};

export function makeReadingRouter({ engine, sessions }: ReadingRouterDeps) {
  const router = Router();

  /**
   * POST /api/reading/events
   * body: { pagesRead, durationMinutes }
   * A reading event reported outside a session (e.g. a position update that read pages).
   */
  router.post("/events", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const pageCount = toOptionalInt(req.body?.pagesRead) ?? 0;
      const minutes = toOptionalInt(req.body?.durationMinutes) ?? 0;

      const reading = await engine.handleReadingEvent({
        userId,
        readingSeconds: minutes * 60,
        pageCount,
      });
      return res.json({ reading });
    } catch (err) {
      return sendError(res, err, "Failed to record reading");
    }
  });

  /**
   * POST /api/reading/books/:bookId/sessions
   * body: { currentPosition }
   */
  router.post("/books/:bookId/sessions", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.bookId)) return res.status(404).json({ error: "Book not found" });

      const currentPosition = toOptionalInt(req.body?.currentPosition) ?? 0;
      const started = await sessions.startSession(userId, req.params.bookId, currentPosition);
      return res.status(201).json({ success: true, ...started });
    } catch (err) {
      return sendError(res, err, "Failed to start reading session");
    }
  });

  /**
   * POST /api/reading/sessions/:id/end
   * body: { durationMinutes, finalPosition, pagesRead? }
   */
  router.post("/sessions/:id/end", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.id)) return res.status(404).json({ error: "Reading session not found" });

      const ended = await sessions.endSession(userId, req.params.id, {
        durationMinutes: toOptionalInt(req.body?.durationMinutes) ?? 0,
        finalPosition: toOptionalInt(req.body?.finalPosition) ?? 0,
        pagesRead: toOptionalInt(req.body?.pagesRead),
      });
      return res.json({ success: true, ...ended });
    } catch (err) {
      return sendError(res, err, "Failed to end reading session");
    }
  });

  /**
   * PUT /api/reading/books/:bookId/position
   * body: { position }
   */
  router.put("/books/:bookId/position", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.bookId)) return res.status(404).json({ error: "Book not found" });

      const position = toOptionalInt(req.body?.position);
      if (position === undefined) return res.status(400).json({ error: "position is required" });

      const updated = await sessions.updatePosition(userId, req.params.bookId, position);
      return res.json({ success: true, ...updated });
    } catch (err) {
      return sendError(res, err, "Failed to update position");
    }
  });

  // GET /api/reading/books/:bookId/stats
  router.get("/books/:bookId/stats", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.bookId)) return res.status(404).json({ error: "Book not found" });

      const stats = await sessions.getBookStats(userId, req.params.bookId);
      return res.json({ stats });
    } catch (err) {
      return sendError(res, err, "Failed to get reading stats");
    }
  });

  // GET /api/reading/books/:bookId/sessions - newest first
  router.get("/books/:bookId/sessions", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.bookId)) return res.status(404).json({ error: "Book not found" });

      const list = await sessions.listSessions(userId, req.params.bookId);
      return res.json({ sessions: list });
    } catch (err) {
      return sendError(res, err, "Failed to get reading sessions");
    }
  });

  return router;
}
