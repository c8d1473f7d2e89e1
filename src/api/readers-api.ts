// src/api/readers-api.ts
import { Router } from "express";
import type { ReaderService } from "../services/reader.service";
import { sendError } from "./respond";

export function makeReadersRouter(readers: ReaderService) {
  const router = Router();

  /**
   * POST /api/readers
   * body: { username, timezone? }
   */
  router.post("/", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const reader = await readers.registerReader(userId, {
        username: String(req.body?.username || ""),
        timezone: typeof req.body?.timezone === "string" ? req.body.timezone : undefined,
      });
      return res.status(201).json({ reader });
    } catch (err) {
      return sendError(res, err, "Failed to register reader");
    }
  });

  // GET /api/readers/me
  router.get("/me", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const reader = await readers.getReader(userId);
      return res.json({ reader });
    } catch (err) {
      return sendError(res, err, "Failed to load reader");
    }
  });

  /**
   * PATCH /api/readers/me
   * body: { timezone }
   */
  router.patch("/me", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const timezone = String(req.body?.timezone || "");
      if (!timezone) return res.status(400).json({ error: "timezone is required" });

      const reader = await readers.updateTimezone(userId, timezone);
      return res.json({ reader });
    } catch (err) {
      return sendError(res, err, "Failed to update reader");
    }
  });

  // GET /api/readers/me/streak
  router.get("/me/streak", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const streak = await readers.getStreak(userId);
      return res.json({ streak });
    } catch (err) {
      return sendError(res, err, "Failed to load streak");
    }
  });

  return router;
}
