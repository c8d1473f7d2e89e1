// src/api/challenges-api.ts
import { Router } from "express";
import type { ChallengeService } from "../services/challenge.service";
import { isObjectId, sendError } from "./respond";

export function makeChallengesRouter(challenges: ChallengeService) {
  const router = Router();

  // GET /api/challenges - active catalog
  router.get("/", async (_req, res) => {
    try {
      const list = await challenges.listCatalog();
      return res.json({ challenges: list });
    } catch (err) {
      return sendError(res, err, "Failed to load challenges");
    }
  });

  // GET /api/challenges/progress - the caller's enrollments with their challenge
  router.get("/progress", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });

      const enrollments = await challenges.listUserChallenges(userId);
      return res.json({ challenges: enrollments });
    } catch (err) {
      return sendError(res, err, "Failed to load challenge progress");
    }
  });

  // POST /api/challenges/:id/start
  router.post("/:id/start", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.id)) return res.status(404).json({ error: "Challenge not found" });

      const enrollment = await challenges.startChallenge(userId, req.params.id);
      return res.status(201).json({ message: "Challenge started successfully", enrollment });
    } catch (err) {
      return sendError(res, err, "Failed to start challenge");
    }
  });

  // POST /api/challenges/:id/abandon - only while not completed
  router.post("/:id/abandon", async (req, res) => {
    try {
      const userId = req.userId;
      if (!userId) return res.status(401).json({ error: "Unauthorized" });
      if (!isObjectId(req.params.id)) return res.status(404).json({ error: "Active challenge not found" });

      await challenges.abandonChallenge(userId, req.params.id);
      return res.json({ message: "Challenge abandoned successfully" });
    } catch (err) {
      return sendError(res, err, "Failed to abandon challenge");
    }
  });

  return router;
}
