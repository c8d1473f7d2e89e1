import express, { type NextFunction, type Request, type Response } from "express";
import type { DataStore } from "../store/types";
import type { PositionStore } from "../state/positionStore";
import { createProgressEngine } from "../services/progressEngine";
import { createReaderService } from "../services/reader.service";
import { createChallengeService } from "../services/challenge.service";
import { createBookService } from "../services/book.service";
import { createReadingSessionService } from "../services/readingSession.service";
import type { EvaluatorRegistry } from "../services/challengeEvaluators";
import { requireAuth } from "../api/auth";
import { makeReadersRouter } from "../api/readers-api";
import { makeChallengesRouter } from "../api/challenges-api";
import { makeReadingRouter } from "../api/reading-api";
import { makeBooksRouter } from "../api/books-api";
import { healthRoute } from "../routes/healthRoute";

export type AppOptions = {
  store: DataStore;
  positions: PositionStore;
  jwtSecret: string;
  defaultTimezone: string;
  evaluators?: EvaluatorRegistry;
  now?: () => Date;
  logRequests?: boolean; // default true
};

// body-parser errors carry the 4xx they should be answered with
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp(opts: AppOptions) {
  const { store, positions, now } = opts;

  const engine = createProgressEngine({ store, evaluators: opts.evaluators, now });
  const readers = createReaderService({ store, defaultTimezone: opts.defaultTimezone, now });
  const challenges = createChallengeService({ store, now });
  const books = createBookService({ store });
  const sessions = createReadingSessionService({ store, engine, positions, now });

  const app = express();
  app.use(express.json({ limit: "100kb" }));

  if (opts.logRequests !== false) {
    app.use((req, _res, next) => {
      console.log(`[HTTP] ${req.method} ${req.originalUrl}`);
      next();
    });
  }

  app.get("/health", healthRoute);

  const auth = requireAuth(opts.jwtSecret);
  app.use("/api/readers", auth, makeReadersRouter(readers));
  app.use("/api/challenges", auth, makeChallengesRouter(challenges));
  app.use("/api/reading", auth, makeReadingRouter({ engine, sessions }));
  app.use("/api/books", auth, makeBooksRouter(books));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Body parser failures (malformed JSON, oversized payloads) and anything a router let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Invalid JSON" });
      return;
    }
    const status = clientErrorStatus(err);
    if (status === 413) {
      res.status(413).json({ error: "Payload too large" });
      return;
    }
    if (status !== null) {
      res.status(status).json({ error: "Bad request" });
      return;
    }
    console.error("[HTTP] Unhandled error:", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
