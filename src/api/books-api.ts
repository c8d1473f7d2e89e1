// src/api/books-api.ts
import { Router } from "express";
import type { BookService } from "../services/book.service";
import { isObjectId, sendError, toOptionalInt } from "./respond";

export function makeBooksRouter(books: BookService) {
  const router = Router();

  /**
   * POST /api/books
   * body: { title, authors?, archiveId?, totalChars? }
   * Registers a catalog entry whose text lives in an external archive.
   */
  router.post("/", async (req, res) => {
    try {
      const totalChars = toOptionalInt(req.body?.totalChars);
      const book = await books.createBook({
        title: String(req.body?.title || ""),
        authors: typeof req.body?.authors === "string" ? req.body.authors : "",
        archiveId: typeof req.body?.archiveId === "string" ? req.body.archiveId : null,
        totalChars: totalChars === undefined ? null : totalChars,
      });
      return res.status(201).json({ book });
    } catch (err) {
      return sendError(res, err, "Failed to create book");
    }
  });

  // GET /api/books/:id
  router.get("/:id", async (req, res) => {
    try {
      if (!isObjectId(req.params.id)) return res.status(404).json({ error: "Book not found" });
      const book = await books.getBook(req.params.id);
      return res.json({ book });
    } catch (err) {
      return sendError(res, err, "Failed to load book");
    }
  });

  return router;
}
