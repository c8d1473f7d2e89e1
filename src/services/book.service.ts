import { NotFoundError, ValidationError } from "../errors";
import type { BookRecord, DataStore } from "../store/types";

export const CHARS_PER_PAGE = 1800;

export type CreateBookInput = {
  title: string;
  authors?: string;
  archiveId?: string | null;
  totalChars?: number | null;
};

export type BookView = BookRecord & { estimatedPages: number | null };

export function estimatePages(totalChars: number | null): number | null {
  if (totalChars === null) return null;
  return Math.max(1, Math.floor(totalChars / CHARS_PER_PAGE));
}

function toView(book: BookRecord): BookView {
  return { ...book, estimatedPages: estimatePages(book.totalChars) };
}

export function createBookService(opts: { store: DataStore }) {
  const { store } = opts;

  async function createBook(input: CreateBookInput): Promise<BookView> {
    const title = input.title.trim().slice(0, 200);
    if (!title) throw new ValidationError("Title is required");

    const totalChars = input.totalChars ?? null;
    if (totalChars !== null && (!Number.isInteger(totalChars) || totalChars < 0)) {
      throw new ValidationError("totalChars must be a non-negative integer");
    }

    const book = await store.repos.books.create({
      title,
      authors: (input.authors ?? "").trim().slice(0, 200),
      archiveId: input.archiveId?.trim() || null,
      totalChars,
    });
    return toView(book);
  }

  async function getBook(id: string): Promise<BookView> {
    const book = await store.repos.books.findById(id);
    if (!book) throw new NotFoundError("Book not found");
    return toView(book);
  }

  return { createBook, getBook };
}

export type BookService = ReturnType<typeof createBookService>;
