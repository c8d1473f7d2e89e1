import type { Response } from "express";
import mongoose from "mongoose";
import { AppError } from "../errors";

export function isObjectId(id: unknown): id is string {
  if (typeof id !== "string") return false;
  return mongoose.Types.ObjectId.isValid(id);
}

// Known failures keep their status and message; anything else is logged and hidden.
export function sendError(res: Response, err: unknown, fallback: string) {
  if (err instanceof AppError) {
    return res.status(err.status).json({ error: err.message });
  }
  console.error(`${fallback}:`, err);
  return res.status(500).json({ error: fallback });
}

// undefined when absent, NaN when not a whole number (the services reject it)
export function toOptionalInt(v: unknown) {
  if (v === undefined || v === null || v === "") return undefined;
  const n = Number(v);
  return Number.isInteger(n) ? n : NaN;
}
