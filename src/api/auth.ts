// src/api/auth.ts
import type { RequestHandler } from "express";
import jwt from "jsonwebtoken";

function getBearerToken(header: string | undefined) {
  const m = String(header || "").match(/^Bearer\s+(.+)$/i);
  return m ? m[1] : null;
}

/**
 * Identity is issued elsewhere; here we only verify the bearer token and read
 * its numeric `userId` claim.
 */
export function readUserIdFromToken(token: string, secret: string): number | null {
  try {
    const payload = jwt.verify(token, secret);
    if (typeof payload === "string") return null;
    const userId = Number(payload.userId);
    return Number.isSafeInteger(userId) && userId > 0 ? userId : null;
  } catch {
    return null;
  }
}

export function requireAuth(secret: string): RequestHandler {
  return (req, res, next) => {
    const token = getBearerToken(req.headers.authorization);
    if (!token) {
      res.status(401).json({ error: "Missing token" });
      return;
    }

    const userId = readUserIdFromToken(token, secret);
    if (!userId) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }

    req.userId = userId;
    next();
  };
}

// Type augmentation for Express Request
declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}
