// src/routes/healthRoute.ts
import type { Request, Response } from "express";

export function healthRoute(_req: Request, res: Response) {
  res.status(200).type("text/plain").send("OK");
}
