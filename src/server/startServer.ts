import type { Express } from "express";
import type { Server } from "http";

export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, "0.0.0.0", () => {
      console.log(`Web server listening on port ${port}`);
      console.log(`Health endpoint: /health`);
      console.log(`API: /api/readers, /api/challenges, /api/reading, /api/books`);
      resolve(server);
    });
    server.on("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
