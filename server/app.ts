import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { sendError } from "./errors";
import { log } from "./logger";
import { registerRoutes, type RouteDependencies } from "./routes";

export async function createApp(deps: RouteDependencies): Promise<{ app: express.Express; server: Server }> {
  const app = express();
  app.use(express.json({ limit: "25mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        const duration = Date.now() - start;
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  const server = await registerRoutes(app, deps);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", details: err.message });
      return;
    }
    sendError(res, err, "Internal Server Error");
  });

  return { app, server };
}
