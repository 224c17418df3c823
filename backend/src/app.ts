import express from "express";
import cors from "cors";
import { existsSync, readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { createDialogsRouter } from "./routes/dialogs.js";
import { DialogSessionStore } from "./services/dialog-sessions.js";

const defaultSpecPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "../swagger.json");

export interface AppOptions {
  /** OpenAPI document written by `npm run swagger`. */
  specPath?: string;
}

export function createApp(store: DialogSessionStore = new DialogSessionStore(), options: AppOptions = {}) {
  const app = express();
  const specPath = options.specPath ?? defaultSpecPath;

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  // Serve OpenAPI spec
  app.get("/api/docs", (_req, res) => {
    // #swagger.ignore = true
    if (existsSync(specPath)) {
      const spec: unknown = JSON.parse(readFileSync(specPath, "utf-8"));
      res.json(spec);
    } else {
      res.status(404).json({ error: "API spec not found. Run: npm run swagger" });
    }
  });

  app.use("/api/dialogs", createDialogsRouter(store));

  return app;
}
