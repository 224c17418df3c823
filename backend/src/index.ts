import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

// Load .env from project root
const __rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
dotenv.config({ path: path.join(__rootDir, ".env") });

import { createApp } from "./app.js";
import { DialogSessionStore } from "./services/dialog-sessions.js";

const PORT = Number(process.env.PORT) || 8000;

const store = new DialogSessionStore({
  ttlMs: Number(process.env.DIALOG_SESSION_TTL_MS) || undefined,
  dialog: {
    initialDirectory: process.env.FILE_DIALOG_INITIAL_DIR || undefined,
    showHidden: process.env.FILE_DIALOG_SHOW_HIDDEN !== "false",
  },
});

const app = createApp(store);

const server = app.listen(PORT, () => {
  console.log(`Backend running on http://localhost:${PORT}`);
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`${signal} received, shutting down gracefully`);
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
