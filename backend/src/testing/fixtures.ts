import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "fs";
import type { Server } from "http";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { Express } from "express";
import type { PlacesProvider } from "../services/places.js";

export const noPlaces: PlacesProvider = {
  userDirectories: () => null,
  devices: () => [],
};

/**
 * Create a scratch directory populated from `layout`. Keys ending in "/" are
 * directories, everything else a file with the given contents.
 */
export function makeTree(layout: Record<string, string>): { root: string; cleanup: () => void } {
  const root = realpathSync(mkdtempSync(join(tmpdir(), "file-dialog-")));

  for (const [name, contents] of Object.entries(layout)) {
    const path = join(root, name);
    if (name.endsWith("/")) {
      mkdirSync(path, { recursive: true });
    } else {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, contents);
    }
  }

  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export async function startServer(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}/api`,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}
