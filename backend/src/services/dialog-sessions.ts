import { v4 as uuid } from "uuid";
import type { OperationMode } from "shared/types/index.js";
import { FileDialog, type FileDialogOptions } from "./file-dialog.js";

const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000; // 30 minutes

interface SessionEntry {
  dialog: FileDialog;
  expiresAt: number;
}

export interface DialogSessionStoreOptions {
  ttlMs?: number;
  dialog?: FileDialogOptions;
  now?: () => number;
}

/**
 * In-memory dialog sessions for the HTTP API. Idle sessions expire after
 * the TTL; every lookup extends it.
 */
export class DialogSessionStore {
  private sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly dialogOptions: FileDialogOptions;
  private readonly now: () => number;

  constructor(options: DialogSessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.dialogOptions = options.dialog ?? {};
    this.now = options.now ?? Date.now;
  }

  create(mode: OperationMode, initialDirectory?: string): { id: string; dialog: FileDialog } {
    this.cleanupExpired();

    const id = uuid();
    const dialog = new FileDialog(this.dialogOptions);
    dialog.open(mode, initialDirectory);
    this.sessions.set(id, { dialog, expiresAt: this.now() + this.ttlMs });

    return { id, dialog };
  }

  get(id: string): FileDialog | undefined {
    this.cleanupExpired();

    const entry = this.sessions.get(id);
    if (!entry) return undefined;

    entry.expiresAt = this.now() + this.ttlMs;
    return entry.dialog;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }

  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (now > entry.expiresAt) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
