import type { DialogSession, OperationMode } from "shared/types/index.js";

export type { DialogSession, OperationMode };

export interface DialogClient {
  open(mode: OperationMode, initialDirectory?: string): Promise<DialogSession>;
  get(id: string, search?: string): Promise<DialogSession>;
  close(id: string): Promise<void>;
  navigate(id: string, path: string): Promise<DialogSession>;
  up(id: string): Promise<DialogSession>;
  back(id: string): Promise<DialogSession>;
  forward(id: string): Promise<DialogSession>;
  refresh(id: string): Promise<DialogSession>;
  select(id: string, path: string): Promise<DialogSession>;
  activate(id: string, path: string): Promise<DialogSession>;
  setSaveName(id: string, name: string): Promise<DialogSession>;
  confirm(id: string): Promise<DialogSession>;
  cancel(id: string): Promise<DialogSession>;
  openCreateDirectory(id: string): Promise<DialogSession>;
  setCreateDirectoryName(id: string, name: string): Promise<DialogSession>;
  commitCreateDirectory(id: string): Promise<DialogSession>;
  cancelCreateDirectory(id: string): Promise<DialogSession>;
}

/**
 * Client for the dialog session API. Every command resolves with the
 * session snapshot after the command ran.
 */
export function createDialogClient(baseUrl: string = "/api"): DialogClient {
  const base = `${baseUrl}/dialogs`;

  async function request<T>(method: string, path: string, fallback: string, body?: unknown): Promise<T> {
    const res = await fetch(`${base}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!res.ok) {
      const error = await res.json();
      throw new Error(error.error || fallback);
    }
    return res.json();
  }

  const session = (id: string) => `/${encodeURIComponent(id)}`;

  return {
    open: (mode, initialDirectory) =>
      request("POST", "", "Failed to open dialog", { mode, initialDirectory }),
    get: (id, search) => {
      const query = search ? `?${new URLSearchParams({ search })}` : "";
      return request("GET", `${session(id)}${query}`, "Failed to load dialog");
    },
    close: async (id) => {
      await request<{ ok: boolean }>("DELETE", session(id), "Failed to close dialog");
    },
    navigate: (id, path) => request("POST", `${session(id)}/navigate`, "Failed to navigate", { path }),
    up: (id) => request("POST", `${session(id)}/up`, "Failed to navigate up"),
    back: (id) => request("POST", `${session(id)}/back`, "Failed to go back"),
    forward: (id) => request("POST", `${session(id)}/forward`, "Failed to go forward"),
    refresh: (id) => request("POST", `${session(id)}/refresh`, "Failed to refresh"),
    select: (id, path) => request("POST", `${session(id)}/select`, "Failed to select", { path }),
    activate: (id, path) => request("POST", `${session(id)}/activate`, "Failed to activate", { path }),
    setSaveName: (id, name) => request("PUT", `${session(id)}/save-name`, "Failed to set file name", { name }),
    confirm: (id) => request("POST", `${session(id)}/confirm`, "Failed to confirm"),
    cancel: (id) => request("POST", `${session(id)}/cancel`, "Failed to cancel"),
    openCreateDirectory: (id) => request("POST", `${session(id)}/create-directory`, "Failed to open folder prompt"),
    setCreateDirectoryName: (id, name) =>
      request("PUT", `${session(id)}/create-directory`, "Failed to set folder name", { name }),
    commitCreateDirectory: (id) => request("POST", `${session(id)}/create-directory/commit`, "Failed to create folder"),
    cancelCreateDirectory: (id) => request("DELETE", `${session(id)}/create-directory`, "Failed to close folder prompt"),
  };
}
