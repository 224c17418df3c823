import { existsSync } from "fs";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../../../backend/src/app.js";
import { DialogSessionStore } from "../../../backend/src/services/dialog-sessions.js";
import { makeTree, noPlaces, startServer } from "../../../backend/src/testing/fixtures.js";
import { createDialogClient, type DialogClient } from "./dialogs.js";

describe("dialog client", () => {
  let root: string;
  let cleanup: () => void;
  let close: () => Promise<void>;
  let client: DialogClient;

  beforeAll(async () => {
    ({ root, cleanup } = makeTree({ "a/": "", "b/": "", "c/": "", "notes.txt": "" }));
    const server = await startServer(createApp(new DialogSessionStore({ dialog: { places: noPlaces } })));
    close = server.close;
    client = createDialogClient(server.baseUrl);
  });

  afterAll(async () => {
    await close();
    cleanup();
  });

  it("saves under a typed name once it is valid", async () => {
    const session = await client.open("save-file", root);
    expect(session.saveNameError).toBe("The file name cannot be empty");

    await expect(client.confirm(session.id)).rejects.toThrow("The file name cannot be empty");

    const named = await client.setSaveName(session.id, "out.txt");
    expect(named.saveNameError).toBeNull();
    expect(named.selectionValid).toBe(true);

    const done = await client.confirm(session.id);
    expect(done.state).toEqual({ status: "selected", path: join(root, "out.txt") });
  });

  it("drops forward history after navigating from a previous directory", async () => {
    const { id } = await client.open("select-directory", root);

    await client.navigate(id, join(root, "a"));
    await client.navigate(id, join(root, "b"));
    const back = await client.back(id);
    expect(back.currentDirectory).toBe(join(root, "a"));
    expect(back.canGoForward).toBe(true);

    const moved = await client.navigate(id, join(root, "c"));
    expect(moved.canGoForward).toBe(false);

    const forward = await client.forward(id);
    expect(forward.currentDirectory).toBe(join(root, "c"));
  });

  it("creates a directory inline and selects it", async () => {
    const { id } = await client.open("select-directory", root);

    const prompt = await client.openCreateDirectory(id);
    expect(prompt.createDirectory).toEqual({ parent: root, input: "", error: "Name of the folder cannot be empty" });

    await client.setCreateDirectoryName(id, "newdir");
    const created = await client.commitCreateDirectory(id);

    expect(existsSync(join(root, "newdir"))).toBe(true);
    expect(created.createDirectory).toBeNull();
    expect(created.selectedItem).toBe(join(root, "newdir"));
    expect(created.entries.some((entry) => entry.path === join(root, "newdir"))).toBe(true);

    const confirmed = await client.confirm(id);
    expect(confirmed.state).toEqual({ status: "selected", path: join(root, "newdir") });
  });

  it("cancels and closes a session", async () => {
    const { id } = await client.open("select-file", root);

    const cancelled = await client.cancel(id);
    expect(cancelled.state).toEqual({ status: "cancelled" });

    await client.close(id);
    await expect(client.get(id)).rejects.toThrow("Dialog session not found");
  });
});
