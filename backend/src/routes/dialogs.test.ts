import { join } from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../app.js";
import { DialogSessionStore } from "../services/dialog-sessions.js";
import { makeTree, noPlaces, startServer } from "../testing/fixtures.js";

describe("dialogs router", () => {
  let root: string;
  let cleanup: () => void;
  let baseUrl: string;
  let close: () => Promise<void>;

  const send = (method: string, path: string, body?: unknown) =>
    fetch(`${baseUrl}/dialogs${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeAll(async () => {
    ({ root, cleanup } = makeTree({ "Documents/": "", "notes.txt": "" }));
    const store = new DialogSessionStore({ dialog: { places: noPlaces } });
    ({ baseUrl, close } = await startServer(createApp(store)));
  });

  afterAll(async () => {
    await close();
    cleanup();
  });

  it("opens a session and returns its snapshot", async () => {
    const res = await send("POST", "", { mode: "select-directory", initialDirectory: root });
    const body = await res.json();

    expect(res.status).toBe(201);
    expect(typeof body.id).toBe("string");
    expect(body.mode).toBe("select-directory");
    expect(body.state).toEqual({ status: "open" });
    expect(body.currentDirectory).toBe(root);
    expect(body.canGoBack).toBe(false);
  });

  it("rejects unknown modes", async () => {
    const res = await send("POST", "", { mode: "delete-everything" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "mode must be one of select-file, select-directory, save-file" });
  });

  it("answers 404 for unknown sessions", async () => {
    const res = await send("POST", "/does-not-exist/back");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Dialog session not found" });
  });

  it("requires string fields in command bodies", async () => {
    const { id } = await (await send("POST", "", { mode: "select-file", initialDirectory: root })).json();

    const res = await send("POST", `/${id}/navigate`, { path: 42 });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "path must be a string" });
  });

  it("maps validation failures to 409 with the field", async () => {
    const { id } = await (await send("POST", "", { mode: "select-directory", initialDirectory: root })).json();

    const res = await send("POST", `/${id}/confirm`);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "Select a directory first", field: "selection" });
  });

  it("filters the listing with ?search=", async () => {
    const { id } = await (await send("POST", "", { mode: "select-file", initialDirectory: root })).json();

    const res = await send("GET", `/${id}?search=NOTES`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.entries).toEqual([{ name: "notes.txt", path: join(root, "notes.txt"), type: "file", isHidden: false }]);
  });

  it("drops sessions", async () => {
    const { id } = await (await send("POST", "", { mode: "select-file", initialDirectory: root })).json();

    expect((await send("DELETE", `/${id}`)).status).toBe(200);
    expect((await send("GET", `/${id}`)).status).toBe(404);
  });
});
