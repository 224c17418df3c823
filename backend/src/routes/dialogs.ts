import { Router, type Request, type Response } from "express";
import type { DialogSession, OperationMode } from "shared/types/index.js";
import type { DialogSessionStore } from "../services/dialog-sessions.js";
import type { FileDialog } from "../services/file-dialog.js";
import { ValidationError } from "../utils/errors.js";

const MODES: readonly OperationMode[] = ["select-file", "select-directory", "save-file"];

class BadRequestError extends Error {}

function isOperationMode(value: unknown): value is OperationMode {
  return MODES.some((mode) => mode === value);
}

function bodyString(req: Pick<Request, "body">, key: string): string {
  const value: unknown = req.body?.[key];
  if (typeof value !== "string") {
    throw new BadRequestError(`${key} must be a string`);
  }
  return value;
}

function searchParam(req: Pick<Request, "query">): string | undefined {
  return typeof req.query.search === "string" ? req.query.search : undefined;
}

function toSession(id: string, dialog: FileDialog, search?: string): DialogSession {
  return { id, ...dialog.snapshot(search) };
}

function sendError(res: Response, err: unknown, action: string) {
  if (err instanceof BadRequestError) {
    return res.status(400).json({ error: err.message });
  }
  if (err instanceof ValidationError) {
    return res.status(409).json({ error: err.message, field: err.field });
  }

  console.error(`Error trying to ${action}:`, err);
  const details = err instanceof Error ? err.message : String(err);
  return res.status(500).json({ error: `Failed to ${action}`, details });
}

export function createDialogsRouter(store: DialogSessionStore): Router {
  const router = Router();

  // Run a command against an existing session and answer with its snapshot
  const command =
    (action: string, run: (dialog: FileDialog, req: Request<{ id: string }>) => void) =>
    (req: Request<{ id: string }>, res: Response) => {
      try {
        const dialog = store.get(req.params.id);
        if (!dialog) {
          return res.status(404).json({ error: "Dialog session not found" });
        }
        run(dialog, req);
        res.json(toSession(req.params.id, dialog, searchParam(req)));
      } catch (err) {
        sendError(res, err, action);
      }
    };

  // Open a new dialog session
  router.post("/", (req, res) => {
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Open dialog'
    // #swagger.description = 'Create a dialog session in the given mode and list its initial directory.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: {
            type: "object",
            required: ["mode"],
            properties: {
              mode: { type: "string", enum: ["select-file", "select-directory", "save-file"] },
              initialDirectory: { type: "string", description: "Directory to start in (default: FILE_DIALOG_INITIAL_DIR or the working directory)" }
            }
          }
        }
      }
    } */
    /* #swagger.responses[201] = { description: "Dialog snapshot with its session id" } */
    /* #swagger.responses[400] = { description: "Unknown mode or malformed initialDirectory" } */
    try {
      const mode: unknown = req.body?.mode;
      if (!isOperationMode(mode)) {
        return res.status(400).json({ error: `mode must be one of ${MODES.join(", ")}` });
      }

      const initialDirectory: unknown = req.body?.initialDirectory;
      if (initialDirectory !== undefined && typeof initialDirectory !== "string") {
        return res.status(400).json({ error: "initialDirectory must be a string" });
      }

      const { id, dialog } = store.create(mode, initialDirectory);
      res.status(201).json(toSession(id, dialog));
    } catch (err) {
      sendError(res, err, "open dialog");
    }
  });

  // Current state, with an optional ?search= filter over the listing
  router.get(
    "/:id",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Get dialog'
    // #swagger.description = 'Return the dialog snapshot. The optional search parameter narrows the listing by a case-insensitive name match.'
    /* #swagger.parameters['search'] = { in: 'query', type: 'string', description: 'Substring filter over entry names' } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("read dialog", () => {}),
  );

  router.delete("/:id", (req, res) => {
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Close dialog'
    // #swagger.description = 'Drop the dialog session.'
    /* #swagger.responses[200] = { description: "Session dropped" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    if (!store.delete(req.params.id)) {
      return res.status(404).json({ error: "Dialog session not found" });
    }
    res.json({ ok: true });
  });

  // Navigation
  router.post(
    "/:id/navigate",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Navigate'
    // #swagger.description = 'Enter a directory. A path that cannot be resolved or is not a directory leaves the dialog where it is and is reported in lastError.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: { type: "object", required: ["path"], properties: { path: { type: "string", description: "Directory to enter" } } }
        }
      }
    } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[400] = { description: "Missing or malformed body field" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("navigate", (dialog, req) => {
      dialog.navigate(bodyString(req, "path"));
    }),
  );
  router.post(
    "/:id/up",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Go up'
    // #swagger.description = 'Enter the parent of the current directory.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("navigate up", (dialog) => {
      dialog.navigateUp();
    }),
  );
  router.post(
    "/:id/back",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Go back'
    // #swagger.description = 'Return to the previous directory in the history.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("go back", (dialog) => {
      dialog.back();
    }),
  );
  router.post(
    "/:id/forward",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Go forward'
    // #swagger.description = 'Move forward in the history after going back.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("go forward", (dialog) => {
      dialog.forward();
    }),
  );
  router.post(
    "/:id/refresh",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Refresh'
    // #swagger.description = 'Reload the current directory and the places. The selection is kept if its entry still exists.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("refresh", (dialog) => dialog.refresh()),
  );

  // Selection
  router.post(
    "/:id/select",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Select entry'
    // #swagger.description = 'Select an entry of the current listing.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: { type: "object", required: ["path"], properties: { path: { type: "string", description: "Path of a listed entry" } } }
        }
      }
    } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[400] = { description: "Missing or malformed body field" } */
    /* #swagger.responses[409] = { description: "Path is not in the current listing" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("select", (dialog, req) => dialog.select(bodyString(req, "path"))),
  );
  router.post(
    "/:id/activate",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Activate entry'
    // #swagger.description = 'Enter a listed directory, or select a listed file and confirm it when the selection is valid.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: { type: "object", required: ["path"], properties: { path: { type: "string", description: "Path of a listed entry" } } }
        }
      }
    } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[400] = { description: "Missing or malformed body field" } */
    /* #swagger.responses[409] = { description: "Path is not in the current listing" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("activate", (dialog, req) => dialog.activate(bodyString(req, "path"))),
  );
  router.put(
    "/:id/save-name",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Set save name'
    // #swagger.description = 'Set the file name typed in save-file mode and validate it.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: { type: "object", required: ["name"], properties: { name: { type: "string", description: "File name inside the current directory" } } }
        }
      }
    } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[400] = { description: "Missing or malformed body field" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("set save name", (dialog, req) => dialog.setSaveName(bodyString(req, "name"))),
  );
  router.post(
    "/:id/confirm",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Confirm'
    // #swagger.description = 'Finish the dialog with the selection, or with the typed name when saving.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[409] = { description: "Dialog not open, or selection or save name invalid" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("confirm", (dialog) => {
      dialog.confirm();
    }),
  );
  router.post(
    "/:id/cancel",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Cancel'
    // #swagger.description = 'Finish the dialog without a result.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("cancel", (dialog) => dialog.cancel()),
  );

  // Inline directory creation
  router.post(
    "/:id/create-directory",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Open create directory prompt'
    // #swagger.description = 'Open the new folder prompt in the current directory.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[409] = { description: "No current directory, or the prompt is already open" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("open create directory", (dialog) => {
      if (!dialog.openCreateDirectory()) {
        throw new ValidationError("createDirectoryName", "Cannot create a directory here");
      }
    }),
  );
  router.put(
    "/:id/create-directory",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Set directory name'
    // #swagger.description = 'Set the name typed in the new folder prompt and validate it.'
    /* #swagger.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: { type: "object", required: ["name"], properties: { name: { type: "string", description: "Name of the folder to create" } } }
        }
      }
    } */
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[400] = { description: "Missing or malformed body field" } */
    /* #swagger.responses[409] = { description: "Prompt is not open" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("set directory name", (dialog, req) => {
      dialog.setCreateDirectoryName(bodyString(req, "name"));
    }),
  );
  router.post(
    "/:id/create-directory/commit",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Create directory'
    // #swagger.description = 'Create the directory, add it to the listing and select it. A filesystem failure is kept on the prompt.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[409] = { description: "Prompt is not open or its name is invalid" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("create directory", (dialog) => {
      dialog.commitCreateDirectory();
    }),
  );
  router.delete(
    "/:id/create-directory",
    // #swagger.tags = ['Dialogs']
    // #swagger.summary = 'Cancel create directory'
    // #swagger.description = 'Close the new folder prompt.'
    /* #swagger.responses[200] = { description: "Dialog snapshot" } */
    /* #swagger.responses[404] = { description: "Dialog session not found" } */
    command("cancel create directory", (dialog) => dialog.cancelCreateDirectory()),
  );

  return router;
}
