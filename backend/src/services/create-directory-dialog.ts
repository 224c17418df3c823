import { mkdirSync } from "fs";
import { join } from "path";
import type { CreateDirectoryState } from "shared/types/index.js";
import { ValidationError } from "../utils/errors.js";
import { isPlainName } from "../utils/paths.js";
import type { PathCatalog } from "./path-catalog.js";

/**
 * Inline "new folder" prompt. Holds the parent directory it was opened in
 * plus the typed name, and is closed by its owner whenever that parent
 * stops being the current directory.
 */
export class CreateDirectoryDialog {
  private request: CreateDirectoryState | null = null;

  constructor(private readonly catalog: PathCatalog) {}

  open(parent: string): void {
    this.request = { parent, input: "", error: null };
    this.request.error = this.validate(this.request.input, parent);
  }

  close(): void {
    this.request = null;
  }

  isOpen(): boolean {
    return this.request !== null;
  }

  /** Called by the owning dialog after it moved to another directory. */
  parentNavigated(): void {
    this.close();
  }

  state(): CreateDirectoryState | null {
    return this.request && { ...this.request };
  }

  setInput(text: string): void {
    if (!this.request) {
      throw new ValidationError("createDirectoryName", "The create directory prompt is not open");
    }
    this.request.input = text;
    this.request.error = this.validate(text, this.request.parent);
  }

  validate(input: string, parent: string): string | null {
    if (input.length === 0) {
      return "Name of the folder cannot be empty";
    }

    if (!isPlainName(input)) {
      return "Name of the folder cannot contain a path separator or be \".\" or \"..\"";
    }

    if (this.catalog.entryKind(join(parent, input)) === "directory") {
      return "A directory with the name already exists";
    }

    return null;
  }

  /**
   * Create the directory. Returns its path on success; on failure the
   * error is kept on the prompt, which stays open with its input.
   */
  commit(): string | null {
    if (!this.request) {
      throw new ValidationError("createDirectoryName", "The create directory prompt is not open");
    }
    if (this.request.error !== null) {
      throw new ValidationError("createDirectoryName", this.request.error);
    }

    const path = join(this.request.parent, this.request.input);
    try {
      mkdirSync(path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.request.error = `Error: ${message}`;
      return null;
    }

    this.close();
    return path;
  }
}
