import { basename, join } from "path";
import type { OperationMode } from "shared/types/index.js";
import { isPlainName } from "../utils/paths.js";
import type { PathCatalog } from "./path-catalog.js";

/**
 * Name shown for a path, or null for a filesystem root.
 */
export function displayName(path: string): string | null {
  const name = basename(path);
  return name.length > 0 ? name : null;
}

export class SelectionValidator {
  constructor(private readonly catalog: PathCatalog) {}

  isSelectionValid(mode: OperationMode, selectedItem: string | null, saveNameError: string | null): boolean {
    switch (mode) {
      case "save-file":
        return saveNameError === null;
      case "select-directory":
        return selectedItem !== null && this.catalog.entryKind(selectedItem) === "directory" && displayName(selectedItem) !== null;
      case "select-file":
        return selectedItem !== null && this.catalog.entryKind(selectedItem) === "file" && displayName(selectedItem) !== null;
    }
  }

  /**
   * Existing directories with the same name are not rejected; only a
   * regular file would be overwritten.
   */
  validateSaveName(input: string, currentDirectory: string | null): string | null {
    if (input.length === 0) {
      return "The file name cannot be empty";
    }

    if (!isPlainName(input)) {
      return "The file name cannot contain a path separator or be \".\" or \"..\"";
    }

    // Only reachable when the initial directory failed to load
    if (currentDirectory === null) {
      return "Currently not in a directory";
    }

    if (this.catalog.entryKind(join(currentDirectory, input)) === "file") {
      return "A file with this name already exists";
    }

    return null;
  }
}
