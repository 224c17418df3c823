import { readdirSync, realpathSync, statSync } from "fs";
import { join, resolve } from "path";
import type { DirectoryEntry } from "shared/types/index.js";
import { IoError } from "../utils/errors.js";

export type { DirectoryEntry };

export interface DirectoryListing {
  path: string;
  entries: DirectoryEntry[];
  /** Entries left out because their name is not valid UTF-8 or they could not be stat'ed. */
  skipped: number;
}

export interface PathCatalogOptions {
  showHidden?: boolean;
}

/**
 * Decode a raw directory entry name, or null when the bytes do not
 * survive a UTF-8 round trip.
 */
function decodeName(raw: Buffer): string | null {
  const name = raw.toString("utf8");
  return Buffer.from(name, "utf8").equals(raw) ? name : null;
}

export class PathCatalog {
  private readonly showHidden: boolean;

  constructor(options: PathCatalogOptions = {}) {
    this.showHidden = options.showHidden ?? true;
  }

  /**
   * Resolve relative segments and symlinks into an absolute path.
   */
  canonicalize(path: string): string {
    const resolvedPath = resolve(path);
    try {
      return realpathSync(resolvedPath);
    } catch (err) {
      throw IoError.from(err, resolvedPath);
    }
  }

  /**
   * Load the immediate children of a directory, in the order the
   * filesystem returns them.
   */
  load(path: string): DirectoryListing {
    const resolvedPath = this.canonicalize(path);

    let names: Buffer[];
    try {
      names = readdirSync(resolvedPath, { encoding: "buffer" });
    } catch (err) {
      throw IoError.from(err, resolvedPath);
    }

    const listing: DirectoryListing = { path: resolvedPath, entries: [], skipped: 0 };

    for (const raw of names) {
      const name = decodeName(raw);
      if (name === null) {
        listing.skipped++;
        continue;
      }

      const isHidden = name.startsWith(".");
      if (isHidden && !this.showHidden) continue;

      const itemPath = join(resolvedPath, name);
      try {
        const itemStat = statSync(itemPath);
        listing.entries.push({
          name,
          path: itemPath,
          type: itemStat.isDirectory() ? "directory" : "file",
          isHidden,
        });
      } catch {
        // Dangling symlinks, entries removed mid-scan, permission issues
        listing.skipped++;
      }
    }

    return listing;
  }

  /**
   * Kind of whatever currently lives at `path`, following symlinks.
   * Only regular files count as "file"; sockets, fifos and devices give null.
   */
  entryKind(path: string): DirectoryEntry["type"] | null {
    try {
      const stat = statSync(path);
      if (stat.isDirectory()) return "directory";
      return stat.isFile() ? "file" : null;
    } catch {
      return null;
    }
  }
}
