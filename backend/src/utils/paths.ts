import { dirname, join, parse, sep } from "path";
import type { PathSegment } from "shared/types/index.js";

/**
 * Split an absolute path into breadcrumb segments, root first. Each segment
 * carries the path up to and including itself.
 */
export function pathSegments(path: string): PathSegment[] {
  const { root } = parse(path);
  const parts = path.slice(root.length).split(sep).filter(Boolean);

  const segments: PathSegment[] = root ? [{ name: root, path: root }] : [];
  let current = root;
  for (const part of parts) {
    current = join(current, part);
    segments.push({ name: part, path: current });
  }
  return segments;
}

export function parentDirectory(path: string): string | null {
  const parent = dirname(path);
  return parent !== path ? parent : null;
}

/** True when `name` names an entry directly inside a directory. */
export function isPlainName(name: string): boolean {
  return name !== "." && name !== ".." && !name.includes("/") && !name.includes(sep);
}
