export type OperationMode = "select-file" | "select-directory" | "save-file";

export type DialogLifecycleState =
  | { status: "closed" }
  | { status: "open" }
  | { status: "selected"; path: string }
  | { status: "cancelled" };

export interface DirectoryEntry {
  name: string;
  path: string;
  type: "directory" | "file";
  isHidden: boolean;
}

export interface PathSegment {
  name: string;
  path: string;
}

export interface UserDirectories {
  home: string | null;
  desktop: string | null;
  documents: string | null;
  downloads: string | null;
  audio: string | null;
  pictures: string | null;
  videos: string | null;
}

export interface Device {
  name: string;
  mountPoint: string;
}

export interface CreateDirectoryState {
  parent: string;
  input: string;
  error: string | null;
}

export interface DialogSnapshot {
  mode: OperationMode;
  state: DialogLifecycleState;
  currentDirectory: string | null;
  segments: PathSegment[];
  entries: DirectoryEntry[];
  skippedEntries: number;
  canGoBack: boolean;
  canGoForward: boolean;
  canGoUp: boolean;
  selectedItem: string | null;
  selectionValid: boolean;
  saveName: string;
  saveNameError: string | null;
  createDirectory: CreateDirectoryState | null;
  userDirectories: UserDirectories | null;
  devices: Device[];
  lastError: string | null;
}

/** Snapshot of a dialog hosted by the backend, keyed by its session id. */
export interface DialogSession extends DialogSnapshot {
  id: string;
}

export type ValidationField = "selection" | "saveName" | "createDirectoryName" | "dialog";
