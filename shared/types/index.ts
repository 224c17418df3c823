export type {
  OperationMode,
  DialogLifecycleState,
  DirectoryEntry,
  PathSegment,
  UserDirectories,
  Device,
  CreateDirectoryState,
  DialogSnapshot,
  DialogSession,
  ValidationField,
} from "./dialog.js";
