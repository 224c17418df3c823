import { basename, join, resolve } from "path";
import type {
  CreateDirectoryState,
  Device,
  DialogLifecycleState,
  DialogSnapshot,
  DirectoryEntry,
  OperationMode,
  PathSegment,
  UserDirectories,
} from "shared/types/index.js";
import { IoError, ValidationError } from "../utils/errors.js";
import { parentDirectory, pathSegments } from "../utils/paths.js";
import { CreateDirectoryDialog } from "./create-directory-dialog.js";
import { NavigationHistory } from "./navigation-history.js";
import { PathCatalog } from "./path-catalog.js";
import { systemPlaces, type PlacesProvider } from "./places.js";
import { displayName, SelectionValidator } from "./selection-validator.js";

export interface FileDialogOptions {
  /** Directory shown by `open` when none is given. Defaults to the working directory. */
  initialDirectory?: string;
  showHidden?: boolean;
  places?: PlacesProvider;
}

/**
 * A single file picker session: history, listing, selection and the inline
 * create-directory prompt. Every command runs synchronously against the
 * filesystem; a failed listing is recorded in `lastError()` and leaves the
 * listing empty instead of throwing.
 */
export class FileDialog {
  private readonly catalog: PathCatalog;
  private readonly validator: SelectionValidator;
  private readonly history = new NavigationHistory();
  private readonly createDirectoryDialog: CreateDirectoryDialog;
  private readonly places: PlacesProvider;
  private readonly initialDirectory: string;

  private currentMode: OperationMode = "select-directory";
  private lifecycle: DialogLifecycleState = { status: "closed" };

  private listing: DirectoryEntry[] = [];
  private skipped = 0;
  private error: string | null = null;

  private selected: string | null = null;
  private saveNameInput = "";
  private saveNameInputError: string | null = null;

  private userDirs: UserDirectories | null = null;
  private deviceList: Device[] = [];

  constructor(options: FileDialogOptions = {}) {
    this.catalog = new PathCatalog({ showHidden: options.showHidden });
    this.validator = new SelectionValidator(this.catalog);
    this.createDirectoryDialog = new CreateDirectoryDialog(this.catalog);
    this.places = options.places ?? systemPlaces;
    this.initialDirectory = options.initialDirectory ?? process.cwd();
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  open(mode: OperationMode, initialDirectory?: string): void {
    this.reset();

    this.currentMode = mode;
    this.lifecycle = { status: "open" };
    this.refreshPlaces();

    this.navigate(initialDirectory ?? this.initialDirectory);
    this.revalidateSaveName();
  }

  selectDirectory(initialDirectory?: string): void {
    this.open("select-directory", initialDirectory);
  }

  selectFile(initialDirectory?: string): void {
    this.open("select-file", initialDirectory);
  }

  saveFile(initialDirectory?: string): void {
    this.open("save-file", initialDirectory);
  }

  /**
   * Finish the session with the current selection, or with the typed name
   * inside the current directory when saving.
   */
  confirm(): string {
    if (this.lifecycle.status !== "open") {
      throw new ValidationError("dialog", "The dialog is not open");
    }

    if (this.currentMode === "save-file") {
      const directory = this.history.current();
      if (this.saveNameInputError !== null || directory === null) {
        throw new ValidationError("saveName", this.saveNameInputError ?? "Currently not in a directory");
      }
      return this.finish(join(directory, this.saveNameInput));
    }

    if (this.selected === null || !this.isSelectionValid()) {
      const expected = this.currentMode === "select-file" ? "file" : "directory";
      throw new ValidationError("selection", `Select a ${expected} first`);
    }
    return this.finish(this.selected);
  }

  cancel(): void {
    this.lifecycle = { status: "cancelled" };
  }

  // ============================================================
  // Navigation
  // ============================================================

  /**
   * Visit `path`. Returns false when it is already the current directory,
   * could not be resolved or is not a directory.
   */
  navigate(path: string): boolean {
    let target: string;
    try {
      target = this.catalog.canonicalize(path);
    } catch (err) {
      this.recordError(err);
      return false;
    }

    if (this.catalog.entryKind(target) !== "directory") {
      this.recordError(new IoError(`ENOTDIR: not a directory, '${target}'`, target, "ENOTDIR"));
      return false;
    }

    if (!this.history.navigateTo(target)) return false;

    this.directoryChanged();
    return true;
  }

  navigateUp(): boolean {
    const current = this.history.current();
    const parent = current && parentDirectory(current);
    return parent ? this.navigate(parent) : false;
  }

  back(): boolean {
    if (!this.history.back()) return false;
    this.directoryChanged();
    return true;
  }

  forward(): boolean {
    if (!this.history.forward()) return false;
    this.directoryChanged();
    return true;
  }

  /**
   * Reload the current directory and the places. The selection survives if
   * its entry is still there.
   */
  refresh(): void {
    this.refreshPlaces();

    const previous = this.selected;
    this.reloadListing();
    if (previous !== null && !this.listing.some((entry) => entry.path === previous)) {
      this.selected = null;
    }
  }

  // ============================================================
  // Selection
  // ============================================================

  select(path: string): void {
    const entry = this.findEntry(path);
    this.selected = entry.path;

    // Picking an existing file while saving proposes overwriting it
    if (this.currentMode === "save-file" && this.catalog.entryKind(entry.path) === "file") {
      const name = displayName(entry.path);
      if (name !== null) {
        this.saveNameInput = name;
        this.revalidateSaveName();
      }
    }
  }

  /**
   * Double-click: enter directories, otherwise select and confirm when the
   * selection is acceptable.
   */
  activate(path: string): void {
    const entry = this.findEntry(path);
    if (entry.type === "directory") {
      this.navigate(entry.path);
      return;
    }

    this.select(entry.path);
    if (this.isSelectionValid()) {
      this.confirm();
    }
  }

  setSaveName(text: string): void {
    this.saveNameInput = text;
    this.revalidateSaveName();
  }

  // ============================================================
  // Create directory
  // ============================================================

  openCreateDirectory(): boolean {
    const directory = this.history.current();
    if (directory === null || this.createDirectoryDialog.isOpen()) return false;

    this.createDirectoryDialog.open(directory);
    return true;
  }

  setCreateDirectoryName(text: string): void {
    this.createDirectoryDialog.setInput(text);
  }

  cancelCreateDirectory(): void {
    this.createDirectoryDialog.close();
  }

  commitCreateDirectory(): string | null {
    const path = this.createDirectoryDialog.commit();
    if (path !== null) {
      this.createDirectoryResult(path);
    }
    return path;
  }

  /** Add a freshly created directory to the listing and select it. */
  createDirectoryResult(path: string): void {
    const name = basename(path);
    this.listing.push({ name, path, type: "directory", isHidden: name.startsWith(".") });
    this.select(path);
  }

  // ============================================================
  // Queries
  // ============================================================

  state(): DialogLifecycleState {
    return { ...this.lifecycle };
  }

  mode(): OperationMode {
    return this.currentMode;
  }

  currentDirectory(): string | null {
    return this.history.current();
  }

  pathSegments(): PathSegment[] {
    const current = this.history.current();
    return current ? pathSegments(current) : [];
  }

  /** Listing entries, optionally narrowed by a case-insensitive name match. */
  entries(filter?: string): DirectoryEntry[] {
    if (!filter) return [...this.listing];

    const needle = filter.toLowerCase();
    return this.listing.filter((entry) => entry.name.toLowerCase().includes(needle));
  }

  skippedEntries(): number {
    return this.skipped;
  }

  canGoBack(): boolean {
    return this.history.canGoBack();
  }

  canGoForward(): boolean {
    return this.history.canGoForward();
  }

  canGoUp(): boolean {
    const current = this.history.current();
    return current !== null && parentDirectory(current) !== null;
  }

  selectedItem(): string | null {
    return this.selected;
  }

  isSelectionValid(): boolean {
    return this.validator.isSelectionValid(this.currentMode, this.selected, this.saveNameInputError);
  }

  saveName(): string {
    return this.saveNameInput;
  }

  saveNameError(): string | null {
    return this.saveNameInputError;
  }

  createDirectory(): CreateDirectoryState | null {
    return this.createDirectoryDialog.state();
  }

  userDirectories(): UserDirectories | null {
    return this.userDirs;
  }

  devices(): Device[] {
    return this.deviceList;
  }

  lastError(): string | null {
    return this.error;
  }

  snapshot(filter?: string): DialogSnapshot {
    return {
      mode: this.currentMode,
      state: this.state(),
      currentDirectory: this.currentDirectory(),
      segments: this.pathSegments(),
      entries: this.entries(filter),
      skippedEntries: this.skipped,
      canGoBack: this.canGoBack(),
      canGoForward: this.canGoForward(),
      canGoUp: this.canGoUp(),
      selectedItem: this.selected,
      selectionValid: this.isSelectionValid(),
      saveName: this.saveNameInput,
      saveNameError: this.saveNameInputError,
      createDirectory: this.createDirectory(),
      userDirectories: this.userDirs,
      devices: [...this.deviceList],
      lastError: this.error,
    };
  }

  // ============================================================
  // Internals
  // ============================================================

  private reset(): void {
    this.lifecycle = { status: "closed" };
    this.history.clear();
    this.listing = [];
    this.skipped = 0;
    this.error = null;
    this.createDirectoryDialog.close();
    this.selected = null;
    this.saveNameInput = "";
    this.saveNameInputError = null;
  }

  private finish(path: string): string {
    this.lifecycle = { status: "selected", path };
    return path;
  }

  private refreshPlaces(): void {
    this.userDirs = this.places.userDirectories();
    this.deviceList = this.places.devices();
  }

  /** Shared tail of navigate, back and forward. */
  private directoryChanged(): void {
    this.createDirectoryDialog.parentNavigated();
    this.selected = null;
    this.reloadListing();
  }

  private reloadListing(): void {
    const directory = this.history.current();
    this.listing = [];
    this.skipped = 0;

    if (directory !== null) {
      try {
        const listing = this.catalog.load(directory);
        this.listing = listing.entries;
        this.skipped = listing.skipped;
        this.error = null;
      } catch (err) {
        this.recordError(err);
      }
    }

    this.revalidateSaveName();
  }

  private revalidateSaveName(): void {
    if (this.currentMode !== "save-file") return;
    this.saveNameInputError = this.validator.validateSaveName(this.saveNameInput, this.history.current());
  }

  private recordError(err: unknown): void {
    if (!(err instanceof IoError)) throw err;
    console.error("Error loading directory:", err.message);
    this.error = err.message;
  }

  private findEntry(path: string): DirectoryEntry {
    const target = resolve(path);
    const entry = this.listing.find((item) => item.path === target);
    if (!entry) {
      throw new ValidationError("selection", `${target} is not in the current directory`);
    }
    return entry;
  }
}
