import { DisplayRow } from "../types";

export type ViewMode = "table" | "log";

export type FlashLevel = "info" | "warn";

export interface Flash {
  text: string;
  level: FlashLevel;
  expiresAt: number;
}

export type PromptState =
  | { stage: "target"; input: string }
  | { stage: "label"; input: string; batteryId: number; currentLabel: string };

/** Keys as delivered by the terminal input hook. Only the flags the view reads. */
export interface KeyPress {
  upArrow?: boolean;
  downArrow?: boolean;
  pageUp?: boolean;
  pageDown?: boolean;
  escape?: boolean;
  ctrl?: boolean;
}

export type RenameCallback = (externalId: string, label: string) => void;

export interface LogSource {
  lines(): readonly string[];
  subscribe(listener: () => void): () => void;
}

/** Immutable picture of the view, published to the renderer. */
export interface ViewSnapshot {
  readonly mode: ViewMode;
  readonly rows: readonly DisplayRow[];
  readonly logLines: readonly string[];
  readonly logScroll: number;
  readonly logTotal: number;
  readonly prompt: Readonly<PromptState> | null;
  readonly flash: { readonly text: string; readonly level: FlashLevel } | null;
  readonly quitRequested: boolean;
}

export type ViewOptions = {
  refreshIntervalMs?: number;
  flashDurationMs?: number;
  logSource?: LogSource;
  visibleLogLines?: number;
  now?: () => number;
};

const DEFAULT_REFRESH_MS = 100;
const DEFAULT_FLASH_MS = 2500;
const DEFAULT_VISIBLE_LOG_LINES = 20;

function compareRows(a: DisplayRow, b: DisplayRow): number {
  if (a.label < b.label) return -1;
  if (a.label > b.label) return 1;
  return a.batteryId - b.batteryId;
}

/**
 * Screen state for the live table, the log pane and the rename prompt.
 *
 * Rows are written by the ingestion consumer; everything else (mode, scroll,
 * prompt, flash) belongs to the input side. The renderer never reads the
 * mutable state directly, only snapshots published by {@link tick}.
 */
export class InteractiveView {
  private readonly rows = new Map<number, DisplayRow>();
  private mode: ViewMode = "table";
  private logScroll = 0;
  private visibleLogLines: number;
  private prompt: PromptState | null = null;
  private flash: Flash | null = null;
  private quitRequested = false;
  private dirty = true;
  private renameCallback: RenameCallback | null = null;
  private readonly listeners = new Set<(snapshot: ViewSnapshot) => void>();
  private readonly quitListeners = new Set<() => void>();
  private current: ViewSnapshot;

  private readonly refreshIntervalMs: number;
  private readonly flashDurationMs: number;
  private readonly logSource?: LogSource;
  private readonly now: () => number;
  private unsubscribeLog?: () => void;

  constructor(options: ViewOptions = {}) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_MS;
    this.flashDurationMs = options.flashDurationMs ?? DEFAULT_FLASH_MS;
    this.visibleLogLines = options.visibleLogLines ?? DEFAULT_VISIBLE_LOG_LINES;
    this.logSource = options.logSource;
    this.now = options.now ?? Date.now;
    this.current = this.buildSnapshot();
    if (this.logSource) {
      this.unsubscribeLog = this.logSource.subscribe(() => this.markDirty());
    }
  }

  // ---- ingestion side ----

  updateRow(row: DisplayRow): void {
    this.rows.set(row.batteryId, { ...row });
    this.markDirty();
  }

  applyLabel(batteryId: number, label: string): void {
    const row = this.rows.get(batteryId);
    if (!row) return;
    this.rows.set(batteryId, { ...row, label });
    this.markDirty();
  }

  getRow(batteryId: number): DisplayRow | undefined {
    return this.rows.get(batteryId);
  }

  findRowByLabel(label: string): DisplayRow | undefined {
    for (const row of this.rows.values()) {
      if (row.label === label) return row;
    }
    return undefined;
  }

  sortedRows(): DisplayRow[] {
    return [...this.rows.values()].sort(compareRows);
  }

  setRenameCallback(callback: RenameCallback | null): void {
    this.renameCallback = callback;
  }

  markDirty(): void {
    this.dirty = true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  // ---- input side ----

  getMode(): ViewMode {
    return this.mode;
  }

  getLogScroll(): number {
    return this.logScroll;
  }

  getPrompt(): Readonly<PromptState> | null {
    return this.prompt;
  }

  getFlash(): Readonly<Flash> | null {
    return this.flash;
  }

  isQuitRequested(): boolean {
    return this.quitRequested;
  }

  onQuit(listener: () => void): () => void {
    this.quitListeners.add(listener);
    return () => {
      this.quitListeners.delete(listener);
    };
  }

  /** Number of log lines that fit on screen; the renderer reports it on resize. */
  setViewport(visibleLogLines: number): void {
    const visible = Math.max(1, Math.floor(visibleLogLines));
    if (visible === this.visibleLogLines) return;
    this.visibleLogLines = visible;
    this.logScroll = this.clampScroll(this.logScroll);
    this.markDirty();
  }

  /**
   * Keys outside the prompt. While a prompt is open the text field owns the
   * keyboard and only Esc (cancel) and Ctrl-C (quit) get here.
   */
  handleKey(input: string, key: KeyPress = {}): void {
    if (key.ctrl && input === "c") {
      this.requestQuit();
      return;
    }

    if (this.prompt) {
      if (key.escape) this.cancelPrompt();
      return;
    }

    switch (input) {
      case "q":
        this.requestQuit();
        return;
      case "l":
      case "L":
        if (this.mode === "table") {
          this.mode = "log";
          this.logScroll = 0;
          this.markDirty();
        }
        return;
      case "t":
      case "T":
        if (this.mode === "log") {
          this.mode = "table";
          this.markDirty();
        }
        return;
      case "c":
      case "C":
        this.prompt = { stage: "target", input: "" };
        this.markDirty();
        return;
    }

    if (this.mode !== "log") return;

    // offset counts lines back from the newest entry
    if (key.upArrow || input === "j") {
      this.scrollBy(1);
    } else if (key.downArrow || input === "k") {
      this.scrollBy(-1);
    } else if (key.pageUp) {
      this.scrollBy(this.visibleLogLines);
    } else if (key.pageDown) {
      this.scrollBy(-this.visibleLogLines);
    }
  }

  setPromptInput(input: string): void {
    if (!this.prompt) return;
    this.prompt = { ...this.prompt, input };
    this.markDirty();
  }

  submitPrompt(): void {
    const prompt = this.prompt;
    if (!prompt) return;

    if (prompt.stage === "target") {
      const target = prompt.input.trim();
      if (!/^\d+$/.test(target)) {
        this.prompt = null;
        this.showFlash(`Invalid battery number: "${target}"`, "warn");
        return;
      }
      const row = this.findRowByLabel(target) ?? this.rows.get(Number(target));
      if (!row) {
        this.prompt = null;
        this.showFlash(`Battery ${target} not found`, "warn");
        return;
      }
      this.prompt = {
        stage: "label",
        input: "",
        batteryId: row.batteryId,
        currentLabel: row.label,
      };
      this.markDirty();
      return;
    }

    const label = prompt.input.trim();
    this.prompt = null;
    if (!label) {
      this.showFlash(`Label of ${prompt.currentLabel} unchanged`, "info");
      return;
    }
    const row = this.rows.get(prompt.batteryId);
    if (!row) {
      this.showFlash(`Battery ${prompt.currentLabel} not found`, "warn");
      return;
    }
    if (!this.renameCallback) {
      this.showFlash("Renaming is not available", "warn");
      return;
    }
    this.renameCallback(row.externalId, label);
    this.showFlash(`Battery ${prompt.currentLabel} renamed to ${label}`, "info");
  }

  cancelPrompt(): void {
    if (!this.prompt) return;
    this.prompt = null;
    this.markDirty();
  }

  showFlash(text: string, level: FlashLevel = "info"): void {
    this.flash = { text, level, expiresAt: this.now() + this.flashDurationMs };
    this.markDirty();
  }

  requestQuit(): void {
    if (this.quitRequested) return;
    this.quitRequested = true;
    this.markDirty();
    for (const l of this.quitListeners) l();
  }

  // ---- rendering ----

  subscribe(listener: (snapshot: ViewSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): ViewSnapshot {
    return this.current;
  }

  /**
   * One render step: expires the flash message and, when anything changed,
   * publishes a new snapshot. Returns whether a snapshot was published.
   */
  tick(): boolean {
    if (this.flash && this.flash.expiresAt <= this.now()) {
      this.flash = null;
      this.dirty = true;
    }
    if (!this.dirty) return false;
    this.dirty = false;
    this.logScroll = this.clampScroll(this.logScroll);
    this.current = this.buildSnapshot();
    for (const l of this.listeners) l(this.current);
    return true;
  }

  /** Ticks every refresh interval until `signal` aborts. */
  run(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const timer = setInterval(() => this.tick(), this.refreshIntervalMs);
      signal.addEventListener(
        "abort",
        () => {
          clearInterval(timer);
          resolve();
        },
        { once: true }
      );
      this.tick();
    });
  }

  dispose(): void {
    this.unsubscribeLog?.();
    this.unsubscribeLog = undefined;
    this.listeners.clear();
    this.quitListeners.clear();
  }

  private logLines(): readonly string[] {
    return this.logSource ? this.logSource.lines() : [];
  }

  private clampScroll(offset: number): number {
    const max = Math.max(0, this.logLines().length - this.visibleLogLines);
    return Math.min(Math.max(0, offset), max);
  }

  private scrollBy(delta: number): void {
    const next = this.clampScroll(this.logScroll + delta);
    if (next === this.logScroll) return;
    this.logScroll = next;
    this.markDirty();
  }

  private buildSnapshot(): ViewSnapshot {
    const all = this.logLines();
    const end = all.length - this.logScroll;
    const start = Math.max(0, end - this.visibleLogLines);
    return Object.freeze({
      mode: this.mode,
      rows: Object.freeze(this.sortedRows()),
      logLines: Object.freeze(all.slice(start, end)),
      logScroll: this.logScroll,
      logTotal: all.length,
      prompt: this.prompt ? { ...this.prompt } : null,
      flash: this.flash ? { text: this.flash.text, level: this.flash.level } : null,
      quitRequested: this.quitRequested,
    });
  }
}
