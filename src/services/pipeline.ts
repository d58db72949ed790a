import { CancellationError } from "../common/errors";
import { Logger } from "../common/logger";
import { BeaconOrigin, TelemetrySnapshot } from "../types";
import { TelemetrySink } from "../beacon/extractor";
import { RenameCallback } from "../ui/view";
import { DisplayController } from "./controller";

export type IngestionEvent =
  | {
      type: "telemetry";
      snapshot: TelemetrySnapshot;
      externalId: string;
      origin?: BeaconOrigin;
    }
  | { type: "labelChange"; externalId: string; label: string };

export type EventHandler = Pick<DisplayController, "handleTelemetry" | "handleLabelChange">;

export interface PipelineStats {
  processed: number;
  failed: number;
  pending: number;
}

export type PipelineOptions = {
  /** Queue length above which a warning is logged, once per crossing. */
  backlogWarningThreshold?: number;
};

const DEFAULT_BACKLOG_WARNING = 500;

/**
 * Single-consumer FIFO between the scanner callback, the rename prompt and the
 * controller. Submitting never waits; events are handled one at a time in
 * arrival order, so repository and row state only ever change here.
 */
export class IngestionPipeline implements TelemetrySink {
  private readonly queue: IngestionEvent[] = [];
  private draining = false;
  private drainScheduled = false;
  private closed = false;
  private backlogWarned = false;
  private processed = 0;
  private failed = 0;
  private idleWaiters: (() => void)[] = [];
  private readonly backlogWarningThreshold: number;

  constructor(
    private readonly handler: EventHandler,
    private readonly logger: Logger,
    options: PipelineOptions = {}
  ) {
    this.backlogWarningThreshold =
      options.backlogWarningThreshold ?? DEFAULT_BACKLOG_WARNING;
  }

  submitTelemetry(
    snapshot: TelemetrySnapshot,
    externalId: string,
    origin?: BeaconOrigin
  ): void {
    this.enqueue({ type: "telemetry", snapshot, externalId, origin });
  }

  submitLabelChange(externalId: string, label: string): void {
    this.enqueue({ type: "labelChange", externalId, label });
  }

  /** Routes the view's rename prompt into the queue. */
  attach(view: { setRenameCallback(callback: RenameCallback | null): void }): void {
    view.setRenameCallback((externalId, label) => {
      try {
        this.submitLabelChange(externalId, label);
      } catch (err) {
        if (!(err instanceof CancellationError)) throw err;
        this.logger
          .with()
          .str("externalId", externalId)
          .logger()
          .warn("Rename ignored, ingestion is shutting down");
      }
    });
  }

  stats(): PipelineStats {
    return {
      processed: this.processed,
      failed: this.failed,
      pending: this.queue.length,
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Resolves once the queue is empty and no event is being handled. */
  drained(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Refuses further events and waits for the queued ones. */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.logger
        .with()
        .num("pending", this.queue.length)
        .logger()
        .debug("Ingestion pipeline closing");
    }
    await this.drained();
  }

  private enqueue(event: IngestionEvent): void {
    if (this.closed) {
      throw new CancellationError("Ingestion pipeline is closed");
    }
    this.queue.push(event);

    if (this.queue.length > this.backlogWarningThreshold) {
      if (!this.backlogWarned) {
        this.backlogWarned = true;
        this.logger
          .with()
          .num("pending", this.queue.length)
          .num("threshold", this.backlogWarningThreshold)
          .logger()
          .warn("Ingestion backlog is growing");
      }
    } else {
      this.backlogWarned = false;
    }

    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.draining) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return; // prevent re-entry
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event) {
        await this.handle(event);
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
      if (this.queue.length) {
        this.scheduleDrain();
      } else if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const w of waiters) w();
      }
    }
  }

  private async handle(event: IngestionEvent): Promise<void> {
    try {
      if (event.type === "telemetry") {
        await this.handler.handleTelemetry(event.snapshot, event.externalId, event.origin);
      } else {
        await this.handler.handleLabelChange(event.externalId, event.label);
      }
      this.processed++;
    } catch (err) {
      this.failed++;
      this.logger
        .with()
        .str("event", event.type)
        .str("externalId", event.externalId)
        .error(err)
        .logger()
        .error("Ingestion event failed");
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.draining && !this.drainScheduled;
  }
}
