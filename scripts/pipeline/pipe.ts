import pLimit from "p-limit";
import { InvalidResourceDataError, errorMessage, formatId, toError } from "../../shared/errors";
import { type Metainfo, type ResourceId, type ResourceRequest, splitRequest } from "../../shared/schema";
import { log, logError, warn } from "../../server/log";
import { AsyncQueue } from "./async-queue";
import type { DataPool, ResourceHandle } from "./data-pool";

export type PipeState = "not-started" | "running" | "stop-requested" | "finished";

export interface PipeItem<T> {
  type: "item";
  id: ResourceId;
  /** Zero-based position of the request in the input. */
  orderId: number;
  metainfo: Metainfo;
  data: T;
}

export interface PipeError {
  type: "error";
  id: ResourceId;
  orderId: number;
  metainfo: Metainfo;
  error: Error;
}

export type PipeEnvelope<T> = PipeItem<T> | PipeError;

/** Turns a materialized resource into the value handed to consumers. */
export interface Retriever<T> {
  retrieve(handle: ResourceHandle, resourceId: ResourceId): Promise<T>;
}

export interface BatchRetrieveOptions {
  maxWorkers?: number;
  /** Stop once the consumer has received this many counted envelopes. */
  maxCount?: number;
  /** Count `PipeError`s towards `maxCount` as well as items. */
  countErrors?: boolean;
  queueSize?: number;
  silent?: boolean;
}

interface SessionContext<T> {
  signal: AbortSignal;
  emit(envelope: PipeEnvelope<T>): Promise<boolean>;
}

/**
 * Consumer side of one `batchRetrieve` call. Work starts on the first pull;
 * iteration yields successful items in completion order and ends once a stop
 * was requested and everything already buffered has been read.
 */
export class PipeSession<T> implements AsyncIterable<PipeItem<T>> {
  readonly errors: PipeError[] = [];
  private currentState: PipeState = "not-started";
  private readonly queue: AsyncQueue<PipeEnvelope<T>>;
  private readonly stopController = new AbortController();
  private readonly finishedController = new AbortController();
  private openGate: () => void = () => {};
  private readonly completion: Promise<void>;

  constructor(
    run: (context: SessionContext<T>) => Promise<void>,
    private readonly options: { queueSize: number; maxCount?: number; countErrors: boolean },
  ) {
    this.queue = new AsyncQueue(options.queueSize);
    const gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
    const context: SessionContext<T> = {
      signal: this.stopController.signal,
      emit: (envelope) => this.emit(envelope),
    };

    this.completion = gate
      .then(async () => {
        if (this.stopController.signal.aborted) return;
        this.currentState = "running";
        await run(context);
      })
      .catch((err: unknown) => {
        logError("Pipeline coordinator failed", err, "pipe");
      })
      .finally(() => {
        this.requestStop();
        this.currentState = "finished";
        this.finishedController.abort();
      });
  }

  get state(): PipeState {
    return this.currentState;
  }

  get stopRequested(): boolean {
    return this.stopController.signal.aborted;
  }

  private async emit(envelope: PipeEnvelope<T>): Promise<boolean> {
    if (this.currentState === "finished") return false;
    return this.queue.push(envelope, this.stopController.signal);
  }

  private requestStop(): void {
    if (this.currentState === "not-started" || this.currentState === "running") {
      this.currentState = "stop-requested";
    }
    this.stopController.abort();
    this.openGate();
  }

  private pull(signal: AbortSignal, timeoutMs?: number): Promise<PipeEnvelope<T> | undefined> {
    this.openGate();
    return this.queue.shift({ signal, timeoutMs });
  }

  /** Next envelope of either kind; `undefined` on timeout or once finished and drained. */
  async next(timeoutMs?: number): Promise<PipeEnvelope<T> | undefined> {
    return this.pull(this.finishedController.signal, timeoutMs);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<PipeItem<T>> {
    let counted = 0;
    const { maxCount } = this.options;
    try {
      if (maxCount !== undefined && maxCount <= 0) return;
      for (;;) {
        const envelope = await this.pull(this.stopController.signal);
        if (envelope === undefined) {
          if (this.stopRequested && this.queue.isEmpty()) return;
          continue;
        }

        if (envelope.type === "error") {
          this.errors.push(envelope);
          if (this.options.countErrors) counted++;
        } else {
          counted++;
          yield envelope;
        }
        if (maxCount !== undefined && counted >= maxCount) return;
      }
    } finally {
      this.requestStop();
    }
  }

  /**
   * Requests a stop. With `wait`, resolves once the coordinator has finished
   * (or after `timeoutMs`); the result says whether it finished.
   */
  async shutdown(wait = true, timeoutMs?: number): Promise<boolean> {
    this.requestStop();
    if (wait) {
      if (timeoutMs === undefined) {
        await this.completion;
      } else {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<void>((resolve) => {
          timer = setTimeout(resolve, timeoutMs);
        });
        try {
          await Promise.race([this.completion, timeout]);
        } finally {
          clearTimeout(timer);
        }
      }
    }
    return this.currentState === "finished";
  }
}

export class Pipe<T> {
  constructor(
    readonly pool: DataPool,
    readonly retriever: Retriever<T>,
  ) {}

  retrieve(resourceId: ResourceId, metainfo: Metainfo = null): Promise<T> {
    return this.pool.withResource(resourceId, metainfo, (handle) => this.retriever.retrieve(handle, resourceId));
  }

  batchRetrieve(
    requests: Iterable<ResourceRequest> | AsyncIterable<ResourceRequest>,
    options: BatchRetrieveOptions = {},
  ): PipeSession<T> {
    const maxWorkers = options.maxWorkers ?? 12;
    const silent = options.silent ?? false;
    return new PipeSession<T>((context) => this.coordinate(requests, context, maxWorkers, silent), {
      queueSize: options.queueSize ?? maxWorkers * 3,
      maxCount: options.maxCount,
      countErrors: options.countErrors ?? false,
    });
  }

  private async runTask(
    resourceId: ResourceId,
    metainfo: Metainfo,
    orderId: number,
    context: SessionContext<T>,
  ): Promise<boolean> {
    if (context.signal.aborted) return false;

    let envelope: PipeEnvelope<T>;
    try {
      const data = await this.retrieve(resourceId, metainfo);
      envelope = { type: "item", id: resourceId, orderId, metainfo, data };
    } catch (err: unknown) {
      if (err instanceof InvalidResourceDataError) {
        warn(`Resource ${formatId(resourceId)} skipped: ${errorMessage(err)}`, "pipe");
      } else {
        logError(`Error occurred when retrieving resource ${formatId(resourceId)}`, err, "pipe");
      }
      envelope = { type: "error", id: resourceId, orderId, metainfo, error: toError(err) };
    }
    await context.emit(envelope);
    return true;
  }

  private async coordinate(
    requests: Iterable<ResourceRequest> | AsyncIterable<ResourceRequest>,
    context: SessionContext<T>,
    maxWorkers: number,
    silent: boolean,
  ): Promise<void> {
    const limit = pLimit(maxWorkers);
    const running = new Set<Promise<void>>();
    let submitted = 0;
    let processed = 0;
    const startTime = Date.now();

    // dispatched tasks drain even when the input throws
    try {
      for await (const request of requests) {
        if (context.signal.aborted) break;
        // keep at most `maxWorkers` tasks waiting behind the running ones
        while (limit.pendingCount >= maxWorkers && running.size > 0) {
          await Promise.race(running);
        }
        if (context.signal.aborted) break;

        const [resourceId, metainfo] = splitRequest(request);
        const orderId = submitted++;
        const task: Promise<void> = limit(() => this.runTask(resourceId, metainfo, orderId, context)).then(
          (attempted) => {
            running.delete(task);
            if (!attempted) return;
            processed++;
            if (!silent && processed % 10 === 0) {
              const elapsed = (Date.now() - startTime) / 1000;
              log(`Progress: ${processed}/${submitted} retrieved | ${(processed / elapsed).toFixed(1)} items/sec`, "pipe");
            }
          },
        );
        running.add(task);
      }
    } finally {
      await Promise.all(running);
      limit.clearQueue();
    }

    if (!silent) {
      log(`Pipeline finished: ${processed} of ${submitted} submitted resources processed`, "pipe");
    }
  }
}
