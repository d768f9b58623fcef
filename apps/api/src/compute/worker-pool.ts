// ---------------------------------------------------------------------------
// Bounded worker-thread pool for CPU-bound request work
// ---------------------------------------------------------------------------

import { Worker } from "node:worker_threads";
import { z } from "zod";
import { AppError, errorMessage } from "../lib/errors.js";

export interface WorkerPoolOptions<TIn, TOut> {
  /**
   * Runs inside each worker. Only its source text crosses the thread
   * boundary, so it must not reference imports or outer variables.
   */
  handler: (input: TIn) => TOut;
  /** Validates the structured-clone reply coming back from a worker. */
  decode: (value: unknown) => TOut;
  /** Number of worker threads. */
  size: number;
}

export interface WorkerPoolStats {
  size: number;
  busy: number;
  queued: number;
}

interface Task<TIn, TOut> {
  input: TIn;
  resolve: (value: TOut) => void;
  reject: (error: Error) => void;
}

interface Slot<TIn, TOut> {
  worker: Worker;
  task: Task<TIn, TOut> | null;
}

const WorkerReply = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), message: z.string() }),
]);

function workerSource(handlerSource: string): string {
  return `
const { parentPort } = require("node:worker_threads");
const handler = ${handlerSource};
parentPort.on("message", (input) => {
  let reply;
  try {
    reply = { ok: true, value: handler(input) };
  } catch (err) {
    reply = { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
  parentPort.postMessage(reply);
});
`;
}

export class WorkerPool<TIn, TOut> {
  private readonly source: string;
  private readonly decode: (value: unknown) => TOut;
  private readonly slots: Slot<TIn, TOut>[] = [];
  private readonly queue: Task<TIn, TOut>[] = [];
  private closed = false;

  constructor(options: WorkerPoolOptions<TIn, TOut>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(
        `Worker pool size must be a positive integer, got ${options.size}`,
      );
    }
    this.source = workerSource(options.handler.toString());
    this.decode = options.decode;
    for (let i = 0; i < options.size; i++) {
      this.slots.push(this.spawn());
    }
  }

  /** Queues `input` and resolves once a worker has computed the result. */
  run(input: TIn): Promise<TOut> {
    if (this.closed) {
      return Promise.reject(new AppError(503, "Compute pool is closed"));
    }
    return new Promise<TOut>((resolve, reject) => {
      this.queue.push({ input, resolve, reject });
      this.dispatch();
    });
  }

  stats(): WorkerPoolStats {
    return {
      size: this.slots.length,
      busy: this.slots.filter((slot) => slot.task !== null).length,
      queued: this.queue.length,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const error = new AppError(503, "Compute pool is closed");
    for (const task of this.queue.splice(0)) {
      task.reject(error);
    }

    const slots = this.slots.splice(0);
    for (const slot of slots) {
      slot.task?.reject(error);
      slot.task = null;
    }
    await Promise.all(slots.map((slot) => slot.worker.terminate()));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private spawn(): Slot<TIn, TOut> {
    const worker = new Worker(this.source, { eval: true });
    const slot: Slot<TIn, TOut> = { worker, task: null };

    worker.on("message", (raw: unknown) => this.settle(slot, raw));
    worker.on("error", (err: Error) =>
      this.replace(
        slot,
        new AppError(500, `Compute worker crashed: ${err.message}`),
      ),
    );
    worker.on("exit", (code: number) =>
      this.replace(
        slot,
        new AppError(500, `Compute worker exited with code ${code}`),
      ),
    );

    return slot;
  }

  private settle(slot: Slot<TIn, TOut>, raw: unknown): void {
    const task = slot.task;
    slot.task = null;
    if (task) {
      try {
        const reply = WorkerReply.parse(raw);
        if (reply.ok) {
          task.resolve(this.decode(reply.value));
        } else {
          task.reject(new AppError(500, `Computation failed: ${reply.message}`));
        }
      } catch (err) {
        task.reject(
          new AppError(500, `Malformed compute reply: ${errorMessage(err)}`),
        );
      }
    }
    this.dispatch();
  }

  /** Fails the slot's in-flight task and puts a fresh worker in its place. */
  private replace(slot: Slot<TIn, TOut>, error: AppError): void {
    const index = this.slots.indexOf(slot);
    // Already replaced, or removed by close()
    if (index === -1) return;

    slot.task?.reject(error);
    slot.task = null;
    this.slots[index] = this.spawn();
    this.dispatch();
  }

  private dispatch(): void {
    for (const slot of this.slots) {
      if (slot.task !== null) continue;
      const task = this.queue.shift();
      if (!task) return;
      slot.task = task;
      slot.worker.postMessage(task.input);
    }
  }
}
