import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { DeliveryPipeline } from "./pipeline.js";
import type { PipelineJob, PipelineOutcome } from "./types.js";

export interface DeliveryWorkerOptions {
  logger: Logger;
  /**
   * Queue jobs per conversation key so rapid messages in one thread reach the
   * assistant in arrival order. Jobs for different keys always run in parallel.
   */
  serializePerConversation: boolean;
  /** Observer for finished jobs. */
  onSettled?: (outcome: PipelineOutcome) => void;
}

/**
 * Runs pipelines outside the webhook request. `send` is one-way: the caller
 * gets nothing back and never waits on the job.
 */
export class DeliveryWorker {
  private readonly lanes = new Map<string, PipelineJob[]>();
  private readonly tasks = new Set<Promise<void>>();
  private laneSeq = 0;

  constructor(
    private readonly pipeline: DeliveryPipeline,
    private readonly opts: DeliveryWorkerOptions,
  ) {}

  /** Jobs sent but not yet finished, including the one running in each lane. */
  get pending(): number {
    let count = 0;
    for (const queue of this.lanes.values()) count += queue.length;
    return count;
  }

  send(job: PipelineJob): void {
    const lane = this.opts.serializePerConversation ? job.key : `${job.key}#${++this.laneSeq}`;
    const queue = this.lanes.get(lane);
    if (queue) {
      // A drain loop for this lane is already running and will pick it up.
      queue.push(job);
      this.opts.logger.debug(`${job.key.slice(0, 12)} queued behind ${queue.length - 1} job(s)`);
      return;
    }

    this.lanes.set(lane, [job]);
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain(lane))
      .catch((error: unknown) => {
        this.opts.logger.error(`Delivery lane ${lane.slice(0, 12)} crashed: ${describeError(error)}`);
      })
      .finally(() => {
        this.lanes.delete(lane);
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  /** Resolves once every job sent so far (and any sent meanwhile) has settled. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  private async drain(lane: string): Promise<void> {
    const queue = this.lanes.get(lane);
    if (!queue) return;

    let job = queue[0];
    while (job) {
      const outcome = await this.pipeline.run(job);
      try {
        this.opts.onSettled?.(outcome);
      } catch (error) {
        this.opts.logger.warn(`onSettled observer threw: ${describeError(error)}`);
      }
      queue.shift();
      job = queue[0];
    }
  }
}
