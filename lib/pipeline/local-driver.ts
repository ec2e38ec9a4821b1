/**
 * Local Driver
 *
 * Runs the whole pipeline in one process. Every write to the store becomes
 * an object-created notification, and `drain()` delivers notifications to
 * the stages whose prefix matches, the way storage triggers would.
 */

import type { AppConfig } from "../config.js";
import type { ObjectStore } from "../storage/types.js";
import type { TriggerRecord } from "./core/schemas.js";
import { runBatch } from "./runner/batch.js";
import { createPipeline, type CreatePipelineOptions, type Pipeline } from "./runner/factory.js";
import type { RecordOutcome } from "./runner/types.js";

const DEFAULT_MAX_DELIVERIES = 100_000;

/**
 * Store wrapper that reports every completed `put`.
 */
export class NotifyingObjectStore implements ObjectStore {
  constructor(
    private readonly inner: ObjectStore,
    private readonly bucket: string,
    private readonly onCreated: (record: TriggerRecord) => void
  ) {}

  get(key: string): Promise<Buffer | null> {
    return this.inner.get(key);
  }

  async put(key: string, body: Buffer | string, contentType?: string): Promise<void> {
    await this.inner.put(key, body, contentType);
    this.onCreated({ bucket: this.bucket, key });
  }

  exists(key: string): Promise<boolean> {
    return this.inner.exists(key);
  }

  list(prefix: string): Promise<string[]> {
    return this.inner.list(prefix);
  }
}

export interface LocalDriverOptions extends CreatePipelineOptions {
  store: ObjectStore;
  maxDeliveries?: number;
}

export interface Delivery {
  stage: string;
  outcome: RecordOutcome;
}

export class LocalDriver {
  private readonly queue: TriggerRecord[] = [];
  private readonly maxDeliveries: number;
  readonly store: ObjectStore;
  readonly pipeline: Pipeline;

  constructor(config: AppConfig, options: LocalDriverOptions) {
    this.maxDeliveries = options.maxDeliveries ?? DEFAULT_MAX_DELIVERIES;
    this.store = new NotifyingObjectStore(options.store, config.bucket, (record) =>
      this.queue.push(record)
    );
    this.pipeline = createPipeline(config, { ...options, store: this.store });
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Write a source file under the raw prefix. */
  async upload(name: string, body: Buffer): Promise<string> {
    const key = `${this.pipeline.config.prefixes.raw}${name}`;
    await this.store.put(key, body);
    return key;
  }

  /**
   * Deliver queued notifications, including the ones produced while
   * draining, until the queue is empty.
   */
  async drain(): Promise<Delivery[]> {
    const { context, stages } = this.pipeline;
    const deliveries: Delivery[] = [];

    let record = this.queue.shift();
    while (record) {
      if (deliveries.length >= this.maxDeliveries) {
        throw new Error(`Stopped after ${this.maxDeliveries} deliveries; the pipeline is not settling`);
      }
      const { key } = record;
      for (const stage of stages.filter((s) => key.startsWith(s.prefix))) {
        const outcomes = await runBatch(stage, { records: [record] }, context.bucket, context.progress);
        for (const outcome of outcomes) {
          deliveries.push({ stage: stage.name, outcome });
        }
      }
      record = this.queue.shift();
    }
    return deliveries;
  }
}
