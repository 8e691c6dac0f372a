import { Mutex } from 'async-mutex';
import { ExternalOperationError, ValidationError, describeError } from '../errors.js';
import { createLogger, logMetric } from '../logger.js';
import { notifySafely, type Notifier, type ScaleSignal } from './notifier.js';
import type { AppliedFactorProbe, Rethemer } from './splash.js';

const logger = createLogger('ScaleQueue');

export interface ScaleJob {
  factor: number;
  notify: boolean;
}

export interface QueueSnapshot {
  active: boolean;
  pending: ScaleJob | null;
}

export interface CoalescingQueueOptions {
  rethemer: Rethemer;
  notifier: Notifier;
  probe?: AppliedFactorProbe;
  minFactor?: number;
  maxFactor?: number;
  metricsDir?: string;
}

/**
 * Drives the boot-splash retheme for scale changes.
 *
 * At most one rethemer call runs at a time. Requests that arrive while one is
 * running collapse into a single pending slot; only the latest survives, and
 * it is applied once the running call returns. `active` and `pending` change
 * only under `mutex`, and the mutex is never held across the rethemer call.
 *
 * Invariant: `!active` implies `pending === null`.
 */
export class CoalescingQueue {
  readonly minFactor: number;
  readonly maxFactor: number;

  private readonly rethemer: Rethemer;
  private readonly notifier: Notifier;
  private readonly probe?: AppliedFactorProbe;
  private readonly metricsDir?: string;

  private readonly mutex = new Mutex();
  private active = false;
  private pending: ScaleJob | null = null;
  private idleWaiters: Array<() => void> = [];
  private applied: number | undefined;

  constructor(options: CoalescingQueueOptions) {
    this.rethemer = options.rethemer;
    this.notifier = options.notifier;
    this.probe = options.probe;
    this.metricsDir = options.metricsDir;
    this.minFactor = options.minFactor ?? 1;
    this.maxFactor = options.maxFactor ?? 2;
    if (!Number.isInteger(this.minFactor) || !Number.isInteger(this.maxFactor) || this.minFactor > this.maxFactor) {
      throw new ValidationError(`Invalid factor bounds [${this.minFactor}, ${this.maxFactor}]`);
    }
  }

  clamp(factor: number): number {
    return Math.min(this.maxFactor, Math.max(this.minFactor, factor));
  }

  /**
   * Requests a retheme at `factor`. Resolves as soon as the request is either
   * running or parked in the pending slot; it never waits for the rethemer.
   *
   * @throws ValidationError synchronously for a non-integer factor
   */
  submit(factor: number, notify = true): Promise<void> {
    if (!Number.isInteger(factor)) {
      throw new ValidationError(`Scale factor must be an integer, got ${factor}`);
    }
    const job: ScaleJob = { factor: this.clamp(factor), notify };

    return this.mutex
      .runExclusive(() => {
        if (this.active) {
          if (this.pending) {
            logger.debug(`Superseding pending factor ${this.pending.factor} with ${job.factor}`);
          } else {
            logger.debug(`Queued factor ${job.factor}`);
          }
          this.pending = job;
          return false;
        }
        this.active = true;
        return true;
      })
      .then((claimed) => {
        if (claimed) {
          this.run(job).catch((e) => logger.error(`Worker crashed: ${describeError(e)}`));
        }
      });
  }

  /** Resolves once no worker is running. */
  onIdle(): Promise<void> {
    if (!this.active) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  snapshot(): QueueSnapshot {
    return { active: this.active, pending: this.pending ? { ...this.pending } : null };
  }

  /** Last factor the rethemer accepted in this process. */
  get lastApplied(): number | undefined {
    return this.applied;
  }

  private async run(first: ScaleJob): Promise<void> {
    let job: ScaleJob | null = first;
    try {
      while (job) {
        await this.process(job);
        job = await this.mutex.runExclusive(() => this.takePending());
      }
    } catch (e) {
      await this.mutex.runExclusive(() => {
        this.pending = null;
        this.goIdle();
      });
      throw e;
    }
  }

  private takePending(): ScaleJob | null {
    const next = this.pending;
    this.pending = null;
    if (!next) {
      this.goIdle();
      return null;
    }
    logger.debug(`Draining pending factor ${next.factor}`);
    // drained jobs always notify
    return { factor: next.factor, notify: true };
  }

  // Called under the mutex, so a submit cannot claim the worker role between
  // clearing `active` and releasing the waiters.
  private goIdle(): void {
    this.active = false;
    this.idleWaiters.splice(0).forEach((resolve) => resolve());
  }

  private async process(job: ScaleJob): Promise<void> {
    logger.debug(`Retheme splash at factor ${job.factor}`);

    const current = await this.currentFactor();
    if (current === job.factor) {
      logger.debug(`Splash already at factor ${job.factor}`);
      await this.signal('SetScaleFactorStarted', job);
      await this.signal('SetScaleFactorDone', job);
      return;
    }

    await this.signal('SetScaleFactorStarted', job);
    const startedAt = Date.now();
    try {
      await this.rethemer.apply(job.factor);
      this.applied = job.factor;
    } catch (e) {
      const err =
        e instanceof ExternalOperationError
          ? e
          : new ExternalOperationError(`Retheme to factor ${job.factor} failed`, job.factor, { cause: e });
      logger.warn(describeError(err));
    }
    await this.recordLatency(job.factor, Date.now() - startedAt);
    await this.signal('SetScaleFactorDone', job);
    logger.debug(`End retheme at factor ${job.factor}`);
  }

  private async currentFactor(): Promise<number | undefined> {
    if (!this.probe) return this.applied;
    try {
      return await this.probe.currentFactor();
    } catch (e) {
      logger.warn(`Cannot query applied factor: ${describeError(e)}`);
      return undefined;
    }
  }

  private async signal(signal: ScaleSignal, job: ScaleJob): Promise<void> {
    if (!job.notify) return;
    await notifySafely(this.notifier, signal, logger);
  }

  private async recordLatency(factor: number, ms: number): Promise<void> {
    if (!this.metricsDir) return;
    await logMetric(this.metricsDir, 'queue', 'retheme_latency_ms', ms, { factor });
  }
}
