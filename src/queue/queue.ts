import type { RunTrigger } from '../scrape/targetDb.js';
import { logger } from '../shared/logger.js';
import { errorText } from '../shared/classify.js';
import { generateId } from '../shared/utils.js';

export interface JobArgs {
  'scrape.target': { targetId: number; trigger: RunTrigger };
  'scrape.all': { trigger: RunTrigger };
  'sync.record': { recordId: number; force?: boolean };
  'sync.sweep': Record<string, never>;
}

export type JobName = keyof JobArgs;

export type JobHandler<N extends JobName> = (args: JobArgs[N]) => Promise<void>;

export interface EnqueueOptions {
  delaySeconds?: number;
}

/**
 * Port to whatever runs background jobs. Pipeline code only enqueues by
 * name; which process executes the handler is the queue's business.
 */
export interface JobQueue {
  enqueue<N extends JobName>(name: N, args: JobArgs[N], opts?: EnqueueOptions): void;
  register<N extends JobName>(name: N, handler: JobHandler<N>): void;
}

type HandlerRegistry = { [K in JobName]?: JobHandler<K> };

interface QueuedJob {
  id: string;
  name: JobName;
  run: () => Promise<void>;
}

export interface QueueStats {
  completed: number;
  failed: number;
  delayed: number;
}

/**
 * In-process queue: jobs run one at a time in enqueue order, delayed jobs
 * wait on a timer. A failing handler is logged and counted; the queue
 * keeps going.
 */
export class LocalJobQueue implements JobQueue {
  private readonly handlers: HandlerRegistry = {};
  private readonly timers = new Set<NodeJS.Timeout>();
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private readonly stats: QueueStats = { completed: 0, failed: 0, delayed: 0 };

  register<N extends JobName>(name: N, handler: JobHandler<N>): void {
    this.handlers[name] = handler;
  }

  enqueue<N extends JobName>(name: N, args: JobArgs[N], opts: EnqueueOptions = {}): void {
    const job: QueuedJob = {
      id: generateId(10),
      name,
      run: async () => {
        const handler: JobHandler<N> | undefined = this.handlers[name];
        if (!handler) throw new Error(`No handler registered for job ${name}`);
        await handler(args);
      },
    };

    const delayMs = Math.max(0, (opts.delaySeconds ?? 0) * 1000);
    if (delayMs === 0) {
      this.push(job);
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.stats.delayed--;
      this.push(job);
    }, delayMs);
    timer.unref();
    this.timers.add(timer);
    this.stats.delayed++;
    logger.debug({ job: name, jobId: job.id, delaySeconds: opts.delaySeconds }, 'Job delayed');
  }

  private push(job: QueuedJob): void {
    this.pending++;
    this.chain = this.chain
      .then(() => this.execute(job))
      .finally(() => {
        this.pending--;
      });
  }

  private async execute(job: QueuedJob): Promise<void> {
    try {
      await job.run();
      this.stats.completed++;
    } catch (err) {
      this.stats.failed++;
      logger.error({ job: job.name, jobId: job.id, error: errorText(err) }, 'Job failed');
    }
  }

  /**
   * Resolves once every job that is ready to run has finished, including
   * jobs enqueued by handlers along the way. Delayed jobs are not awaited.
   */
  async onIdle(): Promise<void> {
    while (this.pending > 0) {
      await this.chain;
    }
  }

  getStats(): QueueStats {
    return { ...this.stats };
  }

  /**
   * Drop delayed jobs that have not fired yet. Returns how many were dropped.
   */
  close(): number {
    const dropped = this.timers.size;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.stats.delayed = 0;
    return dropped;
  }
}
