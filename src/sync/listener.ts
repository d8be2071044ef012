import type { ProspectEvents } from '../prospects/events.js';
import type { JobQueue } from '../queue/queue.js';

/**
 * Turns "record ready" events into sync jobs. This is the only place where
 * scraping leads to syncing.
 */
export class SyncListener {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly events: ProspectEvents,
    private readonly queue: JobQueue,
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.events.subscribe((event) => {
      this.queue.enqueue('sync.record', { recordId: event.prospectId });
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
