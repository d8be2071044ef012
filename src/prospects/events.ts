import { logger } from '../shared/logger.js';

export interface ProspectReadyEvent {
  prospectId: number;
  created: boolean;
  /** Null when the record changed outside a scrape run, e.g. by enrichment. */
  targetId: number | null;
  runId: number | null;
}

export type ProspectReadyListener = (event: ProspectReadyEvent) => void;

/**
 * "Record ready for sync" channel between the scrape job and whatever
 * exports records. The scrape side only publishes; it never imports sync code.
 */
export class ProspectEvents {
  private readonly listeners: ProspectReadyListener[] = [];

  subscribe(listener: ProspectReadyListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  publish(event: ProspectReadyEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error(
          { prospectId: event.prospectId, error: err instanceof Error ? err.message : String(err) },
          'Record-ready listener failed',
        );
      }
    }
  }

  listenerCount(): number {
    return this.listeners.length;
  }
}
