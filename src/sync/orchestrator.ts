import type Database from 'better-sqlite3';
import { crmReadiness, type Config } from '../shared/config.js';
import { classifyError, errorText, type FailureCategory } from '../shared/classify.js';
import { hashObject } from '../shared/hashing.js';
import { logger } from '../shared/logger.js';
import { requireProspect, setProspectStatus } from '../prospects/prospectDb.js';
import { isTerminal } from '../prospects/status.js';
import { ensureSyncState, markFailed, markSynced } from './syncDb.js';
import { buildCrmPayload, extractExternalId, hasMeaningfulFields } from './payload.js';
import type { CrmClient } from './crmClient.js';

const BASE_DELAY_SECONDS = 30;
const MAX_DELAY_SECONDS = 3600;

/**
 * Exponential backoff for the n-th failed attempt: 60s, 120s, 240s, ...
 * capped at one hour.
 */
export function retryDelaySeconds(attempts: number): number {
  return Math.min(BASE_DELAY_SECONDS * 2 ** Math.min(attempts, 10), MAX_DELAY_SECONDS);
}

export type SyncResult =
  | { status: 'disabled' | 'not_configured' | 'empty' | 'skipped'; recordId: number }
  | { status: 'synced'; recordId: number; externalId: string }
  | {
      status: 'error';
      recordId: number;
      error: string;
      category: FailureCategory;
      attempts: number;
      retryDelaySeconds: number;
      nextRetryAt: Date;
      willRetry: boolean;
    };

export interface SyncOptions {
  force?: boolean;
  now?: Date;
}

/**
 * Pushes one record at a time to the CRM. The sync_states row is the only
 * retry bookkeeping: callers re-enqueue after `retryDelaySeconds` when the
 * result says `willRetry`.
 */
export class SyncOrchestrator {
  constructor(
    private readonly db: Database.Database,
    private readonly crm: Readonly<Config['crm']>,
    private readonly client: CrmClient,
  ) {}

  async syncRecord(recordId: number, opts: SyncOptions = {}): Promise<SyncResult> {
    const readiness = crmReadiness(this.crm);
    if (readiness !== 'ready') {
      if (readiness === 'not_configured') {
        logger.warn({ recordId }, 'CRM sync enabled but base_url or token missing');
      }
      return { status: readiness, recordId };
    }

    const prospect = requireProspect(this.db, recordId);
    if (!hasMeaningfulFields(prospect)) {
      logger.debug({ recordId }, 'Record has nothing to export, not syncing');
      return { status: 'empty', recordId };
    }

    const state = ensureSyncState(this.db, recordId);
    const payload = buildCrmPayload(prospect, this.crm.defaults);
    const payloadHash = hashObject(payload);
    const payloadJson = JSON.stringify(payload);

    if (!opts.force && state.status === 'synced' && state.payload_hash && state.payload_hash === payloadHash) {
      return { status: 'skipped', recordId };
    }

    try {
      const response = state.external_id
        ? await this.client.update(state.external_id, payload)
        : await this.client.create(payload);
      const externalId = extractExternalId(response);

      const commit = this.db.transaction(() => {
        markSynced(this.db, state, { payloadHash, payload: payloadJson, externalId, at: opts.now ?? new Date() });
        const current = requireProspect(this.db, recordId);
        if (!isTerminal(current.status)) {
          setProspectStatus(this.db, recordId, 'synced');
        }
      });
      commit();

      logger.info({ recordId, externalId: externalId || state.external_id }, 'Record synced to CRM');
      return { status: 'synced', recordId, externalId: externalId || state.external_id };
    } catch (err) {
      const now = opts.now ?? new Date();
      const attempts = state.attempts + 1;
      const delay = retryDelaySeconds(attempts);
      const nextRetryAt = new Date(now.getTime() + delay * 1000);
      const message = errorText(err);

      markFailed(this.db, state, { attempts, error: message, payload: payloadJson, nextRetryAt });

      const willRetry = attempts <= this.crm.max_retries;
      logger.error({ recordId, attempts, delay, willRetry, error: message }, 'CRM sync failed');
      return {
        status: 'error',
        recordId,
        error: message,
        category: classifyError(err),
        attempts,
        retryDelaySeconds: delay,
        nextRetryAt,
        willRetry,
      };
    }
  }
}
