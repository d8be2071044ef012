export class LeadlineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'LeadlineError';
  }
}

export class ConfigError extends LeadlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends LeadlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class NotFoundError extends LeadlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export type FetchErrorKind = 'network' | 'timeout' | 'http';

export class FetchError extends LeadlineError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class SelectorError extends LeadlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SELECTOR_ERROR', details);
    this.name = 'SelectorError';
  }
}

export class CrmApiError extends LeadlineError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'CRM_API_ERROR', { status, body, ...details });
    this.name = 'CrmApiError';
  }
}

export class TransitionError extends LeadlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSITION_ERROR', details);
    this.name = 'TransitionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
