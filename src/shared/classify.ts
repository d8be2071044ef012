/**
 * Best-effort failure classification by substring match over the lower-cased
 * error text. Deterministic: the same text always yields the same category.
 * Groups are checked in order (network, timeout, config), first hit wins.
 */

export type FailureCategory = 'network' | 'timeout' | 'config' | 'fatal';

const NETWORK_PATTERNS = [
  'dns',
  'resolve',
  'getaddrinfo',
  'enotfound',
  'econnrefused',
  'econnreset',
  'ehostunreach',
  'network error',
  'connection',
];

const TIMEOUT_PATTERNS = ['timeout', 'timed out', 'etimedout'];

const CONFIG_PATTERNS = ['selector', 'config'];

export function classifyMessage(text: string): FailureCategory {
  const lower = text.toLowerCase();
  if (NETWORK_PATTERNS.some((p) => lower.includes(p))) return 'network';
  if (TIMEOUT_PATTERNS.some((p) => lower.includes(p))) return 'timeout';
  if (CONFIG_PATTERNS.some((p) => lower.includes(p))) return 'config';
  return 'fatal';
}

export function errorText(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error && cause.message && !err.message.includes(cause.message)) {
    return `${err.message}: ${cause.message}`;
  }
  return err.message;
}

export function classifyError(err: unknown): FailureCategory {
  return classifyMessage(errorText(err));
}

/**
 * Contained failures end the one run but leave the job "handled" so sibling
 * targets keep going. Fatal ones propagate to the queue's failure path.
 */
export function isContained(category: FailureCategory): boolean {
  return category !== 'fatal';
}
