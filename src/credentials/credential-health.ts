import type { CredentialRecord, CredentialStatus } from '../persistence/types';
import type { CredentialOutcome, HealthPolicy } from './types';

// Caps the exponent so a long failure streak cannot overflow the window arithmetic.
const MAX_BACKOFF_EXPONENT = 20;

/**
 * Cooldown window once `consecutiveFailures` has reached the threshold: the base window,
 * doubled for every failure beyond the threshold, capped at the maximum.
 */
export function cooldownWindowSeconds(consecutiveFailures: number, policy: HealthPolicy): number {
  const exponent = Math.min(
    Math.max(consecutiveFailures - policy.failureThreshold, 0),
    MAX_BACKOFF_EXPONENT,
  );
  return Math.min(policy.cooldownBaseSeconds * 2 ** exponent, policy.cooldownMaxSeconds);
}

/**
 * Status as selection sees it: a cooldown whose window has elapsed counts as active.
 */
export function effectiveStatus(record: CredentialRecord, now: number): CredentialStatus {
  if (record.status !== 'cooling_down') {
    return record.status;
  }

  const until = record.cooldownUntil ? Date.parse(record.cooldownUntil) : Number.NaN;
  if (Number.isNaN(until) || now >= until) {
    return 'active';
  }
  return 'cooling_down';
}

export function isEligible(record: CredentialRecord, now: number): boolean {
  return effectiveStatus(record, now) === 'active';
}

/**
 * Next state of a credential after an upstream call. Returns the same object when nothing
 * changes; `disabled` is terminal.
 */
export function applyOutcome(
  record: CredentialRecord,
  outcome: CredentialOutcome,
  now: number,
  policy: HealthPolicy,
): CredentialRecord {
  if (record.status === 'disabled') {
    return record;
  }

  switch (outcome) {
    case 'success':
      return {
        ...record,
        status: 'active',
        consecutiveFailures: 0,
        cooldownUntil: undefined,
        lastUsedAt: new Date(now).toISOString(),
      };
    case 'transient_failure': {
      const consecutiveFailures = record.consecutiveFailures + 1;
      if (consecutiveFailures < policy.failureThreshold) {
        return { ...record, status: 'active', consecutiveFailures, cooldownUntil: undefined };
      }

      const windowMs = cooldownWindowSeconds(consecutiveFailures, policy) * 1000;
      return {
        ...record,
        status: 'cooling_down',
        consecutiveFailures,
        cooldownUntil: new Date(now + windowMs).toISOString(),
      };
    }
    case 'definitive_failure':
      return {
        ...record,
        status: 'disabled',
        consecutiveFailures: record.consecutiveFailures + 1,
        cooldownUntil: undefined,
      };
  }
}
