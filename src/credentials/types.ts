import type { CredentialStatus } from '../persistence/types';

export type CredentialOutcome = 'success' | 'transient_failure' | 'definitive_failure';

export type HealthPolicy = {
  failureThreshold: number;
  cooldownBaseSeconds: number;
  cooldownMaxSeconds: number;
};

// What the proxy gets back from a selection: enough to make the call, nothing more.
export type PooledCredential = {
  credentialId: string;
  value: string;
  endpoint: string;
};

export type CredentialStatusView = {
  value: string;
  endpoint: string;
  status: CredentialStatus;
  consecutiveFailures: number;
  cooldownUntil?: string;
  lastUsedAt?: string;
};

export type PoolHealthSummary = {
  total: number;
  active: number;
  coolingDown: number;
  disabled: number;
};

export type ImportResult = {
  added: number;
  duplicates: number;
};
