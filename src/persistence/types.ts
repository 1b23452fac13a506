export const CREDENTIAL_STATUSES = ['active', 'cooling_down', 'disabled'] as const;

export type CredentialStatus = (typeof CREDENTIAL_STATUSES)[number];

export type UserRecord = {
  userId: string;
  username: string;
  passwordHash: string;
  createdAt: string;
};

// Sessions are stored by token hash; the raw token only ever lives with the client.
export type SessionRecord = {
  tokenHash: string;
  userId: string;
  issuedAt: string;
  revoked: boolean;
  revokedAt?: string;
};

export type CredentialRecord = {
  credentialId: string;
  value: string;
  ownerId: string;
  endpoint?: string;
  status: CredentialStatus;
  consecutiveFailures: number;
  cooldownUntil?: string;
  lastUsedAt?: string;
  createdAt: string;
};
