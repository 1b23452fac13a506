import Joi from 'joi';

import { CREDENTIAL_STATUSES, CredentialRecord, SessionRecord, UserRecord } from './types';

export const userRecordSchema = Joi.object<UserRecord>({
  userId: Joi.string().required(),
  username: Joi.string().min(1).required(),
  passwordHash: Joi.string().min(1).required(),
  createdAt: Joi.string().isoDate().required(),
});

export const sessionRecordSchema = Joi.object<SessionRecord>({
  tokenHash: Joi.string()
    .pattern(/^[a-f0-9]{64}$/)
    .required(),
  userId: Joi.string().required(),
  issuedAt: Joi.string().isoDate().required(),
  revoked: Joi.boolean().strict().required(),
  revokedAt: Joi.string().isoDate(),
});

export const credentialRecordSchema = Joi.object<CredentialRecord>({
  credentialId: Joi.string().required(),
  value: Joi.string().min(1).required(),
  ownerId: Joi.string().required(),
  endpoint: Joi.string().uri({ scheme: ['http', 'https'] }),
  status: Joi.string()
    .valid(...CREDENTIAL_STATUSES)
    .required(),
  consecutiveFailures: Joi.number().integer().min(0).strict().required(),
  cooldownUntil: Joi.string().isoDate(),
  lastUsedAt: Joi.string().isoDate(),
  createdAt: Joi.string().isoDate().required(),
});
