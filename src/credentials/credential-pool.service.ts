import { randomUUID } from 'node:crypto';

import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ErrorCode } from '../common/error-codes';
import { DEFAULT_UPSTREAM_ENDPOINT } from '../config/env.validation';
import { readIntegerSetting } from '../config/settings';
import { PersistenceService } from '../persistence/persistence.service';
import { CredentialRecord } from '../persistence/types';
import { hashForLogging } from '../utils/hash';
import { SerialLock } from '../utils/serial-lock';
import { applyOutcome, effectiveStatus, isEligible } from './credential-health';
import {
  CredentialOutcome,
  CredentialStatusView,
  HealthPolicy,
  ImportResult,
  PoolHealthSummary,
  PooledCredential,
} from './types';

/**
 * The shared pool of upstream credentials.
 *
 * Management (add, remove, list) is scoped to the owning user; selection draws from every
 * user's credentials. Membership changes are serialised through `lock` and written through
 * to the credential store before they resolve. `selectForUse` runs synchronously, so
 * reading the eligible set and advancing the cursor happen in one step and never wait on
 * I/O or on an upstream call.
 */
@Injectable()
export class CredentialPoolService {
  private readonly logger = new Logger(CredentialPoolService.name);
  private readonly lock = new SerialLock();
  private readonly policy: HealthPolicy;
  private readonly defaultEndpoint: string;
  private cursor = 0;

  constructor(
    private readonly persistence: PersistenceService,
    private readonly configService: ConfigService,
  ) {
    const failureThreshold = readIntegerSetting(
      this.configService,
      this.logger,
      'POOL_FAILURE_THRESHOLD',
      3,
      { min: 1 },
    );
    const cooldownBaseSeconds = readIntegerSetting(
      this.configService,
      this.logger,
      'POOL_COOLDOWN_BASE_SECONDS',
      30,
      { min: 1 },
    );
    const cooldownMaxSeconds = readIntegerSetting(
      this.configService,
      this.logger,
      'POOL_COOLDOWN_MAX_SECONDS',
      900,
      { min: cooldownBaseSeconds },
    );
    this.policy = { failureThreshold, cooldownBaseSeconds, cooldownMaxSeconds };

    const endpoint = this.configService.get<string>('UPSTREAM_DEFAULT_ENDPOINT');
    this.defaultEndpoint = normalizeEndpoint(
      endpoint && endpoint.trim().length > 0 ? endpoint : DEFAULT_UPSTREAM_ENDPOINT,
    );
  }

  async add(ownerId: string, value: string, endpoint?: string): Promise<string> {
    return this.lock.runExclusive(async () => {
      if (this.persistence.credentials.has(value)) {
        throw new ConflictException('Credential is already in the pool', {
          description: ErrorCode.DuplicateKey,
        });
      }

      const record = this.buildRecord(ownerId, value, endpoint);
      await this.persistence.credentials.put(record);
      this.logger.log(`Credential ${hashForLogging(value)} added by user ${ownerId}`);

      return record.credentialId;
    });
  }

  /**
   * Add several credentials in one durable write. Values already pooled (by anyone) or
   * repeated within the batch are counted as duplicates and skipped.
   */
  async addMany(
    ownerId: string,
    values: readonly string[],
    endpoint?: string,
  ): Promise<ImportResult> {
    return this.lock.runExclusive(async () => {
      const seen = new Set<string>();
      const records: CredentialRecord[] = [];
      let duplicates = 0;

      for (const value of values) {
        if (seen.has(value) || this.persistence.credentials.has(value)) {
          duplicates += 1;
          continue;
        }
        seen.add(value);
        records.push(this.buildRecord(ownerId, value, endpoint));
      }

      await this.persistence.credentials.putMany(records);
      this.logger.log(
        `Imported ${records.length} credential(s) for user ${ownerId}; ${duplicates} duplicate(s) skipped`,
      );

      return { added: records.length, duplicates };
    });
  }

  async remove(ownerId: string, value: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const record = this.persistence.credentials.get(value);
      // Someone else's credential is reported exactly like a missing one.
      if (!record || record.ownerId !== ownerId) {
        throw new NotFoundException('Credential not found', { description: ErrorCode.NotFound });
      }

      await this.persistence.credentials.delete(value);
      this.logger.log(`Credential ${hashForLogging(value)} removed by user ${ownerId}`);
    });
  }

  list(ownerId: string): string[] {
    return this.ownedBy(ownerId).map((record) => record.value);
  }

  listStatus(ownerId: string): CredentialStatusView[] {
    const now = Date.now();
    return this.ownedBy(ownerId).map((record) => {
      const status = effectiveStatus(record, now);
      return {
        value: record.value,
        endpoint: this.resolveEndpoint(record),
        status,
        consecutiveFailures: record.consecutiveFailures,
        cooldownUntil: status === 'cooling_down' ? record.cooldownUntil : undefined,
        lastUsedAt: record.lastUsedAt,
      };
    });
  }

  /**
   * Number of credentials that are not disabled; the upper bound of attempts per request.
   */
  size(): number {
    return this.persistence.credentials
      .values()
      .filter((record) => record.status !== 'disabled').length;
  }

  summary(): PoolHealthSummary {
    const now = Date.now();
    const summary: PoolHealthSummary = { total: 0, active: 0, coolingDown: 0, disabled: 0 };

    for (const record of this.persistence.credentials.values()) {
      summary.total += 1;
      const status = effectiveStatus(record, now);
      if (status === 'active') {
        summary.active += 1;
      } else if (status === 'cooling_down') {
        summary.coolingDown += 1;
      } else {
        summary.disabled += 1;
      }
    }

    return summary;
  }

  /**
   * Round-robin over the credentials that are eligible right now, skipping `exclude`.
   * Cooldowns that have run out are eligible again without any write.
   */
  selectForUse(exclude: ReadonlySet<string> = new Set<string>()): PooledCredential {
    const now = Date.now();
    const eligible = this.persistence.credentials
      .values()
      .filter((record) => isEligible(record, now) && !exclude.has(record.credentialId));

    if (eligible.length === 0) {
      throw new ServiceUnavailableException('No usable credential in the pool', {
        description: ErrorCode.PoolExhausted,
      });
    }

    const index = this.cursor % eligible.length;
    const selected = eligible[index];
    this.cursor = (index + 1) % eligible.length;

    return {
      credentialId: selected.credentialId,
      value: selected.value,
      endpoint: this.resolveEndpoint(selected),
    };
  }

  /**
   * Record the result of an upstream call. Runs under the pool lock, so it reads the
   * record after any pending add or remove. Credentials removed in the meantime are
   * ignored. A persistence failure rejects after the in-memory state was rolled back.
   */
  async reportOutcome(credentialId: string, outcome: CredentialOutcome): Promise<void> {
    await this.lock.runExclusive(async () => {
      const record = this.persistence.credentials.find(
        (candidate) => candidate.credentialId === credentialId,
      );
      if (!record) {
        this.logger.debug(`Outcome ${outcome} for unknown credential ${credentialId} ignored`);
        return;
      }

      const next = applyOutcome(record, outcome, Date.now(), this.policy);
      if (next === record) {
        return;
      }

      if (next.status !== record.status) {
        const message = `Credential ${hashForLogging(record.value)} ${record.status} -> ${next.status}`;
        if (next.status === 'active') {
          this.logger.log(message);
        } else {
          this.logger.warn(
            next.cooldownUntil ? `${message} until ${next.cooldownUntil}` : message,
          );
        }
      }

      await this.persistence.credentials.put(next);
    });
  }

  private ownedBy(ownerId: string): CredentialRecord[] {
    return this.persistence.credentials.values().filter((record) => record.ownerId === ownerId);
  }

  private buildRecord(ownerId: string, value: string, endpoint?: string): CredentialRecord {
    return {
      credentialId: randomUUID(),
      value,
      ownerId,
      endpoint: endpoint ? normalizeEndpoint(endpoint) : undefined,
      status: 'active',
      consecutiveFailures: 0,
      createdAt: new Date().toISOString(),
    };
  }

  private resolveEndpoint(record: CredentialRecord): string {
    return record.endpoint ?? this.defaultEndpoint;
  }
}

function normalizeEndpoint(endpoint: string): string {
  return endpoint.trim().replace(/\/+$/, '');
}
