import {
  BadGatewayException,
  BadRequestException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';

import { ErrorCode } from '../common/error-codes';
import { CredentialPoolService } from '../credentials/credential-pool.service';
import type { CredentialOutcome, PooledCredential } from '../credentials/types';
import { HttpClientService, HttpTimeoutError } from '../http-client/http-client.service';
import { hashForLogging } from '../utils/hash';
import {
  buildUpstreamBody,
  ChatCompletionRequest,
  ChatCompletionResult,
  classifyUpstreamResponse,
  UpstreamClassification,
} from './chat-completion';

/**
 * Routes chat completions across the shared credential pool.
 *
 * Each request tries at most as many distinct credentials as the pool has live members.
 * Selection and outcome reporting go through the pool; the upstream call itself runs
 * outside of any lock.
 */
@Injectable()
export class ProxyService {
  private readonly logger = new Logger(ProxyService.name);

  constructor(
    private readonly httpClientService: HttpClientService,
    private readonly credentialPool: CredentialPoolService,
  ) {}

  async inference(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const maxAttempts = this.credentialPool.size();
    const tried = new Set<string>();

    for (let attempt = 1; attempt <= Math.max(maxAttempts, 1); attempt += 1) {
      const credential = this.nextCandidate(tried, attempt);
      if (!credential) {
        break;
      }
      tried.add(credential.credentialId);

      const classification = await this.callUpstream(credential, request);
      this.logAttempt(credential, attempt, maxAttempts, classification);

      if (classification.outcome === 'success') {
        await this.report(credential, 'success');
        return classification.result;
      }

      if (classification.outcome === 'bad_request') {
        // The credential authenticated; the request itself was refused.
        await this.report(credential, 'success');
        throw new BadRequestException('Upstream rejected the request', {
          description: ErrorCode.UpstreamBadRequest,
        });
      }

      await this.report(credential, classification.outcome);
    }

    throw new BadGatewayException('No upstream credential could serve the request', {
      description: ErrorCode.UpstreamUnavailable,
    });
  }

  /**
   * The first selection surfaces `PoolExhausted`; once something was tried, running out of
   * candidates ends the loop instead.
   */
  private nextCandidate(tried: ReadonlySet<string>, attempt: number): PooledCredential | null {
    try {
      return this.credentialPool.selectForUse(tried);
    } catch (error) {
      if (attempt > 1 && error instanceof ServiceUnavailableException) {
        return null;
      }
      throw error;
    }
  }

  private async callUpstream(
    credential: PooledCredential,
    request: ChatCompletionRequest,
  ): Promise<UpstreamClassification> {
    try {
      const response = await this.httpClientService.postJson(
        `${credential.endpoint}/chat/completions`,
        buildUpstreamBody(request),
        { headers: { authorization: `Bearer ${credential.value}` } },
      );
      return classifyUpstreamResponse(response);
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        return {
          outcome: 'transient_failure',
          code: ErrorCode.UpstreamTimeout,
          detail: error.message,
        };
      }
      return {
        outcome: 'transient_failure',
        code: ErrorCode.UpstreamUnavailable,
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Health bookkeeping must not turn an answered request into a failure; a store error
   * here is logged and the request carries on.
   */
  private async report(credential: PooledCredential, outcome: CredentialOutcome): Promise<void> {
    try {
      await this.credentialPool.reportOutcome(credential.credentialId, outcome);
    } catch (error) {
      this.logger.warn(
        `Failed to record ${outcome} for credential ${hashForLogging(credential.value)}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  private logAttempt(
    credential: PooledCredential,
    attempt: number,
    maxAttempts: number,
    classification: UpstreamClassification,
  ): void {
    const payload = {
      event: 'upstream_attempt',
      attempt,
      maxAttempts,
      credential: hashForLogging(credential.value),
      endpoint: credential.endpoint,
      outcome: classification.outcome,
      ...(classification.outcome === 'success'
        ? {}
        : { code: classification.code, detail: classification.detail }),
    };

    if (classification.outcome === 'success') {
      this.logger.log(JSON.stringify(payload));
      return;
    }

    this.logger.warn(JSON.stringify(payload));
  }
}
