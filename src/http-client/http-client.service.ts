import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { RequestInit, Response as UndiciResponse } from 'undici';
import { Agent, fetch } from 'undici';

import { readIntegerSetting } from '../config/settings';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
}

export interface HttpClientRawResponse {
  status: number;
  body: unknown;
  contentType: string | null;
}

/**
 * Raised when an outbound call, body included, does not complete within its timeout. The
 * request is aborted before this is thrown.
 */
export class HttpTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly timeoutMs: number;
  private readonly dispatcher: Agent;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = readIntegerSetting(
      this.configService,
      this.logger,
      'UPSTREAM_TIMEOUT',
      60000,
      { min: 100 },
    );
    this.dispatcher = new Agent({
      connections: 50,
      pipelining: 0,
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * POST a JSON body to an absolute http(s) URL and return the raw status and body.
   * Non-2xx replies resolve normally so callers can classify them. The timeout covers the
   * whole exchange up to the last body byte and rejects with `HttpTimeoutError`; connection
   * problems reject with the underlying error. Nothing is retried here.
   */
  async postJson(
    url: string,
    body: unknown,
    options?: HttpRequestOptions,
  ): Promise<HttpClientRawResponse> {
    const target = this.buildUrl(url);
    const controller = new AbortController();
    const init: RequestInit = {
      method: 'POST',
      headers: this.buildHeaders(options?.headers),
      body: JSON.stringify(body),
      signal: controller.signal,
      dispatcher: this.dispatcher,
    };

    return this.runWithTimeout(target, controller, async () => {
      const response = await fetch(target, init);
      const contentType = response.headers.get('content-type') ?? '';
      const responseBody = await this.parseResponseBody(response, contentType);

      return {
        status: response.status,
        body: responseBody,
        contentType: contentType.length > 0 ? contentType : null,
      };
    });
  }

  private async runWithTimeout<T>(
    url: string,
    controller: AbortController,
    task: () => Promise<T>,
  ): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new HttpTimeoutError(url, this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([task(), timeoutPromise]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private buildUrl(url: string): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error(`Invalid upstream URL: ${url}`);
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`Unsupported upstream protocol: ${parsed.protocol}`);
    }

    return parsed.toString();
  }

  private buildHeaders(headers: Record<string, string> | undefined): Record<string, string> {
    return {
      ...(headers ?? {}),
      accept: 'application/json',
      'content-type': 'application/json',
    };
  }

  private async parseResponseBody(
    response: UndiciResponse,
    contentType: string,
  ): Promise<unknown> {
    const text = await response.text();

    if (!text) {
      return null;
    }

    if (contentType.includes('application/json')) {
      try {
        return JSON.parse(text);
      } catch {
        this.logger.warn('Failed to parse upstream JSON response, returning raw text instead.');
        return text;
      }
    }

    return text;
  }
}
