import Joi from 'joi';

import { ErrorCode } from '../common/error-codes';
import type { CredentialOutcome } from '../credentials/types';
import type { HttpClientRawResponse } from '../http-client/http-client.service';

export const CHAT_ROLES = ['system', 'user', 'assistant', 'developer'] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  top_p: number;
  max_tokens: number;
  // Streaming is not supported; the field is accepted only as `false`.
  stream?: false;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type ChatCompletionResult = {
  content: string;
  usage: TokenUsage;
};

export type UpstreamClassification =
  | { outcome: 'success'; result: ChatCompletionResult }
  | {
      outcome: Exclude<CredentialOutcome, 'success'> | 'bad_request';
      code: ErrorCode;
      detail: string;
    };

export const chatCompletionBodySchema = Joi.object<ChatCompletionRequest>({
  model: Joi.string().trim().min(1).max(256).required(),
  messages: Joi.array()
    .items(
      Joi.object<ChatMessage>({
        role: Joi.string()
          .valid(...CHAT_ROLES)
          .required(),
        content: Joi.string().allow('').max(1_000_000).required(),
      }),
    )
    .min(1)
    .max(256)
    .required(),
  temperature: Joi.number().min(0).max(2).default(1.0),
  top_p: Joi.number().min(0).max(1).default(0.95),
  max_tokens: Joi.number().integer().min(1).max(131072).default(1024),
  stream: Joi.boolean().valid(false),
});

type UpstreamCompletionBody = {
  choices: { message: { content?: string | null } }[];
  usage?: Partial<TokenUsage>;
};

const tokenCount = Joi.number().integer().min(0);

const upstreamCompletionSchema = Joi.object<UpstreamCompletionBody>({
  choices: Joi.array()
    .items(
      Joi.object({
        message: Joi.object({
          content: Joi.string().allow('', null),
        })
          .unknown(true)
          .required(),
      }).unknown(true),
    )
    .min(1)
    .required(),
  usage: Joi.object({
    prompt_tokens: tokenCount,
    completion_tokens: tokenCount,
    total_tokens: tokenCount,
  }).unknown(true),
})
  .unknown(true)
  .required();

/**
 * The JSON body sent upstream. Sampling values always travel explicitly so every
 * credential sees the same request.
 */
export function buildUpstreamBody(request: ChatCompletionRequest): Record<string, unknown> {
  return {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature,
    top_p: request.top_p,
    max_tokens: request.max_tokens,
    stream: false,
  };
}

/**
 * Reduce an upstream completion to its first choice and token usage. Returns `null` for a
 * body without a usable choice.
 */
export function normalizeCompletion(body: unknown): ChatCompletionResult | null {
  const { value, error } = upstreamCompletionSchema.validate(body);
  if (error) {
    return null;
  }

  const usage = value.usage ?? {};
  return {
    content: value.choices[0].message.content ?? '',
    usage: {
      prompt_tokens: usage.prompt_tokens ?? 0,
      completion_tokens: usage.completion_tokens ?? 0,
      total_tokens: usage.total_tokens ?? 0,
    },
  };
}

export function classifyUpstreamResponse(response: HttpClientRawResponse): UpstreamClassification {
  const { status } = response;

  if (status >= 200 && status < 300) {
    const result = normalizeCompletion(response.body);
    if (!result) {
      return {
        outcome: 'transient_failure',
        code: ErrorCode.UpstreamUnavailable,
        detail: `status ${status} without a usable completion`,
      };
    }
    return { outcome: 'success', result };
  }

  if (status === 401 || status === 402 || status === 403) {
    return {
      outcome: 'definitive_failure',
      code: ErrorCode.UpstreamRejected,
      detail: `status ${status}`,
    };
  }

  if (status === 408 || status === 429 || status >= 500) {
    return {
      outcome: 'transient_failure',
      code: ErrorCode.UpstreamUnavailable,
      detail: `status ${status}`,
    };
  }

  if (status >= 400) {
    return {
      outcome: 'bad_request',
      code: ErrorCode.UpstreamBadRequest,
      detail: `status ${status}`,
    };
  }

  // 1xx and 3xx never carry a completion.
  return {
    outcome: 'transient_failure',
    code: ErrorCode.UpstreamUnavailable,
    detail: `status ${status}`,
  };
}
