import { BadRequestException } from '@nestjs/common';
import type { ObjectSchema } from 'joi';

import { ErrorCode } from './error-codes';

/**
 * Validate a request body once at the controller boundary. Unknown fields are stripped so
 * the services only ever see the declared shape.
 */
export function validateBody<T>(schema: ObjectSchema<T>, body: unknown): T {
  const { value, error } = schema.validate(body ?? {}, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const message = error.details.map((detail) => detail.message).join('; ');
    throw new BadRequestException(message, { description: ErrorCode.InvalidRequest });
  }

  return value;
}
