import type { Logger } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';

export type IntegerBounds = {
  min?: number;
  max?: number;
};

export function parseInteger(value: unknown, bounds: IntegerBounds = {}): number | null {
  const candidate = typeof value === 'number' ? value : Number(value);
  if (value === undefined || value === null || value === '' || !Number.isInteger(candidate)) {
    return null;
  }
  if (bounds.min !== undefined && candidate < bounds.min) {
    return null;
  }
  if (bounds.max !== undefined && candidate > bounds.max) {
    return null;
  }
  return candidate;
}

/**
 * Read an integer setting, falling back (with a warning) when the configured value is
 * missing or outside its bounds.
 */
export function readIntegerSetting(
  configService: ConfigService,
  logger: Logger,
  key: string,
  fallback: number,
  bounds: IntegerBounds = {},
): number {
  const raw = configService.get<unknown>(key);
  const parsed = parseInteger(raw, bounds);
  if (parsed !== null) {
    return parsed;
  }

  if (raw !== undefined) {
    logger.warn(`${key} is invalid; using fallback ${fallback}`);
  }
  return fallback;
}
