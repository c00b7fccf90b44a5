// src/config/env.validation.ts
import type { LogLevel } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['verbose', 'debug', 'log', 'warn', 'error'] as const;

/**
 * Raw environment accepted at start-up. Values are parsed again by the
 * namespaced configs; this class only rejects what they cannot use.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  TRELLO_API_KEY!: string;

  @IsString()
  @IsNotEmpty()
  TRELLO_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  TRELLO_BOARD_NAME!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  TRELLO_API_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_STORAGE_MB?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  MAX_MEDIA_AGE_HOURS?: number;

  @IsOptional()
  @IsInt()
  @Min(10)
  @Max(60_000)
  QUEUE_POLL_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(10)
  QUEUE_ERROR_BACKOFF_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(3)
  QUEUE_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CLEANUP_INTERVAL_HOURS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  COORDINATOR_STOP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsBooleanString()
  COORDINATOR_AUTOSTART?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  TRANSCODE_VERIFY_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  TRANSCODE_GRACE_PERIOD_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  HLS_SEGMENT_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  HLS_LIST_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: (typeof LOG_LEVELS)[number];
}

export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}

/** `LOG_LEVEL` names the lowest level printed; everything more severe is kept. */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  const enabled: LogLevel[] = [...LOG_LEVELS.slice(index === -1 ? 2 : index)];
  return [...enabled, 'fatal'];
}
