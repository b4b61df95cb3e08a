import 'reflect-metadata';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { UsageError } from '../config/cliOptions';
import { isRecord } from '../utils/records';

const VARIABLE_TYPES = ['env_var', 'file'] as const;

export class ScheduleVariableInput {
  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsString()
  value!: string;

  @IsOptional()
  @IsIn(VARIABLE_TYPES)
  variable_type?: string;

  @IsOptional()
  @IsBoolean()
  raw?: boolean;
}

/**
 * Pipeline schedule attributes as written on stdin, in GitLab's field names.
 */
export class ScheduleInput {
  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ref?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  cron?: string;

  @IsOptional()
  @IsString()
  cron_timezone?: string;

  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ScheduleVariableInput)
  variables?: ScheduleVariableInput[];
}

/**
 * Command-line values; each one replaces the same field from stdin.
 */
export interface ScheduleFlags {
  description?: string;
  ref?: string;
  cron?: string;
  cronTimezone?: string;
  active?: boolean;
}

export type ScheduleInputMode = 'create' | 'update';

const REQUIRED_ON_CREATE = ['description', 'ref', 'cron'] as const;

export type ScheduleAttributes = Omit<ScheduleInput, 'variables'>;

function parseJsonObject(text: string): Record<string, unknown> {
  if (text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new UsageError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new UsageError('JSON must be an object');
  }
  return parsed;
}

function constraintMessages(errors: ValidationError[]): string[] {
  return errors.flatMap(error => [
    ...Object.values(error.constraints ?? {}),
    ...constraintMessages(error.children ?? []),
  ]);
}

/**
 * Reads schedule attributes from stdin text (blank means none) and applies flag overrides on top.
 *
 * @throws UsageError for malformed JSON, unknown or mistyped fields, missing fields on create, or
 * variables on update.
 */
export function readScheduleInput(text: string, flags: ScheduleFlags, mode: ScheduleInputMode): ScheduleInput {
  const fields = parseJsonObject(text);
  const overrides: Record<string, unknown> = {
    description: flags.description,
    ref: flags.ref,
    cron: flags.cron,
    cron_timezone: flags.cronTimezone,
    active: flags.active,
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      fields[key] = value;
    }
  }

  const input = plainToInstance(ScheduleInput, fields);
  const errors = validateSync(input, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new UsageError(`Invalid pipeline schedule: ${[...new Set(constraintMessages(errors))].join(', ')}`);
  }

  if (mode === 'create') {
    const missing = REQUIRED_ON_CREATE.filter(field => input[field] === undefined);
    if (missing.length > 0) {
      throw new UsageError(`Missing required fields: ${missing.join(', ')}`);
    }
  } else {
    if (input.variables !== undefined) {
      throw new UsageError('Variables can only be set when creating a schedule.');
    }
    if (Object.keys(scheduleAttributes(input)).length === 0) {
      throw new UsageError('Nothing to update. Pipe JSON on stdin or pass --description, --ref, --cron, --cron-timezone, --active or --inactive.');
    }
  }

  return input;
}

/**
 * The request body for create and update: only the fields that were given.
 */
export function scheduleAttributes(input: ScheduleInput): ScheduleAttributes {
  const attributes: ScheduleAttributes = {};
  if (input.description !== undefined) attributes.description = input.description;
  if (input.ref !== undefined) attributes.ref = input.ref;
  if (input.cron !== undefined) attributes.cron = input.cron;
  if (input.cron_timezone !== undefined) attributes.cron_timezone = input.cron_timezone;
  if (input.active !== undefined) attributes.active = input.active;
  return attributes;
}
