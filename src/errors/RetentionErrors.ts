import { DisposalAction } from '../types/index.js';

/**
 * Where an error belongs in a retention run:
 * - configuration: raised before any network call, fatal to the operation
 * - selection: scoped to one rule×label pair, the run continues
 * - transport: enumeration failure for one rule×label pair
 * - disposal: scoped to one chunk (or one id inside it)
 * - marker: marker-label application, logged and non-fatal
 */
export type RetentionErrorKind =
  | 'configuration'
  | 'selection'
  | 'transport'
  | 'disposal'
  | 'marker';

export abstract class RetentionError extends Error {
  abstract readonly kind: RetentionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type InvalidMessageAgeReason = 'format' | 'unit' | 'count';

export class InvalidMessageAgeError extends RetentionError {
  readonly kind = 'configuration';
  readonly token: string;
  readonly reason: InvalidMessageAgeReason;
  readonly unit?: string;
  readonly count?: string;

  constructor(input: {
    token: string;
    reason: InvalidMessageAgeReason;
    unit?: string;
    count?: string;
  }) {
    super(InvalidMessageAgeError.format(input));
    this.token = input.token;
    this.reason = input.reason;
    this.unit = input.unit;
    this.count = input.count;
  }

  private static format(input: {
    token: string;
    reason: InvalidMessageAgeReason;
    unit?: string;
    count?: string;
  }): string {
    switch (input.reason) {
      case 'unit':
        return `Invalid message age "${input.token}": unknown unit "${input.unit ?? ''}" (expected d, w, m or y)`;
      case 'count':
        return `Invalid message age "${input.token}": count "${input.count ?? ''}" must be a positive integer`;
      default:
        return `Invalid message age "${input.token}": expected <unit>:<count>, e.g. y:1 or d:30`;
    }
  }
}

export class RuleNotFoundError extends RetentionError {
  readonly kind = 'configuration';
  readonly ruleId: number;

  constructor(ruleId: number) {
    super(`Rule not found: ${ruleId}`);
    this.ruleId = ruleId;
  }
}

export class DuplicateRuleError extends RetentionError {
  readonly kind = 'configuration';
  readonly ruleId: number;

  constructor(ruleId: number) {
    super(`Rule ${ruleId} already exists`);
    this.ruleId = ruleId;
  }
}

export class LabelAlreadyAssignedError extends RetentionError {
  readonly kind = 'configuration';
  readonly label: string;
  readonly ruleId: number;

  constructor(label: string, ruleId: number) {
    super(`Label "${label}" is already governed by rule ${ruleId}`);
    this.label = label;
    this.ruleId = ruleId;
  }
}

export class LabelNotInRulesError extends RetentionError {
  readonly kind = 'configuration';
  readonly label: string;

  constructor(label: string) {
    super(`No rule targets label "${label}"`);
    this.label = label;
  }
}

export class InvalidLabelError extends RetentionError {
  readonly kind = 'configuration';

  constructor(message = 'Label name must not be empty') {
    super(message);
  }
}

export class ReservedLabelError extends RetentionError {
  readonly kind = 'configuration';
  readonly label: string;

  constructor(label: string, prefix: string) {
    super(`Label "${label}" uses the reserved marker prefix "${prefix}/"`);
    this.label = label;
  }
}

export class ConfigError extends RetentionError {
  readonly kind = 'configuration';
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration ${key}: ${message}`);
    this.key = key;
  }
}

export class RuleStoreError extends RetentionError {
  readonly kind = 'configuration';
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Rule file ${path}: ${message}`, options);
    this.path = path;
  }
}

export class NoLabelsFoundError extends RetentionError {
  readonly kind = 'selection';

  constructor() {
    super('No labels found in mailbox');
  }
}

export class LabelNotFoundInMailboxError extends RetentionError {
  readonly kind = 'selection';
  readonly label: string;

  constructor(label: string) {
    super(`Label "${label}" not found in mailbox`);
    this.label = label;
  }
}

/** A provider call outside search and disposal failed (e.g. listing labels). */
export class ProviderError extends RetentionError {
  readonly kind = 'transport';
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

export class EnumerationError extends RetentionError {
  readonly kind = 'transport';
  readonly predicate: string;
  readonly pageIndex: number;
  readonly partialIds: string[];

  constructor(input: {
    predicate: string;
    pageIndex: number;
    partialIds: string[];
    cause: unknown;
  }) {
    super(
      `Search "${input.predicate}" failed on page ${input.pageIndex} after ${input.partialIds.length} ids: ${describeError(input.cause)}`,
      { cause: input.cause }
    );
    this.predicate = input.predicate;
    this.pageIndex = input.pageIndex;
    this.partialIds = input.partialIds;
  }

  get partialCount(): number {
    return this.partialIds.length;
  }
}

export class DisposalError extends RetentionError {
  readonly kind = 'disposal';
  readonly ruleId: number;
  readonly label: string;
  readonly action: DisposalAction;
  readonly chunkIndex: number;
  readonly count: number;

  constructor(input: {
    ruleId: number;
    label: string;
    action: DisposalAction;
    chunkIndex: number;
    count: number;
    cause: unknown;
  }) {
    super(
      `Rule ${input.ruleId} label "${input.label}" chunk ${input.chunkIndex}: ${input.action} of ${input.count} messages failed: ${describeError(input.cause)}`,
      { cause: input.cause }
    );
    this.ruleId = input.ruleId;
    this.label = input.label;
    this.action = input.action;
    this.chunkIndex = input.chunkIndex;
    this.count = input.count;
  }
}

export class MarkerLabelError extends RetentionError {
  readonly kind = 'marker';
  readonly markerLabel: string;

  constructor(markerLabel: string, cause: unknown) {
    super(`Could not apply marker label "${markerLabel}": ${describeError(cause)}`, { cause });
    this.markerLabel = markerLabel;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isConfigurationError(error: unknown): error is RetentionError {
  return error instanceof RetentionError && error.kind === 'configuration';
}
