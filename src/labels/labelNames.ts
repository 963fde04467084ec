import { InvalidLabelError, ReservedLabelError } from '../errors/RetentionErrors.js';

/**
 * Prefix of every marker label the engine creates. User labels may not live
 * under it, otherwise an unrelated message carrying such a label would be
 * excluded from selection.
 */
export const DEFAULT_MARKER_PREFIX = 'retention-processed';

export function normalizeLabel(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new InvalidLabelError();
  }
  return trimmed;
}

export function isReservedLabel(name: string, prefix: string = DEFAULT_MARKER_PREFIX): boolean {
  const lower = name.trim().toLowerCase();
  const reserved = prefix.toLowerCase();
  return lower === reserved || lower.startsWith(`${reserved}/`);
}

export function assertUserLabel(name: string, prefix: string = DEFAULT_MARKER_PREFIX): string {
  const label = normalizeLabel(name);
  if (isReservedLabel(label, prefix)) {
    throw new ReservedLabelError(label, prefix);
  }
  return label;
}
