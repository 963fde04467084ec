import { describe, it, expect } from '@jest/globals';
import { InvalidLabelError, ReservedLabelError } from '../../../src/errors/RetentionErrors';
import { assertUserLabel, isReservedLabel, normalizeLabel } from '../../../src/labels/labelNames';

describe('labelNames', () => {
  it('should trim label names', () => {
    expect(normalizeLabel('  promo ')).toBe('promo');
    expect(() => normalizeLabel('')).toThrow(InvalidLabelError);
  });

  it('should recognise the marker prefix regardless of case', () => {
    expect(isReservedLabel('retention-processed')).toBe(true);
    expect(isReservedLabel('RETENTION-PROCESSED/rule-1-1-years')).toBe(true);
    expect(isReservedLabel('retention-processed-old')).toBe(false);
    expect(isReservedLabel('kept/rule-1', 'kept')).toBe(true);
  });

  it('should refuse reserved names as user labels', () => {
    expect(() => assertUserLabel('retention-processed/x')).toThrow(ReservedLabelError);
    expect(assertUserLabel(' newsletters ')).toBe('newsletters');
  });
});
