import { normalizeLabel } from '../labels/labelNames.js';
import { RetentionPolicy } from '../retention/RetentionPolicy.js';
import { AgeConversion, DEFAULT_AGE_CONVERSION } from '../types/index.js';

// Characters that end a bare search term in Gmail's query syntax
const NEEDS_QUOTING = /[\s"(){}]/;

export function labelTerm(label: string): string {
  const name = normalizeLabel(label);
  if (!NEEDS_QUOTING.test(name)) {
    return `label:${name}`;
  }
  return `label:"${name.replace(/"/g, '\\"')}"`;
}

/**
 * Turn a rule's label and retention policy into a search predicate:
 *
 *   label:<label> older_than:<N>d [-label:<exclusion>]
 *
 * The exclusion is the rule's marker label; passing it keeps messages a
 * previous run already disposed of out of the result.
 *
 * @throws InvalidLabelError when either label name is empty
 */
export function buildQuery(
  label: string,
  policy: RetentionPolicy,
  exclusionLabel?: string,
  conversion: AgeConversion = DEFAULT_AGE_CONVERSION
): string {
  const terms = [labelTerm(label), policy.age.render(conversion)];
  if (exclusionLabel !== undefined) {
    terms.push(`-${labelTerm(exclusionLabel)}`);
  }
  return terms.join(' ');
}
