import {
  DuplicateRuleError,
  LabelAlreadyAssignedError,
  LabelNotInRulesError,
  RuleNotFoundError,
} from '../errors/RetentionErrors.js';
import { assertUserLabel, DEFAULT_MARKER_PREFIX } from '../labels/labelNames.js';
import { MessageAge } from '../retention/MessageAge.js';
import { RetentionPolicy } from '../retention/RetentionPolicy.js';
import { DisposalAction } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { Rule, RuleDocument } from './Rule.js';

export interface NewRule {
  retention: RetentionPolicy;
  labels?: Iterable<string>;
  action?: DisposalAction;
  /** Assigned as max(id) + 1 when omitted. */
  id?: number;
}

export interface RuleSetDocument {
  version: 1;
  rules: RuleDocument[];
}

/**
 * Rules keyed by id. Iteration is always by ascending id.
 *
 * Every mutator validates before it touches the map, so a failed call
 * leaves the set as it was. The set is read-only while a run is in
 * progress; callers serialize configuration changes against runs.
 */
export class RuleSet {
  private readonly entries = new Map<number, Rule>();

  constructor(
    rules: Iterable<Rule> = [],
    readonly markerPrefix: string = DEFAULT_MARKER_PREFIX
  ) {
    for (const rule of rules) {
      this.insert(rule);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  getRule(id: number): Rule | undefined {
    return this.entries.get(id);
  }

  requireRule(id: number): Rule {
    const rule = this.entries.get(id);
    if (!rule) {
      throw new RuleNotFoundError(id);
    }
    return rule;
  }

  rules(): Rule[] {
    return Array.from(this.entries.values()).sort((a, b) => a.id - b.id);
  }

  labels(): string[] {
    return this.rules().flatMap((rule) => [...rule.labels]);
  }

  rulesByLabel(): Map<string, Rule> {
    const byLabel = new Map<string, Rule>();
    for (const rule of this.rules()) {
      for (const label of rule.labels) {
        byLabel.set(label, rule);
      }
    }
    return byLabel;
  }

  addRule(input: NewRule): Rule {
    const id = input.id ?? this.nextId();
    const rule = new Rule({
      id,
      retention: input.retention,
      labels: Array.from(input.labels ?? [], (label) => assertUserLabel(label, this.markerPrefix)),
      action: input.action,
    });
    this.insert(rule);
    logger.info('Added retention rule', { rule: rule.describe() });
    return rule;
  }

  removeRule(id: number): Rule {
    const rule = this.requireRule(id);
    this.entries.delete(id);
    logger.info('Removed retention rule', { ruleId: id });
    return rule;
  }

  removeRuleByLabel(label: string): Rule {
    const rule = this.rulesByLabel().get(label.trim());
    if (!rule) {
      throw new LabelNotInRulesError(label);
    }
    return this.removeRule(rule.id);
  }

  addLabel(id: number, label: string): Rule {
    const rule = this.requireRule(id);
    const name = assertUserLabel(label, this.markerPrefix);
    this.assertLabelFree(name, id);
    return this.replace(rule.withLabel(name));
  }

  removeLabel(id: number, label: string): Rule {
    return this.replace(this.requireRule(id).withoutLabel(label));
  }

  setAction(id: number, action: DisposalAction): Rule {
    return this.replace(this.requireRule(id).withAction(action));
  }

  toJSON(): RuleSetDocument {
    return { version: 1, rules: this.rules().map((rule) => rule.toJSON()) };
  }

  static fromJSON(document: RuleSetDocument, markerPrefix: string = DEFAULT_MARKER_PREFIX): RuleSet {
    const ruleSet = new RuleSet([], markerPrefix);
    for (const entry of document.rules) {
      ruleSet.addRule({
        id: entry.id,
        retention: new RetentionPolicy(MessageAge.parse(entry.retention), entry.generateLabel),
        labels: entry.labels,
        action: entry.action,
      });
    }
    return ruleSet;
  }

  private nextId(): number {
    let max = 0;
    for (const id of this.entries.keys()) {
      max = Math.max(max, id);
    }
    return max + 1;
  }

  private insert(rule: Rule): void {
    if (this.entries.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    for (const label of rule.labels) {
      assertUserLabel(label, this.markerPrefix);
      this.assertLabelFree(label, rule.id);
    }
    this.entries.set(rule.id, rule);
  }

  private replace(rule: Rule): Rule {
    this.entries.set(rule.id, rule);
    logger.info('Updated retention rule', { rule: rule.describe() });
    return rule;
  }

  private assertLabelFree(label: string, ownerId: number): void {
    for (const rule of this.entries.values()) {
      if (rule.id !== ownerId && rule.hasLabel(label)) {
        throw new LabelAlreadyAssignedError(label, rule.id);
      }
    }
  }
}

/** The starter rules written on first use: all trash, no labels yet. */
export function createDefaultRuleSet(markerPrefix: string = DEFAULT_MARKER_PREFIX): RuleSet {
  const ruleSet = new RuleSet([], markerPrefix);
  for (const age of [MessageAge.years(1), MessageAge.weeks(1), MessageAge.months(1), MessageAge.years(5)]) {
    ruleSet.addRule({ retention: new RetentionPolicy(age, true) });
  }
  return ruleSet;
}
