import { RetentionPolicy } from '../retention/RetentionPolicy.js';
import { DisposalAction } from '../types/index.js';
import { DEFAULT_MARKER_PREFIX, normalizeLabel } from '../labels/labelNames.js';

export interface RuleInit {
  id: number;
  retention: RetentionPolicy;
  labels?: Iterable<string>;
  action?: DisposalAction;
}

/** Shape of a rule in the persisted rule file. */
export interface RuleDocument {
  id: number;
  retention: string;
  generateLabel: boolean;
  labels: string[];
  action: DisposalAction;
}

/**
 * A retention policy bound to a set of labels and a disposal action.
 * Immutable; the owning RuleSet swaps in a new instance on every change.
 */
export class Rule {
  readonly id: number;
  readonly retention: RetentionPolicy;
  readonly labels: readonly string[];
  readonly action: DisposalAction;

  constructor(init: RuleInit) {
    if (!Number.isSafeInteger(init.id) || init.id <= 0) {
      throw new RangeError(`Rule id must be a positive integer, got ${init.id}`);
    }
    this.id = init.id;
    this.retention = init.retention;
    this.labels = Object.freeze(Array.from(new Set(Array.from(init.labels ?? [], normalizeLabel))));
    this.action = init.action ?? DisposalAction.TRASH;
    Object.freeze(this);
  }

  hasLabel(label: string): boolean {
    return this.labels.includes(label.trim());
  }

  withLabel(label: string): Rule {
    if (this.hasLabel(label)) {
      return this;
    }
    return new Rule({ ...this.init(), labels: [...this.labels, label] });
  }

  withoutLabel(label: string): Rule {
    const name = label.trim();
    return new Rule({ ...this.init(), labels: this.labels.filter((l) => l !== name) });
  }

  withAction(action: DisposalAction): Rule {
    return new Rule({ ...this.init(), action });
  }

  /**
   * Name of the label tagged onto messages this rule has disposed of,
   * e.g. `retention-processed/rule-3-6-months`.
   */
  markerLabel(prefix: string = DEFAULT_MARKER_PREFIX): string {
    return `${prefix}/rule-${this.id}-${this.retention.age.slug()}`;
  }

  describe(): string {
    if (this.labels.length === 0) {
      return `Rule #${this.id} has no labels and is inactive.`;
    }
    const verb = this.action === DisposalAction.DELETE
      ? 'delete the message'
      : 'move the message to trash';
    return `Rule #${this.id} is active on \`${this.labels.join(', ')}\` to ${verb} if it is more than ${this.retention.age.describe()} old.`;
  }

  toJSON(): RuleDocument {
    return {
      id: this.id,
      retention: this.retention.age.toToken(),
      generateLabel: this.retention.generateLabel,
      labels: [...this.labels],
      action: this.action,
    };
  }

  private init(): RuleInit {
    return {
      id: this.id,
      retention: this.retention,
      labels: this.labels,
      action: this.action,
    };
  }
}
