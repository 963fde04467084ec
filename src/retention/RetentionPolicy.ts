import { MessageAge } from './MessageAge.js';

/**
 * How long a rule keeps messages, and whether disposed messages get tagged
 * with the rule's marker label so the next run skips them.
 */
export class RetentionPolicy {
  constructor(
    readonly age: MessageAge,
    readonly generateLabel: boolean = true
  ) {
    Object.freeze(this);
  }

  static default(): RetentionPolicy {
    return new RetentionPolicy(MessageAge.years(5), true);
  }

  static parse(token: string, generateLabel = true): RetentionPolicy {
    return new RetentionPolicy(MessageAge.parse(token), generateLabel);
  }

  withGenerateLabel(generateLabel: boolean): RetentionPolicy {
    return new RetentionPolicy(this.age, generateLabel);
  }

  equals(other: RetentionPolicy): boolean {
    return this.generateLabel === other.generateLabel && this.age.equals(other.age);
  }
}
