import { MessageEnumerator } from '../email/MessageEnumerator.js';
import {
  DisposalError,
  EnumerationError,
  LabelNotFoundInMailboxError,
  MarkerLabelError,
  NoLabelsFoundError,
  ProviderError,
  RetentionError,
  describeError,
} from '../errors/RetentionErrors.js';
import { MarkerLabelCache } from '../labels/MarkerLabelCache.js';
import { MailProvider } from '../provider/MailProvider.js';
import { buildQuery } from '../query/QueryBuilder.js';
import { Rule } from '../rules/Rule.js';
import { RuleSet } from '../rules/RuleSet.js';
import {
  AgeConversion,
  ChunkOutcome,
  DEFAULT_AGE_CONVERSION,
  DisposalAction,
  DisposalOutcome,
  DisposeResult,
  PairFailedOutcome,
  RuleQuery,
  RuleSelection,
  RunMode,
  RunOptions,
  RunOutcome,
  RunReport,
} from '../types/index.js';
import { chunk, mapWithConcurrency } from '../utils/concurrency.js';
import { logger, pairLogger } from '../utils/logger.js';

export interface BatchDisposalOptions {
  /** Ids per disposal call. Defaults to, and may not exceed, the provider's batch limit. */
  chunkSize?: number;
  /** Search results requested per page. */
  pageSize?: number;
  /** Page cap per rule×label; 0 means no cap. */
  maxPages?: number;
  /** Chunks of one rule×label disposed in parallel. */
  chunkConcurrency?: number;
  ageConversion?: AgeConversion;
}

export type ProcessorPhase =
  | 'idle'
  | 'selecting'
  | 'enumerating'
  | 'disposing'
  | 'reporting'
  | 'aborted';

export const DEFAULT_PAGE_SIZE = 500;

/**
 * Runs retention rules against a mailbox.
 *
 * Selected trash rules run before any delete rule, each class by ascending
 * id. Each rule×label is enumerated, split into provider-sized chunks and
 * disposed of (or previewed in dry-run mode); a rule×label finishes
 * completely, marker labels included, before the next one builds its
 * predicate.
 */
export class BatchDisposalProcessor {
  private readonly enumerator: MessageEnumerator;
  private readonly chunkSize: number;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly chunkConcurrency: number;
  private readonly ageConversion: AgeConversion;
  private currentPhase: ProcessorPhase = 'idle';
  private running = false;

  constructor(
    private readonly provider: MailProvider,
    private readonly markerCache: MarkerLabelCache = new MarkerLabelCache(),
    options: BatchDisposalOptions = {}
  ) {
    this.enumerator = new MessageEnumerator(provider);
    this.chunkSize = options.chunkSize ?? provider.maxBatchSize;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxPages = options.maxPages ?? 0;
    this.chunkConcurrency = options.chunkConcurrency ?? 1;
    this.ageConversion = options.ageConversion ?? DEFAULT_AGE_CONVERSION;

    if (!Number.isSafeInteger(this.chunkSize) || this.chunkSize <= 0 || this.chunkSize > provider.maxBatchSize) {
      throw new RangeError(
        `chunkSize must be between 1 and the provider batch limit ${provider.maxBatchSize}, got ${this.chunkSize}`
      );
    }
    if (!Number.isSafeInteger(this.chunkConcurrency) || this.chunkConcurrency <= 0) {
      throw new RangeError(`chunkConcurrency must be a positive integer, got ${this.chunkConcurrency}`);
    }
  }

  get phase(): ProcessorPhase {
    return this.currentPhase;
  }

  /**
   * Rules a run would visit, in execution order.
   * @throws RuleNotFoundError for a requested id the set does not hold
   */
  selectRules(ruleSet: RuleSet, selection: RuleSelection = {}): Rule[] {
    const requested = selection.ruleIds ?? [];
    const candidates =
      requested.length > 0
        ? Array.from(new Set(requested), (id) => ruleSet.requireRule(id)).sort((a, b) => a.id - b.id)
        : ruleSet.rules();

    const trash = selection.skipTrash
      ? []
      : candidates.filter((rule) => rule.action === DisposalAction.TRASH);
    const remove = selection.skipDelete
      ? []
      : candidates.filter((rule) => rule.action === DisposalAction.DELETE);

    return [...trash, ...remove];
  }

  /**
   * Predicates a run would search with, without touching the mailbox.
   * Exclusions reflect the marker labels this processor's cache knows of.
   */
  previewQueries(ruleSet: RuleSet, selection: RuleSelection = {}): RuleQuery[] {
    return this.selectRules(ruleSet, selection).flatMap((rule) =>
      rule.labels.map((label) => ({
        ruleId: rule.id,
        label,
        action: rule.action,
        predicate: this.predicateFor(rule, label, ruleSet.markerPrefix),
      }))
    );
  }

  async run(ruleSet: RuleSet, options: RunOptions = {}): Promise<RunReport> {
    const mode = options.mode ?? RunMode.DRY_RUN;
    const report: RunReport = {
      mode,
      outcomes: [],
      cancelled: false,
      totals: { attempted: 0, succeeded: 0, failed: 0 },
    };

    for await (const outcome of this.stream(ruleSet, options)) {
      report.outcomes.push(outcome);
      switch (outcome.kind) {
        case 'preview':
          report.totals.attempted += outcome.attempted.length;
          break;
        case 'disposal':
          report.totals.attempted += outcome.attempted.length;
          report.totals.succeeded += outcome.succeeded.length;
          report.totals.failed += Object.keys(outcome.failed).length;
          break;
        case 'cancelled':
          report.cancelled = true;
          break;
        default:
          break;
      }
    }

    logger.info('Retention run finished', { mode, cancelled: report.cancelled, ...report.totals });
    return report;
  }

  /**
   * Outcomes in execution order: chunks of a rule×label in chunk order,
   * failed rule×label pairs where they occur, and a final `cancelled`
   * outcome if the signal aborted the run.
   *
   * Configuration errors (unknown rule ids) are thrown before any provider
   * call; everything else is reported as an outcome.
   */
  async *stream(ruleSet: RuleSet, options: RunOptions = {}): AsyncGenerator<RunOutcome> {
    if (this.running) {
      throw new Error('A retention run is already in progress on this processor');
    }
    this.running = true;
    let completedChunks = 0;
    let aborted = false;

    try {
      const mode = options.mode ?? RunMode.DRY_RUN;
      const signal = options.signal;
      const isCancelled = (): boolean => signal?.aborted === true;

      this.currentPhase = 'selecting';
      const rules = this.selectRules(ruleSet, options).filter((rule) => {
        if (rule.labels.length === 0) {
          logger.info('Skipping rule without labels', { ruleId: rule.id });
          return false;
        }
        return true;
      });
      logger.info('Starting retention run', {
        mode,
        rules: rules.map((rule) => rule.id),
        skipTrash: options.skipTrash === true,
        skipDelete: options.skipDelete === true,
      });

      if (rules.length === 0) {
        return;
      }
      if (isCancelled()) {
        aborted = true;
        yield { kind: 'cancelled', completedChunks };
        return;
      }

      const mailboxLabels = await this.loadMailboxLabels(ruleSet.markerPrefix);

      for (const rule of rules) {
        for (const label of rule.labels) {
          if (isCancelled()) {
            aborted = true;
            yield { kind: 'cancelled', completedChunks };
            return;
          }

          const log = pairLogger(rule.id, label);

          if (mailboxLabels instanceof RetentionError) {
            log.warn('Skipping rule label: mailbox labels unavailable', { error: mailboxLabels.message });
            yield this.pairFailed(rule, label, mailboxLabels);
            continue;
          }
          if (!mailboxLabels.has(label)) {
            const error = new LabelNotFoundInMailboxError(label);
            log.warn(error.message);
            yield this.pairFailed(rule, label, error);
            continue;
          }

          this.currentPhase = 'enumerating';
          const predicate = this.predicateFor(rule, label, ruleSet.markerPrefix);
          let ids: string[];
          try {
            ids = await this.enumerator.enumerate(predicate, {
              pageSize: this.pageSize,
              maxPages: this.maxPages,
              signal,
            });
          } catch (error) {
            if (isCancelled()) {
              aborted = true;
              yield { kind: 'cancelled', completedChunks };
              return;
            }
            const failure = error instanceof RetentionError
              ? error
              : new ProviderError(`Search "${predicate}"`, error);
            log.error('Enumeration failed; rule label skipped', { error: failure.message });
            yield this.pairFailed(rule, label, failure);
            continue;
          }

          if (ids.length === 0) {
            log.info('No messages match', { predicate });
            continue;
          }

          this.currentPhase = 'disposing';
          const chunks = chunk(ids, this.chunkSize);
          log.info(mode === RunMode.DRY_RUN ? 'Previewing disposal' : 'Disposing messages', {
            predicate,
            action: rule.action,
            messages: ids.length,
            chunks: chunks.length,
          });

          const outcomes = await mapWithConcurrency(
            chunks,
            this.chunkConcurrency,
            (chunkIds, chunkIndex) => this.processChunk(rule, label, ruleSet.markerPrefix, chunkIndex, chunkIds, mode),
            () => !isCancelled()
          );

          this.currentPhase = 'reporting';
          for (const outcome of outcomes) {
            if (outcome) {
              completedChunks++;
              yield outcome;
            }
          }
        }
      }

      if (isCancelled()) {
        aborted = true;
        yield { kind: 'cancelled', completedChunks };
      }
    } finally {
      this.running = false;
      this.currentPhase = aborted ? 'aborted' : 'idle';
    }
  }

  private predicateFor(rule: Rule, label: string, markerPrefix: string): string {
    const marker = rule.markerLabel(markerPrefix);
    const exclusion = rule.retention.generateLabel && this.markerCache.has(marker) ? marker : undefined;
    return buildQuery(label, rule.retention, exclusion, this.ageConversion);
  }

  /**
   * Names of every mailbox label, or the error every rule×label pair of the
   * run should report. Existing marker labels go into the cache.
   */
  private async loadMailboxLabels(markerPrefix: string): Promise<Set<string> | RetentionError> {
    try {
      const labels = await this.provider.listLabels();
      if (labels.length === 0) {
        throw new NoLabelsFoundError();
      }
      this.markerCache.reconcile(labels, markerPrefix);
      return new Set(labels.map((label) => label.name));
    } catch (error) {
      const failure = error instanceof RetentionError ? error : new ProviderError('Listing labels', error);
      logger.error('Could not list mailbox labels', { error: failure.message });
      return failure;
    }
  }

  private async processChunk(
    rule: Rule,
    label: string,
    markerPrefix: string,
    chunkIndex: number,
    ids: string[],
    mode: RunMode
  ): Promise<ChunkOutcome> {
    const log = pairLogger(rule.id, label);

    if (mode === RunMode.DRY_RUN) {
      log.info(`Dry run - would ${rule.action} messages`, { chunkIndex, count: ids.length });
      return { kind: 'preview', ruleId: rule.id, label, action: rule.action, chunkIndex, attempted: ids };
    }

    let result: DisposeResult;
    try {
      result = await this.provider.batchDispose(rule.action, ids);
    } catch (cause) {
      const error = new DisposalError({
        ruleId: rule.id,
        label,
        action: rule.action,
        chunkIndex,
        count: ids.length,
        cause,
      });
      log.error(error.message);
      const reason = describeError(cause);
      return {
        kind: 'disposal',
        ruleId: rule.id,
        label,
        action: rule.action,
        chunkIndex,
        attempted: ids,
        succeeded: [],
        failed: Object.fromEntries(ids.map((id) => [id, reason])),
        error,
      };
    }

    const outcome: DisposalOutcome = {
      kind: 'disposal',
      ruleId: rule.id,
      label,
      action: rule.action,
      chunkIndex,
      attempted: ids,
      succeeded: result.succeeded,
      failed: Object.fromEntries(result.failed.map((failure) => [failure.id, failure.reason])),
    };

    if (result.failed.length > 0) {
      log.warn('Some messages were not disposed', { chunkIndex, failed: result.failed.length });
    }
    log.info(`Chunk ${rule.action} complete`, { chunkIndex, succeeded: result.succeeded.length });

    // Deleted messages are gone; only trashed ones can carry a marker
    if (rule.retention.generateLabel && rule.action === DisposalAction.TRASH && result.succeeded.length > 0) {
      const marker = rule.markerLabel(markerPrefix);
      try {
        const labelId = await this.markerCache.resolve(marker, this.provider);
        for (const batch of chunk(result.succeeded, this.provider.maxBatchSize)) {
          await this.provider.applyLabel(labelId, batch);
        }
      } catch (cause) {
        outcome.markerError = new MarkerLabelError(marker, cause);
        log.warn(outcome.markerError.message, { chunkIndex });
      }
    }

    return outcome;
  }

  private pairFailed(rule: Rule, label: string, error: RetentionError): PairFailedOutcome {
    return {
      kind: 'pair-failed',
      ruleId: rule.id,
      label,
      action: rule.action,
      error,
      partialIds: error instanceof EnumerationError ? error.partialIds : [],
    };
  }
}
