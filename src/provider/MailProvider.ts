import { DisposalAction, DisposeResult, MailLabel, MessageSummary, SearchPage } from '../types/index.js';

/**
 * What the retention engine needs from a mailbox. Transport, retries and
 * authentication live behind this interface.
 */
export interface MailProvider {
  /** Largest id set batchDispose and applyLabel accept in one call. */
  readonly maxBatchSize: number;

  /** @throws NoLabelsFoundError when the mailbox has no labels at all */
  listLabels(): Promise<MailLabel[]>;

  searchMessages(predicate: string, pageToken: string | undefined, pageSize: number): Promise<SearchPage>;

  /**
   * Subject and date of each message, in input order. Messages that no
   * longer exist are left out.
   */
  getMessageSummaries(ids: string[]): Promise<MessageSummary[]>;

  /**
   * Trash or delete a bounded set of messages. Throwing means the whole call
   * failed; otherwise per-id results are reported.
   */
  batchDispose(action: DisposalAction, ids: string[]): Promise<DisposeResult>;

  /** Get-or-create; returns the label id. */
  ensureLabel(name: string): Promise<string>;

  applyLabel(labelId: string, ids: string[]): Promise<void>;
}
