import { gmail_v1 } from 'googleapis';
import { NoLabelsFoundError } from '../errors/RetentionErrors.js';
import { DisposalAction, DisposeResult, MailLabel, MessageSummary, SearchPage } from '../types/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { MailProvider } from './MailProvider.js';

/** Gmail's limit for batchModify and batchDelete. */
export const GMAIL_BATCH_LIMIT = 1000;
/** Gmail caps messages.list at 500 results per page. */
export const GMAIL_MAX_PAGE_SIZE = 500;

const TRASH_LABEL = 'TRASH';
const INBOX_LABEL = 'INBOX';
const USER_ID = 'me';
const SUMMARY_HEADERS = ['Subject', 'Date'];
// messages.get has no batch form; keep the fan-out modest for the per-user quota
const SUMMARY_CONCURRENCY = 10;

/**
 * The slice of the googleapis Gmail client this provider calls.
 * A `gmail_v1.Gmail` instance satisfies it.
 */
export interface GmailApi {
  users: {
    labels: {
      list(params: gmail_v1.Params$Resource$Users$Labels$List): Promise<{ data: gmail_v1.Schema$ListLabelsResponse }>;
      create(params: gmail_v1.Params$Resource$Users$Labels$Create): Promise<{ data: gmail_v1.Schema$Label }>;
    };
    messages: {
      list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
      get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }>;
      batchModify(params: gmail_v1.Params$Resource$Users$Messages$Batchmodify): Promise<unknown>;
      batchDelete(params: gmail_v1.Params$Resource$Users$Messages$Batchdelete): Promise<unknown>;
    };
  };
}

export class GmailProvider implements MailProvider {
  readonly maxBatchSize = GMAIL_BATCH_LIMIT;
  private labelIds = new Map<string, string>();

  constructor(private readonly gmail: GmailApi) {}

  async listLabels(): Promise<MailLabel[]> {
    const labels = await this.fetchLabels();
    if (labels.length === 0) {
      throw new NoLabelsFoundError();
    }
    return labels;
  }

  async searchMessages(predicate: string, pageToken: string | undefined, pageSize: number): Promise<SearchPage> {
    const response = await this.gmail.users.messages.list({
      userId: USER_ID,
      q: predicate,
      pageToken,
      maxResults: Math.min(pageSize, GMAIL_MAX_PAGE_SIZE),
    });

    const ids = (response.data.messages ?? []).flatMap((message) => (message.id ? [message.id] : []));
    logger.debug('Fetched search page', {
      predicate,
      count: ids.length,
      estimate: response.data.resultSizeEstimate ?? 0,
    });

    return {
      ids,
      nextPageToken: response.data.nextPageToken ?? undefined,
    };
  }

  async getMessageSummaries(ids: string[]): Promise<MessageSummary[]> {
    const summaries = await mapWithConcurrency(ids, SUMMARY_CONCURRENCY, async (id) => {
      try {
        const response = await this.gmail.users.messages.get({
          userId: USER_ID,
          id,
          format: 'metadata',
          metadataHeaders: SUMMARY_HEADERS,
        });
        return toSummary(id, response.data);
      } catch (error) {
        if (statusOf(error) !== 404) {
          throw error;
        }
        logger.warn('Skipping message that no longer exists', { id });
        return undefined;
      }
    });
    return summaries.flatMap((summary) => (summary ? [summary] : []));
  }

  async batchDispose(action: DisposalAction, ids: string[]): Promise<DisposeResult> {
    this.assertBatchSize(ids);
    if (ids.length === 0) {
      return { succeeded: [], failed: [] };
    }

    if (action === DisposalAction.DELETE) {
      await this.gmail.users.messages.batchDelete({
        userId: USER_ID,
        requestBody: { ids },
      });
    } else {
      await this.gmail.users.messages.batchModify({
        userId: USER_ID,
        requestBody: {
          ids,
          addLabelIds: [TRASH_LABEL],
          removeLabelIds: [INBOX_LABEL],
        },
      });
    }

    // Gmail batch calls are all-or-nothing
    return { succeeded: [...ids], failed: [] };
  }

  async ensureLabel(name: string): Promise<string> {
    const known = this.labelIds.get(name);
    if (known) {
      return known;
    }

    await this.fetchLabels();
    const listed = this.labelIds.get(name);
    if (listed) {
      return listed;
    }

    try {
      const response = await this.gmail.users.labels.create({
        userId: USER_ID,
        requestBody: {
          name,
          labelListVisibility: 'labelShow',
          messageListVisibility: 'show',
        },
      });
      const id = response.data.id;
      if (!id) {
        throw new Error(`Gmail created label "${name}" without returning an id`);
      }
      this.labelIds.set(name, id);
      logger.info('Created marker label', { name, id });
      return id;
    } catch (error) {
      if (!isConflict(error)) {
        throw error;
      }
      // Created concurrently elsewhere; use the existing one
      await this.fetchLabels();
      const existing = this.labelIds.get(name);
      if (!existing) {
        throw error;
      }
      return existing;
    }
  }

  async applyLabel(labelId: string, ids: string[]): Promise<void> {
    this.assertBatchSize(ids);
    if (ids.length === 0) {
      return;
    }
    await this.gmail.users.messages.batchModify({
      userId: USER_ID,
      requestBody: { ids, addLabelIds: [labelId] },
    });
  }

  private async fetchLabels(): Promise<MailLabel[]> {
    const response = await this.gmail.users.labels.list({ userId: USER_ID });
    const labels = (response.data.labels ?? []).flatMap((label): MailLabel[] =>
      label.id && label.name
        ? [{ id: label.id, name: label.name, type: label.type === 'system' ? 'system' : 'user' }]
        : []
    );
    this.labelIds = new Map(labels.map((label) => [label.name, label.id]));
    return labels;
  }

  private assertBatchSize(ids: string[]): void {
    if (ids.length > this.maxBatchSize) {
      throw new RangeError(`Gmail accepts at most ${this.maxBatchSize} ids per batch, got ${ids.length}`);
    }
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'code' in error ? error.code : undefined;
  if (typeof status === 'number') {
    return status;
  }
  return typeof status === 'string' && /^\d+$/.test(status) ? Number(status) : undefined;
}

function isConflict(error: unknown): boolean {
  return statusOf(error) === 409;
}

function headerValue(message: gmail_v1.Schema$Message, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const header = message.payload?.headers?.find((candidate) => candidate.name?.toLowerCase() === wanted);
  return header?.value ?? undefined;
}

function toSummary(id: string, message: gmail_v1.Schema$Message): MessageSummary {
  const summary: MessageSummary = { id };
  const subject = headerValue(message, 'Subject');
  const date = headerValue(message, 'Date');
  if (subject !== undefined) summary.subject = subject;
  if (date !== undefined) summary.date = date;
  return summary;
}
