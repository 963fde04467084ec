import { MailProvider } from '../../src/provider/MailProvider';
import { DisposalAction, DisposeResult, MailLabel, MessageSummary, SearchPage } from '../../src/types';

export interface FakeMessage {
  id: string;
  labels: string[];
  ageDays: number;
  subject?: string;
  date?: string;
}

interface StoredMessage {
  labels: Set<string>;
  ageDays: number;
  trashed: boolean;
  subject?: string;
  date?: string;
}

interface ProviderCalls {
  listLabels: number;
  search: string[];
  summaries: string[][];
  dispose: Array<{ action: DisposalAction; ids: string[] }>;
  ensureLabel: string[];
  applyLabel: Array<{ labelId: string; ids: string[] }>;
}

interface ParsedPredicate {
  include: string[];
  exclude: string[];
  olderThanDays: number;
}

const TERM = /(-?)label:("(?:[^"\\]|\\.)*"|\S+)|older_than:(\d+)d/g;

export function parsePredicate(predicate: string): ParsedPredicate {
  const parsed: ParsedPredicate = { include: [], exclude: [], olderThanDays: 0 };
  for (const match of predicate.matchAll(TERM)) {
    if (match[3] !== undefined) {
      parsed.olderThanDays = Number(match[3]);
      continue;
    }
    const raw = match[2];
    const name = raw.startsWith('"') ? raw.slice(1, -1).replace(/\\"/g, '"') : raw;
    (match[1] === '-' ? parsed.exclude : parsed.include).push(name);
  }
  return parsed;
}

/**
 * Mailbox held in memory. Understands the `label:`, `-label:` and
 * `older_than:` terms the query builder emits; trashed messages drop out of
 * search unless `includeTrash` is set. Failures are injected through the
 * `fail*` hooks.
 */
export class InMemoryMailProvider implements MailProvider {
  readonly maxBatchSize: number;
  includeTrash = false;

  readonly calls: ProviderCalls = {
    listLabels: 0,
    search: [],
    summaries: [],
    dispose: [],
    ensureLabel: [],
    applyLabel: [],
  };

  failListLabels?: Error;
  failSearch?: (predicate: string, pageIndex: number) => Error | undefined;
  failDispose?: (callIndex: number, ids: string[]) => Error | undefined;
  failApplyLabel?: Error;
  /** Ids a disposal call reports as failed without throwing. */
  rejectIds = new Set<string>();

  private readonly labelIds = new Map<string, string>();
  private readonly messages = new Map<string, StoredMessage>();

  constructor(options: { maxBatchSize?: number; labels?: string[]; messages?: FakeMessage[] } = {}) {
    this.maxBatchSize = options.maxBatchSize ?? 1000;
    for (const name of options.labels ?? []) {
      this.addLabel(name);
    }
    for (const message of options.messages ?? []) {
      this.addMessage(message);
    }
  }

  addLabel(name: string): string {
    const existing = this.labelIds.get(name);
    if (existing) {
      return existing;
    }
    const id = `Label_${this.labelIds.size + 1}`;
    this.labelIds.set(name, id);
    return id;
  }

  addMessage(message: FakeMessage): void {
    for (const label of message.labels) {
      this.addLabel(label);
    }
    this.messages.set(message.id, {
      labels: new Set(message.labels),
      ageDays: message.ageDays,
      trashed: false,
      subject: message.subject,
      date: message.date,
    });
  }

  /** Adds `count` messages `prefix-1`..`prefix-count` carrying `label`. */
  addMessages(prefix: string, count: number, label: string, ageDays: number): string[] {
    const ids: string[] = [];
    for (let i = 1; i <= count; i++) {
      const id = `${prefix}-${i}`;
      this.addMessage({ id, labels: [label], ageDays });
      ids.push(id);
    }
    return ids;
  }

  isTrashed(id: string): boolean {
    return this.messages.get(id)?.trashed === true;
  }

  exists(id: string): boolean {
    return this.messages.has(id);
  }

  labelsOf(id: string): string[] {
    return Array.from(this.messages.get(id)?.labels ?? []);
  }

  get mutationCount(): number {
    return this.calls.dispose.length + this.calls.ensureLabel.length + this.calls.applyLabel.length;
  }

  async listLabels(): Promise<MailLabel[]> {
    this.calls.listLabels++;
    if (this.failListLabels) {
      throw this.failListLabels;
    }
    return Array.from(this.labelIds, ([name, id]) => ({ id, name, type: 'user' as const }));
  }

  async searchMessages(predicate: string, pageToken: string | undefined, pageSize: number): Promise<SearchPage> {
    this.calls.search.push(predicate);
    const offset = pageToken ? Number(pageToken) : 0;
    const failure = this.failSearch?.(predicate, Math.floor(offset / pageSize));
    if (failure) {
      throw failure;
    }

    const { include, exclude, olderThanDays } = parsePredicate(predicate);
    const matching = Array.from(this.messages)
      .filter(([, message]) => this.includeTrash || !message.trashed)
      .filter(([, message]) => message.ageDays > olderThanDays)
      .filter(([, message]) => include.every((label) => message.labels.has(label)))
      .filter(([, message]) => !exclude.some((label) => message.labels.has(label)))
      .map(([id]) => id);

    const ids = matching.slice(offset, offset + pageSize);
    const next = offset + pageSize;
    return { ids, nextPageToken: next < matching.length ? String(next) : undefined };
  }

  async getMessageSummaries(ids: string[]): Promise<MessageSummary[]> {
    this.calls.summaries.push([...ids]);
    return ids.flatMap((id) => {
      const message = this.messages.get(id);
      return message ? [{ id, subject: message.subject, date: message.date }] : [];
    });
  }

  async batchDispose(action: DisposalAction, ids: string[]): Promise<DisposeResult> {
    if (ids.length > this.maxBatchSize) {
      throw new RangeError(`batch of ${ids.length} exceeds ${this.maxBatchSize}`);
    }
    const callIndex = this.calls.dispose.length;
    this.calls.dispose.push({ action, ids: [...ids] });
    const failure = this.failDispose?.(callIndex, ids);
    if (failure) {
      throw failure;
    }

    const result: DisposeResult = { succeeded: [], failed: [] };
    for (const id of ids) {
      if (this.rejectIds.has(id)) {
        result.failed.push({ id, reason: 'rejected' });
        continue;
      }
      if (action === 'delete') {
        this.messages.delete(id);
      } else {
        const message = this.messages.get(id);
        if (message) {
          message.trashed = true;
        }
      }
      result.succeeded.push(id);
    }
    return result;
  }

  async ensureLabel(name: string): Promise<string> {
    this.calls.ensureLabel.push(name);
    return this.addLabel(name);
  }

  async applyLabel(labelId: string, ids: string[]): Promise<void> {
    this.calls.applyLabel.push({ labelId, ids: [...ids] });
    if (this.failApplyLabel) {
      throw this.failApplyLabel;
    }
    const name = Array.from(this.labelIds).find(([, id]) => id === labelId)?.[0];
    if (!name) {
      throw new Error(`Unknown label id ${labelId}`);
    }
    for (const id of ids) {
      this.messages.get(id)?.labels.add(name);
    }
  }
}
