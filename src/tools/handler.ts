import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { AuthManager } from '../auth/AuthManager.js';
import { BatchDisposalOptions, BatchDisposalProcessor, DEFAULT_PAGE_SIZE } from '../disposal/BatchDisposalProcessor.js';
import { MessageEnumerator } from '../email/MessageEnumerator.js';
import { describeError, isConfigurationError } from '../errors/RetentionErrors.js';
import { MarkerLabelCache } from '../labels/MarkerLabelCache.js';
import { MailProvider } from '../provider/MailProvider.js';
import { labelTerm } from '../query/QueryBuilder.js';
import { RetentionPolicy } from '../retention/RetentionPolicy.js';
import { Rule } from '../rules/Rule.js';
import { RuleSet } from '../rules/RuleSet.js';
import { RuleStore } from '../rules/RuleStore.js';
import { DisposalAction, MessageSummary, RuleSelection, RunMode, RunOutcome, RunReport } from '../types/index.js';
import { SerialQueue } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';

export interface ToolContext {
  ruleStore: RuleStore;
  auth: Pick<AuthManager, 'getAuthUrl' | 'completeAuthentication'>;
  /** Resolves the mailbox; fails while unauthenticated. */
  getProvider: () => Promise<MailProvider>;
  markerCache: MarkerLabelCache;
  processing: BatchDisposalOptions;
  /** Rule edits and runs go through here one at a time. */
  queue: SerialQueue;
  /** Aborted on shutdown; cancels a run in progress. */
  signal?: AbortSignal;
}

export type ToolArgs = Record<string, unknown>;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};

// Authorization codes grant mailbox access and must not reach the logs
const SECRET_ARGS = new Set(['code']);

function loggableArgs(args: ToolArgs): ToolArgs {
  return Object.fromEntries(
    Object.entries(args).map(([key, value]) => [key, SECRET_ARGS.has(key) ? '[REDACTED]' : value])
  );
}

export async function handleToolCall(
  toolName: string,
  args: ToolArgs,
  context: ToolContext
): Promise<ToolResult> {
  logger.info(`Handling tool call: ${toolName}`, { args: loggableArgs(args) });

  try {
    switch (toolName) {
      case 'authenticate':
        return await handleAuthenticate(context);

      case 'complete_authentication':
        return await handleCompleteAuthentication(args, context);

      case 'list_rules':
        return await handleListRules(context);

      case 'add_rule':
        return await handleAddRule(args, context);

      case 'remove_rule':
        return await handleRemoveRule(args, context);

      case 'add_rule_label':
        return await handleAddRuleLabel(args, context);

      case 'remove_rule_label':
        return await handleRemoveRuleLabel(args, context);

      case 'set_rule_action':
        return await handleSetRuleAction(args, context);

      case 'preview_rule_queries':
        return await handlePreviewRuleQueries(args, context);

      case 'run_rules':
        return await handleRunRules(args, context);

      case 'list_mailbox_labels':
        return await handleListMailboxLabels(context);

      case 'list_messages':
        return await handleListMessages(args, context);

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
    }
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }
    if (isConfigurationError(error)) {
      logger.warn(`Rejected ${toolName}: ${error.message}`);
      throw new McpError(ErrorCode.InvalidParams, error.message);
    }
    logger.error(`Error in tool ${toolName}:`, error);
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${describeError(error)}`);
  }
}

function jsonResult(value: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(value, null, 2),
    }],
  };
}

// Argument readers

function invalidParams(message: string): McpError {
  return new McpError(ErrorCode.InvalidParams, message);
}

function readString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalidParams(`${key} must be a string`);
  }
  return value;
}

function requireString(args: ToolArgs, key: string): string {
  const value = readString(args, key);
  if (value === undefined) {
    throw invalidParams(`${key} is required`);
  }
  return value;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

function readPositiveInteger(args: ToolArgs, key: string, fallback: number): number {
  const value = args[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (!isPositiveInteger(value)) {
    throw invalidParams(`${key} must be a positive integer`);
  }
  return value;
}

function readRuleId(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isPositiveInteger(value)) {
    throw invalidParams(`${key} must be a positive integer`);
  }
  return value;
}

function requireRuleId(args: ToolArgs, key: string): number {
  const value = readRuleId(args, key);
  if (value === undefined) {
    throw invalidParams(`${key} is required`);
  }
  return value;
}

function readBoolean(args: ToolArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw invalidParams(`${key} must be a boolean`);
  }
  return value;
}

function readStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalidParams(`${key} must be an array of strings`);
  }
  return value;
}

function readRuleIds(args: ToolArgs, key: string): number[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every(isPositiveInteger)) {
    throw invalidParams(`${key} must be an array of positive integers`);
  }
  if (value.length === 0) {
    throw invalidParams(`${key} must name at least one rule; leave it out to select every rule`);
  }
  return value;
}

function isDisposalAction(value: unknown): value is DisposalAction {
  return value === DisposalAction.TRASH || value === DisposalAction.DELETE;
}

function readAction(args: ToolArgs, key: string): DisposalAction | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isDisposalAction(value)) {
    throw invalidParams(`${key} must be "trash" or "delete"`);
  }
  return value;
}

function readSelection(args: ToolArgs): RuleSelection {
  return {
    skipTrash: readBoolean(args, 'skip_trash', false),
    skipDelete: readBoolean(args, 'skip_delete', false),
    ruleIds: readRuleIds(args, 'rule_ids'),
  };
}

// Authentication

async function handleAuthenticate(context: ToolContext): Promise<ToolResult> {
  const authUrl = await context.auth.getAuthUrl();
  return jsonResult({
    success: true,
    authUrl,
    instructions: 'Visit the URL, grant access, then call complete_authentication with the code shown.',
  });
}

async function handleCompleteAuthentication(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const code = requireString(args, 'code').trim();
  if (code === '') {
    throw invalidParams('code must not be empty');
  }
  await context.auth.completeAuthentication(code);
  return jsonResult({ success: true });
}

// Rule management

function summarizeRule(rule: Rule, markerPrefix: string) {
  return {
    ...rule.toJSON(),
    description: rule.describe(),
    markerLabel: rule.retention.generateLabel ? rule.markerLabel(markerPrefix) : undefined,
  };
}

/** Load, change and save the rule file as one queued step. */
function updateRules(context: ToolContext, change: (ruleSet: RuleSet) => Rule): Promise<ToolResult> {
  return context.queue.run(async () => {
    const ruleSet = await context.ruleStore.load();
    const rule = change(ruleSet);
    await context.ruleStore.save(ruleSet);
    return jsonResult({ success: true, rule: summarizeRule(rule, ruleSet.markerPrefix) });
  });
}

async function handleListRules(context: ToolContext): Promise<ToolResult> {
  const ruleSet = await context.ruleStore.load();
  return jsonResult({
    markerPrefix: ruleSet.markerPrefix,
    rules: ruleSet.rules().map((rule) => summarizeRule(rule, ruleSet.markerPrefix)),
  });
}

async function handleAddRule(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const retention = RetentionPolicy.parse(
    requireString(args, 'retention'),
    readBoolean(args, 'generate_label', true)
  );
  const labels = readStringArray(args, 'labels');
  const action = readAction(args, 'action');
  const id = readRuleId(args, 'id');

  return updateRules(context, (ruleSet) => ruleSet.addRule({ retention, labels, action, id }));
}

async function handleRemoveRule(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const ruleId = readRuleId(args, 'rule_id');
  const label = readString(args, 'label');
  if (ruleId !== undefined && label === undefined) {
    return updateRules(context, (ruleSet) => ruleSet.removeRule(ruleId));
  }
  if (label !== undefined && ruleId === undefined) {
    return updateRules(context, (ruleSet) => ruleSet.removeRuleByLabel(label));
  }
  throw invalidParams('Give exactly one of rule_id or label');
}

async function handleAddRuleLabel(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const ruleId = requireRuleId(args, 'rule_id');
  const label = requireString(args, 'label');
  return updateRules(context, (ruleSet) => ruleSet.addLabel(ruleId, label));
}

async function handleRemoveRuleLabel(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const ruleId = requireRuleId(args, 'rule_id');
  const label = requireString(args, 'label');
  return updateRules(context, (ruleSet) => ruleSet.removeLabel(ruleId, label));
}

async function handleSetRuleAction(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const ruleId = requireRuleId(args, 'rule_id');
  const action = readAction(args, 'action');
  if (action === undefined) {
    throw invalidParams('action is required');
  }
  return updateRules(context, (ruleSet) => ruleSet.setAction(ruleId, action));
}

// Retention runs

async function handlePreviewRuleQueries(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const selection = readSelection(args);
  const ruleSet = await context.ruleStore.load();
  const provider = await context.getProvider();

  // exclusions only appear for marker labels the mailbox already has
  const labels = await provider.listLabels();
  context.markerCache.reconcile(labels, ruleSet.markerPrefix);

  const processor = new BatchDisposalProcessor(provider, context.markerCache, context.processing);
  return jsonResult({ queries: processor.previewQueries(ruleSet, selection) });
}

function summarizeOutcome(outcome: RunOutcome) {
  switch (outcome.kind) {
    case 'preview':
      return {
        kind: outcome.kind,
        ruleId: outcome.ruleId,
        label: outcome.label,
        action: outcome.action,
        chunkIndex: outcome.chunkIndex,
        messages: outcome.attempted.length,
      };
    case 'disposal':
      return {
        kind: outcome.kind,
        ruleId: outcome.ruleId,
        label: outcome.label,
        action: outcome.action,
        chunkIndex: outcome.chunkIndex,
        attempted: outcome.attempted.length,
        succeeded: outcome.succeeded.length,
        failed: outcome.failed,
        error: outcome.error?.message,
        markerError: outcome.markerError?.message,
      };
    case 'pair-failed':
      return {
        kind: outcome.kind,
        ruleId: outcome.ruleId,
        label: outcome.label,
        action: outcome.action,
        error: outcome.error.message,
        errorType: outcome.error.name,
        partialMessages: outcome.partialIds.length,
      };
    case 'cancelled':
      return outcome;
  }
}

export function summarizeReport(report: RunReport) {
  return {
    mode: report.mode,
    cancelled: report.cancelled,
    totals: report.totals,
    outcomes: report.outcomes.map(summarizeOutcome),
  };
}

async function handleRunRules(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const selection = readSelection(args);
  const mode = readBoolean(args, 'execute', false) ? RunMode.EXECUTE : RunMode.DRY_RUN;

  return context.queue.run(async () => {
    const ruleSet = await context.ruleStore.load();
    const provider = await context.getProvider();
    const processor = new BatchDisposalProcessor(provider, context.markerCache, context.processing);
    const report = await processor.run(ruleSet, { ...selection, mode, signal: context.signal });
    return jsonResult(summarizeReport(report));
  });
}

async function handleListMailboxLabels(context: ToolContext): Promise<ToolResult> {
  const provider = await context.getProvider();
  const labels = await provider.listLabels();
  return jsonResult({
    labels: labels
      .map((label) => ({ id: label.id, name: label.name, type: label.type }))
      .sort((a, b) => a.name.localeCompare(b.name)),
  });
}

// Message listing

interface MessageQuery {
  predicate: string;
  ruleId?: number;
  label?: string;
}

/** Rule mode: the predicates the rule would search with on its next run. */
async function ruleQueries(ruleId: number, context: ToolContext, provider: MailProvider): Promise<MessageQuery[]> {
  const ruleSet = await context.ruleStore.load();
  ruleSet.requireRule(ruleId);
  context.markerCache.reconcile(await provider.listLabels(), ruleSet.markerPrefix);
  const processor = new BatchDisposalProcessor(provider, context.markerCache, context.processing);
  return processor
    .previewQueries(ruleSet, { ruleIds: [ruleId] })
    .map(({ predicate, label }) => ({ predicate, ruleId, label }));
}

async function handleListMessages(args: ToolArgs, context: ToolContext): Promise<ToolResult> {
  const query = readString(args, 'query')?.trim();
  const labels = readStringArray(args, 'labels') ?? [];
  const ruleId = readRuleId(args, 'rule_id');
  const maxPages = readPositiveInteger(args, 'max_pages', 1);

  let queries: MessageQuery[] = [];
  if (ruleId === undefined) {
    const terms = labels.map((label) => labelTerm(label));
    if (query) {
      terms.push(query);
    }
    if (terms.length === 0) {
      throw invalidParams('Give a query, labels or a rule_id');
    }
    queries = [{ predicate: terms.join(' ') }];
  } else if (query || labels.length > 0) {
    throw invalidParams('Give either rule_id or query/labels, not both');
  }

  const provider = await context.getProvider();
  if (ruleId !== undefined) {
    queries = await ruleQueries(ruleId, context, provider);
  }

  const enumerator = new MessageEnumerator(provider);
  const pageSize = context.processing.pageSize ?? DEFAULT_PAGE_SIZE;
  const results: Array<MessageQuery & { messages: MessageSummary[] }> = [];
  for (const entry of queries) {
    const ids = await enumerator.enumerate(entry.predicate, { pageSize, maxPages, signal: context.signal });
    const messages = ids.length > 0 ? await provider.getMessageSummaries(ids) : [];
    logger.info('Listed messages', { predicate: entry.predicate, count: messages.length });
    results.push({ ...entry, messages });
  }
  return jsonResult({ queries: results });
}
