import Ajv from 'ajv';
import fs from 'fs/promises';
import path from 'path';
import { RuleStoreError } from '../errors/RetentionErrors.js';
import { DEFAULT_MARKER_PREFIX } from '../labels/labelNames.js';
import { logger } from '../utils/logger.js';
import { createDefaultRuleSet, RuleSet, RuleSetDocument } from './RuleSet.js';

export const RULE_FILE_SCHEMA = {
  type: 'object',
  required: ['version', 'rules'],
  additionalProperties: false,
  properties: {
    version: { const: 1 },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'retention', 'generateLabel', 'labels', 'action'],
        additionalProperties: false,
        properties: {
          id: { type: 'integer', minimum: 1 },
          retention: { type: 'string' },
          generateLabel: { type: 'boolean' },
          labels: {
            type: 'array',
            items: { type: 'string', minLength: 1 },
            uniqueItems: true,
          },
          action: { enum: ['trash', 'delete'] },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<RuleSetDocument>(RULE_FILE_SCHEMA);

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps a RuleSet in a JSON file. A missing file yields the default rules.
 */
export class RuleStore {
  constructor(
    readonly filePath: string,
    private readonly markerPrefix: string = DEFAULT_MARKER_PREFIX
  ) {}

  /**
   * @throws RuleStoreError for unreadable, malformed or schema-invalid files,
   * InvalidMessageAgeError for a bad retention token
   */
  async load(): Promise<RuleSet> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No rule file found, starting from default rules', { path: this.filePath });
        return createDefaultRuleSet(this.markerPrefix);
      }
      throw new RuleStoreError(this.filePath, 'cannot be read', { cause: error });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new RuleStoreError(this.filePath, 'is not valid JSON', { cause: error });
    }

    if (!validateDocument(document)) {
      throw new RuleStoreError(this.filePath, ajv.errorsText(validateDocument.errors, { dataVar: 'document' }));
    }

    const ruleSet = RuleSet.fromJSON(document, this.markerPrefix);
    logger.debug('Loaded rules', { path: this.filePath, count: ruleSet.size });
    return ruleSet;
  }

  async save(ruleSet: RuleSet): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify(ruleSet.toJSON(), null, 2)}\n`, 'utf-8');
    await fs.rename(tmpPath, this.filePath);
    logger.debug('Saved rules', { path: this.filePath, count: ruleSet.size });
  }
}
