import fs from 'fs/promises';
import path from 'path';
import { ActiveRule, RuleDocument } from '../types';
import { RULE_PAYLOAD_MAX_BYTES, ruleDocumentSchema } from '../config/ruleSchema';
import { SignalRepository } from '../data/repositories';
import { RuleValidationError, errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

/**
 * Parse and validate one rule document. `source` names the file or request
 * the text came from and appears in the error.
 */
export function parseRuleDocument(raw: string, source: string, maxBytes: number = RULE_PAYLOAD_MAX_BYTES): RuleDocument {
  const size = Buffer.byteLength(raw, 'utf8');
  if (size > maxBytes) {
    throw new RuleValidationError(source, [`document is ${size} bytes, limit is ${maxBytes}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RuleValidationError(source, [`not valid JSON: ${errorMessage(error)}`]);
  }

  const parsed = ruleDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new RuleValidationError(
      source,
      parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export interface LoadedRules {
  active: ActiveRule[];
  /** Every stored definition, enabled or not. */
  total: number;
}

/**
 * Loads `*.json` rule documents from a directory in file-name order,
 * registers each one with the signal store and returns the enabled ones.
 * One bad document aborts the load.
 */
export class RuleLoader {
  constructor(
    private readonly rulesDir: string,
    private readonly signals: SignalRepository
  ) {}

  async listRuleFiles(): Promise<string[]> {
    const entries = await fs.readdir(this.rulesDir);
    return entries
      .filter(name => name.endsWith('.json'))
      .sort()
      .map(name => path.join(this.rulesDir, name));
  }

  async load(): Promise<LoadedRules> {
    const files = await this.listRuleFiles();
    const active: ActiveRule[] = [];
    const seen = new Set<string>();

    for (const file of files) {
      const raw = await fs.readFile(file, 'utf8');
      const document = parseRuleDocument(raw, path.basename(file));
      if (seen.has(document.name)) {
        throw new RuleValidationError(path.basename(file), [`duplicate rule name '${document.name}'`]);
      }
      seen.add(document.name);

      const { id, version } = await this.signals.upsertRuleDef(document, raw);
      logger.debug(`Rule registered: ${document.name} (id=${id}, v${version})`);

      if (!document.enabled) continue;
      active.push({ id, name: document.name, type: document.type, document });
    }

    await this.signals.insertAudit({
      actor: 'rules_engine',
      action: 'rules_loaded',
      meta: { count: active.length },
    });
    logger.info(`Loaded ${active.length} active rules from ${this.rulesDir}`);

    return { active, total: files.length };
  }

  /**
   * Write an uploaded document into the rules directory, replacing the file
   * that already holds a rule of the same name. Returns the stored version.
   */
  async saveRule(raw: string, source: string, maxBytes?: number): Promise<{ document: RuleDocument; id: number; version: number; file: string }> {
    const document = parseRuleDocument(raw, source, maxBytes);
    const file = (await this.findRuleFile(document.name)) ?? path.join(this.rulesDir, `${ruleFileName(document.name)}.json`);

    await fs.mkdir(this.rulesDir, { recursive: true });
    await fs.writeFile(file, raw, 'utf8');
    const { id, version } = await this.signals.upsertRuleDef(document, raw);

    await this.signals.insertAudit({
      actor: 'api',
      action: 'upload_rule',
      targetId: String(id),
      meta: { name: document.name, version },
    });
    return { document, id, version, file };
  }

  private async findRuleFile(name: string): Promise<string | null> {
    let files: string[];
    try {
      files = await this.listRuleFiles();
    } catch (error) {
      logger.warn(`Rules directory not readable: ${errorMessage(error)}`);
      return null;
    }
    for (const file of files) {
      try {
        const existing = parseRuleDocument(await fs.readFile(file, 'utf8'), path.basename(file));
        if (existing.name === name) return file;
      } catch (error) {
        logger.warn(`Skipping unreadable rule file ${path.basename(file)}: ${errorMessage(error)}`);
      }
    }
    return null;
  }
}

export function ruleFileName(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'rule';
}
