#!/usr/bin/env node

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import inquirer from 'inquirer';
import { DETECTOR_KINDS, DetectorKind, RuleDocument, SIGNAL_LEVELS, SignalLevel } from '../types';
import { ConfigSection, configManager } from '../config/ConfigManager';
import { parseRuleDocument, ruleFileName } from '../engine/RuleLoader';
import { SignalBot } from '../bot/SignalBot';
import { RuleValidationError, errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

export interface NewRuleAnswers {
  name: string;
  type: DetectorKind;
  level: SignalLevel;
  cooldownSecs: number;
  tags: string;
  scopeTags: string;
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/** Rule document for the interactive scaffold; detector params start at their defaults. */
export function buildRuleDocument(answers: NewRuleAnswers): RuleDocument {
  const scopeTags = splitList(answers.scopeTags);
  return {
    name: answers.name.trim(),
    type: answers.type,
    enabled: true,
    tags: splitList(answers.tags),
    params: {},
    outputs: { level: answers.level },
    scope: scopeTags.length > 0 ? { tags: scopeTags } : {},
    dedupe: { cooldown_secs: answers.cooldownSecs },
  };
}

function isConfigSection(value: string): value is ConfigSection {
  return Object.prototype.hasOwnProperty.call(configManager.getConfig(), value);
}

async function validateFiles(files: string[]): Promise<boolean> {
  let allValid = true;
  for (const file of files) {
    try {
      const document = parseRuleDocument(await fs.readFile(file, 'utf8'), path.basename(file));
      console.log(`ok    ${file} (${document.name}, ${document.type})`);
    } catch (error) {
      allValid = false;
      if (error instanceof RuleValidationError) {
        console.log(`error ${file}`);
        error.issues.forEach(issue => console.log(`      - ${issue}`));
      } else {
        console.log(`error ${file}: ${errorMessage(error)}`);
      }
    }
  }
  return allValid;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('signal-rules')
    .description('Rule documents and one-off evaluation for the signal engine')
    .version('1.0.0');

  program
    .command('validate')
    .description('Validate rule documents')
    .argument('<files...>', 'rule document paths')
    .action(async (files: string[]) => {
      const ok = await validateFiles(files);
      if (!ok) process.exitCode = 1;
    });

  program
    .command('list')
    .description('List rule documents in the rules directory')
    .option('-d, --dir <dir>', 'rules directory')
    .action(async (options: { dir?: string }) => {
      const dir = options.dir ?? configManager.getSection('engine').rulesDir;
      const files = (await fs.readdir(dir)).filter(name => name.endsWith('.json')).sort();
      if (files.length === 0) {
        console.log(`No rule documents in ${dir}`);
        return;
      }
      for (const file of files) {
        try {
          const document = parseRuleDocument(await fs.readFile(path.join(dir, file), 'utf8'), file);
          const state = document.enabled ? 'on ' : 'off';
          console.log(`${state} ${document.outputs.level} ${document.type.padEnd(22)} ${document.name}`);
        } catch (error) {
          console.log(`ERR ${file}: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    });

  program
    .command('show-config')
    .description('Show the effective configuration, secrets redacted')
    .option('-s, --section <section>', 'engine|ml|execution|notification|ingestion|synonyms|api|environment')
    .action((options: { section?: string }) => {
      const config = configManager.redacted();
      if (!options.section) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }
      if (!isConfigSection(options.section)) {
        console.error(`Invalid section: ${options.section}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(config[options.section], null, 2));
    });

  program
    .command('new')
    .description('Scaffold a rule document interactively')
    .option('-d, --dir <dir>', 'rules directory')
    .action(async (options: { dir?: string }) => {
      const answers = await inquirer.prompt<NewRuleAnswers>([
        {
          type: 'input',
          name: 'name',
          message: 'Rule name:',
          validate: (value: string) => value.trim().length > 0 || 'Name is required',
        },
        { type: 'list', name: 'type', message: 'Detector:', choices: [...DETECTOR_KINDS] },
        { type: 'list', name: 'level', message: 'Alert level:', choices: [...SIGNAL_LEVELS], default: 'P2' },
        {
          type: 'number',
          name: 'cooldownSecs',
          message: 'Cooldown (seconds):',
          default: configManager.getSection('engine').defaultCooldownSecs,
          validate: (value: number) => (Number.isFinite(value) && value >= 0) || 'Must be a non-negative number',
        },
        { type: 'input', name: 'tags', message: 'Tags (comma separated):', default: '' },
        { type: 'input', name: 'scopeTags', message: 'Only markets tagged (comma separated, empty for all):', default: '' },
      ]);

      const raw = `${JSON.stringify(buildRuleDocument(answers), null, 2)}\n`;
      const document = parseRuleDocument(raw, 'scaffold');
      const dir = options.dir ?? configManager.getSection('engine').rulesDir;
      const file = path.join(dir, `${ruleFileName(document.name)}.json`);

      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        { type: 'confirm', name: 'confirm', message: `Write ${file}?`, default: true },
      ]);
      if (!confirm) {
        console.log(raw);
        return;
      }
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(file, raw, { encoding: 'utf8', flag: 'wx' });
      console.log(`Created ${file}`);
    });

  program
    .command('evaluate')
    .description('Run one engine cycle against the configured store')
    .action(async () => {
      const bot = new SignalBot(configManager.getConfig(), { withoutApi: true, withoutIngestion: true });
      try {
        await bot.initialize();
        await bot.engine.loadRules();
        const summary = await bot.engine.evaluateOnce();
        console.log(JSON.stringify(summary, null, 2));
      } finally {
        await bot.stop();
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      logger.error('Command failed:', error);
      process.exit(1);
    });
}
