#!/usr/bin/env node

/**
 * ClaimScout - CLI Entry Point
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import { Scanner } from './core/scanner.js';
import { Extractor } from './extract/index.js';
import { RunContext, type RunEvent } from './context.js';
import { displayPattern, listManifestTypes } from './ecosystems/index.js';
import { scoreName } from './risk/index.js';
import { formatSummary } from './aggregate/index.js';
import {
  loadConfig,
  mergeConfig,
  validateConfig,
  resolveSettings,
  generateSampleConfig,
  findConfigPath,
  type ClaimScoutConfig,
} from './config/index.js';
import type { ScanOutput } from './types.js';
import { errorMessage } from './errors.js';
import { VERSION } from './version.js';

interface CommonCliOptions {
  source: string;
  config?: string;
  label?: string;
  scripts: boolean;
  verbose?: boolean;
}

interface ScanCliOptions extends CommonCliOptions {
  verify: boolean;
  registry?: string;
  concurrency?: number;
  rateLimit?: number;
  pretty?: boolean;
  output?: string;
}

interface OutputCliOptions {
  pretty?: boolean;
  output?: string;
}

const CONFIG_FILENAME = '.claimscoutrc.json';

const program = new Command();

program
  .name('claimscout')
  .description('Find dependency manifests and flag unclaimed or suspicious npm package names')
  .version(VERSION);

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function withScanOptions(command: Command): Command {
  return command
    .requiredOption('-s, --source <dir>', 'Source tree to scan')
    .option('-c, --config <file>', 'Path to config file')
    .option('--label <name>', 'Label stamped on every record (e.g. repository name)')
    .option('--no-scripts', 'Do not scan package.json scripts for install commands')
    .option('--no-verify', 'Skip registry verification')
    .option('--registry <url>', 'Registry base URL')
    .option('--concurrency <n>', 'Maximum in-flight registry lookups', parseNumber)
    .option('--rate-limit <rpm>', 'Registry requests per minute (0 disables)', parseNumber)
    .option('-v, --verbose', 'Show progress');
}

/**
 * Config file values overridden by whatever was given on the command line
 */
function buildConfig(options: ScanCliOptions): ClaimScoutConfig {
  const fileConfig = loadConfig(options.source, options.config);
  if (options.verbose) {
    const configPath = options.config ?? findConfigPath(options.source);
    if (configPath) {
      console.error(chalk.gray(`Config loaded from: ${configPath}`));
    }
  }

  return mergeConfig(fileConfig, {
    label: options.label,
    // Negated flags default to true; only an explicit --no-* overrides the file
    scriptReferences: options.scripts ? undefined : false,
    verify: options.verify ? undefined : false,
    registry: {
      url: options.registry,
      concurrency: options.concurrency,
      requestsPerMinute: options.rateLimit,
    },
  });
}

function attachReporter(context: RunContext): void {
  context.on((event: RunEvent) => {
    switch (event.type) {
      case 'manifest_parsed':
        console.error(chalk.gray(`Parsed ${event.file} (${event.ecosystem}, ${event.records} records)`));
        break;
      case 'manifest_failed':
        console.error(chalk.yellow(`Skipped ${event.file}: ${event.message}`));
        break;
      case 'extraction_finished':
        console.error(chalk.gray(`Extracted ${event.records} records from ${event.files} manifests`));
        break;
      case 'lookup_retry':
        console.error(chalk.yellow(`Retrying ${event.name} in ${event.delayMs}ms (attempt ${event.attempt}): ${event.message}`));
        break;
      case 'lookup_finished':
        console.error(chalk.gray(`Checked ${event.name}: ${event.status}`));
        break;
      case 'verification_cancelled':
        console.error(chalk.yellow(`Verification cancelled: ${event.completed} checked, ${event.skipped} skipped`));
        break;
      case 'lookup_started':
        break;
    }
  });
}

/**
 * Run the scan pipeline, aborting verification on Ctrl+C
 */
async function runScan(options: ScanCliOptions): Promise<ScanOutput> {
  const context = new RunContext({ keepEvents: false });
  if (options.verbose) {
    console.error(chalk.cyan(`ClaimScout v${VERSION}`));
    attachReporter(context);
  }

  const scanner = new Scanner({ config: buildConfig(options), context });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error(chalk.yellow('Interrupted, returning results collected so far...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await scanner.scan(options.source, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function emitJson(value: unknown, options: OutputCliOptions): Promise<void> {
  const json = options.pretty
    ? JSON.stringify(value, null, 2)
    : JSON.stringify(value);

  if (options.output) {
    await writeFile(options.output, json + '\n', 'utf-8');
    console.error(chalk.green(`Results written to ${options.output}`));
  } else {
    console.log(json);
  }
}

function setExitCode(output: ScanOutput): void {
  if (output.summary.unclaimed > 0 || output.summary.suspicious > 0) {
    process.exitCode = 2;
  }
}

// === scan command ===
withScanOptions(
  program
    .command('scan')
    .description('Extract dependencies and verify npm names against the registry (JSON output)')
)
  .option('--pretty', 'Pretty print JSON output')
  .option('-o, --output <file>', 'Write JSON to a file')
  .action(async (options: ScanCliOptions) => {
    try {
      const output = await runScan(options);
      await emitJson(output, options);
      setExitCode(output);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// === check command ===
withScanOptions(
  program
    .command('check')
    .description('Extract and verify, then print a human-readable summary')
)
  .action(async (options: ScanCliOptions) => {
    try {
      const output = await runScan(options);
      const { summary } = output;

      const color = summary.risk.level === 'LOW' ? chalk.green : summary.risk.level === 'MEDIUM' ? chalk.yellow : chalk.red;
      console.log(chalk.bold(`ClaimScout: ${output.rootDir}`) + (output.label ? chalk.gray(` [${output.label}]`) : ''));
      console.log(color(`Risk level: ${summary.risk.level}`));
      if (output.cancelled) {
        console.log(chalk.yellow('Verification was cancelled; results are partial.'));
      }
      console.log();
      console.log(formatSummary(summary, output.records));

      setExitCode(output);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// === extract command ===
program
  .command('extract')
  .description('Extract dependency records only, without registry lookups')
  .requiredOption('-s, --source <dir>', 'Source tree to scan')
  .option('-c, --config <file>', 'Path to config file')
  .option('--label <name>', 'Label stamped on every record')
  .option('--no-scripts', 'Do not scan package.json scripts for install commands')
  .option('--pretty', 'Pretty print JSON output')
  .option('-o, --output <file>', 'Write JSON to a file')
  .option('-v, --verbose', 'Show progress')
  .action(async (options: CommonCliOptions & OutputCliOptions) => {
    try {
      const settings = resolveSettings(mergeConfig(loadConfig(options.source, options.config), {
        label: options.label,
        scriptReferences: options.scripts ? undefined : false,
      }));

      const context = new RunContext({ keepEvents: false });
      if (options.verbose) attachReporter(context);

      const extractor = new Extractor({
        ignorePatterns: settings.ignorePaths,
        concurrency: settings.extractionConcurrency,
        scriptReferences: settings.scriptReferences,
        context,
      });
      const result = await extractor.extract(options.source, { label: settings.label });

      await emitJson({ version: VERSION, ...result }, options);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// === score command ===
program
  .command('score')
  .description('Run the name heuristics on package names')
  .argument('<names...>', 'Package names to score')
  .option('-c, --config <file>', 'Path to config file')
  .option('--json', 'Output JSON')
  .action((names: string[], options: { config?: string; json?: boolean }) => {
    try {
      const { risk } = resolveSettings(loadConfig(process.cwd(), options.config) ?? {});
      const verdicts = names.map(name => ({ name, ...scoreName(name, risk) }));

      if (options.json) {
        console.log(JSON.stringify(verdicts, null, 2));
        return;
      }

      for (const verdict of verdicts) {
        const detail = verdict.matched ? ` (${verdict.matched})` : '';
        console.log(verdict.isSuspicious
          ? chalk.red(`✗ ${verdict.name}: ${verdict.reason}${detail}`)
          : chalk.green(`✓ ${verdict.name}`));
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// === ecosystems command ===
program
  .command('ecosystems')
  .description('List supported manifest files')
  .action(() => {
    console.log(chalk.bold('Supported manifests:\n'));
    for (const type of listManifestTypes()) {
      console.log(`  ${chalk.cyan(type.ecosystem.padEnd(10))} ${displayPattern(type).padEnd(20)} ${chalk.gray(type.format)}`);
    }
  });

// === init command ===
program
  .command('init')
  .description('Create a configuration file in the current directory')
  .option('--force', 'Overwrite existing config file')
  .action(async (options: { force?: boolean }) => {
    const existing = findConfigPath(process.cwd());
    if (existing && !options.force) {
      console.error(chalk.yellow(`Config file already exists: ${existing}`));
      console.error(chalk.gray('Use --force to overwrite'));
      process.exit(1);
    }

    try {
      await writeFile(CONFIG_FILENAME, generateSampleConfig() + '\n');
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
    console.log(chalk.green(`✓ Created ${CONFIG_FILENAME}`));
    console.log();
    console.log('Edit the config file to customize ClaimScout behavior.');
  });

// === config command ===
program
  .command('config')
  .description('Show current configuration')
  .option('-c, --config <file>', 'Path to config file')
  .option('--validate', 'Validate the configuration')
  .action((options: { config?: string; validate?: boolean }) => {
    let config: ClaimScoutConfig | null;
    try {
      config = loadConfig(process.cwd(), options.config);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }

    if (!config) {
      console.error(chalk.yellow('No configuration file found.'));
      console.error(chalk.gray('Run `claimscout init` to create one.'));
      process.exit(1);
    }

    const configPath = options.config ?? findConfigPath(process.cwd());
    console.log(chalk.cyan(`Config loaded from: ${configPath}`));
    console.log();

    if (options.validate) {
      const validation = validateConfig(config);
      if (validation.valid) {
        console.log(chalk.green('✓ Configuration is valid'));
      } else {
        console.log(chalk.red('✗ Configuration has errors:'));
        for (const error of validation.errors) {
          console.log(chalk.red(`  - ${error}`));
        }
        process.exit(1);
      }
      console.log();
    }

    console.log(JSON.stringify(config, null, 2));
  });

// Run CLI
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
