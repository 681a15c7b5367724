import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { CheckType } from '../../../agents/contracts/index.js';
import { createEngine, ENGINE_IDENTITY } from '../../../agents/content-safety/src/engine.js';
import type { ContentSafetyEngine } from '../../../agents/content-safety/src/engine.js';
import { runSafetyCheck } from '../../../agents/content-safety/src/safety-check.js';
import {
  loadEngineConfig,
  setLogLevel,
  setLogWriter,
  structuredLog,
} from '../../../agents/lib/index.js';
import {
  DEFAULT_SCAN_EXCLUDES,
  DEFAULT_SCAN_PATTERNS,
  formatFinding,
  formatSummary,
  formatVerdict,
  scanPath,
  summarize,
} from './commands.js';

const VERSION = ENGINE_IDENTITY.engine_version;

const OutputFormat = z.enum(['text', 'json']);

type GlobalOptions = {
  pii: boolean;
  jailbreak: boolean;
};

interface CheckOptions {
  direction: string;
  output: string;
  customPattern?: string[];
}

interface ScanCommandOptions {
  pattern: string[];
  exclude: string[];
  direction: string;
  output: string;
}

interface OutputOptions {
  output: string;
}

/**
 * Build an engine from the environment plus command-line overrides.
 * Log lines go to stderr so stdout carries only command output.
 */
function buildEngine(program: Command): ContentSafetyEngine {
  const host = loadEngineConfig(process.env);
  const globals = program.opts<GlobalOptions>();

  setLogWriter((line) => console.error(line));
  setLogLevel(host.logLevel);

  return createEngine({
    ...host.engine,
    piiDetectionEnabled: host.engine.piiDetectionEnabled && globals.pii,
    jailbreakDetectionEnabled: host.engine.jailbreakDetectionEnabled && globals.jailbreak,
    telemetryConfig: { enabled: host.telemetryEnabled },
  });
}

function fail(message: string, error: unknown): never {
  console.error(chalk.red(message));
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function buildEngineOrExit(program: Command): ContentSafetyEngine {
  try {
    return buildEngine(program);
  } catch (error) {
    fail('Invalid configuration', error);
  }
}

const directionOption = (): Option =>
  new Option('-d, --direction <direction>', 'Direction to check')
    .choices(CheckType.options)
    .default('both');

const outputOption = (): Option =>
  new Option('-o, --output <format>', 'Output format')
    .choices(OutputFormat.options)
    .default('text');

/**
 * Build the `content-safety` command tree. Commands set `process.exitCode`
 * to 1 when unsafe content is found.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('content-safety')
    .description('Rule-based content safety checks for LLM input and output')
    .version(VERSION)
    .option('--no-pii', 'Disable PII detection')
    .option('--no-jailbreak', 'Disable jailbreak detection');

  program
    .command('check')
    .description('Check a single text for harmful content, jailbreak attempts and PII')
    .argument('<text>', 'Text to check')
    .addOption(directionOption())
    .addOption(outputOption())
    .option('--custom-pattern <patterns...>', 'Additional harmful-content patterns')
    .action((text: string, options: CheckOptions) => {
      const engine = buildEngineOrExit(program);

      for (const pattern of options.customPattern ?? []) {
        if (!engine.addCustomPattern(pattern)) {
          console.error(chalk.yellow(`Skipped invalid pattern: ${pattern}`));
        }
      }

      const result = runSafetyCheck(engine, {
        text,
        check_type: CheckType.parse(options.direction),
      });
      engine.shutdown();

      if (OutputFormat.parse(options.output) === 'json') {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(chalk.bold('\nContent Safety Check\n'));
        if (options.direction !== 'output') {
          console.log(formatVerdict('Input', result.input_check));
        }
        if (options.direction !== 'input') {
          console.log(formatVerdict('Output', result.output_check));
        }
        console.log('');
        console.log(result.overall_safe ? chalk.green('  ✓ Text is safe\n') : chalk.red('  ✗ Text is unsafe\n'));
      }

      process.exitCode = result.overall_safe ? 0 : 1;
    });

  program
    .command('sanitize')
    .description('Redact email addresses, phone numbers, SSNs and card numbers')
    .argument('<text>', 'Text to sanitize')
    .addOption(outputOption())
    .action((text: string, options: OutputOptions) => {
      const engine = buildEngineOrExit(program);

      const sanitized = engine.sanitize(text);
      engine.shutdown();

      if (OutputFormat.parse(options.output) === 'json') {
        console.log(JSON.stringify({ sanitized, changed: sanitized !== text }, null, 2));
      } else {
        console.log(sanitized);
      }
    });

  program
    .command('scan')
    .description('Check every line of a file or of the matching files in a directory')
    .argument('[path]', 'File or directory to scan', '.')
    .option('-p, --pattern <patterns...>', 'File patterns to include', DEFAULT_SCAN_PATTERNS)
    .option('-e, --exclude <patterns...>', 'Patterns to exclude', DEFAULT_SCAN_EXCLUDES)
    .addOption(directionOption())
    .addOption(outputOption())
    .action(async (path: string, options: ScanCommandOptions) => {
      const engine = buildEngineOrExit(program);

      const spinner = ora('Scanning...').start();

      try {
        const report = await scanPath(engine, path, {
          patterns: options.pattern,
          exclude: options.exclude,
          direction: CheckType.parse(options.direction),
        });
        spinner.stop();
        engine.shutdown();

        if (OutputFormat.parse(options.output) === 'json') {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log(chalk.bold('\nContent Safety Scan Results\n'));

          if (report.findings.length === 0) {
            console.log(chalk.green('  ✓ No unsafe content found!\n'));
          } else {
            report.findings.forEach((finding) => {
              console.log(formatFinding(finding));
              console.log('');
            });
          }

          console.log(formatSummary(summarize(report.findings, report.fileCount)));
        }

        process.exitCode = report.findings.length > 0 ? 1 : 0;
      } catch (error) {
        spinner.fail('Scan failed');
        structuredLog('error', 'Scan failed', {
          path,
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      }
    });

  program
    .command('stats')
    .description('Show loaded pattern counts and detector toggles')
    .addOption(outputOption())
    .action((options: OutputOptions) => {
      const engine = buildEngineOrExit(program);

      const stats = engine.getFilterStats();
      engine.shutdown();

      if (OutputFormat.parse(options.output) === 'json') {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      const flag = (on: boolean): string => (on ? chalk.green('enabled') : chalk.yellow('disabled'));
      console.log(chalk.bold('\nContent Safety Engine\n'));
      console.log(`  Harmful patterns:    ${chalk.cyan(stats.harmful_pattern_count)}`);
      console.log(`  Jailbreak patterns:  ${chalk.cyan(stats.jailbreak_pattern_count)}`);
      console.log(`  Content filter:      ${flag(stats.content_filter_enabled)}`);
      console.log(`  PII detection:       ${flag(stats.pii_detection_enabled)}`);
      console.log(`  Jailbreak detection: ${flag(stats.jailbreak_detection_enabled)}`);
      console.log('');
    });

  program
    .command('version')
    .description('Show engine identity')
    .action(() => {
      console.log(`${ENGINE_IDENTITY.engine_id} ${ENGINE_IDENTITY.engine_version}`);
    });

  return program;
}
