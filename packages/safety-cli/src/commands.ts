import chalk from 'chalk';
import { existsSync, readFileSync, statSync } from 'fs';
import { glob } from 'glob';
import { relative, resolve } from 'path';
import type {
  CheckType,
  DetectorKind,
  Direction,
  SafetyVerdict,
  UnsafeVerdict,
} from '../../../agents/contracts/index.js';
import type { ContentSafetyEngine } from '../../../agents/content-safety/src/engine.js';
import { runSafetyCheck } from '../../../agents/content-safety/src/safety-check.js';

export const DEFAULT_SCAN_PATTERNS = ['**/*.txt', '**/*.md', '**/*.json', '**/*.yaml', '**/*.yml'];
export const DEFAULT_SCAN_EXCLUDES = ['**/node_modules/**', '**/dist/**', '**/.git/**'];

export interface ScanFinding {
  file: string;
  line: number;
  direction: Direction;
  verdict: UnsafeVerdict;
}

export interface ScanSummary {
  totalFiles: number;
  totalFindings: number;
  byDetector: Record<DetectorKind, number>;
}

export interface ScanOptions {
  patterns: string[];
  exclude: string[];
  direction: CheckType;
}

export interface ScanReport {
  fileCount: number;
  findings: ScanFinding[];
}

/**
 * Check each non-blank line in the requested directions
 */
export function scanText(
  engine: ContentSafetyEngine,
  text: string,
  file: string = 'input',
  direction: CheckType = 'both'
): ScanFinding[] {
  const findings: ScanFinding[] = [];

  text.split('\n').forEach((line, lineIndex) => {
    if (line.trim() === '') return;

    const result = runSafetyCheck(engine, { text: line, check_type: direction });

    if (!result.input_check.is_safe) {
      findings.push({ file, line: lineIndex + 1, direction: 'input', verdict: result.input_check });
    }
    if (!result.output_check.is_safe) {
      findings.push({ file, line: lineIndex + 1, direction: 'output', verdict: result.output_check });
    }
  });

  return findings;
}

/**
 * Scan a file, or every matching file under a directory.
 * File names in findings are relative to a scanned directory.
 */
export async function scanPath(
  engine: ContentSafetyEngine,
  path: string,
  options: ScanOptions
): Promise<ScanReport> {
  const absolutePath = resolve(path);

  if (!existsSync(absolutePath)) {
    throw new Error(`Path not found: ${absolutePath}`);
  }

  if (!statSync(absolutePath).isDirectory()) {
    const content = readFileSync(absolutePath, 'utf-8');
    return {
      fileCount: 1,
      findings: scanText(engine, content, absolutePath, options.direction),
    };
  }

  const files = await glob(options.patterns, {
    cwd: absolutePath,
    absolute: true,
    nodir: true,
    ignore: options.exclude,
  });
  files.sort();

  const findings: ScanFinding[] = [];
  for (const file of files) {
    const content = readFileSync(file, 'utf-8');
    findings.push(...scanText(engine, content, relative(absolutePath, file), options.direction));
  }

  return { fileCount: files.length, findings };
}

export function summarize(findings: readonly ScanFinding[], totalFiles: number): ScanSummary {
  const byDetector: Record<DetectorKind, number> = {
    harmful_content: 0,
    system_prompt_leakage: 0,
    jailbreak: 0,
    pii: 0,
    input_limit: 0,
  };
  for (const finding of findings) {
    byDetector[finding.verdict.detector] += 1;
  }

  return { totalFiles, totalFindings: findings.length, byDetector };
}

// =============================================================================
// Rendering
// =============================================================================

function describeUnsafe(verdict: UnsafeVerdict): string[] {
  const lines = [
    `${chalk.red('UNSAFE')} ${chalk.white(verdict.reason)}`,
    `${chalk.gray('Detector:')} ${verdict.detector}`,
    `${chalk.gray('Confidence:')} ${verdict.confidence}`,
  ];
  if (verdict.category !== undefined) {
    lines.push(`${chalk.gray('Category:')} ${verdict.category}`);
  }
  if (verdict.matched_pattern !== undefined) {
    lines.push(`${chalk.gray('Pattern:')} ${verdict.matched_pattern}`);
  }
  for (const pii of verdict.detected_pii ?? []) {
    lines.push(`${chalk.gray('PII:')} ${pii.type} x${pii.count}`);
  }
  return lines;
}

export function formatVerdict(label: string, verdict: SafetyVerdict): string {
  const header = chalk.bold(`  ${label}`);
  if (verdict.is_safe) {
    return `${header}\n     ${chalk.green('SAFE')}`;
  }
  return [header, ...describeUnsafe(verdict).map((line) => `     ${line}`)].join('\n');
}

export function formatFinding(finding: ScanFinding): string {
  const location = `${chalk.gray(finding.file)}:${chalk.cyan(finding.line)} ${chalk.gray(`[${finding.direction}]`)}`;
  return [`  ${location}`, ...describeUnsafe(finding.verdict).map((line) => `     ${line}`)].join('\n');
}

export function formatSummary(summary: ScanSummary): string {
  const total =
    summary.totalFindings > 0
      ? chalk.red(summary.totalFindings)
      : chalk.green(summary.totalFindings);

  return [
    chalk.bold('━━━ Scan Summary ━━━'),
    `  Files scanned:  ${chalk.cyan(summary.totalFiles)}`,
    `  Total findings: ${total}`,
    '',
    chalk.bold('  By Detector:'),
    `    Harmful content: ${summary.byDetector.harmful_content}`,
    `    Prompt leakage:  ${summary.byDetector.system_prompt_leakage}`,
    `    Jailbreak:       ${summary.byDetector.jailbreak}`,
    `    PII:             ${summary.byDetector.pii}`,
    `    Input limit:     ${summary.byDetector.input_limit}`,
  ].join('\n');
}
