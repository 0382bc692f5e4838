import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ValidationRun } from './environment-validator';

/** Files a complete checkout is expected to carry */
export const EXPECTED_REPOSITORY_FILES = [
  'README.md',
  'deploy.yml',
  'cloudformation/cognito-infrastructure.yaml',
  'cloudformation/alb-cognito-integration.yaml',
  'cloudformation/parameters/dev-parameters.json',
  'cloudformation/parameters/staging-parameters.json',
  '.ebextensions/01-cognito-config.config',
  '.ebextensions/02-alb-listener-rules.config',
  'docs/architecture.md'
];

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * validation-report-YYYYMMDD-HHMMSS.txt, in UTC
 */
export function reportFileName(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `validation-report-${day}-${time}.txt`;
}

export function renderReport(run: ValidationRun, baseDir: string = process.cwd()): string {
  const { context } = run;
  const lines: string[] = [
    'ElasticBeanstalk Authentication Validation Report',
    `Generated: ${run.checkedAt.toISOString()}`,
    `Project: ${context.projectName}`,
    `Environment: ${context.environment}`,
    `Region: ${context.region}`,
    '',
    '=== Checks ==='
  ];

  for (const finding of run.findings) {
    lines.push(`[${finding.status.toUpperCase()}] ${finding.check}: ${finding.detail}`);
  }

  lines.push('', '=== Configuration Files ===');
  for (const file of EXPECTED_REPOSITORY_FILES) {
    lines.push(existsSync(join(baseDir, file)) ? `✓ ${file}` : `✗ ${file} (missing)`);
  }

  lines.push('', '=== AWS Resources ===');
  for (const stack of run.stacks) {
    lines.push(`${stack.stackName}: ${stack.status}`);
  }

  const failures = run.findings.filter(finding => finding.status === 'Fail').length;
  const warnings = run.findings.filter(finding => finding.status === 'Warn').length;
  lines.push('', `Verdict: ${run.passed ? 'PASS' : 'FAIL'} (${failures} failed, ${warnings} warnings)`, '');

  return lines.join('\n');
}

/**
 * Writes the report into `reportDir` and returns its path
 */
export async function writeReport(
  run: ValidationRun,
  reportDir: string,
  baseDir: string = process.cwd()
): Promise<string> {
  await mkdir(reportDir, { recursive: true });
  const path = join(reportDir, reportFileName(run.checkedAt));
  await writeFile(path, renderReport(run, baseDir), 'utf-8');
  return path;
}
