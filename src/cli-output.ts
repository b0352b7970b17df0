/**
 * Console rendering for installer progress and results
 */

import chalk from 'chalk';
import type { DependencyResult, InstallStatus, ProgressEvent, ProgressListener } from './types.js';

export const BANNER_RULE = '==========================================';

export function formatBanner(title: string): string[] {
  return [BANNER_RULE, title, BANNER_RULE];
}

/**
 * Format one progress event as console lines
 */
export function formatProgressEvent(event: ProgressEvent): string[] {
  switch (event.status) {
    case 'started':
      return [chalk.bold(event.message)];
    case 'ok':
    case 'changed':
      return [chalk.green(`✓ ${event.message}`)];
    case 'skipped':
      return [chalk.dim(`- ${event.message}`)];
    case 'failed': {
      const lines = [chalk.red(`✗ ${event.message}`)];
      if (event.hint) {
        lines.push(chalk.yellow(`  ${event.hint}`));
      }
      return lines;
    }
  }
}

/**
 * Progress listener that prints to the console. Steps are separated by
 * a blank line.
 */
export function createConsoleReporter(write: (line: string) => void = line => console.log(line)): ProgressListener {
  let lastStep: string | null = null;

  return event => {
    if (lastStep !== null && event.step !== lastStep) {
      write('');
    }
    lastStep = event.step;

    for (const line of formatProgressEvent(event)) {
      write(line);
    }
  };
}

function mark(ok: boolean): string {
  return ok ? chalk.green('✓') : chalk.red('✗');
}

export function formatDependencyLine(dependency: DependencyResult): string {
  const state = dependency.alreadyInstalled ? 'installed' : 'not installed';
  return `  ${mark(dependency.alreadyInstalled)} ${dependency.label} (${dependency.command}): ${state}`;
}

/**
 * Human-readable status report
 */
export function formatStatus(status: InstallStatus): string[] {
  const lines: string[] = [chalk.bold('Installation Status'), ''];

  lines.push(chalk.bold('  Dependencies:'));
  for (const dependency of status.dependencies) {
    lines.push(`  ${formatDependencyLine(dependency)}`);
  }

  lines.push('', chalk.bold('  Files:'));
  lines.push(`    ${mark(status.installDir.present)} Install directory: ${status.installDir.path}`);
  lines.push(`    ${mark(status.script.present && status.script.executable)} Script: ${status.script.path}`);
  lines.push(`    ${mark(status.script.hasShebang)} Interpreter directive`);
  lines.push(`    ${mark(status.wrapper.present && status.wrapper.executable && status.wrapper.upToDate)} Wrapper: ${status.wrapper.path}`);

  lines.push('', chalk.bold('  Command:'));
  if (status.command.available) {
    lines.push(`    ${mark(true)} Resolves to ${status.command.resolvedPath ?? ''}`);
  } else {
    lines.push(`    ${mark(false)} Not found on PATH`);
  }

  lines.push('', status.installed ? chalk.green('Installed') : chalk.yellow('Not fully installed'));
  return lines;
}
