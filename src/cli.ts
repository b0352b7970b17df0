#!/usr/bin/env node
/**
 * gitauto-install CLI - Install the gitauto command on a Linux host
 */

import { program } from 'commander';
import chalk from 'chalk';
import { ConfigManager, resolveConfigPath } from './config.js';
import { checkDependencies } from './dependencies.js';
import { InstallerError } from './errors.js';
import { checkInstallStatus, runInstall, runUninstall } from './installer.js';
import { logger, LogLevel } from './logger.js';
import {
  createConsoleReporter,
  formatBanner,
  formatDependencyLine,
  formatStatus
} from './cli-output.js';
import type { InstallerConfig } from './types.js';

program
  .name('gitauto-install')
  .description('Install the gitauto command: dependencies, script, and wrapper')
  .version('1.0.0')
  .option('--config <path>', 'Path to the installer config file')
  .option('--verbose', 'Enable debug logging');

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
});

function openConfig(): ConfigManager {
  const { config } = program.opts<{ config?: string }>();
  return new ConfigManager(resolveConfigPath(config));
}

/**
 * Load and validate the installer config, exiting on failure
 */
function loadInstallerConfig(json: boolean): InstallerConfig {
  try {
    return openConfig().getInstallerConfig();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    const hint = error instanceof InstallerError ? error.hint : undefined;
    if (json) {
      console.log(JSON.stringify({ success: false, error: errorMessage, hint }));
    } else {
      console.error(chalk.red(`✗ ${errorMessage}`));
      if (hint) {
        console.error(chalk.yellow(`  ${hint}`));
      }
    }
    process.exit(1);
  }
}

/**
 * Install (default command)
 */
program
  .command('install', { isDefault: true })
  .description('Install dependencies, the gitauto script, and the gitauto command')
  .option('--source <path>', 'Path to gitauto.py (defaults to ./gitauto.py)')
  .option('--skip-deps', 'Do not check or install python3 and git')
  .option('--dry-run', 'Show what would change without writing anything')
  .option('--json', 'Output as JSON')
  .action((options: { source?: string; skipDeps?: boolean; dryRun?: boolean; json?: boolean }) => {
    const config = loadInstallerConfig(Boolean(options.json));
    const print = (line: string): void => console.log(line);

    if (!options.json) {
      formatBanner(`🚀 Setting up ${config.scriptName} for Linux...`).forEach(print);
      if (options.dryRun) {
        print(chalk.yellow('Dry run: no changes will be made.'));
      }
      print('');
    }

    const result = runInstall(
      {
        config,
        sourcePath: options.source,
        skipDependencies: options.skipDeps,
        dryRun: options.dryRun,
        outputToStderr: Boolean(options.json)
      },
      options.json ? undefined : createConsoleReporter(print)
    );

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.success) {
      print('');
      formatBanner(options.dryRun ? 'Dry run completed.' : '🎉 Setup completed successfully!').forEach(print);
      if (!options.dryRun) {
        print(`You can now run '${config.commandName}' from anywhere.`);
      }
    }

    if (!result.success) {
      process.exit(result.exitCode);
    }
  });

/**
 * Uninstall
 */
program
  .command('uninstall')
  .description('Remove the gitauto command and the installed script (dependencies are kept)')
  .option('--dry-run', 'Show what would be removed without removing anything')
  .option('--json', 'Output as JSON')
  .action((options: { dryRun?: boolean; json?: boolean }) => {
    const config = loadInstallerConfig(Boolean(options.json));
    const result = runUninstall({ config, dryRun: options.dryRun });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.success) {
      const verb = options.dryRun ? 'Would remove' : 'Removed';
      const report = (removed: boolean, path: string): void => {
        console.log(removed ? chalk.green(`✓ ${verb} ${path}`) : chalk.dim(`- Not present: ${path}`));
      };
      report(result.wrapperRemoved, result.paths.wrapperPath);
      report(result.scriptRemoved, result.paths.scriptPath);
      report(result.directoryRemoved, config.installDir);
    } else {
      console.error(chalk.red(`✗ Uninstall failed: ${result.error}`));
      if (result.hint) {
        console.error(chalk.yellow(`  ${result.hint}`));
      }
    }

    if (!result.success) {
      process.exit(1);
    }
  });

/**
 * Status
 */
program
  .command('status')
  .description('Check the current installation without changing anything')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const config = loadInstallerConfig(Boolean(options.json));
    const status = checkInstallStatus(config);

    if (options.json) {
      console.log(JSON.stringify(status, null, 2));
    } else {
      console.log('');
      formatStatus(status).forEach(line => console.log(line));
      console.log('');
    }
  });

/**
 * Doctor - check dependencies only
 */
program
  .command('doctor')
  .description('Check that python3 and git are installed')
  .action(() => {
    const config = loadInstallerConfig(false);
    const results = checkDependencies(config.dependencies);

    console.log(chalk.bold('\nSystem Dependency Check\n'));
    for (const result of results) {
      console.log(formatDependencyLine(result));
      if (!result.alreadyInstalled) {
        console.log(chalk.dim(`    Install: sudo apt-get install -y ${result.package}`));
      }
    }
    console.log('');

    if (results.some(result => !result.alreadyInstalled)) {
      process.exit(1);
    }
  });

/**
 * Config management
 */
const configCommand = program
  .command('config')
  .description('Manage installer settings');

configCommand
  .command('list')
  .description('Show effective settings')
  .action(() => {
    console.log(JSON.stringify(openConfig().getAll(), null, 2));
  });

configCommand
  .command('get <key>')
  .description('Show one setting')
  .action((key: string) => {
    const value = openConfig().get(key);
    if (value === undefined) {
      console.error(chalk.red(`✗ Unknown config key: ${key}`));
      process.exit(1);
    }
    console.log(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
  });

configCommand
  .command('set <key> <value>')
  .description('Change a setting')
  .action((key: string, value: string) => {
    const manager = openConfig();
    try {
      manager.set(key, value);
      console.log(chalk.green(`✓ ${key} = ${value}`));
      console.log(chalk.dim(`  Saved to ${manager.path}`));
    } catch (error) {
      console.error(chalk.red(`✗ ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exit(1);
    }
  });

configCommand
  .command('unset <key>')
  .description('Restore a setting to its default')
  .action((key: string) => {
    const manager = openConfig();
    try {
      manager.delete(key);
      console.log(chalk.green(`✓ ${key} reset to default`));
    } catch (error) {
      console.error(chalk.red(`✗ ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exit(1);
    }
  });

configCommand
  .command('path')
  .description('Print the config file location')
  .action(() => {
    console.log(openConfig().path);
  });

// Parse and execute
program.parse();
