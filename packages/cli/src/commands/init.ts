/**
 * `flashsync init` command.
 *
 * Writes a default .flashsync.yml and checks that the API keys it names
 * are available.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_FILENAME, loadConfig, writeDefaultConfig } from '@flashsync/core';
import { findDeckFiles } from '@flashsync/deck';
import { confirm } from '../prompt.js';
import type { GlobalOptions } from '../session.js';

function reportKey(envName: string, purpose: string): void {
  if (process.env[envName]) {
    console.log(chalk.green(`  ✓ ${envName} is set`) + chalk.gray(` (${purpose})`));
  } else {
    console.log(chalk.yellow(`  ⚠ ${envName} is not set`) + chalk.gray(` (${purpose})`));
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .flashsync.yml in the project directory')
    .option('--force', 'Overwrite an existing configuration without asking')
    .action(async (options: { force?: boolean }, command: Command) => {
      const projectDir = path.resolve(command.optsWithGlobals<GlobalOptions>().path);
      const configPath = path.join(projectDir, CONFIG_FILENAME);

      console.log(chalk.bold('\n  flashsync setup\n'));

      if (fs.existsSync(configPath) && !options.force) {
        const overwrite = await confirm(`${CONFIG_FILENAME} already exists. Overwrite?`);
        if (!overwrite) {
          console.log(chalk.gray('  Keeping existing configuration.\n'));
          return;
        }
      }

      fs.mkdirSync(projectDir, { recursive: true });
      writeDefaultConfig(projectDir);
      console.log(chalk.green(`  ✓ Configuration written to ${chalk.bold(CONFIG_FILENAME)}\n`));

      const config = loadConfig(projectDir);
      console.log(chalk.bold('  API keys'));
      reportKey(config.remote.apiKeyEnv, 'card service');
      reportKey(config.llm.apiKeyEnv, 'classification, grading, rewrites');
      reportKey(config.embeddings.apiKeyEnv, 'embeddings');
      console.log(chalk.gray('  Keys can also go in a .env file in this directory.\n'));

      const decks = findDeckFiles(projectDir);
      if (decks.length > 0) {
        console.log(chalk.gray(`  Found ${decks.length} existing deck file(s).\n`));
      }

      console.log(chalk.white('  Next steps:'));
      console.log(chalk.cyan('    flashsync decks         ') + chalk.gray('# List remote decks'));
      console.log(chalk.cyan('    flashsync pull <deck>   ') + chalk.gray('# Download a deck'));
      console.log(chalk.cyan('    flashsync push          ') + chalk.gray('# Upload every deck file'));
      console.log('');
    });
}
