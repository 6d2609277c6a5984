/**
 * Per-command setup and teardown shared by the flashsync commands.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { Ora } from 'ora';
import {
  InconsistencyError,
  LlmAuthError,
  describeError,
  initLogger,
  loadConfig,
  resolveProjectPath,
  type FlashsyncConfig,
  type Logger,
} from '@flashsync/core';
import { BaseStore, PartialApplyError, type WorkflowContext } from '@flashsync/reconciler';
import { createCardService } from '@flashsync/remote';
import { confirm } from './prompt.js';
import { createReporter, verboseConsoleHandler } from './render.js';

export type GlobalOptions = {
  path: string;
  verbose?: boolean;
};

export interface Session {
  projectDir: string;
  config: FlashsyncConfig;
  logger: Logger;
}

/**
 * Resolve the project directory from the global options, start the run
 * log and load `.flashsync.yml`.
 */
export function openSession(command: Command, name: string): Session {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const projectDir = path.resolve(globals.path);
  const logger = initLogger({
    projectDir,
    command: name,
    onLog: globals.verbose ? verboseConsoleHandler : undefined,
  });
  return { projectDir, config: loadConfig(projectDir), logger };
}

/** Resolve a file argument against the project directory */
export function resolveFile(session: Session, file: string): string {
  return path.resolve(session.projectDir, file);
}

export interface ContextOptions {
  /** Answer every confirmation with yes */
  assumeYes?: boolean;
}

/** Card service, base snapshots and console IO for the reconcile workflows */
export function createWorkflowContext(session: Session, spinner: Ora, options: ContextOptions = {}): WorkflowContext {
  return {
    service: createCardService(session.config),
    baseStore: new BaseStore(resolveProjectPath(session.projectDir, session.config.base.dir)),
    confirm: async (question) => {
      if (options.assumeYes) return true;
      spinner.stop();
      return confirm(question);
    },
    report: createReporter(spinner),
  };
}

/**
 * Stop the spinner, print why the command failed and exit with status 1
 * once the debug log is on disk.
 */
export async function failCommand(spinner: Ora, label: string, error: unknown, session: Session | null): Promise<never> {
  spinner.fail(chalk.red(label));

  if (error instanceof LlmAuthError) {
    console.error(chalk.red(`\n${error.message}`));
  } else {
    console.error(chalk.red(`\n  Reason: ${describeError(error)}`));
  }

  if (error instanceof InconsistencyError) {
    for (const card of error.cards) {
      console.error(chalk.gray(`    ${card.id}: ${card.question.split('\n')[0]}`));
    }
  }

  if (error instanceof PartialApplyError && error.counts.created > 0) {
    console.error(
      chalk.yellow(`\n  ${error.counts.created} card(s) were created before the failure; their ids were saved to the deck file.`)
    );
  }

  if (process.env.FLASHSYNC_DEBUG && error instanceof Error) {
    console.error(chalk.gray(error.stack ?? ''));
  }

  if (session) {
    const fullError = error instanceof Error ? error : new Error(String(error));
    session.logger.error('cli', `${label}: ${describeError(error)}`, {
      errorName: fullError.name,
      stack: fullError.stack,
    });
    console.error(chalk.gray(`\n  Debug log: ${session.logger.filePath}`));
    console.error(chalk.gray(`  Re-run with --verbose for detailed console output\n`));
    session.logger.close();
    await session.logger.flushed();
  }

  process.exit(1);
}
