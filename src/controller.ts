/**
 * Controller
 * Layer: action
 *
 * Wires the add/update operations behind the dispatch controller.
 *
 * Required ports:
 *   - dispatch.run
 *   - symbols.add
 *   - update.run
 *   - output.render
 */

import * as core from '@actions/core';
import type { Config, Operation, OperationHandlers } from './types';
import { dispatch, describeOperation } from './dispatch';
import { readConfig, toInvocation, toRepoTarget, validateStartDate } from './config';
import { addSymbol } from './symbols';
import { runUpdate, failedItems } from './update';
import { render, writeStepSummary } from './output';
import { resolveInWorkDir } from './paths';
import { OperationFailedError } from './errors';

// -----------------------------------------------------------------------------
// Operation handlers
// -----------------------------------------------------------------------------

export function createHandlers(config: Config): OperationHandlers {
  const symbolsPath = resolveInWorkDir(config.symbols_file);

  return {
    add: async (symbol: string): Promise<void> => {
      const outcome = addSymbol(symbol, symbolsPath);
      if (outcome.added) {
        core.info(`Symbol ${outcome.symbol} added to ${config.symbols_file}.`);
      } else if (outcome.reason === 'exists') {
        core.info(`Symbol ${outcome.symbol} already exists in ${config.symbols_file}.`);
      } else {
        core.warning('Empty symbol received.');
      }
    },

    update: async (): Promise<void> => {
      const startDate = validateStartDate(config.start_date);
      const report = await runUpdate({
        symbols_path: symbolsPath,
        start_date: startDate,
        target: toRepoTarget(config),
      });

      const { markdown, console: consoleText } = render(report);
      core.info(consoleText);
      writeStepSummary(markdown);

      const failed = failedItems(report);
      if (failed.length > 0) {
        throw new OperationFailedError('update', failed);
      }
    },
  };
}

// -----------------------------------------------------------------------------
// Invocation
// -----------------------------------------------------------------------------

/**
 * Runs one invocation for the given configuration.
 */
export async function runInvocation(
  config: Config,
  handlers: OperationHandlers = createHandlers(config),
): Promise<Operation> {
  core.info(`Starting stock data sync (${config.trigger_kind} trigger)...`);

  const operation = await dispatch(toInvocation(config), handlers, (phase) => {
    core.debug(`Dispatch phase: ${phase}`);
  });

  core.info(`Completed ${describeOperation(operation)}`);
  return operation;
}

/**
 * Action run: reads the configuration, runs one invocation and reports
 * the outcome. Any error becomes the step's failure.
 */
export async function run(): Promise<void> {
  try {
    const config = readConfig();
    const operation = await runInvocation(config);
    core.setOutput('operation', operation.kind);
  } catch (error) {
    const err = error as Error;
    core.setFailed(err.message);
  }
}
