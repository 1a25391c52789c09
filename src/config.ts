/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.read
 *
 * Reads action inputs, falling back to environment variables so the
 * same entry point works outside a workflow run.
 */

import * as core from '@actions/core';
import type { Config, Invocation, RepoTarget, TriggerKind } from './types';
import { DEFAULT_BRANCH, DEFAULT_START_DATE, DEFAULT_SYMBOLS_FILE } from './types';
import { firstNonBlank, parseBooleanFlag } from './utils';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// -----------------------------------------------------------------------------
// Port: config.read
// -----------------------------------------------------------------------------

/**
 * Reads the configuration for one invocation.
 * The token is masked in logs as soon as it is found. Values only the
 * update operation uses (start_date) are validated by that operation.
 */
export function readConfig(): Config {
  const token = firstNonBlank(
    core.getInput('token'),
    process.env['TOKEN'],
    process.env['GITHUB_TOKEN'],
  );
  if (token) {
    core.setSecret(token);
  }

  return {
    token,
    symbol: firstNonBlank(core.getInput('symbol'), process.env['SYMBOL']) ?? '',
    repository: firstNonBlank(core.getInput('repository'), process.env['GITHUB_REPOSITORY']),
    branch: firstNonBlank(core.getInput('branch')) ?? DEFAULT_BRANCH,
    symbols_file: firstNonBlank(core.getInput('symbols_file')) ?? DEFAULT_SYMBOLS_FILE,
    start_date: firstNonBlank(core.getInput('start_date')) ?? DEFAULT_START_DATE,
    dry_run: parseBooleanFlag(core.getInput('dry_run')),
    trigger_kind: detectTriggerKind(process.env['GITHUB_EVENT_NAME']),
  };
}

/**
 * Checks that a start date is a real calendar day in YYYY-MM-DD form.
 *
 * @throws Error if the date is malformed or does not exist
 */
export function validateStartDate(startDate: string): string {
  const ms = Date.parse(`${startDate}T00:00:00Z`);
  if (
    !ISO_DATE_PATTERN.test(startDate) ||
    Number.isNaN(ms) ||
    new Date(ms).toISOString().slice(0, 10) !== startDate
  ) {
    throw new Error(`Invalid start_date: ${startDate}. Expected YYYY-MM-DD.`);
  }
  return startDate;
}

/**
 * Maps the workflow event name to a trigger kind.
 * Only the 'schedule' event is a scheduled trigger.
 */
export function detectTriggerKind(eventName: string | undefined): TriggerKind {
  return eventName === 'schedule' ? 'scheduled' : 'manual';
}

export function toInvocation(config: Config): Invocation {
  return {
    trigger_kind: config.trigger_kind,
    optional_symbol: config.symbol,
    credential: config.token,
  };
}

/**
 * Returns the upload target, or null on a dry run.
 *
 * @throws Error if the token or repository is missing on a real run
 */
export function toRepoTarget(config: Config): RepoTarget | null {
  if (config.dry_run) {
    return null;
  }
  if (!config.token) {
    throw new Error('A token is required to upload files.');
  }
  if (!config.repository) {
    throw new Error(
      'No repository provided. Set the repository input or GITHUB_REPOSITORY environment variable.',
    );
  }
  return { token: config.token, repository: config.repository, branch: config.branch };
}
