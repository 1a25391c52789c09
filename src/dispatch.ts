/**
 * Trigger & Dispatch Controller
 * Layer: core
 *
 * Provided ports:
 *   - dispatch.selectOperation
 *   - dispatch.run
 *
 * Checks the credential, then runs exactly one of the add/update
 * operations. Operation errors propagate unchanged.
 *
 *   checking_credential ──► dispatching ──► succeeded
 *            │                    │
 *            └──────► failed ◄────┘
 */

import * as core from '@actions/core';
import type { DispatchPhase, Invocation, Operation, OperationHandlers } from './types';
import { MissingCredentialError } from './errors';

// -----------------------------------------------------------------------------
// Credential check
// -----------------------------------------------------------------------------

/**
 * @throws MissingCredentialError if the credential is unset, empty or blank
 */
export function assertCredential(credential: string | undefined): asserts credential is string {
  if (credential === undefined || credential.trim() === '') {
    throw new MissingCredentialError();
  }
}

// -----------------------------------------------------------------------------
// Port: dispatch.selectOperation
// -----------------------------------------------------------------------------

/**
 * Selects the operation for an invocation.
 * Scheduled runs always update; a manual run with a symbol adds it.
 */
export function selectOperation(invocation: Invocation): Operation {
  const symbol = invocation.optional_symbol.trim();
  if (invocation.trigger_kind === 'manual' && symbol !== '') {
    return { kind: 'add', symbol };
  }
  return { kind: 'update' };
}

export function describeOperation(operation: Operation): string {
  return operation.kind === 'add' ? `add(${operation.symbol})` : 'update()';
}

// -----------------------------------------------------------------------------
// Port: dispatch.run
// -----------------------------------------------------------------------------

/**
 * Runs one invocation and returns the operation that ran.
 *
 * @param onPhase - Called on every state transition
 * @throws MissingCredentialError before any operation runs
 * @throws whatever the selected operation throws
 */
export async function dispatch(
  invocation: Invocation,
  handlers: OperationHandlers,
  onPhase?: (phase: DispatchPhase) => void,
): Promise<Operation> {
  onPhase?.('checking_credential');
  try {
    assertCredential(invocation.credential);
  } catch (error) {
    onPhase?.('failed');
    throw error;
  }

  if (invocation.trigger_kind === 'scheduled' && invocation.optional_symbol.trim() !== '') {
    core.warning(
      `Ignoring symbol '${invocation.optional_symbol.trim()}' on a scheduled run; running update.`,
    );
  }

  const operation = selectOperation(invocation);
  onPhase?.('dispatching');
  try {
    switch (operation.kind) {
      case 'add':
        await handlers.add(operation.symbol);
        break;
      case 'update':
        await handlers.update();
        break;
    }
  } catch (error) {
    onPhase?.('failed');
    throw error;
  }

  onPhase?.('succeeded');
  return operation;
}
