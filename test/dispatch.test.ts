/**
 * Dispatch Controller Tests
 *
 * Credential gate, operation selection and failure propagation.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { assertCredential, selectOperation, describeOperation, dispatch } from '../src/dispatch';
import { MissingCredentialError } from '../src/errors';
import type { DispatchPhase, Invocation, OperationHandlers } from '../src/types';

vi.mock('@actions/core');

import * as core from '@actions/core';

// -----------------------------------------------------------------------------
// Test helpers
// -----------------------------------------------------------------------------

function makeInvocation(overrides: Partial<Invocation> = {}): Invocation {
  return {
    trigger_kind: 'manual',
    optional_symbol: '',
    credential: 'abc123',
    ...overrides,
  };
}

function makeHandlers(): OperationHandlers & {
  add: ReturnType<typeof vi.fn<(symbol: string) => Promise<void>>>;
  update: ReturnType<typeof vi.fn<() => Promise<void>>>;
} {
  return {
    add: vi.fn<(symbol: string) => Promise<void>>().mockResolvedValue(undefined),
    update: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  };
}

beforeEach((): void => {
  vi.clearAllMocks();
});

// -----------------------------------------------------------------------------
// assertCredential
// -----------------------------------------------------------------------------

describe('assertCredential', () => {
  it('accepts a non-empty credential', () => {
    expect(() => assertCredential('abc123')).not.toThrow();
  });

  it.each([undefined, '', '   '])('rejects %j', (credential) => {
    expect(() => assertCredential(credential)).toThrow(MissingCredentialError);
  });
});

// -----------------------------------------------------------------------------
// selectOperation
// -----------------------------------------------------------------------------

describe('selectOperation', () => {
  it('selects update when no symbol is given', () => {
    expect(selectOperation(makeInvocation())).toEqual({ kind: 'update' });
  });

  it('selects add with the symbol', () => {
    expect(selectOperation(makeInvocation({ optional_symbol: 'TSLA' }))).toEqual({
      kind: 'add',
      symbol: 'TSLA',
    });
  });

  it('trims the symbol and treats whitespace as empty', () => {
    expect(selectOperation(makeInvocation({ optional_symbol: ' TSLA ' }))).toEqual({
      kind: 'add',
      symbol: 'TSLA',
    });
    expect(selectOperation(makeInvocation({ optional_symbol: '  ' }))).toEqual({ kind: 'update' });
  });

  it('always selects update for scheduled runs', () => {
    expect(
      selectOperation(makeInvocation({ trigger_kind: 'scheduled', optional_symbol: 'TSLA' })),
    ).toEqual({ kind: 'update' });
  });

  it('does not depend on the credential', () => {
    expect(selectOperation(makeInvocation({ credential: undefined }))).toEqual({ kind: 'update' });
  });
});

describe('describeOperation', () => {
  it('formats both operations', () => {
    expect(describeOperation({ kind: 'add', symbol: 'TSLA' })).toBe('add(TSLA)');
    expect(describeOperation({ kind: 'update' })).toBe('update()');
  });
});

// -----------------------------------------------------------------------------
// dispatch
// -----------------------------------------------------------------------------

describe('dispatch', () => {
  it('runs update with no arguments when the symbol is empty', async () => {
    const handlers = makeHandlers();

    const operation = await dispatch(makeInvocation({ optional_symbol: '' }), handlers);

    expect(operation).toEqual({ kind: 'update' });
    expect(handlers.update).toHaveBeenCalledTimes(1);
    expect(handlers.update).toHaveBeenCalledWith();
    expect(handlers.add).not.toHaveBeenCalled();
  });

  it('runs add with the exact symbol', async () => {
    const handlers = makeHandlers();

    const operation = await dispatch(makeInvocation({ optional_symbol: 'TSLA' }), handlers);

    expect(operation).toEqual({ kind: 'add', symbol: 'TSLA' });
    expect(handlers.add).toHaveBeenCalledTimes(1);
    expect(handlers.add).toHaveBeenCalledWith('TSLA');
    expect(handlers.update).not.toHaveBeenCalled();
  });

  it('fails before any operation when the credential is empty', async () => {
    const handlers = makeHandlers();

    await expect(
      dispatch(makeInvocation({ credential: '', optional_symbol: 'TSLA' }), handlers),
    ).rejects.toBeInstanceOf(MissingCredentialError);

    expect(handlers.add).not.toHaveBeenCalled();
    expect(handlers.update).not.toHaveBeenCalled();
  });

  it('fails before any operation when the credential is unset', async () => {
    const handlers = makeHandlers();

    await expect(dispatch(makeInvocation({ credential: undefined }), handlers)).rejects.toThrow(
      'No token provided. Set the token input or TOKEN environment variable.',
    );

    expect(handlers.add).not.toHaveBeenCalled();
    expect(handlers.update).not.toHaveBeenCalled();
  });

  it('always runs update on a scheduled trigger', async () => {
    const handlers = makeHandlers();

    await dispatch(makeInvocation({ trigger_kind: 'scheduled' }), handlers);

    expect(handlers.update).toHaveBeenCalledTimes(1);
    expect(handlers.add).not.toHaveBeenCalled();
    expect(core.warning).not.toHaveBeenCalled();
  });

  it('warns and ignores a symbol on a scheduled trigger', async () => {
    const handlers = makeHandlers();

    await dispatch(makeInvocation({ trigger_kind: 'scheduled', optional_symbol: 'TSLA' }), handlers);

    expect(handlers.update).toHaveBeenCalledTimes(1);
    expect(handlers.add).not.toHaveBeenCalled();
    expect(core.warning).toHaveBeenCalledWith(
      "Ignoring symbol 'TSLA' on a scheduled run; running update.",
    );
  });

  it('propagates operation errors unchanged without trying the other operation', async () => {
    const handlers = makeHandlers();
    const failure = new Error('upload rejected');
    handlers.update.mockRejectedValue(failure);

    await expect(dispatch(makeInvocation(), handlers)).rejects.toBe(failure);

    expect(handlers.update).toHaveBeenCalledTimes(1);
    expect(handlers.add).not.toHaveBeenCalled();
  });

  it('reports phases for a successful run', async () => {
    const phases: DispatchPhase[] = [];

    await dispatch(makeInvocation(), makeHandlers(), (phase) => phases.push(phase));

    expect(phases).toEqual(['checking_credential', 'dispatching', 'succeeded']);
  });

  it('reports phases for a missing credential', async () => {
    const phases: DispatchPhase[] = [];

    await expect(
      dispatch(makeInvocation({ credential: '' }), makeHandlers(), (phase) => phases.push(phase)),
    ).rejects.toThrow(MissingCredentialError);

    expect(phases).toEqual(['checking_credential', 'failed']);
  });

  it('reports phases for a failed operation', async () => {
    const phases: DispatchPhase[] = [];
    const handlers = makeHandlers();
    handlers.add.mockRejectedValue(new Error('disk full'));

    await expect(
      dispatch(makeInvocation({ optional_symbol: 'TSLA' }), handlers, (phase) => phases.push(phase)),
    ).rejects.toThrow('disk full');

    expect(phases).toEqual(['checking_credential', 'dispatching', 'failed']);
  });
});
