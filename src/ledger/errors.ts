/**
 * Ledger error taxonomy
 */

import type { Direction, SchemaOperation } from './types.js';

export type LedgerErrorCode =
  | 'DUPLICATE_REVISION'
  | 'BROKEN_LINK'
  | 'CHAIN_BROKEN'
  | 'UNKNOWN_REVISION'
  | 'NOT_ANCESTOR'
  | 'OPERATION_FAILED'
  | 'INVALID_CONFIG';

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * Malformed, duplicate or broken link in the revision chain
 */
export class ChainError extends LedgerError {
  constructor(
    code: 'DUPLICATE_REVISION' | 'BROKEN_LINK' | 'CHAIN_BROKEN',
    message: string
  ) {
    super(code, message);
    this.name = 'ChainError';
  }
}

export class UnknownRevisionError extends LedgerError {
  constructor(public readonly revisionId: string) {
    super('UNKNOWN_REVISION', `Revision '${revisionId}' is not in the chain`);
    this.name = 'UnknownRevisionError';
  }
}

/**
 * Target cannot be reached by a pure forward or backward walk
 */
export class NotAncestorError extends LedgerError {
  constructor(
    public readonly from: string | null,
    public readonly to: string | null,
    public readonly direction: Direction
  ) {
    super(
      'NOT_ANCESTOR',
      `Cannot walk ${direction} from ${from ?? 'base'} to ${to ?? 'base'}`
    );
    this.name = 'NotAncestorError';
  }
}

/**
 * The store rejected an operation. The revision's transaction has been rolled back.
 */
export class OperationError extends LedgerError {
  constructor(
    public readonly revisionId: string,
    public readonly operationIndex: number,
    public readonly operation: SchemaOperation | null,
    description: string,
    public readonly underlying: unknown
  ) {
    super(
      'OPERATION_FAILED',
      `Revision ${revisionId}, operation #${operationIndex + 1} (${description}) failed: ${errorMessage(underlying)}`
    );
    this.name = 'OperationError';
  }
}

export class ConfigError extends LedgerError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
