/**
 * Error taxonomy for the indexer. Every error carries a context record that is
 * logged alongside the message, and a flag telling the sync loop whether the
 * next tick may clear the failure. The loop halts on a non-retryable one.
 */
export class IndexerError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** An event whose attributes do not match the schema its producer emits. */
export class DecodeError extends IndexerError {
  constructor(eventType: string, reason: string, context: Record<string, unknown> = {}) {
    super(`cannot decode ${eventType} event: ${reason}`, { eventType, ...context }, false);
  }
}

/** The chain service could not be reached or the connection broke mid-call. */
export class RpcTransportError extends IndexerError {
  constructor(method: string, cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `rpc ${method} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { method, ...context },
      true,
    );
  }
}

/** The chain answered, but with a JSON-RPC error or a non-zero ABCI code. */
export class RpcResponseError extends IndexerError {
  constructor(
    method: string,
    public readonly code: number,
    detail: string,
    context: Record<string, unknown> = {},
  ) {
    super(`rpc ${method} returned code ${code}: ${detail}`, { method, code, ...context }, true);
  }
}

/**
 * Chain data that contradicts what the index already holds: an unknown commit
 * signer, a settlement for a proposal that was never created, a conflicting
 * settlement height.
 */
export class StateInconsistencyError extends IndexerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, true);
  }
}

export class StoreWriteError extends IndexerError {
  constructor(operation: string, cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation, ...context },
      true,
    );
  }
}

export class AgentError extends IndexerError {
  constructor(operation: string, cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `agent ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation, ...context },
      false,
    );
  }
}

export class ConfigError extends IndexerError {
  constructor(key: string, value: string, expected: string) {
    super(`invalid ${key}="${value}": expected ${expected}`, { key }, false);
  }
}

export function isTransportError(err: unknown): err is RpcTransportError {
  return err instanceof RpcTransportError;
}
