/**
 * Error taxonomy for the agent core. Every class carries a `kind` discriminator so
 * callers (and the HTTP layer) can classify failures without string matching.
 */

export type GatewayErrorKind = 'transient' | 'permanent';
export type PlanningErrorKind = 'unparsable_response' | 'gateway_failure' | 'invalid_goal';
export type StoreErrorKind = 'not_found' | 'write_failed' | 'corrupt' | 'unsupported_version' | 'conflict';
export type AdvanceErrorKind = 'invalid_state' | 'goal_conflict';

abstract class AgentError<K extends string> extends Error {
  readonly kind: K;

  protected constructor(name: string, kind: K, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name;
    this.kind = kind;
  }

  /** `<ErrorName>:<kind>`, the stable code reported to callers. */
  get code(): string {
    return `${this.name}:${this.kind}`;
  }
}

export class GatewayError extends AgentError<GatewayErrorKind> {
  /** Number of attempts made before giving up. */
  readonly attempts: number;

  constructor(kind: GatewayErrorKind, message: string, options: { attempts?: number; cause?: unknown } = {}) {
    super('GatewayError', kind, message, options.cause);
    this.attempts = options.attempts ?? 1;
  }

  withAttempts(attempts: number): GatewayError {
    return new GatewayError(this.kind, this.message, { attempts, cause: this.cause });
  }
}

export class PlanningError extends AgentError<PlanningErrorKind> {
  constructor(kind: PlanningErrorKind, message: string, cause?: unknown) {
    super('PlanningError', kind, message, cause);
  }
}

export class StoreError extends AgentError<StoreErrorKind> {
  constructor(kind: StoreErrorKind, message: string, cause?: unknown) {
    super('StoreError', kind, message, cause);
  }
}

export class AdvanceError extends AgentError<AdvanceErrorKind> {
  constructor(kind: AdvanceErrorKind, message: string) {
    super('AdvanceError', kind, message);
  }
}

export type AnyAgentError = GatewayError | PlanningError | StoreError | AdvanceError;

export function isAgentError(error: unknown): error is AnyAgentError {
  return (
    error instanceof GatewayError ||
    error instanceof PlanningError ||
    error instanceof StoreError ||
    error instanceof AdvanceError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
