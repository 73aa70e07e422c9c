/**
 * Error Taxonomy
 *
 * Every failure the core raises carries a category. The category decides
 * whether the Resilience Manager retries it and how the orchestrator
 * reports it back to the reasoning model.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Base
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory = 'VALIDATION' | 'TRANSIENT' | 'CONSISTENCY' | 'ORCHESTRATION' | 'PERMANENT';

/** Serializable form handed back to the agent and the HTTP layer. */
export interface ErrorDetail {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export abstract class ClinigraphError extends Error {
  public override readonly cause?: unknown;
  abstract readonly category: ErrorCategory;
  abstract readonly code: string;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.cause = cause;
  }

  /**
   * Whether the Resilience Manager may retry this error.
   */
  get retryable(): boolean {
    return this.category === 'TRANSIENT';
  }

  /** Extra structured fields for the error detail. */
  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toDetail(): ErrorDetail {
    const details = this.details();
    return details
      ? { code: this.code, message: this.message, details }
      : { code: this.code, message: this.message };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends ClinigraphError {
  override readonly category = 'VALIDATION' as const;
  override readonly code: string = 'VALIDATION_ERROR';
}

export class ArgumentValidationError extends ValidationError {
  override readonly code = 'INVALID_ARGUMENTS';

  constructor(
    public readonly field: string,
    message: string,
    public readonly toolName?: string
  ) {
    super(toolName ? `${toolName}: invalid '${field}': ${message}` : `Invalid '${field}': ${message}`);
  }

  protected override details(): Record<string, unknown> {
    return this.toolName ? { field: this.field, tool: this.toolName } : { field: this.field };
  }
}

export class UnknownToolError extends ValidationError {
  override readonly code = 'UNKNOWN_TOOL';

  constructor(
    public readonly toolName: string,
    public readonly available: readonly string[] = []
  ) {
    super(`Unknown tool '${toolName}'`);
  }

  protected override details(): Record<string, unknown> {
    return { tool: this.toolName, available: [...this.available] };
  }
}

export class QuerySyntaxError extends ValidationError {
  override readonly code = 'QUERY_SYNTAX_ERROR';
}

export class QueryTooComplexError extends ValidationError {
  override readonly code = 'QUERY_TOO_COMPLEX';

  constructor(
    public readonly reason: 'LENGTH' | 'MATCH_CLAUSES' | 'UNBOUNDED_PATTERN',
    message: string
  ) {
    super(message);
  }

  protected override details(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

export class MalformedFactError extends ValidationError {
  override readonly code = 'MALFORMED_FACT';

  constructor(
    public readonly factType: string,
    public readonly index: number,
    message: string
  ) {
    super(`${factType}[${index}]: ${message}`);
  }

  protected override details(): Record<string, unknown> {
    return { factType: this.factType, index: this.index };
  }
}

export class PatientNotFoundError extends ValidationError {
  override readonly code = 'PATIENT_NOT_FOUND';

  constructor(public readonly patientId: number) {
    super(`Patient ${patientId} not found`);
  }

  protected override details(): Record<string, unknown> {
    return { patientId: this.patientId };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Transient
// ═══════════════════════════════════════════════════════════════════════════════

export class TransientError extends ClinigraphError {
  override readonly category = 'TRANSIENT' as const;
  override readonly code: string = 'TRANSIENT_ERROR';
}

export class TimeoutError extends TransientError {
  override readonly code = 'TIMEOUT';

  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Consistency
// ═══════════════════════════════════════════════════════════════════════════════

export class ConsistencyError extends ClinigraphError {
  override readonly category = 'CONSISTENCY' as const;
  override readonly code: string = 'CONSISTENCY_ERROR';
}

export class DanglingEdgeError extends ConsistencyError {
  override readonly code = 'DANGLING_EDGE';

  constructor(
    public readonly edgeType: string,
    public readonly missingNodeId: string
  ) {
    super(`${edgeType} edge references node ${missingNodeId} which is not in the subgraph`);
  }

  protected override details(): Record<string, unknown> {
    return { edgeType: this.edgeType, missingNodeId: this.missingNodeId };
  }
}

export class DuplicateNodeError extends ConsistencyError {
  override readonly code = 'DUPLICATE_NODE';

  constructor(public readonly nodeId: string) {
    super(`Node ${nodeId} appears more than once in the subgraph`);
  }

  protected override details(): Record<string, unknown> {
    return { nodeId: this.nodeId };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestration
// ═══════════════════════════════════════════════════════════════════════════════

export type AbortReason = 'MALFORMED_PLAN' | 'PLANNER_FAILED' | 'DEADLINE_EXCEEDED' | 'CANCELLED';

export class OrchestrationError extends ClinigraphError {
  override readonly category = 'ORCHESTRATION' as const;
  override readonly code: AbortReason;

  constructor(reason: AbortReason, message: string, cause?: unknown) {
    super(message, cause);
    this.code = reason;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Permanent
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Retries exhausted. Never retryable itself, so nested retry layers
 * do not multiply attempts.
 */
export class FinalError extends ClinigraphError {
  override readonly category = 'PERMANENT' as const;
  override readonly code = 'RETRIES_EXHAUSTED';

  constructor(
    public readonly operationName: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `${operationName} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(lastError)}`,
      lastError
    );
  }

  protected override details(): Record<string, unknown> {
    return { operation: this.operationName, attempts: this.attempts };
  }
}

/** The caller's signal fired (request deadline or cancellation). */
export class AbortedError extends ClinigraphError {
  override readonly category = 'PERMANENT' as const;
  override readonly code = 'ABORTED';

  constructor(
    public readonly operationName: string,
    public readonly reason: unknown
  ) {
    super(`${operationName} aborted: ${describeError(reason)}`, reason);
  }
}

export class ToolRegistrationError extends ClinigraphError {
  override readonly category = 'PERMANENT' as const;
  override readonly code = 'TOOL_REGISTRATION';
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Convert any thrown value into a serializable detail.
 */
export function toErrorDetail(error: unknown): ErrorDetail {
  if (error instanceof ClinigraphError) return error.toDetail();
  // Provider errors tag themselves with a string `type` (e.g. GraphClientError)
  const type: unknown = error instanceof Error ? Reflect.get(error, 'type') : undefined;
  return {
    code: typeof type === 'string' ? type : 'INTERNAL_ERROR',
    message: describeError(error)
  };
}
