/**
 * Prediction Service Client
 *
 * HTTP client for the external risk model services. Each service exposes
 * POST /predict and GET /health; response bodies pass through unmodified.
 */

import { ClinigraphError, describeError, type ErrorCategory } from '@/core/errors';
import { isTransientStatus } from '@/core/resilience';

export type PredictionService = 'diabetes' | 'cardio';

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A prediction call failed. `status` is null when no response arrived.
 * Network failures and 408/429/5xx are transient; other statuses are not.
 */
export class PredictionServiceError extends ClinigraphError {
  override readonly category: ErrorCategory;
  override readonly code = 'PREDICTION_SERVICE_ERROR';

  constructor(
    public readonly service: PredictionService,
    public readonly status: number | null,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.category = status === null || isTransientStatus(status) ? 'TRANSIENT' : 'PERMANENT';
  }

  protected override details(): Record<string, unknown> {
    return { service: this.service, status: this.status };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Client
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class PredictionClient {
  private readonly normalizedBase: string;

  constructor(
    readonly service: PredictionService,
    baseUrl: string,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.normalizedBase = baseUrl.replace(/\/+$/, '');
  }

  get location(): string {
    return this.normalizedBase;
  }

  /**
   * POST the validated features and return the service's JSON unchanged.
   *
   * @throws PredictionServiceError
   */
  async predict(features: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.normalizedBase}/predict`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(features),
        signal
      });
    } catch (error) {
      // Caller aborts propagate as-is so the retry layer sees the signal
      if (signal?.aborted) throw error;
      throw new PredictionServiceError(
        this.service,
        null,
        `${this.service} service unreachable: ${describeError(error)}`,
        error
      );
    }

    const body = await response.text();
    if (!response.ok) {
      throw new PredictionServiceError(
        this.service,
        response.status,
        `${this.service} service returned ${response.status}: ${body.slice(0, 200)}`
      );
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new PredictionServiceError(
        this.service,
        response.status,
        `${this.service} service returned invalid JSON`,
        error
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.normalizedBase}/health`, {
        signal: AbortSignal.timeout(3000)
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
