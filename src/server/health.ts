/**
 * Health Endpoint
 *
 * GET /health probes every dependent service concurrently and always
 * answers 200; an unreachable dependency only marks the service degraded.
 */

import type { Context } from 'hono';
import type { DependentService, HealthProbes, ServerClients } from './clients';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  /** Service name to whether it was reachable */
  dependentServices: Record<DependentService, boolean>;
}

/** Upper bound for any single probe */
const PROBE_TIMEOUT_MS = 5000;

function probe(check: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  const guarded = check().then(
    (healthy) => healthy,
    () => false
  );

  return Promise.race([guarded, timeout]).finally(() => clearTimeout(timer));
}

export async function checkHealth(
  probes: HealthProbes,
  timeoutMs: number = PROBE_TIMEOUT_MS
): Promise<HealthReport> {
  const [graph, records, diabetesModel, cardioModel] = await Promise.all([
    probe(probes.graph, timeoutMs),
    probe(probes.records, timeoutMs),
    probe(probes.diabetesModel, timeoutMs),
    probe(probes.cardioModel, timeoutMs)
  ]);

  const dependentServices: HealthReport['dependentServices'] = {
    graph,
    records,
    diabetesModel,
    cardioModel
  };
  const healthy = Object.values(dependentServices).every(Boolean);

  return { status: healthy ? 'healthy' : 'degraded', dependentServices };
}

export function createHealthHandler(getClients: () => Promise<ServerClients>) {
  return async (c: Context): Promise<Response> => {
    const { health } = await getClients();
    return c.json(await checkHealth(health), 200);
  };
}
