/**
 * Startup Display
 *
 * Displays initialization steps and server info after the clients are up.
 */

import { getLLMDisplayName } from '@/config/config';
import type { Config } from '@/config/schema';
import type { DiscoveryReport } from '@/providers/mcp';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

interface DependencyStatus {
  location: string;
  healthy: boolean;
}

export interface StartupInfo {
  graph: DependencyStatus;
  records: DependencyStatus;
  diabetesModel: DependencyStatus;
  cardioModel: DependencyStatus;
  llm: {
    provider: string;
    model: string;
  };
  /** Registered tool names, built-in and discovered */
  tools: string[];
  discovery: DiscoveryReport[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Delay between initialization steps (ms) */
const STEP_DELAY = 50;

const DIVIDER = '━'.repeat(78);

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Log an initialization step. Unhealthy dependencies get a warning mark;
 * the server still starts and reports them on /health.
 */
function logStep(label: string, detail?: string, healthy = true): void {
  const mark = healthy ? c.brightGreen('✓') : c.brightYellow('!');
  const detailText = detail ? c.dim(detail) : '';
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${mark} ${c.white(label)}${' '.repeat(padding)}${detailText}`);
}

function dependencyStep(label: string, status: DependencyStatus): void {
  const detail = status.healthy ? status.location : `${status.location} (unreachable)`;
  logStep(label, detail, status.healthy);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  console.log(`    • ${methodColor(method.padEnd(6))} ${c.cyan(path.padEnd(24))} ${c.dim(description)}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Display the startup sequence. The banner is displayed separately first.
 */
export async function displayStartup(config: Config, info: StartupInfo): Promise<void> {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  await pause(STEP_DELAY);
  logStep('Configuration loaded');

  await pause(STEP_DELAY);
  dependencyStep('Knowledge graph', info.graph);

  await pause(STEP_DELAY);
  dependencyStep('Patient records', info.records);

  await pause(STEP_DELAY);
  dependencyStep('Diabetes model', info.diabetesModel);

  await pause(STEP_DELAY);
  dependencyStep('Cardiovascular model', info.cardioModel);

  await pause(STEP_DELAY);
  logStep('LLM client ready', `${info.llm.provider}/${info.llm.model}`);

  for (const report of info.discovery) {
    await pause(STEP_DELAY);
    if (report.error !== undefined) {
      logStep(`MCP ${report.server}`, 'unreachable, skipped', false);
    } else {
      logStep(`MCP ${report.server}`, `${report.tools.length} tools`);
    }
  }

  await pause(STEP_DELAY);
  logStep('Tool registry sealed', info.tools.join(', '));

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  displayEndpoint('POST', '/chat', 'Medical agent conversation');
  displayEndpoint('GET', '/health', 'Dependency health');
  displayEndpoint('POST', '/mcp', 'Model Context Protocol (agent tools)');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

/**
 * Build the LLM part of the startup info from config.
 */
export function describeLLM(config: Config): StartupInfo['llm'] {
  return { provider: getLLMDisplayName(config), model: config.llm.model };
}
