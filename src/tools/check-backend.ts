#!/usr/bin/env node

/**
 * Backend check tool
 * Probes the configured Ollama host:port and lists the installed models
 */

import { AppConfig, loadConfig, loadEnvFile } from '../main/config';
import { errorMessage } from '../shared/domain/errors';
import { rootLogger } from '../shared/infrastructure/logging/logger';
import { AvailabilityProbe, tcpProbe } from '../shared/infrastructure/ollama/availability';
import { ModelCatalog } from '../shared/infrastructure/ollama/ModelCatalog';

export interface BackendReport {
  target: string;
  reachable: boolean;
  models: string[];
}

export async function checkBackend(
  config: AppConfig,
  probe: AvailabilityProbe = tcpProbe(config.host, config.port, config.probeTimeoutMs),
  catalog: ModelCatalog = new ModelCatalog({ source: config.modelSource, ollamaBin: config.ollamaBin, baseUrl: config.baseUrl })
): Promise<BackendReport> {
  const reachable = await probe();
  const models = await catalog.listModels();
  return { target: `${config.host}:${config.port}`, reachable, models };
}

export function formatReport(report: BackendReport): string {
  const lines = [
    `${report.reachable ? '✅' : '❌'} Ollama at ${report.target}: ${report.reachable ? 'reachable' : 'not reachable'}`,
    `📋 Models (${report.models.length}): ${report.models.length ? report.models.join(', ') : 'none found'}`
  ];
  if (!report.reachable) {
    lines.push('💡 Start the daemon with `ollama serve`, or set OLLAMA_HOST / OLLAMA_PORT.');
  }
  return lines.join('\n');
}

async function run() {
  loadEnvFile();
  const config = loadConfig();
  rootLogger.setLevel(config.logLevel);
  const report = await checkBackend(config);
  console.log(formatReport(report));
  if (!report.reachable) process.exitCode = 1;
}

if (require.main === module) {
  run().catch(error => {
    console.error('💥 Backend check failed:', errorMessage(error));
    process.exitCode = 1;
  });
}
