import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { LogLevel, parseLogLevel } from '../shared/infrastructure/logging/logger';
import type { ModelSource } from '../shared/infrastructure/ollama/ModelCatalog';
import { DEFAULT_OUTPUT_FILE } from '../shared/infrastructure/output/ResponseSink';

export interface AppConfig {
  host: string;
  port: number;
  baseUrl: string;
  probeTimeoutMs: number;
  requestTimeoutMs: number;
  modelSource: ModelSource;
  ollamaBin: string;
  progressIntervalMs: number;
  outputFile: string;
  checkBeforeSend: boolean;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const MAX_PORT = 65535;

const int = (raw: string | undefined, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number => {
  const parsed = parseInt(raw || '', 10);
  return isNaN(parsed) || parsed < min || parsed > max ? fallback : parsed;
};

const bool = (raw: string | undefined): boolean => ['1', 'true', 'yes', 'on'].includes((raw || '').trim().toLowerCase());

/**
 * Loads `.env` from the working directory (if present) into process.env.
 * Existing variables win over the file.
 */
export function loadEnvFile(cwd: string = process.cwd()): string | undefined {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) return undefined;
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new Error(`Could not load ${envPath}: ${result.error.message}`);
  }
  return envPath;
}

export function loadConfig(env: Env = process.env): AppConfig {
  let host = (env.OLLAMA_HOST || 'localhost').trim();
  let port = int(env.OLLAMA_PORT, 11434, 1, MAX_PORT);
  let baseUrl = `http://${host}:${port}`;

  const override = env.OLLAMA_BASE_URL?.trim();
  if (override) {
    let url: URL;
    try {
      url = new URL(override);
    } catch {
      throw new Error(`OLLAMA_BASE_URL must be a valid URL, got "${override}"`);
    }
    host = url.hostname;
    port = url.port ? Number(url.port) : url.protocol === 'https:' ? 443 : 80;
    baseUrl = override.replace(/\/+$/, '');
  }

  const source = (env.OLLAMA_MODEL_SOURCE || 'cli').trim().toLowerCase();

  return {
    host,
    port,
    baseUrl,
    probeTimeoutMs: int(env.OLLAMA_PROBE_TIMEOUT_MS, 1000, 1),
    requestTimeoutMs: int(env.OLLAMA_REQUEST_TIMEOUT_MS, 300000),
    modelSource: source === 'http' ? 'http' : 'cli',
    ollamaBin: env.OLLAMA_BIN?.trim() || 'ollama',
    progressIntervalMs: int(env.OLLAMA_PROGRESS_INTERVAL_MS, 1000, 1),
    outputFile: env.OLLAMA_OUTPUT_FILE?.trim() || DEFAULT_OUTPUT_FILE,
    checkBeforeSend: bool(env.OLLAMA_CHECK_BEFORE_SEND),
    logLevel: parseLogLevel(env.OLLAMA_LOG_LEVEL, 'warn')
  };
}
