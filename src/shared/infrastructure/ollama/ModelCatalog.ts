import axios from 'axios';
import { execFile } from 'child_process';
import { z } from 'zod';
import { errorMessage } from '../../domain/errors';
import { Logger, rootLogger } from '../logging/logger';
import { DEFAULT_BASE_URL } from './OllamaClient';

export const NO_MODELS_PLACEHOLDER = 'No models available';

export type ModelSource = 'cli' | 'http';

/** Runs a command and resolves to its stdout; rejects on spawn failure or non-zero exit. */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }))
});

export const execCommand: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { timeout: 15000, windowsHide: true }, (err, stdout, stderr) => {
      if (err) {
        const detail = String(stderr).trim();
        reject(new Error(detail ? `${err.message}: ${detail}` : err.message));
        return;
      }
      resolve(String(stdout));
    });
  });

/**
 * Parses the table printed by `ollama list`: first column of every line,
 * header and blank lines skipped.
 */
export function parseModelList(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map(line => line.trim().split(/\s+/)[0] ?? '')
    .filter(name => name && name !== 'NAME');
}

export const toOrderedSet = (names: Iterable<string>): string[] => Array.from(new Set(names)).sort();

export interface ModelCatalogOptions {
  source?: ModelSource;
  ollamaBin?: string;
  baseUrl?: string;
  runCommand?: CommandRunner;
  logger?: Logger;
}

export class ModelCatalog {
  private readonly source: ModelSource;
  private readonly ollamaBin: string;
  private readonly baseUrl: string;
  private readonly runCommand: CommandRunner;
  private readonly logger: Logger;
  private current: string[] = [];

  constructor(options: ModelCatalogOptions = {}) {
    this.source = options.source ?? 'cli';
    this.ollamaBin = options.ollamaBin || 'ollama';
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.runCommand = options.runCommand ?? execCommand;
    this.logger = options.logger ?? rootLogger.child('models');
  }

  get models(): readonly string[] {
    return this.current;
  }

  /** Model names for a selector; a single placeholder entry when nothing is installed or reachable. */
  choices(): string[] {
    return this.current.length ? [...this.current] : [NO_MODELS_PLACEHOLDER];
  }

  async refresh(): Promise<string[]> {
    this.current = await this.listModels();
    return [...this.current];
  }

  /** Never rejects: an unreachable backend or unreadable output yields an empty list. */
  async listModels(): Promise<string[]> {
    this.logger.info(`📋 Fetching available models (${this.source})...`);
    try {
      const names = this.source === 'http' ? await this.fromHttp() : await this.fromCli();
      const models = toOrderedSet(names);
      this.logger.info(`✅ Found ${models.length} models: ${models.join(', ')}`);
      return models;
    } catch (error) {
      this.logger.warn('⚠️ Error listing models:', errorMessage(error));
      return [];
    }
  }

  private async fromCli(): Promise<string[]> {
    const output = await this.runCommand(this.ollamaBin, ['list']);
    return parseModelList(output);
  }

  private async fromHttp(): Promise<string[]> {
    const { data } = await axios.get<unknown>(`${this.baseUrl}/api/tags`, { timeout: 10000 });
    const parsed = tagsSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('malformed /api/tags reply');
    }
    return parsed.data.models.map(m => m.name);
  }
}
