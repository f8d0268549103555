import type { ChatBackend } from '../domain/chat';
import { Logger, rootLogger } from '../infrastructure/logging/logger';
import type { AvailabilityProbe } from '../infrastructure/ollama/availability';
import { ModelCatalog, NO_MODELS_PLACEHOLDER } from '../infrastructure/ollama/ModelCatalog';
import type { ResponseSink } from '../infrastructure/output/ResponseSink';
import { runnerFactory } from './ChatSlot';
import { PromptTab } from './tabs/PromptTab';
import { VisionTab } from './tabs/VisionTab';

export interface VisionAppDeps {
  client: ChatBackend;
  catalog: ModelCatalog;
  probe: AvailabilityProbe;
  sink?: ResponseSink;
  backendLabel: string; // host:port shown in the advisory
  checkBeforeSend?: boolean;
  progressIntervalMs?: number;
  logger?: Logger;
}

export interface StartupReport {
  backendAvailable: boolean;
  warning?: string;
  models: string[];
}

export const backendAdvisory = (label: string): string =>
  `Ollama does not seem to be running. Please ensure Ollama is running and accessible on ${label}.`;

/**
 * Both tabs plus the shared model catalog. The availability probe runs once
 * in `start()`; a backend started later is not re-probed.
 */
export class VisionApp {
  readonly prompt: PromptTab;
  readonly vision: VisionTab;
  private readonly catalog: ModelCatalog;
  private readonly probe: AvailabilityProbe;
  private readonly backendLabel: string;
  private readonly logger: Logger;
  private _warning?: string;

  constructor(deps: VisionAppDeps) {
    this.catalog = deps.catalog;
    this.probe = deps.probe;
    this.backendLabel = deps.backendLabel;
    this.logger = deps.logger ?? rootLogger.child('app');

    const createRunner = runnerFactory({
      client: deps.client,
      sink: deps.sink,
      transportCheck: deps.checkBeforeSend ? deps.probe : undefined,
      progressIntervalMs: deps.progressIntervalMs,
      logger: this.logger.child('runner')
    });
    this.prompt = new PromptTab(createRunner, this.logger.child('prompt'));
    this.vision = new VisionTab(createRunner, this.logger.child('vision'));
  }

  get warning(): string | undefined {
    return this._warning;
  }

  async start(): Promise<StartupReport> {
    const backendAvailable = await this.probe();
    if (!backendAvailable) {
      this._warning = backendAdvisory(this.backendLabel);
      this.logger.warn(`⚠️ ${this._warning}`);
    }
    const models = await this.reloadModels();
    return { backendAvailable, warning: this._warning, models };
  }

  modelChoices(): string[] {
    return this.catalog.choices();
  }

  async reloadModels(): Promise<string[]> {
    const models = await this.catalog.refresh();
    const choices = this.catalog.choices();
    this.prompt.model = keepOrFirst(this.prompt.model, choices);
    this.vision.model = keepOrFirst(this.vision.model, choices);
    this.logger.info(`🔄 Models reloaded: ${models.length}`);
    return models;
  }
}

function keepOrFirst(current: string | undefined, choices: string[]): string | undefined {
  if (current && current !== NO_MODELS_PLACEHOLDER && choices.includes(current)) return current;
  return choices[0];
}
