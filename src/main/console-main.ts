#!/usr/bin/env node
import readline from 'readline';
import { VisionApp } from '../shared/application/VisionApp';
import { SlotSnapshot } from '../shared/application/ChatSlot';
import type { RunOutcome, SlotName } from '../shared/domain/chat';
import { InvalidInputError, SlotBusyError, errorMessage } from '../shared/domain/errors';
import { Logger, formatLogEntry, rootLogger } from '../shared/infrastructure/logging/logger';
import { tcpProbe } from '../shared/infrastructure/ollama/availability';
import { ModelCatalog } from '../shared/infrastructure/ollama/ModelCatalog';
import { OllamaClient } from '../shared/infrastructure/ollama/OllamaClient';
import { FileResponseSink } from '../shared/infrastructure/output/ResponseSink';
import { Command, HELP_TEXT, parseCommand, resolveModel } from './commands';
import { AppConfig, loadConfig, loadEnvFile } from './config';
import { formatModelChoices, formatOutcome, formatProgress, formatTabHeader, promptLabel } from './console-view';

export interface ConsoleOutput {
  write(text: string): void;
}

export function createApp(config: AppConfig, logger: Logger = rootLogger): VisionApp {
  return new VisionApp({
    client: new OllamaClient({
      baseUrl: config.baseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      logger: logger.child('ollama')
    }),
    catalog: new ModelCatalog({
      source: config.modelSource,
      ollamaBin: config.ollamaBin,
      baseUrl: config.baseUrl,
      logger: logger.child('models')
    }),
    probe: tcpProbe(config.host, config.port, config.probeTimeoutMs, logger.child('probe')),
    sink: new FileResponseSink(config.outputFile),
    backendLabel: `${config.host}:${config.port}`,
    checkBeforeSend: config.checkBeforeSend,
    progressIntervalMs: config.progressIntervalMs,
    logger
  });
}

/**
 * Terminal stand-in for the two-tab window. Requests run in the background;
 * the host only reacts to slot snapshots, so input stays responsive while a
 * request is in flight.
 */
export class ConsoleHost {
  private current: SlotName = 'prompt';
  private readonly pending = new Set<Promise<void>>();
  private readonly lastProgress: Record<SlotName, number> = { prompt: -1, vision: -1 };

  constructor(
    private readonly app: VisionApp,
    private readonly out: ConsoleOutput,
    private readonly logger: Logger = rootLogger
  ) {
    app.prompt.slot.on('change', snapshot => this.render(snapshot));
    app.vision.slot.on('change', snapshot => this.render(snapshot));
  }

  get tab(): SlotName {
    return this.current;
  }

  get busy(): boolean {
    return this.current === 'prompt' ? this.app.prompt.slot.busy : this.app.vision.slot.busy;
  }

  /** Resolves once every request started so far has reached its terminal outcome. */
  async idle(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  /** Returns false when the host should exit. */
  async handle(line: string): Promise<boolean> {
    const command = parseCommand(line);
    try {
      return await this.dispatch(command);
    } catch (error) {
      if (error instanceof InvalidInputError || error instanceof SlotBusyError) {
        this.out.write(`Warning: ${error.message}`);
        return true;
      }
      throw error;
    }
  }

  private async dispatch(command: Command): Promise<boolean> {
    switch (command.type) {
      case 'empty':
        return true;
      case 'quit':
        return false;
      case 'help':
        this.out.write(HELP_TEXT);
        return true;
      case 'unknown':
        this.out.write(command.hint);
        return true;
      case 'tab':
        this.current = command.tab;
        this.out.write(formatTabHeader(this.app, this.current));
        return true;
      case 'models': {
        await this.app.reloadModels();
        this.out.write(formatModelChoices(this.app.modelChoices(), this.selectedModel()));
        return true;
      }
      case 'model':
        return this.selectModel(command.model);
      case 'system':
        this.app.prompt.systemPrompt = command.text;
        this.out.write(command.text ? 'System prompt set.' : 'System prompt cleared.');
        return true;
      case 'toggle-system':
        this.app.prompt.toggleSystemPrompt();
        this.out.write(formatTabHeader(this.app, 'prompt'));
        return true;
      case 'image':
        this.app.vision.attachImage(command.path);
        this.out.write(formatTabHeader(this.app, 'vision'));
        return true;
      case 'clear':
        this.app.vision.clearImage();
        this.out.write('Image cleared.');
        return true;
      case 'reset':
        this.app.prompt.reset();
        this.lastProgress.prompt = -1;
        this.out.write('Prompt tab reset.');
        return true;
      case 'process':
        this.track(this.app.vision.process());
        return true;
      case 'ask':
        if (this.current !== 'prompt') {
          this.out.write('Questions go to the Prompt tab; use /tab prompt, or /process on the Vision tab.');
          return true;
        }
        // a refused question must not replace the one in flight
        if (this.app.prompt.slot.busy) throw new SlotBusyError('prompt');
        this.app.prompt.question = command.question;
        this.track(this.app.prompt.submit());
        return true;
      case 'logs': {
        const entries = this.logger.buffer.recent(command.limit);
        this.out.write(entries.length ? entries.map(formatLogEntry).join('\n') : '(no log entries)');
        return true;
      }
    }
  }

  private selectModel(arg: string): boolean {
    const choices = this.app.modelChoices();
    const model = resolveModel(arg, choices);
    if (!model) {
      this.out.write(`No model number ${arg}; there are ${choices.length} choices.`);
      return true;
    }
    if (this.current === 'prompt') this.app.prompt.model = model;
    else this.app.vision.model = model;
    this.out.write(formatTabHeader(this.app, this.current));
    return true;
  }

  private selectedModel(): string | undefined {
    return this.current === 'prompt' ? this.app.prompt.model : this.app.vision.model;
  }

  private track(run: Promise<RunOutcome>): void {
    const settled: Promise<void> = run
      .then(
        () => undefined,
        error => {
          this.logger.error('❌ Request failed unexpectedly:', errorMessage(error));
          this.out.write(`Error: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        this.pending.delete(settled);
      });
    this.pending.add(settled);
  }

  private render(snapshot: SlotSnapshot): void {
    if (snapshot.state === 'running') {
      if (snapshot.progress !== this.lastProgress[snapshot.slot]) {
        this.lastProgress[snapshot.slot] = snapshot.progress;
        this.out.write(`${snapshot.slot} ${formatProgress(snapshot.progress)}`);
      }
      return;
    }
    this.lastProgress[snapshot.slot] = -1;
    const text = formatOutcome(snapshot);
    if (text) this.out.write(text);
  }
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  rootLogger.setLevel(config.logLevel);
  rootLogger.info('🚀 Starting with backend', config.baseUrl);

  const app = createApp(config);
  const out: ConsoleOutput = { write: text => console.log(text) };
  const host = new ConsoleHost(app, out);

  const report = await app.start();
  if (report.warning) out.write(`Ollama Not Available: ${report.warning}`);
  out.write('Available Ollama models:');
  out.write(formatModelChoices(app.modelChoices(), app.prompt.model));
  out.write('Type /help for commands.');

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const prompt = () => {
    rl.setPrompt(promptLabel(host.tab, host.busy));
    rl.prompt();
  };
  rl.on('line', line => {
    host.handle(line).then(
      keepGoing => (keepGoing ? prompt() : rl.close()),
      error => {
        out.write(`Error: ${errorMessage(error)}`);
        prompt();
      }
    );
  });
  await new Promise<void>(resolve => rl.once('close', resolve));
  await host.idle();
}

if (require.main === module) {
  main().catch(error => {
    console.error('💥 Fatal:', errorMessage(error));
    process.exitCode = 1;
  });
}
