import { EventEmitter } from 'events';
import { ChatRequest, RunOutcome, RunnerState, SlotName } from '../domain/chat';
import { SlotBusyError } from '../domain/errors';
import { Logger, rootLogger } from '../infrastructure/logging/logger';
import { RequestRunner, RequestRunnerOptions } from './RequestRunner';

export interface SlotSnapshot {
  slot: SlotName;
  state: RunnerState;
  progress: number;
  result: string;
  error?: string;
  submitEnabled: boolean;
}

type SlotView = Omit<SlotSnapshot, 'slot' | 'submitEnabled'>;

export type RunnerFactory = (request: ChatRequest) => RequestRunner;

export interface ChatSlot {
  on(event: 'change', listener: (snapshot: SlotSnapshot) => void): this;
  emit(event: 'change', snapshot: SlotSnapshot): boolean;
}

export const runnerFactory = (options: RequestRunnerOptions): RunnerFactory =>
  request => new RequestRunner(request, options);

/**
 * One request slot (a tab). Owns at most one active runner and mirrors its
 * events into a snapshot the host renders.
 */
export class ChatSlot extends EventEmitter {
  private active?: RequestRunner;
  private view: SlotView = { state: 'idle', progress: 0, result: '' };
  private readonly logger: Logger;

  constructor(readonly name: SlotName, private readonly createRunner: RunnerFactory, logger?: Logger) {
    super();
    this.logger = logger ?? rootLogger.child(`slot:${name}`);
  }

  get busy(): boolean {
    return this.active !== undefined;
  }

  snapshot(): SlotSnapshot {
    return { slot: this.name, ...this.view, submitEnabled: !this.busy };
  }

  /** Throws SlotBusyError synchronously while a request is active. */
  submit(request: ChatRequest): Promise<RunOutcome> {
    if (this.active) {
      throw new SlotBusyError(this.name);
    }
    const runner = this.createRunner(request);
    this.active = runner;

    runner.on('progress', value => this.update({ progress: value }));
    runner.on('completed', text => {
      this.active = undefined;
      this.update({ state: 'completed', result: text, error: undefined });
    });
    runner.on('failed', message => {
      this.active = undefined;
      this.update({ state: 'failed', progress: 0, error: message });
    });

    this.update({ state: 'running', progress: 0, result: '', error: undefined });
    this.logger.info(`📨 ${this.name} request submitted to ${request.model}`);
    return this.runToEnd(runner);
  }

  /** Clears the displayed result. Ignored while a request is running. */
  clearResult(): void {
    if (this.busy) {
      this.logger.warn(`⚠️ Cannot clear ${this.name} result while a request is running`);
      return;
    }
    this.update({ state: 'idle', progress: 0, result: '', error: undefined });
  }

  private async runToEnd(runner: RequestRunner): Promise<RunOutcome> {
    try {
      return await runner.run();
    } finally {
      if (this.active === runner) {
        // run() rejected before any terminal event
        this.active = undefined;
        this.update({ state: 'failed', progress: 0 });
      }
    }
  }

  private update(patch: Partial<SlotView>): void {
    this.view = { ...this.view, ...patch };
    this.emit('change', this.snapshot());
  }
}
