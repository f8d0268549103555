import { EventEmitter } from 'events';
import { ChatBackend, ChatRequest, ChatResponse, RunOutcome, RunnerState, failure } from '../domain/chat';
import { RunnerStateError, errorMessage } from '../domain/errors';
import type { AvailabilityProbe } from '../infrastructure/ollama/availability';
import { Logger, rootLogger } from '../infrastructure/logging/logger';
import type { ResponseSink } from '../infrastructure/output/ResponseSink';

export const PROGRESS_STEP = 10;
export const PROGRESS_RAMP_CEILING = 90;
export const DEFAULT_PROGRESS_INTERVAL_MS = 1000;

export interface RunnerEvents {
  progress: [value: number];
  completed: [text: string];
  failed: [message: string];
}

export interface RequestRunnerOptions {
  client: ChatBackend;
  sink?: ResponseSink;
  /** Transport check run before the backend call; false fails the run as TransportUnavailable. */
  transportCheck?: AvailabilityProbe;
  progressIntervalMs?: number;
  logger?: Logger;
}

export interface RequestRunner {
  on<E extends keyof RunnerEvents>(event: E, listener: (...args: RunnerEvents[E]) => void): this;
  once<E extends keyof RunnerEvents>(event: E, listener: (...args: RunnerEvents[E]) => void): this;
  emit<E extends keyof RunnerEvents>(event: E, ...args: RunnerEvents[E]): boolean;
}

/**
 * Executes exactly one backend call for one request.
 *
 * idle -> running -> completed | failed. While the call is in flight the
 * runner emits a fixed-cadence progress ramp (0, 10, ... 90); the backend
 * reports no real progress. Success emits 100 before `completed`. All ticks
 * precede the single terminal event. The runner holds no reference to UI
 * state: listeners apply its events.
 */
export class RequestRunner extends EventEmitter {
  private _state: RunnerState = 'idle';
  private _progress = -1;
  private readonly client: ChatBackend;
  private readonly sink?: ResponseSink;
  private readonly transportCheck?: AvailabilityProbe;
  private readonly progressIntervalMs: number;
  private readonly logger: Logger;

  constructor(readonly request: ChatRequest, options: RequestRunnerOptions) {
    super();
    this.client = options.client;
    this.sink = options.sink;
    this.transportCheck = options.transportCheck;
    this.progressIntervalMs = Math.max(1, options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS);
    this.logger = options.logger ?? rootLogger.child('runner');
  }

  get state(): RunnerState {
    return this._state;
  }

  /** Last emitted tick, 0 before the run starts. */
  get progress(): number {
    return Math.max(0, this._progress);
  }

  async run(): Promise<RunOutcome> {
    if (this._state !== 'idle') {
      throw new RunnerStateError(this._state);
    }
    this._state = 'running';
    this.logger.debug(`▶️ Run started for ${this.request.model}`);
    this.tick(0);

    const ramp = setInterval(() => {
      if (this._progress < PROGRESS_RAMP_CEILING) {
        this.tick(Math.min(PROGRESS_RAMP_CEILING, this._progress + PROGRESS_STEP));
      }
    }, this.progressIntervalMs);

    let response: ChatResponse;
    try {
      response = await this.execute();
    } catch (error) {
      this.logger.error('❌ Error in runner:', errorMessage(error));
      response = failure('ServiceError', `Could not get response from ${this.request.model}: ${errorMessage(error)}`);
    } finally {
      clearInterval(ramp);
    }

    return this.settle(response);
  }

  private async execute(): Promise<ChatResponse> {
    if (this.transportCheck && !(await this.transportCheck())) {
      return failure('TransportUnavailable', `Could not get response from ${this.request.model}: Ollama is not reachable`);
    }
    return this.client.send(this.request);
  }

  private async settle(response: ChatResponse): Promise<RunOutcome> {
    if (response.type === 'failure') {
      this._state = 'failed';
      this.emit('failed', response.message);
      return { status: 'failed', kind: response.kind, message: response.message };
    }

    this.tick(100);
    if (this.sink) {
      try {
        await this.sink.write(response.text);
      } catch (error) {
        this.logger.warn('⚠️ Error saving response to file:', errorMessage(error));
      }
    }
    this._state = 'completed';
    this.emit('completed', response.text);
    return { status: 'completed', text: response.text };
  }

  private tick(value: number): void {
    const bounded = Math.min(100, Math.max(0, Math.round(value)));
    if (bounded < this._progress) return;
    this._progress = bounded;
    this.emit('progress', bounded);
  }
}
