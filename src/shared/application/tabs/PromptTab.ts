import type { RunOutcome } from '../../domain/chat';
import { ChatSlot, RunnerFactory } from '../ChatSlot';
import { buildPromptRequest } from '../requests';
import type { Logger } from '../../infrastructure/logging/logger';

export class PromptTab {
  readonly slot: ChatSlot;
  model?: string;
  systemPrompt = '';
  question = '';
  private _showSystemPrompt = false;

  constructor(createRunner: RunnerFactory, logger?: Logger) {
    this.slot = new ChatSlot('prompt', createRunner, logger);
  }

  get showSystemPrompt(): boolean {
    return this._showSystemPrompt;
  }

  /** Only changes what the host displays; a non-empty system prompt is sent either way. */
  toggleSystemPrompt(): boolean {
    this._showSystemPrompt = !this._showSystemPrompt;
    return this._showSystemPrompt;
  }

  submit(): Promise<RunOutcome> {
    const request = buildPromptRequest({
      model: this.model,
      question: this.question,
      systemPrompt: this.systemPrompt
    });
    return this.slot.submit(request);
  }

  reset(): void {
    this.systemPrompt = '';
    this.question = '';
    this.slot.clearResult();
  }
}
