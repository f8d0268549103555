import type { SlotName, RunnerState } from './chat';

/**
 * Raised when user input is rejected before any request is built.
 */
export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

export class SlotBusyError extends Error {
  readonly slot: SlotName;

  constructor(slot: SlotName) {
    super(`A ${slot} request is already running; wait for it to finish before submitting again.`);
    this.name = 'SlotBusyError';
    this.slot = slot;
  }
}

export class RunnerStateError extends Error {
  readonly state: RunnerState;

  constructor(state: RunnerState) {
    super(`Runner cannot start from state "${state}"; a runner executes exactly one request.`);
    this.name = 'RunnerStateError';
    this.state = state;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
