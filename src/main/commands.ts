import type { SlotName } from '../shared/domain/chat';

export type Command =
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'tab'; tab: SlotName }
  | { type: 'models' }
  | { type: 'model'; model: string }
  | { type: 'system'; text: string }
  | { type: 'toggle-system' }
  | { type: 'image'; path: string }
  | { type: 'clear' }
  | { type: 'reset' }
  | { type: 'process' }
  | { type: 'logs'; limit: number }
  | { type: 'ask'; question: string }
  | { type: 'empty' }
  | { type: 'unknown'; input: string; hint: string };

export const HELP_TEXT = [
  'Commands:',
  '  /tab prompt|vision     switch tab',
  '  /models                reload the model list',
  '  /model <name|number>   select a model for the current tab',
  '  /system <text>         set the system prompt (Prompt tab)',
  '  /show-system           show or hide the system prompt',
  '  /image <path>          attach an image (Vision tab)',
  '  /clear                 clear the image and result (Vision tab)',
  '  /process               process the attached image (Vision tab)',
  '  /reset                 clear the Prompt tab',
  '  /logs [n]              show recent log lines',
  '  /quit                  exit',
  'Any other line on the Prompt tab is sent as the question.'
].join('\n');

const DEFAULT_LOG_LINES = 50;

export function parseCommand(line: string): Command {
  const input = line.trim();
  if (!input) return { type: 'empty' };
  if (!input.startsWith('/')) return { type: 'ask', question: input };

  const space = input.indexOf(' ');
  const name = (space === -1 ? input.slice(1) : input.slice(1, space)).toLowerCase();
  const arg = space === -1 ? '' : input.slice(space + 1).trim();

  switch (name) {
    case 'help':
    case '?':
      return { type: 'help' };
    case 'quit':
    case 'exit':
      return { type: 'quit' };
    case 'tab': {
      const tab = arg.toLowerCase();
      if (tab === 'prompt' || tab === 'vision') return { type: 'tab', tab };
      return { type: 'unknown', input, hint: 'Usage: /tab prompt|vision' };
    }
    case 'models':
      return { type: 'models' };
    case 'model':
      return arg ? { type: 'model', model: arg } : { type: 'unknown', input, hint: 'Usage: /model <name|number>' };
    case 'system':
      return { type: 'system', text: arg };
    case 'show-system':
      return { type: 'toggle-system' };
    case 'image':
      return arg ? { type: 'image', path: unquote(arg) } : { type: 'unknown', input, hint: 'Usage: /image <path>' };
    case 'clear':
      return { type: 'clear' };
    case 'reset':
      return { type: 'reset' };
    case 'process':
      return { type: 'process' };
    case 'logs': {
      const limit = parseInt(arg, 10);
      return { type: 'logs', limit: isNaN(limit) || limit <= 0 ? DEFAULT_LOG_LINES : limit };
    }
    default:
      return { type: 'unknown', input, hint: 'Unknown command, type /help for the list.' };
  }
}

/** A number picks from the listed choices (1-based); anything else is taken as a model name. */
export function resolveModel(arg: string, choices: string[]): string | undefined {
  if (/^\d+$/.test(arg)) {
    return choices[Number(arg) - 1];
  }
  return arg;
}

function unquote(value: string): string {
  const match = /^(["'])(.*)\1$/.exec(value);
  return match ? match[2] : value;
}
