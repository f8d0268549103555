import type { SlotSnapshot } from '../shared/application/ChatSlot';
import type { VisionApp } from '../shared/application/VisionApp';
import type { SlotName } from '../shared/domain/chat';
import { describeImage } from '../shared/domain/chat';

const BAR_WIDTH = 10;

export function formatProgress(value: number, width = BAR_WIDTH): string {
  const bounded = Math.min(100, Math.max(0, Math.round(value)));
  const filled = Math.round((bounded / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${bounded}%`;
}

export function formatModelChoices(choices: string[], selected?: string): string {
  return choices.map((name, i) => `${name === selected ? '*' : ' '} ${i + 1}. ${name}`).join('\n');
}

/** Text printed when a slot reaches a terminal state; undefined for intermediate states. */
export function formatOutcome(snapshot: SlotSnapshot): string | undefined {
  const title = snapshot.slot === 'prompt' ? 'Prompt' : 'Vision';
  if (snapshot.state === 'completed') {
    return `--- ${title} result ---\n${snapshot.result}`;
  }
  if (snapshot.state === 'failed') {
    return `Error: An error occurred: ${snapshot.error ?? 'unknown error'}`;
  }
  return undefined;
}

export function formatTabHeader(app: VisionApp, tab: SlotName): string {
  if (tab === 'prompt') {
    const lines = [`[Prompt] model: ${app.prompt.model ?? '-'}`];
    if (app.prompt.showSystemPrompt) {
      lines.push(`System Prompt: ${app.prompt.systemPrompt || '(empty)'}`);
    }
    return lines.join('\n');
  }
  const image = app.vision.image;
  return `[Vision] model: ${app.vision.model ?? '-'} | image: ${image ? describeImage(image) : '(none)'}`;
}

export const promptLabel = (tab: SlotName, busy: boolean): string => `${tab}${busy ? ' (running)' : ''}> `;
