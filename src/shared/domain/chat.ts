export type ImageAttachment =
  | { kind: 'path'; path: string }
  | { kind: 'bytes'; data: Uint8Array; label?: string }; // pasted / in-memory image

export interface ChatRequest {
  model: string;
  message: string;
  systemPrompt?: string;
  images?: readonly ImageAttachment[];
}

export type FailureKind = 'TransportUnavailable' | 'ServiceError' | 'InvalidInput';

export type ChatResponse =
  | { type: 'success'; text: string }
  | { type: 'failure'; kind: FailureKind; message: string };

export type RunOutcome =
  | { status: 'completed'; text: string }
  | { status: 'failed'; kind: FailureKind; message: string };

export type RunnerState = 'idle' | 'running' | 'completed' | 'failed';

export type SlotName = 'prompt' | 'vision';

export interface ChatBackend {
  send(request: ChatRequest): Promise<ChatResponse>;
}

export const success = (text: string): ChatResponse => ({ type: 'success', text });

export const failure = (kind: FailureKind, message: string): ChatResponse => ({ type: 'failure', kind, message });

export function describeImage(image: ImageAttachment): string {
  if (image.kind === 'path') return image.path;
  return image.label ?? `${image.data.byteLength} bytes`;
}
