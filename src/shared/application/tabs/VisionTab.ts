import type { ImageAttachment, RunOutcome } from '../../domain/chat';
import { InvalidInputError } from '../../domain/errors';
import { ChatSlot, RunnerFactory } from '../ChatSlot';
import { buildVisionRequest, isSupportedImagePath } from '../requests';
import type { Logger } from '../../infrastructure/logging/logger';

export class VisionTab {
  readonly slot: ChatSlot;
  model?: string;
  private _image?: ImageAttachment;

  constructor(createRunner: RunnerFactory, logger?: Logger) {
    this.slot = new ChatSlot('vision', createRunner, logger);
  }

  get image(): ImageAttachment | undefined {
    return this._image;
  }

  /** Dropped file. */
  attachImage(filePath: string): void {
    if (!isSupportedImagePath(filePath)) {
      throw new InvalidInputError('Only image files (png, jpg, jpeg, gif, bmp) are supported.');
    }
    this._image = { kind: 'path', path: filePath };
  }

  /** Pasted image. */
  attachImageBytes(data: Uint8Array, label = 'pasted image'): void {
    if (!data.byteLength) {
      throw new InvalidInputError('No image found in clipboard.');
    }
    this._image = { kind: 'bytes', data: new Uint8Array(data), label };
  }

  clearImage(): void {
    this._image = undefined;
    this.slot.clearResult();
  }

  process(): Promise<RunOutcome> {
    const request = buildVisionRequest({ model: this.model, image: this._image });
    return this.slot.submit(request);
  }
}
