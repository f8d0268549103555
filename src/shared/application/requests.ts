import path from 'path';
import { z } from 'zod';
import type { ChatRequest, ImageAttachment } from '../domain/chat';
import { InvalidInputError } from '../domain/errors';
import { NO_MODELS_PLACEHOLDER } from '../infrastructure/ollama/ModelCatalog';

export const VISION_INSTRUCTION = 'Extract text from this image:';
export const SUPPORTED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.bmp'];

const modelSchema = z
  .string()
  .trim()
  .min(1)
  .refine(model => model !== NO_MODELS_PLACEHOLDER);

const promptInputSchema = z.object({
  model: modelSchema,
  question: z.string().refine(q => q.trim().length > 0),
  systemPrompt: z.string().optional()
});

export type PromptInput = {
  model?: string;
  question?: string;
  systemPrompt?: string;
};

export type VisionInput = {
  model?: string;
  image?: ImageAttachment;
};

// byte attachments are copied so the caller's buffer can be reused once submitted
const detach = (image: ImageAttachment): ImageAttachment =>
  image.kind === 'bytes' ? { ...image, data: new Uint8Array(image.data) } : image;

const freeze = (request: ChatRequest): ChatRequest =>
  Object.freeze({ ...request, images: request.images ? Object.freeze(request.images.map(detach)) : undefined });

/** Validates Prompt tab input; throws InvalidInputError before anything is sent. */
export function buildPromptRequest(input: PromptInput): ChatRequest {
  const parsed = promptInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(
      'Please select a model and enter a question.',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const { model, question, systemPrompt } = parsed.data;
  return freeze({ model, message: question, systemPrompt: systemPrompt || undefined });
}

export function buildVisionRequest(input: VisionInput): ChatRequest {
  if (!input.image) {
    throw new InvalidInputError('Please drop or paste an image first.');
  }
  const model = modelSchema.safeParse(input.model);
  if (!model.success) {
    throw new InvalidInputError('Please select a model.');
  }
  return freeze({ model: model.data, message: VISION_INSTRUCTION, images: [input.image] });
}

export function isSupportedImagePath(filePath: string): boolean {
  return SUPPORTED_IMAGE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}
