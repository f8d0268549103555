import axios from 'axios';
import fs from 'fs/promises';
import { z } from 'zod';
import {
  ChatBackend,
  ChatRequest,
  ChatResponse,
  FailureKind,
  ImageAttachment,
  describeImage,
  failure,
  success
} from '../../domain/chat';
import { errorMessage } from '../../domain/errors';
import { Logger, rootLogger } from '../logging/logger';

export const DEFAULT_BASE_URL = 'http://localhost:11434';
const DEFAULT_REQUEST_TIMEOUT_MS = 300000; // 5 minutes, vision models can be slow on CPU

export interface OllamaWireMessage {
  role: 'system' | 'user';
  content: string;
  images?: string[];
}

const chatReplySchema = z.object({
  message: z.object({
    content: z.string()
  })
});

const errorBodySchema = z.object({ error: z.string() });

export interface OllamaClientOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  logger?: Logger;
}

class AttachmentError extends Error {
  constructor(image: ImageAttachment, cause: unknown) {
    super(`cannot read image ${describeImage(image)} (${errorMessage(cause)})`);
    this.name = 'AttachmentError';
  }
}

/**
 * Chat client for a local Ollama daemon. `send` resolves to a Success or a
 * Failure and never rejects: every transport, protocol or service error is
 * turned into a Failure naming the model and the cause.
 */
export class OllamaClient implements ChatBackend {
  private readonly _baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: OllamaClientOptions = {}) {
    this._baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? rootLogger.child('ollama');
    this.logger.debug(`🌐 Ollama client initialized with base URL: ${this._baseUrl}`);
  }

  get baseUrl(): string {
    return this._baseUrl;
  }

  async send(request: ChatRequest): Promise<ChatResponse> {
    this.logger.info(`🚀 Sending chat request to model: ${request.model} (images: ${request.images?.length ?? 0})`);

    let messages: OllamaWireMessage[];
    try {
      messages = await this.buildMessages(request);
    } catch (error) {
      return this.fail(request.model, 'InvalidInput', errorMessage(error));
    }

    const startTime = Date.now();
    try {
      const { data } = await axios.post<unknown>(
        `${this._baseUrl}/api/chat`,
        { model: request.model, messages, stream: false },
        {
          timeout: this.requestTimeoutMs,
          headers: { 'Content-Type': 'application/json' }
        }
      );

      const parsed = chatReplySchema.safeParse(data);
      if (!parsed.success) {
        return this.fail(request.model, 'ServiceError', 'malformed reply from Ollama (missing message.content)');
      }

      this.logger.info(`✅ Received response from ${request.model} in ${Date.now() - startTime}ms, length ${parsed.data.message.content.length}`);
      return success(parsed.data.message.content);
    } catch (error) {
      const { kind, cause } = this.classify(error);
      return this.fail(request.model, kind, cause);
    }
  }

  async buildMessages(request: ChatRequest): Promise<OllamaWireMessage[]> {
    const messages: OllamaWireMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    const user: OllamaWireMessage = { role: 'user', content: request.message };
    if (request.images && request.images.length) {
      user.images = await Promise.all(request.images.map(image => this.encodeImage(image)));
    }
    messages.push(user);
    return messages;
  }

  private async encodeImage(image: ImageAttachment): Promise<string> {
    if (image.kind === 'bytes') {
      return Buffer.from(image.data).toString('base64');
    }
    try {
      this.logger.debug(`🖼️ Processing image: ${image.path}`);
      const imgBuffer = await fs.readFile(image.path);
      return imgBuffer.toString('base64');
    } catch (error) {
      throw new AttachmentError(image, error);
    }
  }

  private classify(error: unknown): { kind: FailureKind; cause: string } {
    if (!axios.isAxiosError(error)) {
      return { kind: 'ServiceError', cause: errorMessage(error) };
    }

    this.logger.debug('🔍 Axios error details:', {
      code: error.code,
      status: error.response?.status,
      url: error.config?.url
    });

    if (error.response) {
      const body = errorBodySchema.safeParse(error.response.data);
      const detail = body.success ? body.data.error : error.response.statusText || error.message;
      return { kind: 'ServiceError', cause: `HTTP ${error.response.status}: ${detail}` };
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { kind: 'ServiceError', cause: 'request timed out, the model might be taking too long to respond' };
    }
    // no response at all: nothing is listening, or the connection dropped
    return {
      kind: 'TransportUnavailable',
      cause: `cannot connect to Ollama at ${this._baseUrl} (${error.code || error.message || 'no response'})`
    };
  }

  private fail(model: string, kind: FailureKind, cause: string): ChatResponse {
    const message = `Could not get response from ${model}: ${cause}`;
    this.logger.error(`❌ ${kind}: ${message}`);
    return failure(kind, message);
  }
}
