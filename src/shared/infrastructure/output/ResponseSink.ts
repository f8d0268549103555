import fs from 'fs/promises';
import path from 'path';

export const DEFAULT_OUTPUT_FILE = 'content_out@ollama.md';

export interface ResponseSink {
  write(text: string): Promise<void>;
}

/** Overwrites one fixed file with the latest successful response. */
export class FileResponseSink implements ResponseSink {
  readonly filePath: string;

  constructor(filePath: string = DEFAULT_OUTPUT_FILE) {
    this.filePath = path.resolve(filePath);
  }

  async write(text: string): Promise<void> {
    await fs.writeFile(this.filePath, text + '\n', 'utf8');
  }
}
