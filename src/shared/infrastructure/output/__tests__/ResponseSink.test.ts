import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULT_OUTPUT_FILE, FileResponseSink } from '../ResponseSink';

describe('FileResponseSink', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vision-sink-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('overwrites the file with the latest response', async () => {
    const file = path.join(tmpDir, 'out.md');
    const sink = new FileResponseSink(file);

    await sink.write('first answer');
    await sink.write('second');

    await expect(fs.readFile(file, 'utf8')).resolves.toBe('second\n');
  });

  it('defaults to content_out@ollama.md in the working directory', () => {
    expect(new FileResponseSink().filePath).toBe(path.resolve(DEFAULT_OUTPUT_FILE));
    expect(DEFAULT_OUTPUT_FILE).toBe('content_out@ollama.md');
  });

  it('rejects when the directory does not exist', async () => {
    const sink = new FileResponseSink(path.join(tmpDir, 'nope', 'out.md'));
    await expect(sink.write('x')).rejects.toThrow();
  });
});
