import { ModelCatalog, NO_MODELS_PLACEHOLDER, parseModelList, CommandRunner } from '../ModelCatalog';
import { FakeOllama, closedPort } from '../../../../tests/helpers/fakeOllama';

const LIST_OUTPUT = [
  'NAME               ID              SIZE      MODIFIED',
  'llava:latest       8dd30f6b0cb1    4.7 GB    2 days ago',
  '',
  'llama3:8b          365c0bd3c000    4.7 GB    3 weeks ago',
  'gemma2:2b          8ccf136fdd52    1.6 GB    5 weeks ago',
  ''
].join('\n');

describe('parseModelList', () => {
  it('takes the first column and skips the header and blank lines', () => {
    expect(parseModelList(LIST_OUTPUT)).toEqual(['llava:latest', 'llama3:8b', 'gemma2:2b']);
  });

  it('handles CRLF output', () => {
    expect(parseModelList('NAME ID\r\nphi3:mini abc\r\n')).toEqual(['phi3:mini']);
  });

  it('returns nothing for empty output', () => {
    expect(parseModelList('')).toEqual([]);
  });
});

describe('ModelCatalog (cli source)', () => {
  it('runs `<bin> list` and returns a sorted, de-duplicated list', async () => {
    const calls: Array<[string, string[]]> = [];
    const runCommand: CommandRunner = async (file, args) => {
      calls.push([file, args]);
      return LIST_OUTPUT + 'llava:latest  8dd30f6b0cb1  4.7 GB  2 days ago\n';
    };
    const catalog = new ModelCatalog({ ollamaBin: '/opt/ollama/bin/ollama', runCommand });

    await expect(catalog.listModels()).resolves.toEqual(['gemma2:2b', 'llama3:8b', 'llava:latest']);
    expect(calls).toEqual([['/opt/ollama/bin/ollama', ['list']]]);
  });

  it('returns an empty list when the command fails', async () => {
    const catalog = new ModelCatalog({
      runCommand: async () => {
        throw new Error('spawn ollama ENOENT');
      }
    });

    await expect(catalog.listModels()).resolves.toEqual([]);
  });

  it('keeps the last refresh and offers a placeholder when empty', async () => {
    let output = LIST_OUTPUT;
    const catalog = new ModelCatalog({ runCommand: async () => output });

    expect(catalog.choices()).toEqual([NO_MODELS_PLACEHOLDER]);
    await catalog.refresh();
    expect(catalog.models).toEqual(['gemma2:2b', 'llama3:8b', 'llava:latest']);
    expect(catalog.choices()).toEqual(['gemma2:2b', 'llama3:8b', 'llava:latest']);

    output = 'NAME ID SIZE MODIFIED\n';
    await catalog.refresh();
    expect(catalog.models).toEqual([]);
    expect(catalog.choices()).toEqual([NO_MODELS_PLACEHOLDER]);
  });
});

describe('ModelCatalog (http source)', () => {
  const fake = new FakeOllama();
  let baseUrl: string;

  beforeAll(async () => {
    baseUrl = await fake.start();
  });

  afterAll(async () => {
    await fake.stop();
  });

  it('reads names from /api/tags', async () => {
    fake.reply(() => ({ status: 200, body: { models: [{ name: 'mistral:7b' }, { name: 'llava:13b' }] } }));
    const catalog = new ModelCatalog({ source: 'http', baseUrl });

    await expect(catalog.listModels()).resolves.toEqual(['llava:13b', 'mistral:7b']);
    expect(fake.requests[fake.requests.length - 1].url).toBe('/api/tags');
  });

  it('returns an empty list for a malformed reply', async () => {
    fake.reply(() => ({ status: 200, body: { tags: 'nope' } }));
    const catalog = new ModelCatalog({ source: 'http', baseUrl });

    await expect(catalog.listModels()).resolves.toEqual([]);
  });

  it('returns an empty list when the backend is unreachable', async () => {
    const port = await closedPort();
    const catalog = new ModelCatalog({ source: 'http', baseUrl: `http://127.0.0.1:${port}` });

    await expect(catalog.listModels()).resolves.toEqual([]);
  });
});
