import http from 'http';
import net from 'net';

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

export type Reply = { status: number; body: unknown };
export type ReplyHandler = (req: RecordedRequest) => Reply | Promise<Reply>;

/**
 * In-process stand-in for the Ollama HTTP API. Records every request and
 * answers through the handler given per test.
 */
export class FakeOllama {
  readonly requests: RecordedRequest[] = [];
  private server?: http.Server;
  private handler: ReplyHandler = () => ({ status: 404, body: { error: 'not found' } });

  reply(handler: ReplyHandler): void {
    this.handler = handler;
  }

  async start(): Promise<string> {
    this.server = http.createServer((req, res) => {
      let raw = '';
      req.on('data', chunk => { raw += String(chunk); });
      req.on('end', () => {
        const recorded: RecordedRequest = {
          method: req.method || 'GET',
          url: req.url || '/',
          body: raw ? JSON.parse(raw) : undefined
        };
        this.requests.push(recorded);
        Promise.resolve(this.handler(recorded)).then(({ status, body }) => {
          res.writeHead(status, { 'Content-Type': 'application/json' });
          res.end(typeof body === 'string' ? body : JSON.stringify(body));
        }, (error: unknown) => {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: String(error) }));
        });
      });
    });
    const server = this.server;
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    return `http://127.0.0.1:${portOf(server)}`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  }
}

/** A 127.0.0.1 port nothing listens on. */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const port = portOf(server);
  await new Promise<void>(resolve => server.close(() => resolve()));
  return port;
}

export function portOf(server: net.Server): number {
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('expected a TCP address');
  return address.port;
}
