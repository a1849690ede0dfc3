import { createServer, type IncomingHttpHeaders, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';

export type RecordedRequest = {
  readonly method: string | undefined;
  readonly url: string | undefined;
  readonly headers: IncomingHttpHeaders;
  readonly body: unknown;
};

export type Reply = {
  readonly status: number;
  readonly body: string;
  readonly headers?: Record<string, string>;
};

export type FakeBackend = {
  readonly baseUrl: string;
  readonly requests: ReadonlyArray<RecordedRequest>;
  close(): Promise<void>;
};

/**
 * Starts an HTTP server on a random loopback port. `respond` returns the
 * reply for each recorded request, or null to leave the request hanging.
 */
export async function startFakeBackend(
  respond: (request: RecordedRequest) => Reply | null,
): Promise<FakeBackend> {
  const requests: Array<RecordedRequest> = [];

  const server: Server = createServer((req, res) => {
    const chunks: Array<Buffer> = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      const recorded: RecordedRequest = {
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: raw.length > 0 ? JSON.parse(raw) : null,
      };
      requests.push(recorded);

      const reply = respond(recorded);
      if (reply === null) {
        return;
      }
      res.writeHead(reply.status, { 'Content-Type': 'application/json', ...reply.headers });
      res.end(reply.body);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = addressOf(server);

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** A loopback URL nothing is listening on. */
export async function unusedBaseUrl(): Promise<string> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = addressOf(server);
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  return `http://127.0.0.1:${port}`;
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address;
}
