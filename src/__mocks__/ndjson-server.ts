/**
 * Loopback HTTP server for exercising the real transport against a socket.
 */

import { createServer, type Server, type ServerResponse } from 'node:http';

export interface ServedRequest {
  readonly method: string;
  readonly path: string;
  readonly body: string;
}

export type NdjsonHandler = (response: ServerResponse, request: ServedRequest) => void;

/**
 * Start `response` as an NDJSON stream; headers go out immediately
 */
export function startNdjson(response: ServerResponse): void {
  response.writeHead(200, { 'content-type': 'application/x-ndjson' });
  response.flushHeaders();
}

export function writeRecord(response: ServerResponse, record: unknown): void {
  response.write(`${JSON.stringify(record)}\n`);
}

export class NdjsonServer {
  readonly requests: ServedRequest[] = [];
  private markAbandoned: () => void = () => undefined;
  /** Settles once the client drops a response before the server ended it */
  readonly abandoned: Promise<void> = new Promise<void>((resolve) => {
    this.markAbandoned = resolve;
  });
  private readonly server: Server;

  constructor(handler: NdjsonHandler) {
    this.server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const served: ServedRequest = {
          method: req.method ?? 'GET',
          path: req.url ?? '/',
          body: Buffer.concat(chunks).toString('utf8'),
        };
        this.requests.push(served);
        res.on('close', () => {
          if (!res.writableFinished) this.markAbandoned();
        });
        handler(res, served);
      });
    });
  }

  /**
   * Listen on an ephemeral loopback port and return the base URL
   */
  async listen(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async close(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
