import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import type { HttpServerConfig } from '@/config/http';
import { StackApiHandler, type StackDirectory } from '@/adapters/http/stackApi/stackApiHandler';
import type { StateGateway } from '@/adapters/http/ws/stateGateway';
import { sendJson } from '@/adapters/http/utils/jsonBody';

/**
 * Hosts the stack API and the state feed on one HTTP server.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly stackApi: StackApiHandler;
  private server?: http.Server;

  constructor(
    private readonly config: HttpServerConfig,
    private readonly options: {
      stacks: StackDirectory;
      stateFeed: StateGateway;
    },
  ) {
    this.stackApi = new StackApiHandler(options.stacks);
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        const message = error instanceof Error ? error.message : String(error);
        this.log.error('http request failed', { message });
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'http-internal-error' });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    server.on('upgrade', (req, socket, head) => {
      this.handleUpgrade(req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      server
        .listen(this.config.port, this.config.host, () => {
          this.log.info('http gateway listening', {
            port: this.config.port,
            host: this.config.host,
          });
          resolve();
        })
        .on('error', reject);
    });
  }

  public async stop(): Promise<void> {
    this.options.stateFeed.close();
    await new Promise<void>((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(() => resolve());
      this.server = undefined;
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = (req.url ?? '/').split('?')[0] || '/';

    if (pathname === '/ws') {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end('Upgrade Required');
      return;
    }

    if (this.stackApi.matches(pathname)) {
      await this.stackApi.handle(req, res);
      return;
    }

    sendJson(res, 404, { error: 'not-found' });
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.options.stateFeed.handleUpgrade(req, socket, head)) {
      return;
    }
    socket.destroy();
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Cache-Control', 'no-cache');
  }
}
