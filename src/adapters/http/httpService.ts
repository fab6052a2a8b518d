import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export type HttpServiceOptions = {
  name: string;
  port: number;
  host: string;
  handler: RequestHandler;
  /** Headers sent on the 500 and 400 responses this service writes itself. */
  errorHeaders?: Record<string, string>;
  log?: Logger;
};

/**
 * HTTP listener with per-request error isolation. A handler that throws
 * produces a 500 for that request only; the listener keeps serving.
 */
export class HttpService {
  private readonly log: Logger;
  private server?: http.Server;
  private boundPort: number;

  constructor(private readonly options: HttpServiceOptions) {
    this.log = options.log ?? createLogger('Http');
    this.boundPort = options.port;
  }

  /** Actual listening port (differs from the configured one when that was 0). */
  public get port(): number {
    return this.boundPort;
  }

  public get listening(): boolean {
    return this.server?.listening ?? false;
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.options.handler(req, res).catch((error: unknown) => {
        this.log.error('http request failed', { message: errorMessage(error), url: req.url });
        if (!res.headersSent) {
          res.writeHead(500, { ...this.errorHeaders(), 'Content-Length': 0 });
          res.end();
        } else {
          res.destroy();
        }
      });
    });

    server.on('clientError', (error, socket) => {
      this.log.debug('malformed http request', { message: errorMessage(error) });
      if (!socket.writable) {
        socket.destroy();
        return;
      }
      const headers = Object.entries({ ...this.errorHeaders(), 'Content-Length': '0', Connection: 'close' })
        .map(([key, value]) => `${key}: ${value}`)
        .join('\r\n');
      socket.end(`HTTP/1.1 400 Bad Request\r\n${headers}\r\n\r\n`);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address && typeof address === 'object') {
          this.boundPort = address.port;
        }
        this.log.info(`${this.options.name} listening`, {
          port: this.boundPort,
          host: this.options.host,
        });
        resolve();
      });
    });
    this.server = server;
  }

  public async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private errorHeaders(): Record<string, string> {
    return this.options.errorHeaders ?? { 'Content-Type': 'text/plain' };
  }
}
