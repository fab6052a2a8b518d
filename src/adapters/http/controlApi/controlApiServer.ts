import type { ControlApiOptions } from '@/config/http';
import { HttpService } from '@/adapters/http/httpService';
import { ControlApiHandler, type NotificationTrigger } from '@/adapters/http/controlApi/controlApiHandler';
import { createLogger } from '@/shared/logging/logger';

export class ControlApiServer {
  private readonly http: HttpService;

  constructor(options: ControlApiOptions, trigger: NotificationTrigger) {
    const handler = new ControlApiHandler(trigger);
    this.http = new HttpService({
      name: 'control api',
      port: options.port,
      host: options.host,
      handler: (req, res) => handler.handle(req, res),
      errorHeaders: { 'Content-Type': 'application/json' },
      log: createLogger('Http', 'ControlApi'),
    });
  }

  public get port(): number {
    return this.http.port;
  }

  public start(): Promise<void> {
    return this.http.start();
  }

  public stop(): Promise<void> {
    return this.http.stop();
  }
}
