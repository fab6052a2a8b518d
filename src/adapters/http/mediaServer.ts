import type { MediaServerOptions } from '@/config/http';
import { HttpService } from '@/adapters/http/httpService';
import { MEDIA_ERROR_HEADERS, MediaAssetHandler } from '@/adapters/http/media/mediaAssetHandler';
import { createLogger } from '@/shared/logging/logger';

/**
 * Long-lived listener cast devices fetch notification audio from. Runs on
 * its own sockets, independent of the worker's polling.
 */
export class MediaServer {
  private readonly http: HttpService;

  constructor(
    private readonly options: MediaServerOptions,
    handler: MediaAssetHandler = new MediaAssetHandler(options.assetDir),
    private readonly now: () => number = Date.now,
  ) {
    this.http = new HttpService({
      name: 'media server',
      port: options.port,
      host: options.host,
      handler: (req, res) => handler.handle(req, res),
      errorHeaders: MEDIA_ERROR_HEADERS,
      log: createLogger('Http', 'Media'),
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

  /**
   * URL for an asset in the served directory, with a cache-busting token.
   */
  public assetUrl(fileName: string): string {
    return `http://${this.options.advertisedHost}:${this.port}/${encodeURIComponent(fileName)}?t=${this.now()}`;
  }
}
