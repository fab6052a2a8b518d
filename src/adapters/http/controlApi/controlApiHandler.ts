import type { IncomingMessage, ServerResponse } from 'node:http';
import type { TargetSummary } from '@/application/targets/targetRegistry';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { readJsonBody, sendJson } from '@/adapters/http/controlApi/jsonBody';
import { normalizePath } from '@/adapters/http/utils/requestPath';

/**
 * What the control API drives: the pipeline's trigger surface and the target list.
 */
export interface NotificationTrigger {
  notify(target: string, text: string): boolean;
  notifyDefault(text: string): boolean;
  listTargets(): TargetSummary[];
}

type RouteHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void> | void;

type Route = {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
};

type NotifyBody = {
  target?: unknown;
  text?: unknown;
};

function isNotifyBody(value: unknown): value is NotifyBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON API for queueing notifications from other systems.
 */
export class ControlApiHandler {
  private readonly log = createLogger('Http', 'ControlApi');
  private readonly routes: Route[];

  constructor(private readonly trigger: NotificationTrigger) {
    this.routes = [
      {
        method: 'POST',
        pattern: /^\/api\/notify$/,
        handler: async (req, res) => this.handleNotify(req, res),
      },
      {
        method: 'GET',
        pattern: /^\/api\/targets$/,
        handler: (_req, res) => sendJson(res, 200, { targets: this.trigger.listTargets() }),
      },
    ];
  }

  public async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = normalizePath(req.url ?? '/').replace(/\/+$/, '') || '/';
    const method = (req.method ?? 'GET').toUpperCase();
    const candidates = this.routes.filter((route) => route.pattern.test(pathname));
    if (candidates.length === 0) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const route = candidates.find((candidate) => candidate.method === method);
    if (!route) {
      res.setHeader('Allow', candidates.map((candidate) => candidate.method).join(', '));
      sendJson(res, 405, { error: 'method-not-allowed' });
      return;
    }
    try {
      await route.handler(req, res);
    } catch (err) {
      this.log.error('control api error', { message: errorMessage(err) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'control-api-error' });
      }
    }
  }

  private async handleNotify(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJsonBody(req, res);
    if (res.writableEnded) {
      return;
    }
    if (!isNotifyBody(body) || typeof body.text !== 'string' || !body.text.trim()) {
      sendJson(res, 400, { error: 'missing-text' });
      return;
    }
    if (body.target !== undefined && typeof body.target !== 'string') {
      sendJson(res, 400, { error: 'invalid-target' });
      return;
    }
    const target = body.target?.trim();
    const queued = target
      ? this.trigger.notify(target, body.text)
      : this.trigger.notifyDefault(body.text);
    if (!queued) {
      sendJson(res, 409, { error: 'notification-rejected' });
      return;
    }
    this.log.debug('notification accepted', { target: target ?? 'default' });
    sendJson(res, 202, { queued: true });
  }
}
