import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import { toTreeView } from '@/domain/stack/sourceResolver';
import type { MediaStack } from '@/application/stack/mediaStack';
import type { StackSummary } from '@/application/stack/stackManager';
import { stackCommandSchema } from '@/application/stack/stackCommands';
import {
  BrowseError,
  CommandFailedError,
  SourceNotFoundError,
  TargetNotFoundError,
  errorMessage,
} from '@/application/stack/stackErrors';
import { readJsonBody, sendJson } from '@/adapters/http/utils/jsonBody';

export type StackDirectory = {
  list(): StackSummary[];
  get(stackId: string): MediaStack | null;
};

type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  match: RegExpMatchArray,
  url: URL,
) => Promise<void> | void;

type Route = {
  method?: string;
  pattern: RegExp;
  handler: RouteHandler;
};

const API_PREFIX = '/api';

/**
 * REST surface over the configured media stacks.
 */
export class StackApiHandler {
  private readonly log = createLogger('Http', 'StackApi');
  private readonly routes: Route[];

  constructor(private readonly stacks: StackDirectory) {
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return pathname === API_PREFIX || pathname.startsWith(`${API_PREFIX}/`);
  }

  public async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname.slice(API_PREFIX.length).replace(/\/+$/, '') || '/';
    const method = (req.method ?? 'GET').toUpperCase();

    try {
      const handled = await this.dispatchRoute(pathname, method, req, res, url);
      if (!handled) {
        sendJson(res, 404, { error: 'not-found' });
      }
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private buildRoutes(): Route[] {
    return [
      {
        method: 'GET',
        pattern: /^\/stacks$/,
        handler: (_req, res) => sendJson(res, 200, { stacks: this.stacks.list() }),
      },
      {
        method: 'GET',
        pattern: /^\/stacks\/([^/]+)$/,
        handler: (_req, res, match) => {
          const stack = this.requireStack(res, match[1]);
          if (!stack) return;
          sendJson(res, 200, { id: stack.id, name: stack.name, state: stack.getState() });
        },
      },
      {
        method: 'GET',
        pattern: /^\/stacks\/([^/]+)\/tree$/,
        handler: (_req, res, match) => {
          const stack = this.requireStack(res, match[1]);
          if (!stack) return;
          const tree = stack.getTree();
          sendJson(res, 200, { tree: tree ? toTreeView(tree) : null });
        },
      },
      {
        method: 'POST',
        pattern: /^\/stacks\/([^/]+)\/command$/,
        handler: async (req, res, match) => {
          const stack = this.requireStack(res, match[1]);
          if (!stack) return;
          const body = await readJsonBody(req, res);
          if (res.writableEnded) return;
          const parsed = stackCommandSchema.safeParse(body);
          if (!parsed.success) {
            sendJson(res, 400, {
              error: 'invalid-command',
              issues: parsed.error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
              })),
            });
            return;
          }
          this.log.debug('stack command', { stackId: stack.id, command: parsed.data.command });
          await stack.execute(parsed.data);
          sendJson(res, 200, { ok: true, state: stack.getState() });
        },
      },
      {
        method: 'GET',
        pattern: /^\/stacks\/([^/]+)\/browse$/,
        handler: async (_req, res, match, url) => {
          const stack = this.requireStack(res, match[1]);
          if (!stack) return;
          const contentType = url.searchParams.get('type') ?? undefined;
          const contentId = url.searchParams.get('id') ?? undefined;
          sendJson(res, 200, await stack.browseMedia(contentType, contentId));
        },
      },
    ];
  }

  private async dispatchRoute(
    pathname: string,
    method: string,
    req: IncomingMessage,
    res: ServerResponse,
    url: URL,
  ): Promise<boolean> {
    for (const route of this.routes) {
      if (route.method && route.method !== method) {
        continue;
      }
      const match = pathname.match(route.pattern);
      if (!match) {
        continue;
      }
      await route.handler(req, res, match, url);
      return true;
    }
    return false;
  }

  private requireStack(res: ServerResponse, rawId: string | undefined): MediaStack | null {
    const stackId = decodeURIComponent(rawId ?? '');
    const stack = this.stacks.get(stackId);
    if (!stack) {
      sendJson(res, 404, { error: 'unknown-stack', stackId });
      return null;
    }
    return stack;
  }

  private sendError(res: ServerResponse, error: unknown): void {
    const message = errorMessage(error);
    if (res.writableEnded) {
      this.log.warn('stack api error after response', { message });
      return;
    }
    if (error instanceof SourceNotFoundError || error instanceof TargetNotFoundError) {
      this.log.info('stack api target missing', { message });
      sendJson(res, 404, { error: 'not-found', message });
      return;
    }
    if (error instanceof BrowseError) {
      this.log.info('stack api browse failed', { message });
      sendJson(res, 404, { error: 'browse-failed', message });
      return;
    }
    if (error instanceof CommandFailedError) {
      this.log.warn('stack command failed', { deviceId: error.deviceId, command: error.command, message });
      sendJson(res, 502, { error: 'command-failed', message, deviceId: error.deviceId });
      return;
    }
    this.log.error('stack api error', { message });
    sendJson(res, 500, { error: 'stack-api-error' });
  }
}
