import express, { type ErrorRequestHandler, type RequestHandler } from 'express';

import { WorkspaceAgent } from '../agent/loop.js';
import { GatewayError, describeError, toErrorBody, type ErrorBody } from '../errors.js';
import { parseConversation, serializeConversation } from '../llm/messages.js';
import { createLogger } from '../logging.js';
import type { WorkspaceRouter } from './router.js';

const BODY_LIMIT = '4mb';

const logger = createLogger('http');

function sendError(res: express.Response, body: ErrorBody): void {
  res.status(body.status).json(body);
}

function resolveWorkspace(router: WorkspaceRouter): RequestHandler {
  return (req, res, next) => {
    router.resolve(req.path).then(
      (agent) => {
        if (!agent) {
          sendError(res, { status: 404, message: 'Path not found' });
          return;
        }
        if (req.method !== 'POST') {
          sendError(res, { status: 406, message: 'Method not allowed' });
          return;
        }
        res.locals.workspace = agent;
        next();
      },
      (error: unknown) => next(error),
    );
  };
}

const handleConversation: RequestHandler = (req, res, next) => {
  const agent: unknown = res.locals.workspace;
  if (!(agent instanceof WorkspaceAgent)) {
    next(new Error(`No workspace resolved for ${req.path}`));
    return;
  }

  const startedAt = Date.now();
  Promise.resolve()
    .then(() => agent.run(parseConversation(req.body)))
    .then(({ conversation, usage }) => {
      logger.info(`POST ${req.path} → 200 in ${Date.now() - startedAt}ms`);
      res.status(200).json(serializeConversation(conversation, usage));
    })
    .catch((error: unknown) => next(error));
};

function isBodyParserError(error: unknown): error is { status: number; type: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    logger.warn(`${req.method} ${req.path} rejected: ${error.type}`);
    sendError(res, {
      status: error.status,
      message: error.type === 'entity.parse.failed' ? 'Invalid JSON body' : 'Invalid request body',
    });
    return;
  }

  const body = toErrorBody(error);
  const log = error instanceof GatewayError && body.status < 500 ? logger.warn : logger.error;
  log.call(logger, `${req.method} ${req.path} → ${body.status}: ${describeError(error)}`);
  sendError(res, body);
};

/**
 * One Express application per listening socket. Unknown paths answer 404, other methods than
 * POST on a workspace path answer 406, and every error leaves as `{ status, message }`.
 */
export function createListenerApp(router: WorkspaceRouter): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(resolveWorkspace(router));
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(handleConversation);
  app.use(handleError);

  return app;
}
