import {
  ChatHandler,
  ChatMiddleware,
  ChatRequest,
  HandlerResult,
} from '../common/interfaces/chat.interface';
import { decodeActionToken } from '../core/action-token';
import { BotMetrics } from './metrics';

/**
 * Composes middleware around a final handler. The first middleware in the
 * list runs outermost.
 */
export function chain(middlewares: ChatMiddleware[], handler: ChatHandler): ChatHandler {
  return middlewares
    .slice()
    .reverse()
    .reduce<ChatHandler>((next, middleware) => {
      return async (request: ChatRequest) => middleware(request, next);
    }, handler);
}

/**
 * Label used for metrics: the command name, or `callback:<action>` for
 * button presses.
 */
export function operationLabel(request: ChatRequest): string {
  if (request.kind === 'command') return request.command || 'unknown';
  return `callback:${callbackAction(request.data)}`;
}

function callbackAction(data: string): string {
  const outcome = decodeActionToken(data);
  return outcome.decoded ? outcome.token.action : 'invalid';
}

export function authorization(allowedUserIds: Iterable<number>, metrics: BotMetrics): ChatMiddleware {
  const allowed = new Set(allowedUserIds);

  return async (request, next) => {
    if (allowed.has(request.userId)) {
      return next(request);
    }

    metrics.recordUnauthorized(request.userId);

    if (request.kind === 'command') {
      console.warn(`⛔️ Unauthorized access denied for ${request.userId}`);
      await request.responder.reply({ text: '⛔️ Sorry, you are not authorized to use this bot.' });
    } else {
      console.warn(`⛔️ Unauthorized callback denied for ${request.userId}`);
      await request.responder.answer('⛔️ You are not authorized to perform this action.');
    }

    return { status: 'denied' };
  };
}

/**
 * Counts requests and errors and measures handler latency
 */
export function instrumentation(metrics: BotMetrics): ChatMiddleware {
  return async (request, next) => {
    const label = operationLabel(request);

    if (request.kind === 'command') {
      metrics.recordCommand(label, request.userId);
    } else {
      metrics.recordCallback(callbackAction(request.data), request.userId);
    }

    const startedAt = process.hrtime.bigint();
    let result: HandlerResult;
    try {
      result = await next(request);
    } catch (error) {
      metrics.recordError(error instanceof Error ? error.name : typeof error, label);
      throw error;
    } finally {
      metrics.observeLatency(label, Number(process.hrtime.bigint() - startedAt) / 1e9);
    }

    if (result.status === 'error') {
      metrics.recordError(result.error.name, label);
    }
    return result;
  };
}
