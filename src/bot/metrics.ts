import * as http from 'http';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import { COMMAND_LATENCY_BUCKETS_SECONDS } from '../common/time.constants';

export interface BotMetricsOptions {
  /** Also export Node.js process metrics */
  collectDefaults?: boolean;
}

/**
 * Prometheus instruments for chat usage. Each instance owns its registry so
 * tests can inspect counters in isolation.
 */
export class BotMetrics {
  readonly registry = new Registry();

  readonly commands = new Counter({
    name: 'telegram_bot_commands_total',
    help: 'Number of commands received by the bot',
    labelNames: ['command', 'user_id'] as const,
    registers: [this.registry],
  });

  readonly callbacks = new Counter({
    name: 'telegram_bot_callbacks_total',
    help: 'Number of callback queries processed',
    labelNames: ['action', 'user_id'] as const,
    registers: [this.registry],
  });

  readonly errors = new Counter({
    name: 'telegram_bot_errors_total',
    help: 'Number of errors encountered',
    labelNames: ['type', 'command'] as const,
    registers: [this.registry],
  });

  readonly unauthorizedAttempts = new Counter({
    name: 'telegram_bot_unauthorized_attempts_total',
    help: 'Number of unauthorized access attempts',
    labelNames: ['user_id'] as const,
    registers: [this.registry],
  });

  readonly commandLatency = new Histogram({
    name: 'telegram_bot_command_latency_seconds',
    help: 'Command processing latency in seconds',
    labelNames: ['command'] as const,
    buckets: COMMAND_LATENCY_BUCKETS_SECONDS,
    registers: [this.registry],
  });

  constructor(options: BotMetricsOptions = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  recordCommand(command: string, userId: number): void {
    this.commands.inc({ command, user_id: String(userId) });
  }

  recordCallback(action: string, userId: number): void {
    this.callbacks.inc({ action, user_id: String(userId) });
  }

  recordError(type: string, command: string): void {
    this.errors.inc({ type, command });
  }

  recordUnauthorized(userId: number): void {
    this.unauthorizedAttempts.inc({ user_id: String(userId) });
  }

  observeLatency(command: string, seconds: number): void {
    this.commandLatency.observe({ command }, seconds);
  }
}

export interface MonitoringResponse {
  statusCode: number;
  contentType: string;
  body: string;
}

/**
 * Routes of the monitoring server: `/metrics` for Prometheus, `/health` for probes
 */
export async function handleMonitoringRequest(url: string | undefined, metrics: BotMetrics): Promise<MonitoringResponse> {
  const path = (url ?? '/').split('?')[0];

  if (path === '/metrics') {
    return {
      statusCode: 200,
      contentType: metrics.registry.contentType,
      body: await metrics.registry.metrics(),
    };
  }

  if (path === '/health') {
    return { statusCode: 200, contentType: 'application/json', body: JSON.stringify({ status: 'ok' }) };
  }

  return { statusCode: 404, contentType: 'text/plain', body: 'Not Found' };
}

export function startMonitoringServer(port: number, metrics: BotMetrics): http.Server {
  const server = http.createServer((req, res) => {
    handleMonitoringRequest(req.url, metrics)
      .then((response) => {
        res.writeHead(response.statusCode, { 'Content-Type': response.contentType });
        res.end(response.body);
      })
      .catch((error) => {
        console.error('❌ Metrics collection failed:', error);
        res.writeHead(500);
        res.end('Internal Server Error');
      });
  });

  server.listen(port, () => {
    console.log(`📈 Metrics server listening on port ${port}`);
  });

  return server;
}
