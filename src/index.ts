#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as http from 'http';
import * as path from 'path';

import { BotMetrics, startMonitoringServer } from './bot/metrics';
import { COMMANDS, InteractionShell } from './bot/interaction-shell';
import { authorization, chain, instrumentation } from './bot/middleware';
import { TelegramTransport } from './bot/telegram';
import { BotConfig } from './config/bot-config';
import { AppStatusReporter } from './core/app-status';
import { KubernetesClusterGateway } from './core/cluster-gateway';
import { loadKubeConfig } from './core/kube';
import { LogLinkDirectory } from './core/log-links';
import { ReconciliationDriver } from './core/reconciliation';
import { ReleaseHealthAggregator } from './core/release-health';
import { Stoppable, gracefulShutdown, printErrorAndExit } from './utils/utils';

const envFiles = [
  '.env.local',
  `.env.${process.env.NODE_ENV}`,
  '.env'
];

envFiles.forEach(file => {
  const envPath = path.resolve(process.cwd(), file);
  dotenv.config({ path: envPath });
});

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main() {
  console.log('🚀 Starting flux-ops-bot...');
  console.log(`📦 Version: ${process.env.npm_package_version || 'unknown'}`);

  try {
    const config = BotConfig.fromEnvironment();
    console.log(`🌍 Environment: ${config.getAppConfig().nodeEnv}`);

    const clusterConfig = config.getClusterConfig();
    const telegramConfig = config.getTelegramConfig();
    const metricsConfig = config.getMetricsConfig();

    const kubeConfig = loadKubeConfig({
      kubeconfigPath: clusterConfig.kubeconfigPath,
      context: clusterConfig.context,
    });
    const gateway = new KubernetesClusterGateway(kubeConfig);

    const shell = new InteractionShell({
      releases: new ReleaseHealthAggregator(gateway),
      reconciler: new ReconciliationDriver(gateway),
      apps: new AppStatusReporter(gateway, {
        labelSelector: clusterConfig.appsLabelSelector,
        mainContainerPrefix: clusterConfig.mainContainerPrefix,
      }),
      logLinks: new LogLinkDirectory(config.getLogLinks()),
    });

    const metrics = new BotMetrics({ collectDefaults: true });
    const pipeline = chain(
      [authorization(telegramConfig.allowedUserIds, metrics), instrumentation(metrics)],
      (request) => shell.handle(request),
    );

    const services: Stoppable[] = [];

    const transport = new TelegramTransport({
      token: telegramConfig.token,
      commands: COMMANDS,
      handler: pipeline,
    });

    if (metricsConfig.enabled) {
      const server = startMonitoringServer(metricsConfig.port, metrics);
      services.push({ name: 'metrics server', stop: () => closeServer(server) });
    } else {
      console.log('ℹ️  Metrics server disabled (METRICS_ENABLED=false)');
    }

    await transport.start();
    services.unshift({ name: 'telegram bot', stop: () => transport.stop() });

    process.once('SIGTERM', async () => await gracefulShutdown('SIGTERM', services));
    process.once('SIGINT', async () => await gracefulShutdown('SIGINT', services));

    console.log('🔄 flux-ops-bot is running. Press Ctrl+C to stop.');
  } catch (error) {
    printErrorAndExit(`💥 Failed to start flux-ops-bot: ${error}`, 1);
  }
}

main().catch((error) => {
  printErrorAndExit(`💥 Unhandled error: ${error}`, 1);
});
