// packages/server/src/main.ts
import { loadConfig } from '@blockbridge/config';
import {
  assertPortAvailable,
  assertSupportedRuntime,
  createLogger,
  extractErrorInfo,
  getEventBus,
  loadDotenv,
  setupUnhandledRejectionHandler,
} from '@blockbridge/infra';
import { LogChatPlatform } from './gateway/platform.js';
import { createGatewayServer } from './gateway/server.js';
import { ProcessLifecycle } from './process/lifecycle.js';

async function main(): Promise<void> {
  assertSupportedRuntime();
  loadDotenv();

  const config = loadConfig();
  const logger = createLogger({
    name: 'blockbridge',
    level: config.logging.level,
    file: config.logging.file,
    console: { enabled: true, pretty: !config.logging.json },
    redactKeys: config.logging.redactSensitive ? undefined : [],
  });
  setupUnhandledRejectionHandler(logger);

  const lifecycle = new ProcessLifecycle({ logger });

  await assertPortAvailable(config.gateway.port, config.gateway.host);

  const gateway = createGatewayServer(config, {
    platform: new LogChatPlatform(logger.child('platform')),
    logger,
  });

  lifecycle.register(() => gateway.stop());
  lifecycle.init();

  await gateway.start();
  getEventBus().emit('system:ready');
}

main().catch((err: unknown) => {
  const { code, message } = extractErrorInfo(err);
  console.error(`Failed to start gateway [${code}]: ${message}`);
  process.exit(1);
});
