#!/usr/bin/env node
// This is the process entrypoint that wires configuration, logging and the selected transport.

import { loadConfig, type AppConfig } from './config/env.js';
import { createHttpServer } from './http/server.js';
import { McpProtocolEngine } from './mcp/protocol.js';
import { createToolRegistry } from './mcp/tools.js';
import { runStdioTransport } from './transport/stdio.js';
import { normalizeError } from './utils/errors.js';
import { createLogger, errorForLog } from './utils/logger.js';
import { OpenWeatherClient } from './weather/client.js';

type Logger = ReturnType<typeof createLogger>;

async function runStdio(engine: McpProtocolEngine, logger: Logger): Promise<void> {
  const shutdown = new AbortController();
  process.once('SIGINT', () => shutdown.abort());
  process.once('SIGTERM', () => shutdown.abort());

  await runStdioTransport(process.stdin, process.stdout, engine, {
    logger: logger.child({ component: 'stdio_transport' }),
    signal: shutdown.signal
  });

  // Every response was flushed before the loop returned; stdin may still hold the event loop open.
  process.exit(0);
}

async function runHttp(engine: McpProtocolEngine, logger: Logger, config: AppConfig): Promise<void> {
  const app = createHttpServer({ engine, logger });

  // This helper closes the listener so in-flight tool calls can finish.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ signal }, 'shutdown_started');
    await app.close();
    app.log.info({ signal }, 'shutdown_completed');
  }

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      app.log.error({ signal, error: errorForLog(error) }, 'shutdown_failed');
      process.exit(1);
    });
  };

  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ host: config.host, port: config.port });
  app.log.info({ host: config.host, port: config.port }, 'server_started');
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  if (!config.openWeatherApiKey) {
    logger.warn({ event: 'openweather_api_key_missing' }, 'openweather_api_key_missing');
  }

  const weatherClient = new OpenWeatherClient({
    apiKey: config.openWeatherApiKey,
    baseUrl: config.openWeatherBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child({ component: 'openweather_client' })
  });

  const engine = new McpProtocolEngine({
    registry: createToolRegistry(weatherClient),
    logger: logger.child({ component: 'mcp_engine' })
  });

  logger.info({ event: 'server_starting', transport: config.transport }, 'server_starting');

  if (config.transport === 'http') {
    await runHttp(engine, logger, config);
    return;
  }

  await runStdio(engine, logger);
}

main().catch((error: unknown) => {
  const appError = normalizeError(error);
  // The logger may not exist yet when configuration fails, so the failure is written to stderr directly.
  process.stderr.write(`${JSON.stringify({ event: 'server_failed', code: appError.code, message: appError.message })}\n`);
  process.exit(1);
});
