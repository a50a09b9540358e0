/**
 * Server entry point.
 *
 * Configuration comes from SEMVERX_* variables, PORT and LOG_LEVEL.
 * SEMVERX_TELEMETRY_WEBHOOK_URL (with an optional
 * SEMVERX_TELEMETRY_WEBHOOK_SECRET) forwards every decision event over
 * HTTP; SEMVERX_TELEMETRY_LOG=true also writes them to the log.
 */

import { loadCompatConfigFromEnv } from './config';
import { createCompatContext } from './context';
import { TelemetrySink } from './domain/telemetry';
import { errorMessage, logger, parseLogLevel, setLogLevel } from './logger';
import { createApp } from './server';
import { LoggerTelemetrySink } from './telemetry/sinks';
import { WebhookTelemetrySink } from './telemetry/webhook-sink';

setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

const PORT = parseInt(process.env.PORT ?? '5000', 10);

const sinks: TelemetrySink[] = [];
if (process.env.SEMVERX_TELEMETRY_WEBHOOK_URL) {
  sinks.push(
    new WebhookTelemetrySink({
      url: process.env.SEMVERX_TELEMETRY_WEBHOOK_URL,
      signingSecret: process.env.SEMVERX_TELEMETRY_WEBHOOK_SECRET,
    }),
  );
}
if (process.env.SEMVERX_TELEMETRY_LOG === 'true') {
  sinks.push(new LoggerTelemetrySink());
}

const context = createCompatContext(loadCompatConfigFromEnv(process.env), { sinks });
const app = createApp(context);

const server = app.listen(PORT, () => {
  logger.info('Server listening', { port: PORT, config: context.config });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close();
  context.shutdown().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error('Telemetry flush failed during shutdown', { error: errorMessage(err) });
      process.exit(1);
    },
  );
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
