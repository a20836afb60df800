import { config } from './config';
import { buildApp } from './server';

/**
 * Main entrypoint for the items service.
 * Builds the app with logging enabled and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Items service listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting items service:', err);
  process.exit(1);
});
