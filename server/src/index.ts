import { loadConfig } from './config.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // Binds UDP 53 first; a bind failure rejects and ends the process.
  const built = await buildApp(config);

  const shutdown = (signal: NodeJS.Signals): void => {
    built.app.log.info({ signal }, 'shutting down');
    built
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        built.app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await built.app.listen({ host: config.HOST, port: config.PORT });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
