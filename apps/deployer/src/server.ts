import { buildApp } from './app.js';
import { loadSettings } from './config/env.js';

const start = async () => {
  const settings = loadSettings();
  const app = buildApp(settings);

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: settings.port, host: settings.host });
  app.log.info(
    { stacksRoot: settings.stacksRoot, rateLimitPerMinute: settings.rateLimitPerMinute, vault: settings.vault !== null },
    'Deployer ready',
  );
};

start().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
