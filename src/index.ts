import { env } from './env';
import { log } from './log';
import { createRuntime } from './runtime';
import { buildServer } from './server';

async function main(): Promise<void> {
  const runtime = await createRuntime(env);
  const { server } = buildServer(runtime.server);

  server.listen(env.PORT, () => {
    log.info({ event: 'server_listening', port: env.PORT }, 'server listening');
    runtime.dialer?.start();
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ event: 'shutdown_started', signal }, 'shutting down');
    server.close();
    runtime
      .close()
      .then(() => {
        log.info({ event: 'shutdown_complete' }, 'shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error({ event: 'shutdown_failed', err: error }, 'shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  log.fatal({ event: 'startup_failed', err: error }, 'startup failed');
  process.exit(1);
});
