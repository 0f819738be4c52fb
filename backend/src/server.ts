import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ host: env.HOST, port: env.PORT });
  console.log(`[BOOT] Gradient descent lab listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[BOOT] Failed to start server:', err);
  process.exit(1);
});
