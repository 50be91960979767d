import 'dotenv/config';
import { buildApp } from '@/app';
import { env } from '@/config/env';
import { closeRedisClient } from '@/config/redis';

async function start() {
  const app = buildApp();
  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    app.log.error({ error: String(err) }, 'Server failed to start');
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close()
      .then(() => closeRedisClient())
      .then(() => process.exit(0))
      .catch((err) => {
        app.log.error({ error: String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err) => {
  console.error(JSON.stringify({ level: 'error', message: 'Server crashed', error: String(err) }));
  process.exit(1);
});
