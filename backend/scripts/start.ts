import { schedule, type ScheduledTask } from 'node-cron';
import type { FastifyBaseLogger } from 'fastify';
import buildServer from '../src/server.js';
import { env } from '../src/util/env.js';
import { refreshNews } from '../src/services/news.js';

const NEWS_REFRESH_CRON = '*/10 * * * *';

class JobScheduler {
  private readonly tasks: ScheduledTask[] = [];

  constructor(private readonly log: FastifyBaseLogger) {}

  every(expression: string, name: string, job: () => Promise<void>): void {
    this.tasks.push(
      schedule(expression, () => {
        job().catch((err: unknown) => this.log.error({ err, job: name }, 'scheduled job failed'));
      }),
    );
    this.log.info({ job: name, expression }, 'scheduled job registered');
  }

  stopAll(): void {
    for (const task of this.tasks.splice(0)) {
      try {
        task.stop();
      } catch (err) {
        this.log.error({ err }, 'failed to stop scheduled job');
      }
    }
  }
}

function onShutdownSignal(handler: (signal: NodeJS.Signals) => Promise<void>): void {
  let triggered = false;
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      if (triggered) return;
      triggered = true;
      handler(signal).finally(() => process.exit(0));
    });
  }
}

async function main() {
  const app = await buildServer();
  const { log } = app;
  const scheduler = new JobScheduler(log);

  onShutdownSignal(async (signal) => {
    log.info({ signal }, 'received shutdown signal');
    scheduler.stopAll();
    try {
      await app.close();
      log.info('server stopped');
    } catch (err) {
      log.error({ err }, 'error during shutdown');
    }
  });

  scheduler.every(NEWS_REFRESH_CRON, 'news-refresh', () => refreshNews(log));

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    log.error({ err }, 'failed to start server');
    scheduler.stopAll();
    process.exit(1);
  }
  app.isStarted = true;
  log.info({ host: env.HOST, port: env.PORT }, 'server started');
  await refreshNews(log);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
