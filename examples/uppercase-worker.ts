/**
 * Example: a worker that upper-cases text.
 *
 * Demonstrates function registration, middleware, progress reporting and
 * graceful shutdown.
 */

import { GearmanWorker, connect } from '../src/index.js';
import { logging, timeout } from '../src/middleware/index.js';

const connection = await connect({ host: 'localhost', port: 4730 });
const worker = new GearmanWorker(connection, { workerId: 'upper-1' });

worker.use(logging({ level: 'debug' }));
worker.use('upper.lines', timeout({ timeoutMs: 30_000 }));

worker.registerFunction('upper', (data) => data.toString('utf8').toUpperCase());

worker.registerFunction('upper.lines', async (data, ctx) => {
  const lines = data.toString('utf8').split('\n');
  for (const [i, line] of lines.entries()) {
    ctx.sendData(`${line.toUpperCase()}\n`);
    ctx.sendStatus(i + 1, lines.length);
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
});

worker.events.on('job.failed', (event) => {
  console.log(`[event] Job failed: ${event.subject} (${event.data.error})`);
});

worker.events.on('worker.stopped', (event) => {
  console.log(`Worker stopped (${event.data.reason}) after ${event.data.jobs_completed} jobs.`);
});

await worker.start();
console.log(`Worker ${worker.workerId} serving: ${worker.functionNames.join(', ')}`);

const shutdown = (): void => {
  worker
    .stop()
    .then(() => connection.close())
    .catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exitCode = 1;
    });
};

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);
