/**
 * Example: submitting jobs with GearmanClient.
 *
 * Demonstrates a foreground submission that waits for the result, a
 * background submission, and a status query.
 */

import { GearmanClient, GearmanJobFailedError, connect } from '../src/index.js';

const connection = await connect({ host: 'localhost' });
const client = new GearmanClient(connection);

// --- Foreground: wait for the result ---
try {
  const result = await client.submit('upper', 'hello world');
  console.log(`Result: ${result.workData.toString('utf8')}`);
} catch (error) {
  if (!(error instanceof GearmanJobFailedError)) throw error;
  console.log(`Job failed: ${error.exception ?? 'no exception reported'}`);
}

// --- Background: fire and forget ---
const handle = await client.submitBackground('upper.lines', 'one\ntwo\nthree', {
  priority: 'low',
  uniqueId: 'lines-batch-1',
});
console.log(`Queued background job ${handle}`);

// --- Status ---
const status = await client.getStatus(handle);
console.log(
  `Job ${status.handle}: known=${status.known} running=${status.running} ` +
    `(${status.numerator}/${status.denominator})`,
);

connection.close();
