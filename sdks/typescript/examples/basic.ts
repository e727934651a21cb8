/**
 * Basic usage example for the jdb TypeScript client.
 *
 * This example demonstrates:
 * - Connecting to a server
 * - Putting, getting, appending and deleting keys
 * - Compare-and-swap
 * - Error handling
 *
 * It starts an ephemeral in-process server unless JDB_ENDPOINT is set.
 */

import {
  connect,
  createEphemeral,
  RemoteError,
  TransportError,
  type EphemeralJdb,
} from '../src/index';

async function main() {
  let ephemeral: EphemeralJdb | undefined;
  let endpoint = process.env.JDB_ENDPOINT;
  if (!endpoint) {
    ephemeral = await createEphemeral();
    endpoint = ephemeral.getEndpoint();
  }

  const client = connect(endpoint, 'example-client', { timeout: 2000 });

  try {
    // === Basic Put/Get/Delete ===

    console.log('\n=== Basic Operations ===');

    const put = await client.put('user:123', 'Alice');
    console.log(`Put succeeded with status ${put.status}:`, put.value);

    console.log(`Value: ${String(await client.get('user:123'))}`);

    await client.append('user:123', ' Smith');
    console.log(`After append: ${String(await client.get('user:123'))}`);

    // === Compare-and-swap ===

    console.log('\n=== Compare-and-swap ===');

    const swapped = await client.cas('user:123', 'Alice Smith', 'Bob');
    console.log(`CAS from 'Alice Smith' to 'Bob': ${swapped}`);

    const stale = await client.cas('user:123', 'Alice Smith', 'Carol');
    console.log(`CAS with a stale current value: ${stale}`);

    await client.delete('user:123');
    console.log(`After delete: ${String(await client.get('user:123'))}`);

    console.log(`\nIssued ${client.lastRequestId} requests`);
  } catch (err) {
    if (err instanceof RemoteError) {
      console.error('Server rejected the request:', err.toJSON());
    } else if (err instanceof TransportError) {
      console.error(`Request failed (${err.code}): ${err.message}`);
    } else {
      throw err;
    }
  } finally {
    await ephemeral?.stop();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
