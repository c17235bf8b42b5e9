/**
 * Database Worker Thread
 *
 * Runs sql.js operations off the main thread. Communicates with the main
 * thread through the RPC protocol.
 */

import { exposeOnPort } from './core/rpc';
import { createWorkerEndpoint } from './core/sqlite-db';
import { createParentPort, isMainThread } from './platform/threadPool';

if (isMainThread) {
  console.error('[DatabaseWorker] No parent port - invalid execution context');
} else {
  exposeOnPort(createWorkerEndpoint(), createParentPort());
  console.log('[DatabaseWorker] Ready for connections');
}
