/**
 * Worker Thread APIs
 *
 * Adapts Node's worker_threads module to the message port shape used by
 * the RPC layer, on both sides of a worker boundary.
 */

import { Worker, isMainThread, parentPort } from 'worker_threads';
import type { MessagePort, WorkerOptions } from 'worker_threads';

import type { WorkerPort } from '../core/rpc';

/**
 * Port for the main thread's side of a worker, plus termination.
 */
export interface WorkerHandle extends WorkerPort {
  terminate(): Promise<number>;
  onExit(handler: (exitCode: number) => void): void;
}

/**
 * Spawn a worker thread running `scriptPath`.
 */
export function spawnWorker(scriptPath: string, options?: WorkerOptions): WorkerHandle {
  const worker = new Worker(scriptPath, options);
  return {
    postMessage(data: unknown): void {
      worker.postMessage(data);
    },
    on(event: 'message', handler: (data: unknown) => void): void {
      worker.on(event, handler);
    },
    onExit(handler: (exitCode: number) => void): void {
      worker.on('exit', handler);
    },
    terminate(): Promise<number> {
      return worker.terminate();
    }
  };
}

/**
 * Port for a worker thread talking to the thread that spawned it.
 */
export function createParentPort(): WorkerPort {
  if (!parentPort) {
    throw new Error('Not running in a worker thread');
  }
  return createPortAdapter(parentPort);
}

/**
 * Port over one end of a MessageChannel.
 */
export function createPortAdapter(port: MessagePort): WorkerPort {
  return {
    postMessage(data: unknown): void {
      port.postMessage(data);
    },
    on(event: 'message', handler: (data: unknown) => void): void {
      port.on(event, handler);
    }
  };
}

export { isMainThread };
