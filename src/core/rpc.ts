/**
 * Inter-Thread Communication Module
 *
 * Request/response protocol over postMessage between the main thread and
 * the database worker thread. Each connection tracks its own pending
 * invocations.
 */

// ============================================================================
// Message Protocol Types
// ============================================================================

/**
 * Unique identifier for tracking message exchanges.
 */
type MessageCorrelationId = string;

/**
 * Outgoing invocation request.
 */
export interface InvocationEnvelope {
  readonly kind: 'invoke';
  readonly correlationId: MessageCorrelationId;
  readonly methodName: string;
  readonly parameters: unknown[];
}

/**
 * Incoming response to a prior invocation.
 */
export interface ResponseEnvelope {
  readonly kind: 'result';
  readonly correlationId: MessageCorrelationId;
  readonly payload?: unknown;
  readonly errorText?: string;
}

/**
 * Union of all protocol message types.
 */
export type ProtocolEnvelope = InvocationEnvelope | ResponseEnvelope;

/**
 * Default timeout for remote invocations (30 seconds).
 */
const INVOCATION_TIMEOUT_MS = 30000;

/**
 * Local method implementations exposed to the remote side.
 */
export type MethodImplementations = Record<string, (...args: never[]) => unknown>;

/**
 * Remote view of an interface: every method returns a promise.
 */
export type RemoteMethods<T> = {
  [K in keyof T]: T[K] extends (...args: infer A) => infer R ? (...args: A) => Promise<Awaited<R>> : never;
};

function isProtocolEnvelope(value: unknown): value is ProtocolEnvelope {
  if (!value || typeof value !== 'object' || !('kind' in value)) return false;
  const { kind } = value;
  return kind === 'invoke' || kind === 'result';
}

// ============================================================================
// Invocation Tracking
// ============================================================================

interface PendingInvocation {
  readonly onComplete: (value: unknown) => void;
  readonly onFault: (error: Error) => void;
  readonly expirationTimer: ReturnType<typeof setTimeout>;
}

/**
 * Pending invocations of one connection, keyed by correlation ID.
 */
export class InvocationTracker {
  private readonly pending = new Map<MessageCorrelationId, PendingInvocation>();
  private counter = 0;

  get size(): number {
    return this.pending.size;
  }

  /**
   * Generate a unique correlation ID.
   */
  nextId(): MessageCorrelationId {
    const timestamp = Date.now().toString(36);
    const sequence = (++this.counter).toString(36);
    return `ipc_${timestamp}_${sequence}`;
  }

  register(id: MessageCorrelationId, invocation: PendingInvocation): void {
    this.pending.set(id, invocation);
  }

  /**
   * Settle a pending invocation from its response.
   *
   * @returns false if nothing was waiting for this response
   */
  settle(response: ResponseEnvelope): boolean {
    const invocation = this.pending.get(response.correlationId);
    if (!invocation) return false;

    clearTimeout(invocation.expirationTimer);
    this.pending.delete(response.correlationId);

    if (response.errorText !== undefined) {
      invocation.onFault(new Error(response.errorText));
    } else {
      invocation.onComplete(response.payload);
    }
    return true;
  }

  /**
   * Fail every pending invocation, e.g. when the worker exits.
   */
  rejectAll(reason: string): void {
    for (const [id, invocation] of this.pending) {
      clearTimeout(invocation.expirationTimer);
      this.pending.delete(id);
      invocation.onFault(new Error(reason));
    }
  }
}

// ============================================================================
// Proxy Factory
// ============================================================================

/**
 * Dispatcher function type for sending messages.
 */
type MessageDispatcher = (envelope: ProtocolEnvelope) => void;

/**
 * Build a proxy object that forwards method calls to a remote context.
 *
 * Each method on the proxy returns a Promise that settles when the
 * remote handler responds, or rejects after `timeoutMs`.
 *
 * @param dispatcher - Function to send messages to the remote context
 * @param tracker - Pending invocations of this connection
 * @param methodNames - Methods to expose on the proxy
 * @param timeoutMs - Timeout for each invocation
 */
export function buildMethodProxy<T extends object>(
  dispatcher: MessageDispatcher,
  tracker: InvocationTracker,
  methodNames: readonly (keyof T & string)[],
  timeoutMs: number = INVOCATION_TIMEOUT_MS
): RemoteMethods<T> {
  const proxyObject: Record<string, (...parameters: unknown[]) => Promise<unknown>> = {};

  for (const methodName of methodNames) {
    proxyObject[methodName] = (...parameters: unknown[]) => {
      return new Promise((resolve, reject) => {
        const correlationId = tracker.nextId();

        const expirationTimer = setTimeout(() => {
          tracker.settle({
            kind: 'result',
            correlationId,
            errorText: `Invocation timeout: ${methodName}`
          });
        }, timeoutMs);

        tracker.register(correlationId, {
          onComplete: resolve,
          onFault: reject,
          expirationTimer
        });

        dispatcher({
          kind: 'invoke',
          correlationId,
          methodName,
          parameters
        });
      });
    };
  }

  // The record carries exactly the requested method names
  return proxyObject as RemoteMethods<T>;
}

// ============================================================================
// Message Processing
// ============================================================================

/**
 * Response dispatcher type.
 */
type ResponseDispatcher = (response: ResponseEnvelope) => void;

/**
 * Process an incoming invocation: run the local method and send its
 * result (or error text) back.
 *
 * @returns true if the envelope was an invocation
 */
export function serveInvocation(
  envelope: unknown,
  localMethods: MethodImplementations,
  sendResponse: ResponseDispatcher
): boolean {
  if (!isProtocolEnvelope(envelope) || envelope.kind !== 'invoke') return false;

  const { correlationId, methodName, parameters } = envelope;

  // Only own properties are callable; inherited names such as
  // 'constructor' or '__proto__' are unknown methods.
  const implementation = Object.prototype.hasOwnProperty.call(localMethods, methodName)
    ? localMethods[methodName]
    : undefined;

  if (typeof implementation !== 'function') {
    sendResponse({
      kind: 'result',
      correlationId,
      errorText: `Unknown method: ${methodName}`
    });
    return true;
  }

  Promise.resolve()
    .then(() => Reflect.apply(implementation, localMethods, parameters))
    .then(result => {
      sendResponse({
        kind: 'result',
        correlationId,
        payload: result
      });
    })
    .catch((err: unknown) => {
      sendResponse({
        kind: 'result',
        correlationId,
        errorText: err instanceof Error ? err.message : String(err)
      });
    });

  return true;
}

/**
 * Process an incoming response for one of this connection's invocations.
 *
 * @returns true if the envelope was a response
 */
export function processResponse(envelope: unknown, tracker: InvocationTracker): boolean {
  if (!isProtocolEnvelope(envelope) || envelope.kind !== 'result') return false;
  tracker.settle(envelope);
  return true;
}

// ============================================================================
// Port Helpers
// ============================================================================

/**
 * Worker-like interface for message passing.
 */
export interface WorkerPort {
  postMessage(data: unknown): void;
  on(event: 'message', handler: (data: unknown) => void): void;
}

/**
 * Create a method proxy for communicating with a worker thread.
 */
export function connectWorkerPort<T extends object>(
  port: WorkerPort,
  methodNames: readonly (keyof T & string)[],
  timeoutMs?: number
): { proxy: RemoteMethods<T>; tracker: InvocationTracker } {
  const tracker = new InvocationTracker();

  port.on('message', data => {
    processResponse(data, tracker);
  });

  const proxy = buildMethodProxy<T>(envelope => port.postMessage(envelope), tracker, methodNames, timeoutMs);
  return { proxy, tracker };
}

/**
 * Serve local methods to the other end of a port.
 */
export function exposeOnPort(localMethods: MethodImplementations, port: WorkerPort): void {
  port.on('message', data => {
    serveInvocation(data, localMethods, response => port.postMessage(response));
  });
}
