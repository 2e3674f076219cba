/**
 * Page side of the binding bridge.
 *
 * `Runtime.addBinding` gives the page a fire-and-forget function that takes one
 * string. The shim below wraps it into an async function: each call gets a
 * sequence number, its resolve/reject are parked in `callbacks` / `errors` maps
 * on the wrapper, and the host later settles that sequence number with
 * bindingSettleScript().
 */
import type { BindingContext, BindingHandler } from './connection-state.js'
import { TransportClosedError, errorMessage } from './errors.js'
import { toJsonLiteral } from './utils.js'

export function bindingShimScript(name: string): string {
  const nameLiteral = JSON.stringify(name)
  return `(() => {
  const bindingName = ${nameLiteral};
  const binding = window[bindingName];
  window[bindingName] = async (...args) => {
    const me = window[bindingName];
    let callbacks = me['callbacks'];
    if (!callbacks) {
      callbacks = new Map();
      me['callbacks'] = callbacks;
    }
    let errors = me['errors'];
    if (!errors) {
      errors = new Map();
      me['errors'] = errors;
    }
    const seq = (me['lastSeq'] || 0) + 1;
    me['lastSeq'] = seq;
    const promise = new Promise((resolve, reject) => {
      callbacks.set(seq, resolve);
      errors.set(seq, reject);
    });
    binding(JSON.stringify({ name: bindingName, seq, args }));
    return promise;
  };
})()`
}

/** JSON literals for the page: `result` is any JSON value, `error` is a JSON string, `""` for none. */
export type BindingOutcome = {
  result: string
  error: string
}

export function bindingSettleScript({ name, seq, outcome }: { name: string; seq: number; outcome: BindingOutcome }): string {
  const nameLiteral = JSON.stringify(name)
  return `(() => {
  const me = window[${nameLiteral}];
  const seq = ${seq};
  const result = ${outcome.result};
  const error = ${outcome.error};
  if (error) {
    me['errors'].get(seq)(error);
  } else {
    me['callbacks'].get(seq)(result);
  }
  me['callbacks'].delete(seq);
  me['errors'].delete(seq);
})()`
}

function failure(error: unknown): BindingOutcome {
  const message = errorMessage(error) || 'Binding call failed'
  return { result: 'null', error: JSON.stringify(message) }
}

function rejectOnAbort(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let dispose = () => {}
  const promise = new Promise<never>((_, reject) => {
    const onAbort = () => {
      reject(new TransportClosedError('Connection closed while the binding call was running'))
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    dispose = () => signal.removeEventListener('abort', onAbort)
  })
  return { promise, dispose }
}

/**
 * Runs a handler and encodes what it produced for the settle script. Never
 * throws: thrown errors, rejections and values JSON cannot encode all become an
 * error message. Gives up early when the context's signal aborts.
 */
export async function runBindingHandler(
  handler: BindingHandler,
  args: unknown[],
  context: BindingContext,
): Promise<BindingOutcome> {
  const aborted = rejectOnAbort(context.signal)
  try {
    const value = await Promise.race([Promise.resolve().then(() => handler(args, context)), aborted.promise])
    return { result: toJsonLiteral(value), error: '""' }
  } catch (error) {
    return failure(error)
  } finally {
    aborted.dispose()
  }
}
