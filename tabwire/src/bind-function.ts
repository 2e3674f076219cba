import type { BindingHandler } from './connection-state.js'
import { ArgumentMismatchError, ArgumentTypeError } from './errors.js'

/** Checks the decoded page arguments before they reach a typed function. */
export type ArgumentGuard<A extends unknown[]> = (args: unknown[]) => args is A

/**
 * Adapts a plain function to the binding handler contract. The page must pass
 * exactly `fn.length` arguments, and `guard` must accept them; they arrive
 * decoded from JSON and are handed to `fn` positionally.
 *
 * Functions with rest or default parameters report a shorter `length`; give
 * those a handler of their own.
 */
export function bindFunction<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  guard: ArgumentGuard<A>,
): BindingHandler {
  return async (args) => {
    if (args.length !== fn.length) {
      throw new ArgumentMismatchError({ expected: fn.length, received: args.length })
    }
    if (!guard(args)) {
      throw new ArgumentTypeError()
    }
    return await fn(...args)
  }
}
