/**
 * Callable helpers
 */

import { toError } from "../errors";
import { failure, success } from "../types";
import type { SwarmCallable, SwarmFn, SwarmOutcome } from "../types";

/** Call either form of callable once */
export function invoke<R, T, E>(callable: SwarmCallable<R, T, E>, resource: R): Promise<SwarmOutcome<T, E>> {
  return typeof callable === "function" ? callable(resource) : callable.invoke(resource);
}

/**
 * Lift a throwing async function into a callable: resolved values become
 * success outcomes, rejections become error outcomes.
 *
 * @example
 * ```typescript
 * const fetchStatus = attempt(async (client: HttpClient) => {
 *   const res = await client.postJson(url, {}, body);
 *   return res.status;
 * });
 * ```
 */
export function attempt<R, T>(fn: (resource: R) => Promise<T>): SwarmFn<R, T, Error> {
  return async (resource) => {
    try {
      return success(await fn(resource));
    } catch (error) {
      return failure(toError(error));
    }
  };
}
