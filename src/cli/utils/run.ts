import { Cause, Effect, Exit } from 'effect';

/**
 * Run an effect and return its value, rejecting with the original failure rather than a fiber wrapper.
 */
export async function runEffect<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(effect);
  if (Exit.isSuccess(exit)) return exit.value;
  throw Cause.squash(exit.cause);
}
