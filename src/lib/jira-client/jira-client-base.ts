import { Effect, pipe } from 'effect';
import { ValidationError } from '../errors.js';
import type { JiraSession, SessionError } from './session.js';

export type JiraError = SessionError | ValidationError;

export interface Page<A> {
  values: readonly A[];
  startAt: number;
  maxResults: number;
  isLast?: boolean;
}

export class JiraClientBase {
  constructor(protected readonly session: JiraSession) {}

  protected requireIssueKey(issueKey: string): Effect.Effect<string, ValidationError> {
    return /^[A-Za-z][A-Za-z0-9_]*-\d+$/.test(issueKey) || /^\d+$/.test(issueKey)
      ? Effect.succeed(issueKey)
      : Effect.fail(new ValidationError(`Invalid issue key: ${issueKey}`, 'issueKey', issueKey));
  }

  protected requireId(id: number, label: string): Effect.Effect<number, ValidationError> {
    return Number.isInteger(id) && id > 0
      ? Effect.succeed(id)
      : Effect.fail(new ValidationError(`${label} must be a positive number`, label, id));
  }

  /**
   * Fetch pages one after the other until the server reports the last one.
   */
  protected collectPages<A, E>(fetchPage: (startAt: number) => Effect.Effect<Page<A>, E>): Effect.Effect<A[], E> {
    const loop = (startAt: number, collected: A[]): Effect.Effect<A[], E> =>
      pipe(
        fetchPage(startAt),
        Effect.flatMap((page) => {
          const all = [...collected, ...page.values];
          const done = page.isLast ?? (page.values.length === 0 || page.values.length < page.maxResults);
          return done || page.values.length === 0 ? Effect.succeed(all) : loop(page.startAt + page.values.length, all);
        }),
      );
    return loop(0, []);
  }
}
