import { Effect, pipe } from 'effect';
import type { IssueFieldsPayload } from '../issue-fields.js';
import { JiraClientBase, type JiraError } from './jira-client-base.js';
import {
  CreatedIssueSchema,
  ISSUE_FIELDS,
  type Issue,
  IssueSchema,
  SearchResultSchema,
  type Transition,
  TransitionsResponseSchema,
} from './jira-client-types.js';

const API = '/rest/api/2';
const PAGE_SIZE = 50;

export class JiraClientIssues extends JiraClientBase {
  getIssueEffect(issueKey: string): Effect.Effect<Issue, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestJson(
          { method: 'GET', path: `${API}/issue/${key}`, query: { fields: ISSUE_FIELDS.join(',') } },
          IssueSchema,
        ),
      ),
    );
  }

  /**
   * Run a JQL search and return every matching issue, fetching pages sequentially.
   */
  searchIssuesEffect(jql: string): Effect.Effect<Issue[], JiraError> {
    return this.collectPages((startAt) =>
      pipe(
        this.session.requestJson(
          {
            method: 'GET',
            path: `${API}/search`,
            query: { jql, startAt, maxResults: PAGE_SIZE, fields: ISSUE_FIELDS.join(',') },
          },
          SearchResultSchema,
        ),
        Effect.map((result) => ({
          values: result.issues,
          startAt: result.startAt,
          maxResults: result.maxResults,
          isLast: result.startAt + result.issues.length >= result.total,
        })),
      ),
    );
  }

  createIssueEffect(payload: { fields: IssueFieldsPayload }): Effect.Effect<string, JiraError> {
    return pipe(
      this.session.requestJson({ method: 'POST', path: `${API}/issue`, body: payload }, CreatedIssueSchema),
      Effect.map((created) => created.key),
    );
  }

  updateIssueEffect(issueKey: string, payload: { fields: IssueFieldsPayload }): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) => this.session.requestVoid({ method: 'PUT', path: `${API}/issue/${key}`, body: payload })),
    );
  }

  deleteIssueEffect(issueKey: string): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) => this.session.requestVoid({ method: 'DELETE', path: `${API}/issue/${key}` })),
    );
  }

  /**
   * Assign to a user by name, or unassign with `null`.
   */
  assignIssueEffect(issueKey: string, user: string | null): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestVoid({ method: 'PUT', path: `${API}/issue/${key}/assignee`, body: { name: user } }),
      ),
    );
  }

  getIssueTransitionsEffect(issueKey: string): Effect.Effect<readonly Transition[], JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestJson({ method: 'GET', path: `${API}/issue/${key}/transitions` }, TransitionsResponseSchema),
      ),
      Effect.map((response) => response.transitions),
    );
  }

  transitionIssueEffect(issueKey: string, transitionId: string): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestVoid({
          method: 'POST',
          path: `${API}/issue/${key}/transitions`,
          body: { transition: { id: transitionId } },
        }),
      ),
    );
  }
}
