import { Effect, pipe } from 'effect';
import { JiraClientBase, type JiraError } from './jira-client-base.js';
import { type Sprint, type SprintState, SprintsResponseSchema } from './jira-client-types.js';

export class JiraClientSprints extends JiraClientBase {
  getBoardSprintsEffect(boardId: number, state?: SprintState): Effect.Effect<Sprint[], JiraError> {
    return pipe(
      this.requireId(boardId, 'boardId'),
      Effect.flatMap((id) =>
        this.collectPages((startAt) =>
          this.session.requestJson(
            { method: 'GET', path: `/rest/agile/1.0/board/${id}/sprint`, query: { startAt, state } },
            SprintsResponseSchema,
          ),
        ),
      ),
    );
  }

  addIssuesToSprintEffect(sprintId: number, issueKeys: readonly string[]): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireId(sprintId, 'sprintId'),
      Effect.flatMap((id) =>
        this.session.requestVoid({
          method: 'POST',
          path: `/rest/agile/1.0/sprint/${id}/issue`,
          body: { issues: issueKeys },
        }),
      ),
    );
  }

  moveIssuesToBacklogEffect(issueKeys: readonly string[]): Effect.Effect<void, JiraError> {
    return this.session.requestVoid({
      method: 'POST',
      path: '/rest/agile/1.0/backlog/issue',
      body: { issues: issueKeys },
    });
  }
}
