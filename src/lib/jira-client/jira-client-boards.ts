import { Effect, pipe, Schema } from 'effect';
import { JiraClientBase, type JiraError } from './jira-client-base.js';
import {
  type Board,
  BoardConfigurationSchema,
  BoardsResponseSchema,
  type Component,
  ComponentSchema,
  FilterSchema,
  type Project,
  ProjectSchema,
  type Status,
  StatusSchema,
} from './jira-client-types.js';

/**
 * Boards plus the project-level metadata the resolver needs: projects, components, statuses.
 */
export class JiraClientBoards extends JiraClientBase {
  getBoardsEffect(): Effect.Effect<Board[], JiraError> {
    return this.collectPages((startAt) =>
      this.session.requestJson({ method: 'GET', path: '/rest/agile/1.0/board', query: { startAt } }, BoardsResponseSchema),
    );
  }

  /**
   * The JQL of the saved filter behind a board.
   */
  getBoardFilterQueryEffect(boardId: number): Effect.Effect<string, JiraError> {
    return pipe(
      this.requireId(boardId, 'boardId'),
      Effect.flatMap((id) =>
        this.session.requestJson(
          { method: 'GET', path: `/rest/agile/1.0/board/${id}/configuration` },
          BoardConfigurationSchema,
        ),
      ),
      Effect.flatMap((configuration) =>
        this.session.requestJson({ method: 'GET', path: `/rest/api/2/filter/${configuration.filter.id}` }, FilterSchema),
      ),
      Effect.map((filter) => filter.jql),
    );
  }

  getProjectsEffect(): Effect.Effect<readonly Project[], JiraError> {
    return this.session.requestJson({ method: 'GET', path: '/rest/api/2/project' }, Schema.Array(ProjectSchema));
  }

  getProjectComponentsEffect(projectId: string): Effect.Effect<readonly Component[], JiraError> {
    return this.session.requestJson(
      { method: 'GET', path: `/rest/api/2/project/${projectId}/components` },
      Schema.Array(ComponentSchema),
    );
  }

  getStatusesEffect(): Effect.Effect<readonly Status[], JiraError> {
    return this.session.requestJson({ method: 'GET', path: '/rest/api/2/status' }, Schema.Array(StatusSchema));
  }
}
