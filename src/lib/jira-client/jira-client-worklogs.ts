import { Effect, pipe } from 'effect';
import { JiraClientBase, type JiraError } from './jira-client-base.js';
import { type Worklog, WorklogsResponseSchema } from './jira-client-types.js';

export interface NewWorklog {
  timeSpent: string;
  /** yyyy-MM-ddTHH:mm:ss.SSS+hhmm */
  started?: string;
  comment?: string;
}

export class JiraClientWorklogs extends JiraClientBase {
  getWorklogsEffect(issueKey: string): Effect.Effect<readonly Worklog[], JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestJson({ method: 'GET', path: `/rest/api/2/issue/${key}/worklog` }, WorklogsResponseSchema),
      ),
      Effect.map((response) => response.worklogs),
    );
  }

  addWorklogEffect(issueKey: string, worklog: NewWorklog): Effect.Effect<void, JiraError> {
    const body: Record<string, string> = { timeSpent: worklog.timeSpent };
    if (worklog.started) body.started = worklog.started;
    if (worklog.comment) body.comment = worklog.comment;

    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestVoid({ method: 'POST', path: `/rest/api/2/issue/${key}/worklog`, body }),
      ),
    );
  }

  deleteWorklogEffect(issueKey: string, worklogId: string): Effect.Effect<void, JiraError> {
    return pipe(
      this.requireIssueKey(issueKey),
      Effect.flatMap((key) =>
        this.session.requestVoid({ method: 'DELETE', path: `/rest/api/2/issue/${key}/worklog/${worklogId}` }),
      ),
    );
  }
}
