import type { IssueFieldsPayload } from './issue-fields.js';
import { JiraClientBoards } from './jira-client/jira-client-boards.js';
import { JiraClientIssues } from './jira-client/jira-client-issues.js';
import { JiraClientSprints } from './jira-client/jira-client-sprints.js';
import type { SprintState } from './jira-client/jira-client-types.js';
import { JiraClientUsers } from './jira-client/jira-client-users.js';
import { JiraClientWorklogs, type NewWorklog } from './jira-client/jira-client-worklogs.js';
import { JiraSession, type SessionOptions } from './jira-client/session.js';

export * from './jira-client/jira-client-types.js';
export type { JiraError } from './jira-client/jira-client-base.js';
export type { NewWorklog } from './jira-client/jira-client-worklogs.js';
export { JiraSession, type SessionOptions, type SessionPrompter } from './jira-client/session.js';

/**
 * Composes the per-area clients over one shared session.
 */
export class JiraClient {
  readonly session: JiraSession;
  private issuesClient: JiraClientIssues;
  private worklogsClient: JiraClientWorklogs;
  private boardsClient: JiraClientBoards;
  private sprintsClient: JiraClientSprints;
  private usersClient: JiraClientUsers;

  constructor(sessionOrOptions: JiraSession | SessionOptions) {
    this.session = sessionOrOptions instanceof JiraSession ? sessionOrOptions : new JiraSession(sessionOrOptions);
    this.issuesClient = new JiraClientIssues(this.session);
    this.worklogsClient = new JiraClientWorklogs(this.session);
    this.boardsClient = new JiraClientBoards(this.session);
    this.sprintsClient = new JiraClientSprints(this.session);
    this.usersClient = new JiraClientUsers(this.session);
  }

  reset(): void {
    this.session.reset();
  }

  // ============= Issue Operations =============
  getIssueEffect(issueKey: string) {
    return this.issuesClient.getIssueEffect(issueKey);
  }

  searchIssuesEffect(jql: string) {
    return this.issuesClient.searchIssuesEffect(jql);
  }

  createIssueEffect(payload: { fields: IssueFieldsPayload }) {
    return this.issuesClient.createIssueEffect(payload);
  }

  updateIssueEffect(issueKey: string, payload: { fields: IssueFieldsPayload }) {
    return this.issuesClient.updateIssueEffect(issueKey, payload);
  }

  deleteIssueEffect(issueKey: string) {
    return this.issuesClient.deleteIssueEffect(issueKey);
  }

  assignIssueEffect(issueKey: string, user: string | null) {
    return this.issuesClient.assignIssueEffect(issueKey, user);
  }

  getIssueTransitionsEffect(issueKey: string) {
    return this.issuesClient.getIssueTransitionsEffect(issueKey);
  }

  transitionIssueEffect(issueKey: string, transitionId: string) {
    return this.issuesClient.transitionIssueEffect(issueKey, transitionId);
  }

  // ============= Worklog Operations =============
  getWorklogsEffect(issueKey: string) {
    return this.worklogsClient.getWorklogsEffect(issueKey);
  }

  addWorklogEffect(issueKey: string, worklog: NewWorklog) {
    return this.worklogsClient.addWorklogEffect(issueKey, worklog);
  }

  deleteWorklogEffect(issueKey: string, worklogId: string) {
    return this.worklogsClient.deleteWorklogEffect(issueKey, worklogId);
  }

  // ============= Board & Project Operations =============
  getBoardsEffect() {
    return this.boardsClient.getBoardsEffect();
  }

  getBoardFilterQueryEffect(boardId: number) {
    return this.boardsClient.getBoardFilterQueryEffect(boardId);
  }

  getProjectsEffect() {
    return this.boardsClient.getProjectsEffect();
  }

  getProjectComponentsEffect(projectId: string) {
    return this.boardsClient.getProjectComponentsEffect(projectId);
  }

  getStatusesEffect() {
    return this.boardsClient.getStatusesEffect();
  }

  // ============= Sprint Operations =============
  getBoardSprintsEffect(boardId: number, state?: SprintState) {
    return this.sprintsClient.getBoardSprintsEffect(boardId, state);
  }

  addIssuesToSprintEffect(sprintId: number, issueKeys: readonly string[]) {
    return this.sprintsClient.addIssuesToSprintEffect(sprintId, issueKeys);
  }

  moveIssuesToBacklogEffect(issueKeys: readonly string[]) {
    return this.sprintsClient.moveIssuesToBacklogEffect(issueKeys);
  }

  // ============= User Operations =============
  getCurrentUserIdEffect() {
    return this.usersClient.getCurrentUserIdEffect();
  }
}
