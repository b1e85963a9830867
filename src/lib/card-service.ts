import { Effect, pipe } from 'effect';
import { type ConfigError, NotFoundError, type InvalidLabelError, ValidationError } from './errors.js';
import { IssueFields } from './issue-fields.js';
import type { Issue, JiraClient, JiraError, Worklog } from './jira-client.js';
import type { LoggingService } from './logging.js';
import { type ComponentRef, type DomainResolver, isBacklog, type SprintTarget } from './resolver.js';
import {
  displayStringToDate,
  friendlyWorklogTime,
  isoIsToday,
  isoIsYesterday,
  sanitizeWorklogTime,
  toTrackerTimestamp,
} from './utils/worklog-time.js';

export type CardError = JiraError | ConfigError | NotFoundError;

export interface IssueFilters {
  /** user id; the logged-in user when absent */
  assignee?: string;
  /** sprint name, number or "backlog"; the current sprint when absent */
  sprint?: string;
  /** status as typed, e.g. "inprogress" */
  status?: string;
  /** searched in summary and description */
  text?: string;
}

export interface SearchQuery {
  assignee?: string;
  sprint?: SprintTarget;
  status?: string;
  text?: string;
}

export interface NewIssue {
  summary: string;
  details?: string;
  component?: string;
  labels?: readonly string[];
  assignee?: string;
  /** sprint name, number or "backlog"; the current sprint when absent */
  sprint?: string;
  timeleft?: string;
  issuetype?: string;
  /** skip the component label check */
  forceLabels?: boolean;
}

export interface WorklogEntry {
  timeSpent: string;
  /** display string or ISO-8601 */
  started: string;
  comment: string;
}

const quote = (text: string) => text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');

/**
 * The card-level flows of the shell, composed from resolver lookups and client calls.
 * Remote calls are issued one after the other.
 */
export class CardService {
  private readonly logger: LoggingService;

  constructor(
    private readonly client: JiraClient,
    private readonly resolver: DomainResolver,
    logger: LoggingService,
  ) {
    this.logger = logger.withModule('cards');
  }

  /**
   * Build the search query for already-resolved filters.
   */
  buildSearchQuery(query: SearchQuery): Effect.Effect<string, CardError> {
    const target = query.sprint;
    const base: Effect.Effect<string, CardError> =
      target && isBacklog(target)
        ? Effect.map(
            this.resolver.projectInfo(),
            (project) =>
              `project = ${project.id} AND issuetype != Epic AND resolution = Unresolved AND status != Done AND ` +
              '(Sprint = EMPTY OR Sprint not in (openSprints(), futureSprints()))',
          )
        : target
          ? Effect.succeed(`sprint = ${target.id}`)
          : Effect.map(this.resolver.resolveCurrentSprint(), (sprint) => `sprint = ${sprint.id}`);

    return Effect.map(base, (jql) => {
      let result = `${jql} AND assignee = ${query.assignee || 'currentUser()'}`;
      if (query.status) result += ` AND status in ("${quote(query.status)}")`;
      if (query.text) {
        const text = quote(query.text);
        result += ` AND (summary ~ "${text}" OR description ~ "${text}")`;
      }
      return result;
    });
  }

  searchIssues(query: SearchQuery): Effect.Effect<Issue[], CardError> {
    return pipe(
      this.buildSearchQuery(query),
      Effect.tap((jql) => this.logger.debug(`Searching: ${jql}`)),
      Effect.flatMap((jql) => this.client.searchIssuesEffect(jql)),
    );
  }

  /**
   * Resolve the sprint and status text, then search. Nothing is searched when either is unknown.
   */
  listIssues(filters: IssueFilters = {}): Effect.Effect<Issue[], CardError> {
    const sprint: Effect.Effect<SprintTarget | undefined, CardError> = filters.sprint
      ? this.resolver.resolveSprint(filters.sprint)
      : Effect.succeed(undefined);
    const status: Effect.Effect<string | undefined, CardError> = filters.status
      ? this.requireStatusName(filters.status)
      : Effect.succeed(undefined);

    return pipe(
      Effect.all({ sprint, status }),
      Effect.flatMap(({ sprint, status }) =>
        this.searchIssues({ assignee: filters.assignee, sprint, status, text: filters.text }),
      ),
    );
  }

  getIssue(issueKey: string): Effect.Effect<Issue, JiraError> {
    return this.client.getIssueEffect(issueKey);
  }

  /**
   * Create the issue, assign it, then put it into its sprint (or the backlog). Returns the new key.
   */
  createIssue(input: NewIssue): Effect.Effect<string, CardError | InvalidLabelError | ValidationError> {
    return pipe(
      // reject malformed labels before anything goes over the wire
      Effect.try({
        try: () => new IssueFields().labels(input.labels),
        catch: (error) =>
          error instanceof ValidationError ? error : new ValidationError(`Invalid labels: ${error}`, 'labels', input.labels),
      }),
      Effect.flatMap(() =>
        input.sprint
          ? this.resolver.resolveSprint(input.sprint)
          : Effect.map(this.resolver.resolveCurrentSprint(), (sprint): SprintTarget => sprint),
      ),
      Effect.tap(() =>
        input.forceLabels ? Effect.void : this.resolver.checkComponentLabels(input.component, input.labels),
      ),
      Effect.flatMap((sprint) =>
        pipe(
          Effect.all({ component: this.optionalComponent(input.component), project: this.resolver.projectInfo() }),
          Effect.flatMap(({ component, project }) =>
            Effect.try({
              try: () => {
                const fields = new IssueFields()
                  .summary(input.summary)
                  .description(input.details)
                  .component(component?.name)
                  .labels(input.labels)
                  .project({ id: project.id })
                  .issuetype(input.issuetype || 'Task');
                if (input.timeleft) fields.timetracking(input.timeleft, input.timeleft);
                return fields.build();
              },
              catch: (error) =>
                error instanceof ValidationError ? error : new ValidationError(`Invalid issue fields: ${error}`),
            }),
          ),
          Effect.flatMap((payload) => this.client.createIssueEffect(payload)),
          Effect.tap((key) => this.logger.info(`Created ${key}`)),
          Effect.tap((key) => (input.assignee ? this.client.assignIssueEffect(key, input.assignee) : Effect.void)),
          Effect.tap((key) =>
            isBacklog(sprint)
              ? this.client.moveIssuesToBacklogEffect([key])
              : this.client.addIssuesToSprintEffect(sprint.id, [key]),
          ),
        ),
      ),
    );
  }

  /**
   * Set the remaining estimate. The issue is reloaded first so its original estimate is written back unchanged.
   */
  editRemainingTime(issueKey: string, time: string): Effect.Effect<void, JiraError | ValidationError> {
    return pipe(
      this.client.getIssueEffect(issueKey),
      Effect.flatMap((issue) => this.originalEstimate(issue)),
      Effect.map((original) => new IssueFields().timetracking(time, original).build()),
      Effect.flatMap((payload) => this.client.updateIssueEffect(issueKey, payload)),
    );
  }

  zeroRemainingTime(issueKey: string): Effect.Effect<void, JiraError | ValidationError> {
    return this.editRemainingTime(issueKey, '0');
  }

  /**
   * Zero the estimate of my Done issues in the current sprint that still have time left.
   */
  zeroRemainingWorkDone(): Effect.Effect<string[], CardError | ValidationError> {
    return pipe(
      this.resolver.resolveCurrentSprint(),
      Effect.flatMap((sprint) =>
        this.client.searchIssuesEffect(
          `sprint = ${sprint.id} AND assignee = currentUser() AND status = "Done" AND remainingEstimate > 0`,
        ),
      ),
      Effect.flatMap((issues) =>
        Effect.forEach(issues, (issue) => Effect.as(this.zeroRemainingTime(issue.key), issue.key)),
      ),
    );
  }

  updateComponent(issueKey: string, text: string): Effect.Effect<string, CardError> {
    return pipe(
      this.resolver.resolveComponent(text),
      Effect.tap((component) =>
        this.client.updateIssueEffect(issueKey, new IssueFields().component(component.name).build()),
      ),
      Effect.map((component) => component.name),
    );
  }

  /**
   * Replace the issue's labels, checked against its first component unless forced.
   */
  updateLabels(
    issue: Issue,
    labels: readonly string[],
    force = false,
  ): Effect.Effect<void, JiraError | InvalidLabelError | ValidationError> {
    return pipe(
      force ? Effect.void : this.resolver.checkComponentLabels(issue.fields.components[0]?.name, labels),
      Effect.flatMap(() => this.writeLabels(issue.key, labels)),
    );
  }

  /**
   * Reload the issue and add labels to the ones it has. Returns the new label set.
   */
  addLabels(
    issueKey: string,
    labels: readonly string[],
    force = false,
  ): Effect.Effect<string[], JiraError | InvalidLabelError | ValidationError> {
    return pipe(
      this.client.getIssueEffect(issueKey),
      Effect.flatMap((issue) => {
        const updated = [...new Set([...issue.fields.labels, ...labels.filter((label) => label.length > 0)])];
        return Effect.as(this.updateLabels(issue, updated, force), updated);
      }),
    );
  }

  removeLabels(issueKey: string, labels: readonly string[]): Effect.Effect<string[], JiraError | ValidationError> {
    const unwanted = new Set(labels.map((label) => label.toLowerCase()));
    return pipe(
      this.client.getIssueEffect(issueKey),
      Effect.flatMap((issue) => {
        const remaining = issue.fields.labels.filter((label) => !unwanted.has(label.toLowerCase()));
        return Effect.as(this.writeLabels(issue.key, remaining), remaining);
      }),
    );
  }

  /**
   * Move the issue along a transition picked by name or by its number in `availableTransitions`.
   * Returns the transition's display name.
   */
  transition(issueKey: string, text: string): Effect.Effect<string, JiraError | NotFoundError> {
    return pipe(
      this.resolver.availableTransitions(issueKey),
      Effect.flatMap((available) => {
        const id = this.resolver.resolveStatusId(available, text);
        const status = available.find((s) => s.id === id);
        return status
          ? Effect.as(this.client.transitionIssueEffect(issueKey, status.id), status.friendlyName)
          : Effect.fail(new NotFoundError(`"${text}" is an invalid status for this issue`, 'status', text));
      }),
    );
  }

  /**
   * Zero the remaining estimate, then transition to Done.
   */
  done(issueKey: string): Effect.Effect<string, JiraError | NotFoundError | ValidationError> {
    return pipe(
      this.zeroRemainingTime(issueKey),
      Effect.flatMap(() => this.transition(issueKey, 'done')),
    );
  }

  worklogsFor(issueKey: string): Effect.Effect<readonly Worklog[], JiraError> {
    return this.client.getWorklogsEffect(issueKey);
  }

  logWork(issueKey: string, time: string, comment: string, started?: Date): Effect.Effect<void, JiraError> {
    return this.client.addWorklogEffect(issueKey, {
      timeSpent: sanitizeWorklogTime(time),
      comment,
      started: started ? toTrackerTimestamp(started) : undefined,
    });
  }

  /**
   * Delete every existing worklog of the issue, then add the edited entries.
   * The shell confirms with the user before calling this.
   */
  replaceWorklogs(
    issueKey: string,
    existing: readonly Worklog[],
    edited: readonly WorklogEntry[],
  ): Effect.Effect<void, JiraError | ValidationError> {
    return pipe(
      Effect.try({
        try: () => edited.map((entry) => ({ ...entry, started: displayStringToDate(entry.started) })),
        catch: (error) => new ValidationError(`Invalid worklog start time: ${error}`, 'started'),
      }),
      Effect.tap(() => this.logger.info('Deleting old worklog entries')),
      Effect.tap(() => Effect.forEach(existing, (worklog) => this.client.deleteWorklogEffect(issueKey, worklog.id))),
      Effect.tap(() => this.logger.info('Creating new worklog entries')),
      Effect.flatMap((entries) =>
        Effect.forEach(entries, (entry) => this.logWork(issueKey, entry.timeSpent, entry.comment, entry.started)),
      ),
      Effect.asVoid,
    );
  }

  /**
   * Worklogs of the given issues that were started today (local time).
   */
  todaysWorklogs(issues: readonly Issue[], now: Date = new Date()): Effect.Effect<Worklog[], JiraError> {
    return this.worklogsStartedOn(issues, (started) => isoIsToday(started, now));
  }

  yesterdaysWorklogs(issues: readonly Issue[], now: Date = new Date()): Effect.Effect<Worklog[], JiraError> {
    return this.worklogsStartedOn(issues, (started) => isoIsYesterday(started, now));
  }

  moveToBacklog(issueKey: string): Effect.Effect<void, JiraError> {
    return this.client.moveIssuesToBacklogEffect([issueKey]);
  }

  /**
   * Add the issue to the board's current sprint. Returns the sprint name.
   */
  pullIntoCurrentSprint(issueKey: string): Effect.Effect<string, CardError> {
    return pipe(
      this.resolver.resolveCurrentSprint(),
      Effect.tap((sprint) => this.client.addIssuesToSprintEffect(sprint.id, [issueKey])),
      Effect.map((sprint) => sprint.name),
    );
  }

  /**
   * Assign to a user id, or unassign with null.
   */
  assign(issueKey: string, user: string | null): Effect.Effect<void, JiraError> {
    return this.client.assignIssueEffect(issueKey, user);
  }

  remove(issueKey: string): Effect.Effect<void, JiraError> {
    return this.client.deleteIssueEffect(issueKey);
  }

  private optionalComponent(text: string | undefined): Effect.Effect<ComponentRef | undefined, CardError> {
    return text ? this.resolver.resolveComponent(text) : Effect.succeed(undefined);
  }

  private requireStatusName(text: string): Effect.Effect<string, JiraError | NotFoundError> {
    return pipe(
      this.resolver.resolveStatusName(text),
      Effect.flatMap((name) =>
        name ? Effect.succeed(name) : Effect.fail(new NotFoundError(`Unable to find status: ${text}`, 'status', text)),
      ),
    );
  }

  private writeLabels(issueKey: string, labels: readonly string[]): Effect.Effect<void, JiraError | ValidationError> {
    return pipe(
      Effect.try({
        try: () => (labels.length > 0 ? new IssueFields().labels(labels) : new IssueFields().clearLabels()).build(),
        catch: (error) =>
          error instanceof ValidationError ? error : new ValidationError(`Invalid labels: ${error}`, 'labels', labels),
      }),
      Effect.flatMap((payload) => this.client.updateIssueEffect(issueKey, payload)),
    );
  }

  private originalEstimate(issue: Issue): Effect.Effect<string> {
    const original = issue.fields.timetracking?.originalEstimate;
    if (original) return Effect.succeed(original);
    return Effect.as(
      this.logger.warn(`${issue.key} has no time tracking field, using its original estimate in seconds`),
      friendlyWorklogTime(issue.fields.timeoriginalestimate),
    );
  }

  private worklogsStartedOn(
    issues: readonly Issue[],
    matches: (started: string) => boolean,
  ): Effect.Effect<Worklog[], JiraError> {
    return pipe(
      Effect.forEach(issues, (issue) => this.client.getWorklogsEffect(issue.key)),
      Effect.map((perIssue) => perIssue.flat().filter((worklog) => matches(worklog.started))),
    );
  }
}
