import { Effect, pipe } from 'effect';
import type { ComponentLabels, Config } from './config.js';
import { ConfigError, InvalidLabelError, NotFoundError } from './errors.js';
import type { JiraClient, JiraError, Status } from './jira-client.js';
import type { LoggingService } from './logging.js';

export interface BoardInfo {
  alias: string;
  id: number;
  name: string;
  /** JQL of the board's saved filter; absent when the filter cannot be read */
  filterQuery?: string;
}

export interface ProjectInfo {
  alias: string;
  id: string;
  key: string;
  name: string;
}

export interface SprintRef {
  name: string;
  id: number;
}

export type SprintTarget = SprintRef | { backlog: true };

export interface ComponentRef {
  name: string;
  id: string;
}

/**
 * A transition the issue can take right now, numbered for selection in the shell.
 */
export interface AvailableStatus {
  /** whitespace-free, lower-case form used for matching */
  name: string;
  id: string;
  friendlyName: string;
  localNum: number;
}

export type ResolverConfig = Pick<Config, 'board' | 'project' | 'labelCheck' | 'excludedTransitionMarker'>;

export const BACKLOG = 'backlog';

/**
 * "In Progress", "in progress" and "INPROGRESS" all become "inprogress".
 */
export function normalizeName(text: string): string {
  return text.replace(/\s+/g, '').toLowerCase();
}

export function isBacklog(target: SprintTarget): target is { backlog: true } {
  return 'backlog' in target;
}

const isNumeric = (text: string) => /^\d+$/.test(text);

/**
 * Turns what the user typed (sprint numbers, partial component names, status names) into
 * the tracker's ids. Board, project, status and current-sprint lookups are cached until `reload()`.
 */
export class DomainResolver {
  private readonly boards = new Map<string, BoardInfo>();
  private readonly projects = new Map<string, ProjectInfo>();
  private readonly currentSprints = new Map<number, SprintRef>();
  private statuses: readonly Status[] | undefined;
  private readonly labelsMap: ComponentLabels;
  private readonly logger: LoggingService;

  constructor(
    private readonly client: JiraClient,
    private readonly config: ResolverConfig,
    componentLabels: ComponentLabels,
    logger: LoggingService,
  ) {
    this.logger = logger.withModule('resolver');
    this.labelsMap = Object.fromEntries(
      Object.entries(componentLabels).map(([component, labels]) => [
        component.toLowerCase(),
        labels.map((label) => label.toLowerCase()),
      ]),
    );
  }

  get componentLabelsMap(): ComponentLabels {
    return this.labelsMap;
  }

  reload(): void {
    this.boards.clear();
    this.projects.clear();
    this.currentSprints.clear();
    this.statuses = undefined;
  }

  boardInfo(alias: string = this.config.board): Effect.Effect<BoardInfo, JiraError | ConfigError | NotFoundError> {
    const wanted = alias.trim().toLowerCase();
    if (!wanted) return Effect.fail(new ConfigError("Configuration has no 'board' defined"));

    const cached = this.boards.get(wanted);
    if (cached) return Effect.succeed(cached);

    return pipe(
      this.client.getBoardsEffect(),
      Effect.flatMap((boards) => {
        const board = boards.find((b) => b.name.toLowerCase() === wanted || String(b.id) === wanted);
        return board ? Effect.succeed(board) : Effect.fail(new NotFoundError(`Unable to find board '${alias}'`, 'board', alias));
      }),
      Effect.flatMap((board) =>
        pipe(
          this.boardFilterQuery(board.id),
          Effect.map((filterQuery): BoardInfo => ({ alias, id: board.id, name: board.name, filterQuery })),
        ),
      ),
      Effect.tap((info) => Effect.sync(() => this.boards.set(wanted, info))),
    );
  }

  // a filter shared with other teams may be hidden from this user; the board is still usable
  private boardFilterQuery(boardId: number): Effect.Effect<string | undefined> {
    return pipe(
      this.client.getBoardFilterQueryEffect(boardId),
      Effect.map((query): string | undefined => query),
      Effect.catchAll((error) =>
        Effect.as(this.logger.warn(`Cannot read the filter of board ${boardId}: ${error.message}`), undefined),
      ),
    );
  }

  projectInfo(alias: string = this.config.project): Effect.Effect<ProjectInfo, JiraError | ConfigError | NotFoundError> {
    const wanted = alias.trim().toLowerCase();
    if (!wanted) return Effect.fail(new ConfigError("Configuration has no 'project' defined"));

    const cached = this.projects.get(wanted);
    if (cached) return Effect.succeed(cached);

    return pipe(
      this.client.getProjectsEffect(),
      Effect.flatMap((projects) => {
        const project = projects.find((p) => [p.key.toLowerCase(), p.name.toLowerCase(), p.id].includes(wanted));
        return project
          ? Effect.succeed<ProjectInfo>({ alias, id: project.id, key: project.key, name: project.name })
          : Effect.fail(new NotFoundError(`Unable to find project '${alias}'`, 'project', alias));
      }),
      Effect.tap((info) => Effect.sync(() => this.projects.set(wanted, info))),
    );
  }

  /**
   * A number matches a standalone number in the sprint name ("5" finds "Sprint 5", not "Sprint 50").
   * Anything else is a case-insensitive substring of the name.
   */
  resolveSprint(text: string): Effect.Effect<SprintTarget, JiraError | ConfigError | NotFoundError> {
    const wanted = text.trim().toLowerCase();
    if (wanted === BACKLOG) return Effect.succeed({ backlog: true });

    return pipe(
      this.boardInfo(),
      Effect.flatMap((board) => this.client.getBoardSprintsEffect(board.id)),
      Effect.flatMap((sprints) => {
        const sprint = isNumeric(wanted)
          ? sprints.find((s) => s.name.split(/\s+/).some((token) => isNumeric(token) && token === wanted))
          : sprints.find((s) => s.name.toLowerCase().includes(wanted));
        return sprint
          ? Effect.succeed<SprintTarget>({ name: sprint.name, id: sprint.id })
          : Effect.fail(new NotFoundError(`Unable to find sprint with text: ${text}`, 'sprint', text));
      }),
    );
  }

  /**
   * The board's active sprint; when several are active the most recently created wins.
   */
  resolveCurrentSprint(boardId?: number): Effect.Effect<SprintRef, JiraError | ConfigError | NotFoundError> {
    return pipe(
      boardId === undefined ? Effect.map(this.boardInfo(), (board) => board.id) : Effect.succeed(boardId),
      Effect.flatMap((id) => {
        const cached = this.currentSprints.get(id);
        if (cached) return Effect.succeed(cached);

        return pipe(
          this.client.getBoardSprintsEffect(id, 'active'),
          Effect.flatMap((sprints) => {
            const active = sprints.filter((s) => s.state.toLowerCase() === 'active').sort((a, b) => a.id - b.id);
            const current = active.at(-1);
            return current
              ? Effect.succeed<SprintRef>({ name: current.name, id: current.id })
              : Effect.fail(new NotFoundError(`No active sprint on board ${id}`, 'sprint'));
          }),
          Effect.tap((sprint) => Effect.sync(() => this.currentSprints.set(id, sprint))),
        );
      }),
    );
  }

  /**
   * Exact name or id first, then a case-insensitive substring of the name.
   */
  resolveComponent(text: string): Effect.Effect<ComponentRef, JiraError | ConfigError | NotFoundError> {
    const wanted = text.trim().toLowerCase();

    return pipe(
      this.projectInfo(),
      Effect.flatMap((project) => this.client.getProjectComponentsEffect(project.id)),
      Effect.flatMap((components) => {
        const component =
          components.find((c) => c.name.toLowerCase() === wanted || c.id === wanted) ??
          (wanted ? components.find((c) => c.name.toLowerCase().includes(wanted)) : undefined);
        return component
          ? Effect.succeed<ComponentRef>({ name: component.name, id: component.id })
          : Effect.fail(new NotFoundError(`Unable to find component with text: ${text}`, 'component', text));
      }),
    );
  }

  /**
   * The tracker's spelling of a status name, or undefined when nothing matches.
   */
  resolveStatusName(text: string): Effect.Effect<string | undefined, JiraError> {
    const wanted = normalizeName(text);
    return pipe(
      this.allStatuses(),
      Effect.map((statuses) => statuses.find((s) => normalizeName(s.name) === wanted)?.name),
    );
  }

  /**
   * Transitions the issue can take, without the excluded ones, sorted by name and numbered from 1.
   */
  availableTransitions(issueKey: string): Effect.Effect<AvailableStatus[], JiraError> {
    const marker = this.config.excludedTransitionMarker;
    return pipe(
      this.client.getIssueTransitionsEffect(issueKey),
      Effect.map((transitions) =>
        transitions
          .filter((t) => !marker || !t.name.includes(marker))
          .map((t) => ({ name: normalizeName(t.name), id: t.id, friendlyName: t.name }))
          .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
          .map((status, index) => ({ ...status, localNum: index + 1 })),
      ),
    );
  }

  resolveStatusId(available: readonly AvailableStatus[], text: string): string | undefined {
    const wanted = normalizeName(text);
    const number = isNumeric(wanted) ? Number.parseInt(wanted, 10) : undefined;
    return available.find((s) => s.name === wanted || s.localNum === number)?.id;
  }

  /**
   * Fails on the first label not allowed for the component. Only applies when label checking
   * is on and the component has an entry in the labels file.
   */
  checkComponentLabels(
    component: string | undefined,
    labels: readonly string[] | undefined,
  ): Effect.Effect<void, InvalidLabelError> {
    if (!this.config.labelCheck || !component || !labels || labels.length === 0) return Effect.void;

    const allowed = this.labelsMap[component.toLowerCase()];
    if (!allowed) return Effect.void;

    const offending = labels.find((label) => !allowed.includes(label.toLowerCase()));
    return offending === undefined ? Effect.void : Effect.fail(new InvalidLabelError(component, offending));
  }

  private allStatuses(): Effect.Effect<readonly Status[], JiraError> {
    const cached = this.statuses;
    if (cached) return Effect.succeed(cached);
    return pipe(
      this.client.getStatusesEffect(),
      Effect.tap((statuses) =>
        Effect.sync(() => {
          this.statuses = statuses;
        }),
      ),
    );
  }
}
