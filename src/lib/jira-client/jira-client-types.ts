import { Schema } from 'effect';

// Schema definitions for the parts of the tracker's payloads sprintdeck reads.
// Unknown properties are dropped on decode.

export const UserRefSchema = Schema.Struct({
  key: Schema.optional(Schema.String),
  name: Schema.String,
  displayName: Schema.optional(Schema.String),
});

export const ComponentRefSchema = Schema.Struct({
  id: Schema.optional(Schema.String),
  name: Schema.String,
});

export const TimeTrackingSchema = Schema.Struct({
  originalEstimate: Schema.optional(Schema.String),
  remainingEstimate: Schema.optional(Schema.String),
  timeSpent: Schema.optional(Schema.String),
  originalEstimateSeconds: Schema.optional(Schema.Number),
  remainingEstimateSeconds: Schema.optional(Schema.Number),
  timeSpentSeconds: Schema.optional(Schema.Number),
});

const NullableSeconds = Schema.optional(Schema.NullOr(Schema.Number));

export const IssueSchema = Schema.Struct({
  id: Schema.String,
  key: Schema.String,
  self: Schema.optional(Schema.String),
  fields: Schema.Struct({
    summary: Schema.String,
    description: Schema.optional(Schema.NullOr(Schema.String)),
    status: Schema.Struct({ id: Schema.optional(Schema.String), name: Schema.String }),
    components: Schema.optionalWith(Schema.Array(ComponentRefSchema), { default: () => [] }),
    labels: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
    timetracking: Schema.optional(TimeTrackingSchema),
    timespent: NullableSeconds,
    timeestimate: NullableSeconds,
    timeoriginalestimate: NullableSeconds,
    assignee: Schema.optional(Schema.NullOr(UserRefSchema)),
    issuetype: Schema.optional(Schema.Struct({ name: Schema.String })),
    project: Schema.optional(Schema.Struct({ id: Schema.String, key: Schema.String, name: Schema.String })),
  }),
});

export const SearchResultSchema = Schema.Struct({
  issues: Schema.Array(IssueSchema),
  startAt: Schema.Number,
  maxResults: Schema.Number,
  total: Schema.Number,
});

export const WorklogSchema = Schema.Struct({
  id: Schema.String,
  issueId: Schema.String,
  timeSpent: Schema.String,
  timeSpentSeconds: Schema.Number,
  started: Schema.String,
  comment: Schema.optionalWith(Schema.String, { default: () => '' }),
  author: Schema.optional(UserRefSchema),
});

export const WorklogsResponseSchema = Schema.Struct({
  startAt: Schema.Number,
  maxResults: Schema.Number,
  total: Schema.Number,
  worklogs: Schema.Array(WorklogSchema),
});

export const BoardSchema = Schema.Struct({
  id: Schema.Number,
  name: Schema.String,
  type: Schema.String,
});

export const BoardsResponseSchema = Schema.Struct({
  values: Schema.Array(BoardSchema),
  startAt: Schema.Number,
  maxResults: Schema.Number,
  isLast: Schema.optional(Schema.Boolean),
});

export const BoardConfigurationSchema = Schema.Struct({
  id: Schema.Number,
  filter: Schema.Struct({ id: Schema.String }),
});

export const FilterSchema = Schema.Struct({
  id: Schema.String,
  jql: Schema.String,
});

export const ProjectSchema = Schema.Struct({
  id: Schema.String,
  key: Schema.String,
  name: Schema.String,
});

export const SprintSchema = Schema.Struct({
  id: Schema.Number,
  name: Schema.String,
  state: Schema.String,
  startDate: Schema.optional(Schema.String),
  endDate: Schema.optional(Schema.String),
  originBoardId: Schema.optional(Schema.Number),
});

export const SprintsResponseSchema = Schema.Struct({
  values: Schema.Array(SprintSchema),
  startAt: Schema.Number,
  maxResults: Schema.Number,
  isLast: Schema.optional(Schema.Boolean),
});

export const ComponentSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
});

export const StatusSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
});

export const TransitionsResponseSchema = Schema.Struct({
  transitions: Schema.Array(
    Schema.Struct({
      id: Schema.String,
      name: Schema.String,
      to: Schema.optional(Schema.Struct({ name: Schema.String })),
    }),
  ),
});

export const CreatedIssueSchema = Schema.Struct({
  id: Schema.String,
  key: Schema.String,
});

export const LoginResponseSchema = Schema.Struct({
  session: Schema.Struct({ name: Schema.String, value: Schema.String }),
});

// Type definitions
export type UserRef = Schema.Schema.Type<typeof UserRefSchema>;
export type Issue = Schema.Schema.Type<typeof IssueSchema>;
export type SearchResult = Schema.Schema.Type<typeof SearchResultSchema>;
export type Worklog = Schema.Schema.Type<typeof WorklogSchema>;
export type Board = Schema.Schema.Type<typeof BoardSchema>;
export type Project = Schema.Schema.Type<typeof ProjectSchema>;
export type Sprint = Schema.Schema.Type<typeof SprintSchema>;
export type Component = Schema.Schema.Type<typeof ComponentSchema>;
export type Status = Schema.Schema.Type<typeof StatusSchema>;
export type Transition = Schema.Schema.Type<typeof TransitionsResponseSchema>['transitions'][number];

export type SprintState = 'active' | 'future' | 'closed';

// Standard fields to fetch for issues
export const ISSUE_FIELDS = [
  'summary',
  'description',
  'status',
  'components',
  'labels',
  'timetracking',
  'timespent',
  'timeestimate',
  'timeoriginalestimate',
  'assignee',
  'issuetype',
  'project',
];

export const isIssue = Schema.is(IssueSchema);
export const isWorklog = Schema.is(WorklogSchema);
