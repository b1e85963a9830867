import { Schema } from 'effect';
import type { WorklogEntry } from '../card-service.js';
import { ParseError } from '../errors.js';
import { isWorklog, type Worklog } from '../jira-client/jira-client-types.js';
import { friendlyWorklogTime, isoToDate, isoToDisplayString } from '../utils/worklog-time.js';
import { ResourceCollection } from './resource-collection.js';

const COMMENT_LIMIT = 88;

export function worklogRow(worklog: Worklog): string[] {
  const comment = worklog.comment.length > COMMENT_LIMIT ? `${worklog.comment.slice(0, COMMENT_LIMIT - 1)}...` : worklog.comment;
  return [friendlyWorklogTime(worklog.timeSpentSeconds), isoToDisplayString(worklog.started), comment];
}

// the editor gets the whole comment; edited text replaces the stored worklogs
function worklogTextRow(worklog: Worklog): string[] {
  return [friendlyWorklogTime(worklog.timeSpentSeconds), isoToDisplayString(worklog.started), worklog.comment];
}

/**
 * Worklogs in order of their start time, with time spent summed in the totals row.
 */
export function worklogCollection(worklogs: readonly Worklog[]): ResourceCollection<Worklog> {
  return new ResourceCollection(worklogs, {
    kind: 'worklog',
    isEntry: isWorklog,
    fieldNames: ['timeSpent', 'started', 'comment'],
    alignLeft: ['comment'],
    row: worklogRow,
    textRow: worklogTextRow,
    totals: (entries) => [friendlyWorklogTime(entries.reduce((sum, w) => sum + w.timeSpentSeconds, 0)), '', ''],
    sortKey: (worklog) => isoToDate(worklog.started).getTime(),
  });
}

const EditedWorklogSchema = Schema.Struct({
  timeSpent: Schema.Union(Schema.String, Schema.Number),
  started: Schema.String,
  comment: Schema.optionalWith(Schema.NullOr(Schema.String), { default: () => '' }),
});

/**
 * Read worklog text edited by the user back into entries to log.
 *
 * @throws ParseError when the text is not a list of worklog mappings
 */
export function parseWorklogText(text: string): WorklogEntry[] {
  return ResourceCollection.fromText(text).map((row, index) => {
    const decoded = Schema.decodeUnknownEither(EditedWorklogSchema)(row);
    if (decoded._tag === 'Left') {
      throw new ParseError(`Worklog ${index + 1} is incomplete: ${decoded.left.message}`, decoded.left);
    }
    const { timeSpent, started, comment } = decoded.right;
    return { timeSpent: String(timeSpent), started, comment: comment ?? '' };
  });
}
