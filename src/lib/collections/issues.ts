import { type Issue, isIssue } from '../jira-client/jira-client-types.js';
import { friendlyWorklogTime } from '../utils/worklog-time.js';
import { ResourceCollection } from './resource-collection.js';

const SUMMARY_LIMIT = 50;

export const ISSUE_FIELD_NAMES = ['key', 'summary', 'component', 'label', 'status', 'timeSpent', 'timeLeft'] as const;

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit - 1)}...` : text;
}

export function issueRow(issue: Issue): string[] {
  const f = issue.fields;
  return [
    issue.key,
    truncate(f.summary, SUMMARY_LIMIT),
    f.components[0]?.name ?? '',
    f.labels.join(', '),
    f.status.name,
    friendlyWorklogTime(f.timespent),
    friendlyWorklogTime(f.timeestimate),
  ];
}

function issueTotals(issues: readonly Issue[]): string[] {
  const spent = issues.reduce((sum, issue) => sum + (issue.fields.timespent ?? 0), 0);
  const left = issues.reduce((sum, issue) => sum + (issue.fields.timeestimate ?? 0), 0);
  return ['', '', '', '', '', friendlyWorklogTime(spent), friendlyWorklogTime(left)];
}

/**
 * Issues sorted by status name, with time spent and time left summed in the totals row.
 */
export function issueCollection(issues: readonly Issue[]): ResourceCollection<Issue> {
  return new ResourceCollection(issues, {
    kind: 'issue',
    isEntry: isIssue,
    fieldNames: ISSUE_FIELD_NAMES,
    alignLeft: ['summary'],
    row: issueRow,
    totals: issueTotals,
    sortKey: (issue) => issue.fields.status.name,
  });
}
