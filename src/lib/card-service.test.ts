import { Effect } from 'effect';
import { beforeEach, describe, expect, it } from 'vitest';
import { FakeJira, makeIssue, makeWorklog } from '../test/mocks/fake-jira.js';
import { server } from '../test/setup-msw.js';
import { createTestShell } from '../test/test-helpers.js';
import { InvalidLabelError, NotFoundError, ValidationError } from './errors.js';
import { toTrackerTimestamp } from './utils/worklog-time.js';

let jira: FakeJira;

beforeEach(() => {
  jira = new FakeJira();
  server.use(...jira.handlers());
});

const writes = () =>
  jira.requests
    .filter((r) => r.method !== 'GET' && r.path !== '/rest/auth/1/session')
    .map((r) => `${r.method} ${r.path}`);

const bodyOf = (method: string, path: string) => jira.requestsTo(method, path)[0]?.body;

describe('CardService search', () => {
  it('searches my cards in the current sprint by default', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.buildSearchQuery({}))).toBe('sprint = 41 AND assignee = currentUser()');
  });

  it('adds assignee, status and quoted text clauses', async () => {
    const { cards } = createTestShell();

    const jql = await Effect.runPromise(
      cards.buildSearchQuery({
        assignee: 'alice',
        sprint: { name: 'Sprint 5', id: 40 },
        status: 'In Progress',
        text: 'say "hi"',
      }),
    );

    expect(jql).toBe(
      'sprint = 40 AND assignee = alice AND status in ("In Progress") AND ' +
        '(summary ~ "say \\"hi\\"" OR description ~ "say \\"hi\\"")',
    );
  });

  it('searches open backlog cards of the project', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.buildSearchQuery({ sprint: { backlog: true } }))).toBe(
      'project = 10000 AND issuetype != Epic AND resolution = Unresolved AND status != Done AND ' +
        '(Sprint = EMPTY OR Sprint not in (openSprints(), futureSprints())) AND assignee = currentUser()',
    );
  });

  it('resolves sprint and status text before searching', async () => {
    jira.searchResults = [makeIssue('PROJ-1')];
    const { cards } = createTestShell();

    const issues = await Effect.runPromise(cards.listIssues({ sprint: '5', status: 'inprogress' }));

    expect(issues.map((issue) => issue.key)).toEqual(['PROJ-1']);
    expect(jira.requestsTo('GET', '/rest/api/2/search')[0].query.get('jql')).toBe(
      'sprint = 40 AND assignee = currentUser() AND status in ("In Progress")',
    );
  });

  it('does not search for an unknown status', async () => {
    const { cards } = createTestShell();

    const error = await Effect.runPromise(Effect.flip(cards.listIssues({ status: 'blocked' })));

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Unable to find status: blocked');
    expect(jira.requestsTo('GET', '/rest/api/2/search')).toHaveLength(0);
  });
});

describe('CardService createIssue', () => {
  it('creates, assigns, then adds the card to the current sprint', async () => {
    const { cards } = createTestShell();

    const key = await Effect.runPromise(
      cards.createIssue({ summary: 'New thing', component: 'backend', labels: ['api'], assignee: 'alice', timeleft: '2h30m' }),
    );

    expect(key).toBe('PROJ-101');
    expect(writes()).toEqual([
      'POST /rest/api/2/issue',
      'PUT /rest/api/2/issue/PROJ-101/assignee',
      'POST /rest/agile/1.0/sprint/41/issue',
    ]);
    expect(bodyOf('POST', '/rest/api/2/issue')).toEqual({
      fields: {
        summary: 'New thing',
        components: [{ name: 'Backend' }],
        labels: ['api'],
        project: { id: '10000' },
        issuetype: { name: 'Task' },
        timetracking: { remainingEstimate: '2h 30m', originalEstimate: '2h 30m' },
      },
    });
    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-101/assignee')).toEqual({ name: 'alice' });
    expect(bodyOf('POST', '/rest/agile/1.0/sprint/41/issue')).toEqual({ issues: ['PROJ-101'] });
  });

  it('puts the card in the backlog on request', async () => {
    const { cards } = createTestShell();

    await Effect.runPromise(cards.createIssue({ summary: 'Later', sprint: 'backlog', issuetype: 'Bug' }));

    expect(writes()).toEqual(['POST /rest/api/2/issue', 'POST /rest/agile/1.0/backlog/issue']);
    expect(bodyOf('POST', '/rest/api/2/issue')).toEqual({
      fields: { summary: 'Later', project: { id: '10000' }, issuetype: { name: 'Bug' } },
    });
  });

  it('refuses labels the component does not allow unless forced', async () => {
    const { cards } = createTestShell();

    const error = await Effect.runPromise(
      Effect.flip(cards.createIssue({ summary: 'x', component: 'Backend', labels: ['ui'] })),
    );
    expect(error).toBeInstanceOf(InvalidLabelError);
    expect(writes()).toEqual([]);

    await Effect.runPromise(cards.createIssue({ summary: 'x', component: 'Backend', labels: ['ui'], forceLabels: true }));
    expect(writes()[0]).toBe('POST /rest/api/2/issue');
  });
});

describe('CardService estimates', () => {
  it('keeps the original estimate when setting time left', async () => {
    jira.addIssue(makeIssue('PROJ-1', { timetracking: { originalEstimate: '1d', remainingEstimate: '4h' } }));
    const { cards } = createTestShell();

    await Effect.runPromise(cards.editRemainingTime('PROJ-1', '3h'));

    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-1')).toEqual({
      fields: { timetracking: { remainingEstimate: '3h', originalEstimate: '1d' } },
    });
  });

  it('falls back to the original estimate in seconds', async () => {
    jira.addIssue(makeIssue('PROJ-2', { timeoriginalestimate: 5400 }));
    const { cards, entries } = createTestShell();

    await Effect.runPromise(cards.editRemainingTime('PROJ-2', '1h'));

    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-2')).toEqual({
      fields: { timetracking: { remainingEstimate: '1h', originalEstimate: '1h 30m' } },
    });
    expect(entries.filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'PROJ-2 has no time tracking field, using its original estimate in seconds',
    ]);
  });

  it('zeroes the time left of my finished cards', async () => {
    jira.searchResults = [jira.addIssue(makeIssue('PROJ-3', { timetracking: { originalEstimate: '2h' } }))];
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.zeroRemainingWorkDone())).toEqual(['PROJ-3']);
    expect(jira.requestsTo('GET', '/rest/api/2/search')[0].query.get('jql')).toBe(
      'sprint = 41 AND assignee = currentUser() AND status = "Done" AND remainingEstimate > 0',
    );
    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-3')).toEqual({
      fields: { timetracking: { remainingEstimate: '0', originalEstimate: '2h' } },
    });
  });
});

describe('CardService components and labels', () => {
  beforeEach(() => {
    jira.addIssue(makeIssue('PROJ-1', { components: [{ name: 'Backend' }], labels: ['api'] }));
  });

  it('sets the component by partial name', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.updateComponent('PROJ-1', 'front'))).toBe('Frontend');
    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-1')).toEqual({ fields: { components: [{ name: 'Frontend' }] } });
  });

  it('adds labels to the existing ones', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.addLabels('PROJ-1', ['db', 'api', '']))).toEqual(['api', 'db']);
    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-1')).toEqual({ fields: { labels: ['api', 'db'] } });
  });

  it('checks added labels against the first component', async () => {
    const { cards } = createTestShell();

    const error = await Effect.runPromise(Effect.flip(cards.addLabels('PROJ-1', ['ui'])));
    expect(error).toBeInstanceOf(InvalidLabelError);
    expect(jira.requestsTo('PUT', '/rest/api/2/issue/PROJ-1')).toHaveLength(0);

    expect(await Effect.runPromise(cards.addLabels('PROJ-1', ['ui'], true))).toEqual(['api', 'ui']);
  });

  it('removes labels regardless of case, down to none', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.removeLabels('PROJ-1', ['API']))).toEqual([]);
    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-1')).toEqual({ fields: { labels: [] } });
  });
});

describe('CardService status', () => {
  beforeEach(() => {
    jira.addIssue(makeIssue('PROJ-1', { timetracking: { originalEstimate: '1d' } }));
  });

  it('transitions by number and returns the status name', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.transition('PROJ-1', '2'))).toBe('In Progress');
    expect(bodyOf('POST', '/rest/api/2/issue/PROJ-1/transitions')).toEqual({ transition: { id: '31' } });
  });

  it('rejects a status the card cannot move to', async () => {
    const { cards } = createTestShell();

    const error = await Effect.runPromise(Effect.flip(cards.transition('PROJ-1', 'review')));
    expect(error.message).toBe('"review" is an invalid status for this issue');
  });

  it('zeroes the time left before closing', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.done('PROJ-1'))).toBe('Done');
    expect(writes()).toEqual(['PUT /rest/api/2/issue/PROJ-1', 'POST /rest/api/2/issue/PROJ-1/transitions']);
    expect(bodyOf('POST', '/rest/api/2/issue/PROJ-1/transitions')).toEqual({ transition: { id: '41' } });
  });
});

describe('CardService worklogs', () => {
  it('logs work with a tracker timestamp', async () => {
    const { cards } = createTestShell();
    const started = new Date(2024, 2, 5, 9, 0, 0);

    await Effect.runPromise(cards.logWork('PROJ-1', '1h30m', 'review', started));

    expect(bodyOf('POST', '/rest/api/2/issue/PROJ-1/worklog')).toEqual({
      timeSpent: '1h 30m',
      started: toTrackerTimestamp(started),
      comment: 'review',
    });
  });

  it('replaces every worklog with the edited ones', async () => {
    const { cards } = createTestShell();
    const existing = [
      makeWorklog('10', '2024-03-05T09:00:00.000+0000', 1800),
      makeWorklog('11', '2024-03-05T14:00:00.000+0000', 3600),
    ];

    await Effect.runPromise(
      cards.replaceWorklogs('PROJ-1', existing, [{ timeSpent: '1h', started: '03/05/2024 09:00:00', comment: 'merged' }]),
    );

    expect(writes()).toEqual([
      'DELETE /rest/api/2/issue/PROJ-1/worklog/10',
      'DELETE /rest/api/2/issue/PROJ-1/worklog/11',
      'POST /rest/api/2/issue/PROJ-1/worklog',
    ]);
    expect(bodyOf('POST', '/rest/api/2/issue/PROJ-1/worklog')).toEqual({
      timeSpent: '1h',
      started: toTrackerTimestamp(new Date(2024, 2, 5, 9, 0, 0)),
      comment: 'merged',
    });
  });

  it('deletes nothing when an edited start time is unreadable', async () => {
    const { cards } = createTestShell();

    const error = await Effect.runPromise(
      Effect.flip(
        cards.replaceWorklogs('PROJ-1', [makeWorklog('10', '2024-03-05T09:00:00.000+0000', 1800)], [
          { timeSpent: '1h', started: 'someday', comment: '' },
        ]),
      ),
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(writes()).toEqual([]);
  });

  it("collects today's and yesterday's worklogs of the listed cards", async () => {
    const now = new Date(2024, 2, 5, 18, 0, 0);
    const today = toTrackerTimestamp(new Date(2024, 2, 5, 9, 0, 0));
    const yesterday = toTrackerTimestamp(new Date(2024, 2, 4, 16, 0, 0));
    jira.worklogs.set('PROJ-1', [makeWorklog('1', today, 3600), makeWorklog('2', yesterday, 1800)]);
    jira.worklogs.set('PROJ-2', [makeWorklog('3', today, 900)]);
    const issues = [makeIssue('PROJ-1'), makeIssue('PROJ-2')];
    const { cards } = createTestShell();

    const todays = await Effect.runPromise(cards.todaysWorklogs(issues, now));
    const yesterdays = await Effect.runPromise(cards.yesterdaysWorklogs(issues, now));

    expect(todays.map((w) => w.id)).toEqual(['1', '3']);
    expect(yesterdays.map((w) => w.id)).toEqual(['2']);
  });
});

describe('CardService sprint moves', () => {
  it('pulls a card into the current sprint', async () => {
    const { cards } = createTestShell();

    expect(await Effect.runPromise(cards.pullIntoCurrentSprint('PROJ-1'))).toBe('Sprint 50');
    expect(bodyOf('POST', '/rest/agile/1.0/sprint/41/issue')).toEqual({ issues: ['PROJ-1'] });
  });

  it('moves a card to the backlog', async () => {
    const { cards } = createTestShell();

    await Effect.runPromise(cards.moveToBacklog('PROJ-1'));
    expect(bodyOf('POST', '/rest/agile/1.0/backlog/issue')).toEqual({ issues: ['PROJ-1'] });
  });

  it('unassigns with null and deletes cards', async () => {
    jira.addIssue(makeIssue('PROJ-1'));
    const { cards } = createTestShell();

    await Effect.runPromise(cards.assign('PROJ-1', null));
    await Effect.runPromise(cards.remove('PROJ-1'));

    expect(bodyOf('PUT', '/rest/api/2/issue/PROJ-1/assignee')).toEqual({ name: null });
    expect(jira.issues.has('PROJ-1')).toBe(false);
  });
});
