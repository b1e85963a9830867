import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors.js';
import { IssueFields } from './issue-fields.js';

describe('IssueFields', () => {
  it('builds a create payload', () => {
    const payload = new IssueFields()
      .summary('Fix login')
      .description('Users get logged out')
      .component('Backend')
      .labels(['api'])
      .assignee('tester')
      .issuetype('Bug')
      .project({ id: '10000' })
      .build();

    expect(payload).toEqual({
      fields: {
        summary: 'Fix login',
        description: 'Users get logged out',
        components: [{ name: 'Backend' }],
        labels: ['api'],
        assignee: { name: 'tester' },
        issuetype: { name: 'Bug' },
        project: { id: '10000' },
      },
    });
  });

  it('skips empty values', () => {
    const payload = new IssueFields()
      .summary('')
      .description(undefined)
      .component('')
      .labels(undefined)
      .labels([])
      .assignee(undefined)
      .build();

    expect(payload).toEqual({ fields: {} });
  });

  it('clears labels explicitly', () => {
    expect(new IssueFields().clearLabels().build()).toEqual({ fields: { labels: [] } });
  });

  it('rejects labels that are not a list of strings', () => {
    expect(() => new IssueFields().labels('api')).toThrow(ValidationError);
    expect(() => new IssueFields().labels(['api', 3])).toThrow('Labels must be a list of strings');
  });

  it('needs some way to name the project', () => {
    expect(() => new IssueFields().project({})).toThrow('A project needs a name, key or id');
    expect(new IssueFields().project({ key: 'PROJ', name: '' }).build()).toEqual({ fields: { project: { key: 'PROJ' } } });
  });

  it('writes both estimates in tracker form', () => {
    expect(new IssueFields().timetracking('2h30m', '1d').build()).toEqual({
      fields: { timetracking: { remainingEstimate: '2h 30m', originalEstimate: '1d' } },
    });
  });

  it('returns a copy from build', () => {
    const fields = new IssueFields().summary('First');
    const first = fields.build();
    fields.summary('Second');

    expect(first.fields.summary).toBe('First');
  });
});
