import { describe, expect, it } from 'vitest';
import { makeWorklog } from '../../test/mocks/fake-jira.js';
import { ParseError } from '../errors.js';
import { isoToDisplayString } from '../utils/worklog-time.js';
import { parseWorklogText, worklogCollection, worklogRow } from './worklogs.js';

describe('worklog collection', () => {
  const afternoon = makeWorklog('11', '2024-03-05T14:30:00.000+0000', 3600, 'pairing');
  const morning = makeWorklog('10', '2024-03-05T09:00:00.000+0000', 1800, 'c'.repeat(100));

  it('shows time spent, a local start time and the comment', () => {
    expect(worklogRow(afternoon)).toEqual(['1h', isoToDisplayString('2024-03-05T14:30:00.000+0000'), 'pairing']);
  });

  it('cuts long comments', () => {
    expect(worklogRow(morning)[2]).toBe(`${'c'.repeat(87)}...`);
  });

  it('keeps the whole comment in editable text', () => {
    const edited = parseWorklogText(worklogCollection([morning]).toText());

    expect(edited).toEqual([
      { timeSpent: '30m', started: isoToDisplayString('2024-03-05T09:00:00.000+0000'), comment: 'c'.repeat(100) },
    ]);
  });

  it('orders by start time and sums time spent', () => {
    const collection = worklogCollection([afternoon, morning]);
    const lines = collection.render().split('\n');
    const footer = lines[lines.length - 2]
      .split('|')
      .slice(1, -1)
      .map((cell) => cell.trim());

    expect(collection.select(1).id).toBe('10');
    expect(footer).toEqual(['total', '1h30m', '', '']);
  });
});

describe('parseWorklogText', () => {
  it('reads edited entries', () => {
    const text = [
      '- timeSpent: 1h30m',
      '  started: Tue 03/05/2024 14:30:00 CET',
      '  comment: review',
      '- timeSpent: 45',
      '  started: 2024-03-05T09:00:00.000+0100',
      '  comment:',
    ].join('\n');

    expect(parseWorklogText(text)).toEqual([
      { timeSpent: '1h30m', started: 'Tue 03/05/2024 14:30:00 CET', comment: 'review' },
      { timeSpent: '45', started: '2024-03-05T09:00:00.000+0100', comment: '' },
    ]);
  });

  it('defaults a missing comment to empty', () => {
    expect(parseWorklogText('- timeSpent: 2h\n  started: 03/05/2024 10:00:00\n')).toEqual([
      { timeSpent: '2h', started: '03/05/2024 10:00:00', comment: '' },
    ]);
  });

  it('treats an emptied file as no worklogs', () => {
    expect(parseWorklogText('\n')).toEqual([]);
  });

  it('names the incomplete entry', () => {
    expect(() => parseWorklogText('- timeSpent: 1h\n')).toThrow(ParseError);
    expect(() => parseWorklogText('- timeSpent: 1h\n')).toThrow('Worklog 1 is incomplete');
  });
});
