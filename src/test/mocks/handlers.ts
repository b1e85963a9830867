import { HttpResponse, http } from 'msw';

export const JIRA_URL = 'https://jira.test';

/**
 * Defaults for the bare login flow. Tests that touch the board install a `FakeJira` on top.
 */
export const handlers = [
  http.post(`${JIRA_URL}/rest/auth/1/session`, () =>
    HttpResponse.json({ session: { name: 'JSESSIONID', value: 'default-session' } }),
  ),

  http.get(`${JIRA_URL}/rest/api/2/myself`, () => HttpResponse.json({ key: 'tester', name: 'tester' })),
];
