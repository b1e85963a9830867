import type { Effect } from 'effect';
import { JiraClientBase, type JiraError } from './jira-client-base.js';

export class JiraClientUsers extends JiraClientBase {
  /**
   * The logged-in user's id (key, or name on servers without keys). Fetched once per session.
   */
  getCurrentUserIdEffect(): Effect.Effect<string, JiraError> {
    return this.session.currentUserId();
  }
}
