import { ValidationError } from './errors.js';
import { sanitizeWorklogTime } from './utils/worklog-time.js';

export interface ProjectRef {
  id?: string;
  key?: string;
  name?: string;
}

export interface IssueFieldsPayload {
  summary?: string;
  description?: string;
  components?: { name: string }[];
  labels?: string[];
  assignee?: { name: string };
  issuetype?: { name: string };
  project?: ProjectRef;
  timetracking?: { remainingEstimate: string; originalEstimate: string };
}

/**
 * Builds the `fields` body for creating or updating an issue.
 * Every setter ignores empty values, so optional user input can be passed straight through.
 */
export class IssueFields {
  private readonly fields: IssueFieldsPayload = {};

  summary(summary: string | undefined): this {
    if (summary) this.fields.summary = summary;
    return this;
  }

  description(description: string | undefined): this {
    if (description) this.fields.description = description;
    return this;
  }

  component(component: string | undefined): this {
    if (component) this.fields.components = [{ name: component }];
    return this;
  }

  /**
   * @throws ValidationError when `labels` is not an array of strings
   */
  labels(labels: unknown): this {
    if (labels === undefined || labels === null) return this;
    if (!Array.isArray(labels) || !labels.every((label): label is string => typeof label === 'string')) {
      throw new ValidationError('Labels must be a list of strings', 'labels', labels);
    }
    if (labels.length > 0) this.fields.labels = [...labels];
    return this;
  }

  // An empty list is a no-op for labels(); removing the last label needs this.
  clearLabels(): this {
    this.fields.labels = [];
    return this;
  }

  assignee(name: string | undefined): this {
    if (name) this.fields.assignee = { name };
    return this;
  }

  issuetype(name: string | undefined): this {
    if (name) this.fields.issuetype = { name };
    return this;
  }

  /**
   * @throws ValidationError when none of name, key or id is given
   */
  project(ref: ProjectRef): this {
    const project: ProjectRef = {};
    if (ref.id) project.id = ref.id;
    if (ref.key) project.key = ref.key;
    if (ref.name) project.name = ref.name;
    if (Object.keys(project).length === 0) {
      throw new ValidationError('A project needs a name, key or id', 'project', ref);
    }
    this.fields.project = project;
    return this;
  }

  // Both estimates are always written; the tracker resets whichever one is left out.
  timetracking(remaining: string, original: string): this {
    this.fields.timetracking = {
      remainingEstimate: sanitizeWorklogTime(remaining),
      originalEstimate: sanitizeWorklogTime(original),
    };
    return this;
  }

  build(): { fields: IssueFieldsPayload } {
    return { fields: { ...this.fields } };
  }
}
