/**
 * Issue types understood by the importer. Anything that is not an Epic is a
 * work item that may be linked under one.
 */
export const ISSUE_TYPES = ['Epic', 'Story', 'Task'] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];

/**
 * Jira priorities, highest first.
 */
export const PRIORITIES = ['Highest', 'High', 'Medium', 'Low', 'Lowest'] as const;

export type Priority = (typeof PRIORITIES)[number];

export const DEFAULT_PRIORITY: Priority = 'Medium';

export const DEFAULT_ISSUE_TYPE: IssueType = 'Story';

/**
 * A single testable statement attached to an issue.
 */
export interface AcceptanceCriterion {
  readonly description: string;
}

/**
 * A unit of work to be created in the ticketing system.
 *
 * `parent` and `dependencies` are raw free-text references; they are turned
 * into concrete keys by the resolver, never by the parsers.
 */
export interface Issue {
  readonly title: string;
  readonly description: string;
  readonly type: IssueType;
  readonly priority: Priority;
  readonly acceptanceCriteria: readonly AcceptanceCriterion[];
  readonly storyKey?: string;
  readonly businessOutcome?: string;
  readonly epicName?: string;
  /** Epic reference such as `PREP`, resolved against the epic mapping. */
  readonly parent?: string;
  /** Comma-delimited dependency references. */
  readonly dependencies?: string;
  readonly estimatedEffort?: string;
  readonly labels?: string;
}

/**
 * Fields accepted by {@link createIssue}. Only title and type are required.
 */
export interface IssueFields {
  title: string;
  type: IssueType;
  description?: string | null;
  priority?: Priority;
  acceptanceCriteria?: readonly (AcceptanceCriterion | string)[];
  storyKey?: string | null;
  businessOutcome?: string | null;
  epicName?: string | null;
  parent?: string | null;
  dependencies?: string | null;
  estimatedEffort?: string | null;
  labels?: string | null;
}

const OPTIONAL_TEXT_FIELDS = [
  'storyKey',
  'businessOutcome',
  'epicName',
  'parent',
  'dependencies',
  'estimatedEffort',
  'labels',
] as const;

type OptionalTextField = (typeof OPTIONAL_TEXT_FIELDS)[number];

function toCriterion(entry: AcceptanceCriterion | string): AcceptanceCriterion | null {
  const description = (typeof entry === 'string' ? entry : entry.description).trim();
  if (!description) {
    return null;
  }
  return Object.freeze({ description });
}

/**
 * Build an immutable Issue, applying defaults.
 *
 * Empty optional strings are dropped so that "absent" has a single
 * representation; acceptance criteria are always an array.
 */
export function createIssue(fields: IssueFields): Issue {
  const criteria: AcceptanceCriterion[] = [];
  for (const entry of fields.acceptanceCriteria ?? []) {
    const criterion = toCriterion(entry);
    if (criterion) {
      criteria.push(criterion);
    }
  }

  const optional: Partial<Record<OptionalTextField, string>> = {};
  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value = fields[field]?.trim();
    if (value) {
      optional[field] = value;
    }
  }

  return Object.freeze({
    title: fields.title.trim(),
    description: fields.description ?? '',
    type: fields.type,
    priority: fields.priority ?? DEFAULT_PRIORITY,
    acceptanceCriteria: Object.freeze(criteria),
    ...optional,
  });
}

/**
 * Return a new Issue with `changes` applied and every other field carried
 * forward. The original issue is left untouched.
 */
export function withIssueChanges(issue: Issue, changes: Partial<IssueFields>): Issue {
  return createIssue({ ...issue, ...changes });
}

const PRIORITY_LOOKUP = new Map<string, Priority>(
  PRIORITIES.map((p) => [p.toLowerCase(), p]),
);

const ISSUE_TYPE_LOOKUP = new Map<string, IssueType>(
  ISSUE_TYPES.map((t) => [t.toLowerCase(), t]),
);

/**
 * Map free text to a Priority. Case-insensitive; unknown input is Medium.
 */
export function parsePriority(text: string | null | undefined): Priority {
  if (!text) {
    return DEFAULT_PRIORITY;
  }
  return PRIORITY_LOOKUP.get(text.trim().toLowerCase()) ?? DEFAULT_PRIORITY;
}

/**
 * Map free text to an IssueType. Case-insensitive; unknown input is Story.
 */
export function parseIssueType(text: string | null | undefined): IssueType {
  if (!text) {
    return DEFAULT_ISSUE_TYPE;
  }
  return ISSUE_TYPE_LOOKUP.get(text.trim().toLowerCase()) ?? DEFAULT_ISSUE_TYPE;
}

export interface PartitionedIssues {
  epics: Issue[];
  /** Stories and tasks, in document order. */
  workItems: Issue[];
}

/**
 * Split a parsed document into epics and the work items that hang off them.
 */
export function partitionIssues(issues: readonly Issue[]): PartitionedIssues {
  const epics: Issue[] = [];
  const workItems: Issue[] = [];
  for (const issue of issues) {
    if (issue.type === 'Epic') {
      epics.push(issue);
    } else {
      workItems.push(issue);
    }
  }
  return { epics, workItems };
}
