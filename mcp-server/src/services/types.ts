/** Subset of the global fetch used by JiraService; injected so tests can stub the wire. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface JiraSettings {
  baseUrl: string;
  username: string;
  apiToken: string;
  timeoutSeconds: number;
}

export interface JiraServiceOptions {
  settings: JiraSettings;
  fetch?: FetchLike;
}

/** Atlassian Document Format, reduced to the single-paragraph shape we submit. */
export interface AdfDocument {
  type: "doc";
  version: 1;
  content: Array<{
    type: "paragraph";
    content: Array<{ type: "text"; text: string }>;
  }>;
}

/** Remote documents are owned by Jira and passed through untouched. */
export type JiraDocument = Record<string, unknown>;

export interface CommentPage {
  startAt: number;
  maxResults: number;
  total: number;
  isLast?: boolean;
  values?: unknown[];
  [key: string]: unknown;
}

export interface CreateIssueInput {
  projectKey: string;
  summary: string;
  issueType: string;
  description?: string;
}

export interface CommentPageOptions {
  startAt?: number;
  maxResults?: number;
}

export interface IJiraService {
  getIssue(issueKey: string): Promise<JiraDocument>;
  searchIssues(jql: string, maxResults?: number): Promise<JiraDocument>;
  createIssue(input: CreateIssueInput): Promise<JiraDocument>;
  updateIssue(issueKey: string, fields: Record<string, unknown>): Promise<void>;
  addComment(issueKey: string, comment: string): Promise<JiraDocument>;
  getComments(issueKey: string, options?: CommentPageOptions): Promise<CommentPage>;
  getProjects(): Promise<JiraDocument[]>;
  transitionIssue(issueKey: string, transitionId: string): Promise<void>;
  getTransitions(issueKey: string): Promise<JiraDocument>;
}
