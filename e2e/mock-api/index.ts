import express from "express";
import type { NextFunction, Request, Response } from "express";

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RecordedCall {
  method: string;
  path: string;
  query: Record<string, string>;
  body: unknown;
  timestamp: string;
}

export interface MockIssue {
  id: string;
  key: string;
  fields: Record<string, unknown>;
  comments: MockComment[];
}

export interface MockComment {
  id: string;
  body: unknown;
  created: string;
}

export interface MockJiraOptions {
  username?: string;
  apiToken?: string;
}

export interface MockJiraApi {
  app: express.Application;
  getCalls(): RecordedCall[];
  resetCalls(): void;
  getIssue(key: string): MockIssue | undefined;
}

const API = "/rest/api/3";

const PROJECTS = [
  { id: "10000", key: "TEST", name: "Test Project", projectTypeKey: "software" },
  { id: "10001", key: "OPS", name: "Operations", projectTypeKey: "business" },
];

const TRANSITIONS = [
  { id: "11", name: "To Do", to: { id: "1", name: "To Do" } },
  { id: "21", name: "In Progress", to: { id: "3", name: "In Progress" } },
  { id: "31", name: "Done", to: { id: "10001", name: "Done" } },
];

// ── Helpers ───────────────────────────────────────────────────────────────────

function jiraError(res: Response, status: number, message: string): void {
  res.status(status).json({ errorMessages: [message], errors: {} });
}

function flatQuery(req: Request): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.query)) {
    if (typeof value === "string") query[key] = value;
  }
  return query;
}

function intParam(value: unknown, fallback: number): number {
  if (typeof value !== "string") return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── App factory ───────────────────────────────────────────────────────────────

export function createApp(options: MockJiraOptions = {}): MockJiraApi {
  const username = options.username ?? "test@example.com";
  const apiToken = options.apiToken ?? "test-token";
  const expectedAuth = `Basic ${Buffer.from(`${username}:${apiToken}`).toString("base64")}`;

  const calls: RecordedCall[] = [];
  const issues = new Map<string, MockIssue>();
  let nextIssueNumber = 1;
  let nextCommentId = 10000;

  function addIssue(projectKey: string, fields: Record<string, unknown>): MockIssue {
    const issueNumber = nextIssueNumber++;
    const issue: MockIssue = {
      id: String(10000 + issueNumber),
      key: `${projectKey}-${issueNumber}`,
      fields: { status: { name: "To Do" }, ...fields },
      comments: [],
    };
    issues.set(issue.key, issue);
    return issue;
  }

  addIssue("TEST", {
    project: { key: "TEST" },
    summary: "Seeded issue",
    issuetype: { name: "Task" },
  });

  const app = express();
  app.use(express.json());

  app.use(API, (req: Request, res: Response, next: NextFunction) => {
    calls.push({
      method: req.method,
      path: `${API}${req.path}`,
      query: flatQuery(req),
      body: req.body,
      timestamp: new Date().toISOString(),
    });
    if (req.headers.authorization !== expectedAuth) {
      jiraError(res, 401, "Client must be authenticated to access this resource.");
      return;
    }
    next();
  });

  function findIssue(req: Request, res: Response): MockIssue | undefined {
    const issue = issues.get(req.params.key);
    if (!issue) {
      jiraError(res, 404, "Issue does not exist or you do not have permission to see it.");
    }
    return issue;
  }

  app.get(`${API}/issue/:key`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    res.status(200).json({ id: issue.id, key: issue.key, fields: issue.fields });
  });

  app.put(`${API}/issue/:key`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    const body: unknown = req.body;
    if (!isRecord(body) || !isRecord(body.fields)) {
      jiraError(res, 400, "Field 'fields' is required.");
      return;
    }
    issue.fields = { ...issue.fields, ...body.fields };
    res.status(204).end();
  });

  app.post(`${API}/issue`, (req: Request, res: Response) => {
    const body: unknown = req.body;
    const fields = isRecord(body) && isRecord(body.fields) ? body.fields : undefined;
    const project = fields && isRecord(fields.project) ? fields.project : undefined;
    if (!fields || !project || typeof project.key !== "string" || !fields.summary) {
      res.status(400).json({ errorMessages: [], errors: { summary: "You must specify a summary of the issue." } });
      return;
    }
    const issue = addIssue(project.key, fields);
    res.status(201).json({ id: issue.id, key: issue.key, self: `${API}/issue/${issue.id}` });
  });

  app.get(`${API}/search`, (req: Request, res: Response) => {
    const jql = typeof req.query.jql === "string" ? req.query.jql : "";
    const maxResults = intParam(req.query.maxResults, 50);
    const projectMatch = /project\s*=\s*"?(\w+)"?/i.exec(jql);
    const matching = [...issues.values()].filter((issue) => !projectMatch || issue.key.startsWith(`${projectMatch[1]}-`));
    res.status(200).json({
      startAt: 0,
      maxResults,
      total: matching.length,
      issues: matching.slice(0, maxResults).map((issue) => ({ id: issue.id, key: issue.key, fields: issue.fields })),
    });
  });

  app.get(`${API}/issue/:key/comment`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    const startAt = intParam(req.query.startAt, 0);
    const maxResults = intParam(req.query.maxResults, 50);
    const page = issue.comments.slice(startAt, startAt + maxResults);
    res.status(200).json({
      startAt,
      maxResults,
      total: issue.comments.length,
      isLast: startAt + page.length >= issue.comments.length,
      values: page,
    });
  });

  app.post(`${API}/issue/:key/comment`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    const body: unknown = req.body;
    if (!isRecord(body) || !isRecord(body.body)) {
      jiraError(res, 400, "Comment body can not be empty!");
      return;
    }
    const comment: MockComment = {
      id: String(nextCommentId++),
      body: body.body,
      created: new Date().toISOString(),
    };
    issue.comments.push(comment);
    res.status(201).json(comment);
  });

  app.get(`${API}/project`, (_req: Request, res: Response) => {
    res.status(200).json(PROJECTS);
  });

  app.get(`${API}/issue/:key/transitions`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    res.status(200).json({ expand: "transitions", transitions: TRANSITIONS });
  });

  app.post(`${API}/issue/:key/transitions`, (req: Request, res: Response) => {
    const issue = findIssue(req, res);
    if (!issue) return;
    const body: unknown = req.body;
    const transitionId = isRecord(body) && isRecord(body.transition) ? body.transition.id : undefined;
    const transition = TRANSITIONS.find((t) => t.id === transitionId);
    if (!transition) {
      jiraError(res, 400, `Transition id '${String(transitionId)}' is not valid for this issue.`);
      return;
    }
    issue.fields = { ...issue.fields, status: { name: transition.to.name } };
    res.status(204).end();
  });

  // GET /health
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok" });
  });

  return {
    app,
    getCalls: () => calls,
    resetCalls: () => {
      calls.length = 0;
    },
    getIssue: (key) => issues.get(key),
  };
}
