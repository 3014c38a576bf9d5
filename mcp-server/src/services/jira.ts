import { z } from "zod";
import { formatZodError, JiraApiError, JiraTransportError } from "../errors.js";
import { createLogger } from "../logger.js";
import { toAdfDocument } from "./adf.js";
import type {
  CommentPage,
  CommentPageOptions,
  CreateIssueInput,
  FetchLike,
  IJiraService,
  JiraDocument,
  JiraServiceOptions,
} from "./types.js";

const API_PREFIX = "/rest/api/3";

export const DEFAULT_SEARCH_MAX_RESULTS = 50;
export const DEFAULT_COMMENT_START_AT = 0;
export const DEFAULT_COMMENT_MAX_RESULTS = 50;

const DocumentSchema = z.record(z.unknown());
const DocumentListSchema = z.array(DocumentSchema);
const CommentPageSchema = z
  .object({
    startAt: z.number(),
    maxResults: z.number(),
    total: z.number(),
    isLast: z.boolean().optional(),
    values: z.array(z.unknown()).optional(),
  })
  .passthrough();

type HttpMethod = "GET" | "POST" | "PUT";

interface RequestOptions {
  query?: Record<string, string | number>;
  body?: unknown;
}

const log = createLogger("jira");

function issuePath(issueKey: string, suffix = ""): string {
  return `/issue/${encodeURIComponent(issueKey)}${suffix}`;
}

export class JiraService implements IJiraService {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: JiraServiceOptions) {
    const { settings } = options;
    this.baseUrl = settings.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${settings.username}:${settings.apiToken}`).toString("base64")}`;
    this.timeoutMs = settings.timeoutSeconds * 1000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async getIssue(issueKey: string): Promise<JiraDocument> {
    return this.request("GET", issuePath(issueKey), DocumentSchema);
  }

  async searchIssues(jql: string, maxResults = DEFAULT_SEARCH_MAX_RESULTS): Promise<JiraDocument> {
    return this.request("GET", "/search", DocumentSchema, { query: { jql, maxResults } });
  }

  async createIssue(input: CreateIssueInput): Promise<JiraDocument> {
    const fields: Record<string, unknown> = {
      project: { key: input.projectKey },
      summary: input.summary,
      issuetype: { name: input.issueType },
    };
    if (input.description) {
      fields.description = toAdfDocument(input.description);
    }

    return this.request("POST", "/issue", DocumentSchema, { body: { fields } });
  }

  async updateIssue(issueKey: string, fields: Record<string, unknown>): Promise<void> {
    await this.send("PUT", issuePath(issueKey), { body: { fields } });
  }

  async addComment(issueKey: string, comment: string): Promise<JiraDocument> {
    return this.request("POST", issuePath(issueKey, "/comment"), DocumentSchema, {
      body: { body: toAdfDocument(comment) },
    });
  }

  async getComments(issueKey: string, options: CommentPageOptions = {}): Promise<CommentPage> {
    return this.request("GET", issuePath(issueKey, "/comment"), CommentPageSchema, {
      query: {
        startAt: options.startAt ?? DEFAULT_COMMENT_START_AT,
        maxResults: options.maxResults ?? DEFAULT_COMMENT_MAX_RESULTS,
      },
    });
  }

  async getProjects(): Promise<JiraDocument[]> {
    return this.request("GET", "/project", DocumentListSchema);
  }

  async transitionIssue(issueKey: string, transitionId: string): Promise<void> {
    await this.send("POST", issuePath(issueKey, "/transitions"), {
      body: { transition: { id: transitionId } },
    });
  }

  async getTransitions(issueKey: string): Promise<JiraDocument> {
    return this.request("GET", issuePath(issueKey, "/transitions"), DocumentSchema);
  }

  /** {@link send}, then check the body against `schema`. */
  private async request<T extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: T,
    options: RequestOptions = {},
  ): Promise<z.infer<T>> {
    const { payload, pathname } = await this.send(method, path, options);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`${method} ${pathname} returned an unexpected body: ${formatZodError(parsed.error)}`);
    }
    return parsed.data;
  }

  /** Issue exactly one HTTP request. Resolves to the decoded body, or undefined when Jira sends none. */
  private async send(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<{ payload: unknown; pathname: string }> {
    const url = new URL(`${this.baseUrl}${API_PREFIX}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const init: RequestInit = {
      method,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: this.authorization,
      },
      signal: AbortSignal.timeout(this.timeoutMs),
      ...(options.body !== undefined && { body: JSON.stringify(options.body) }),
    };

    const start = performance.now();
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url.toString(), init);
      text = await response.text();
    } catch (error) {
      throw new JiraTransportError(method, url.pathname, error);
    }

    log.debug("Jira request", {
      method,
      path: url.pathname,
      status: response.status,
      durationMs: Math.round(performance.now() - start),
    });

    if (!response.ok) {
      throw new JiraApiError({
        method,
        path: url.pathname,
        status: response.status,
        statusText: response.statusText,
        body: text,
      });
    }

    if (response.status === 204 || text.trim() === "") {
      return { payload: undefined, pathname: url.pathname };
    }
    try {
      return { payload: JSON.parse(text), pathname: url.pathname };
    } catch (error) {
      throw new Error(`${method} ${url.pathname} returned a non-JSON body`, { cause: error });
    }
  }
}

