import { request, Agent, type Dispatcher } from "undici";
import { createGunzip, createInflate } from "zlib";
import { ApiError, classifyError } from "./apiErrors";
import { moduleLogger } from "./logger";
import { ResponseParser } from "./responseParser";
import type {
  Profile,
  SubmissionId,
  SubmissionList,
  SubmissionListQuery,
  TokenProvider,
  VerdictSnapshot,
} from "./types";

const log = moduleLogger("apiClient");

export const DEFAULT_BASE_URL = "https://acm.sjtu.edu.cn/OnlineJudge/api/v1";

export interface JudgeApiClientOptions {
  baseUrl?: string;
  tokenProvider: TokenProvider;
  /** Replaces the client's own keep-alive agent (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  now?: () => Date;
}

interface RawResponse {
  body: string;
  statusCode: number;
}

/**
 * Anything that can report the judging state of a submission
 */
export interface StatusSource {
  fetchStatus(submissionId: SubmissionId): Promise<VerdictSnapshot>;
}

/**
 * Read a response body, decompressing gzip/deflate content
 */
async function readBody(
  body: AsyncIterable<Uint8Array>,
  contentEncoding: string | undefined
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  const raw = Buffer.concat(chunks);

  if (contentEncoding !== "gzip" && contentEncoding !== "deflate") {
    return raw.toString("utf-8");
  }

  log.debug(`[Response] Decompressing ${contentEncoding} encoded content`);
  const decoder = contentEncoding === "gzip" ? createGunzip() : createInflate();
  const decompressed: Buffer[] = [];

  decoder.on("data", (chunk: Buffer) => {
    decompressed.push(chunk);
  });

  await new Promise<void>((resolve, reject) => {
    decoder.on("end", resolve);
    decoder.on("error", reject);
    decoder.write(raw);
    decoder.end();
  });

  return Buffer.concat(decompressed).toString("utf-8");
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Pull a human-readable reason out of an error body
 */
function errorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      for (const key of ["message", "detail", "error"]) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value === "string" && value) {
          return value;
        }
      }
    }
  } catch {
    return body.substring(0, 200).trim();
  }
  return body.substring(0, 200).trim();
}

export interface JudgeApi extends StatusSource {
  getProfile(): Promise<Profile>;
  listSubmissions(query?: SubmissionListQuery): Promise<SubmissionList>;
  abortSubmission(submissionId: SubmissionId): Promise<void>;
}

/**
 * Judge REST API client with a persistent keep-alive connection pool
 */
export class JudgeApiClient implements JudgeApi {
  private readonly baseUrl: string;
  private readonly tokenProvider: TokenProvider;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly now: () => Date;

  constructor(options: JudgeApiClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.tokenProvider = options.tokenProvider;
    this.now = options.now ?? (() => new Date());

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
        connections: 10,
        connect: { timeout: 10000 },
        headersTimeout: 15000,
        bodyTimeout: 15000,
      });
      this.ownsDispatcher = true;
    }
  }

  /**
   * Build request headers, including the bearer token
   */
  private buildHeaders(): Record<string, string> {
    const token = this.tokenProvider.getToken();
    if (!token) {
      throw new ApiError(
        "Unauthorized",
        "No access token configured. Run `termjudge auth login <token>` first."
      );
    }

    return {
      "User-Agent": "termjudge",
      Accept: "application/json",
      "Accept-Encoding": "gzip, deflate",
      Authorization: `Bearer ${token}`,
    };
  }

  /**
   * Make an HTTP request. Failures are always thrown as ApiError.
   */
  private async makeRequest(
    path: string,
    options: {
      method?: "GET" | "POST";
      query?: Record<string, string | number | undefined>;
    } = {}
  ): Promise<RawResponse> {
    const method = options.method || "GET";
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers = this.buildHeaders();
    log.debug(`[HTTP ${method}] ${url.toString()}`);

    let response: RawResponse;
    try {
      const result = await request(url, {
        method,
        headers,
        dispatcher: this.dispatcher,
      });

      const body = await readBody(
        result.body,
        headerValue(result.headers["content-encoding"])
      );
      response = { body, statusCode: result.statusCode };
    } catch (error) {
      const classified = classifyError(error);
      log.debug(
        { kind: classified.kind },
        `[Request Failed] ${method} ${url.pathname}: ${classified.message}`
      );
      throw classified;
    }

    log.debug(
      `[Response] Status: ${response.statusCode}, Body length: ${response.body.length}`
    );

    if (response.statusCode >= 400) {
      log.debug(
        `[HTTP Error ${response.statusCode}] ${response.body.substring(0, 1000)}`
      );
      throw ApiError.fromStatus(response.statusCode, errorDetail(response.body));
    }

    return response;
  }

  private async getJson(
    path: string,
    query?: Record<string, string | number | undefined>
  ): Promise<unknown> {
    const response = await this.makeRequest(path, { query });
    return ResponseParser.parseJson(response.body);
  }

  /**
   * Fetch the current judging state of a submission
   */
  async fetchStatus(submissionId: SubmissionId): Promise<VerdictSnapshot> {
    const body = await this.getJson(
      `/submission/${encodeURIComponent(String(submissionId))}`
    );
    return ResponseParser.parseSubmissionStatus(body, submissionId, this.now());
  }

  /**
   * Profile of the user the token belongs to
   */
  async getProfile(): Promise<Profile> {
    return ResponseParser.parseProfile(await this.getJson("/user/profile"));
  }

  /**
   * List submissions, newest first
   */
  async listSubmissions(query: SubmissionListQuery = {}): Promise<SubmissionList> {
    const body = await this.getJson("/submission/", {
      username: query.username,
      problem_id: query.problemId,
      status: query.status,
      lang: query.language,
      cursor: query.cursor,
    });
    return ResponseParser.parseSubmissionList(body);
  }

  /**
   * Abort a submission that is still being judged
   */
  async abortSubmission(submissionId: SubmissionId): Promise<void> {
    await this.makeRequest(
      `/submission/${encodeURIComponent(String(submissionId))}/abort`,
      { method: "POST" }
    );
    log.info(`Abort requested for submission ${submissionId}`);
  }

  /**
   * Dispose and cleanup
   */
  async dispose(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.destroy();
    }
  }
}
