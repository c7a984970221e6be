/**
 * Thin SciCat REST client: username/password login, dataset lookup and
 * creation, orig-datablock (file list) and thumbnail attachment.
 * Every request is bounded by a timeout.
 */

import type { ZodType } from "zod";
import { AuthenticationError, SubmissionError, describeError } from "../errors.js";
import {
  createdDatasetSchema,
  datasetListSchema,
  legacyTokenResponseSchema,
  tokenResponseSchema,
  type SciCatAttachment,
  type SciCatDataset,
  type SciCatOrigDatablock,
} from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface SciCatClientConfig {
  /** API base, e.g. "https://scicat.example.org/api/v3" */
  baseUrl: string;
  username: string;
  password: string;
  /** Per-request timeout. Defaults to 30s. */
  timeoutMs?: number;
  /** fetch implementation. Defaults to the global fetch. */
  fetch?: typeof fetch;
}

interface RequestOptions {
  body?: unknown;
  /** Send the bearer token. Defaults to true. */
  auth?: boolean;
}

/** Raw outcome of one HTTP call */
interface HttpResult {
  status: number;
  ok: boolean;
  body: unknown;
}

function isTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError";
}

export class SciCatClient {
  readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private token: string | null = null;

  constructor(config: SciCatClientConfig) {
    this.baseUrl = config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`;
    this.username = config.username;
    this.password = config.password;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  get authenticated(): boolean {
    return this.token !== null;
  }

  /**
   * Obtain a bearer token. Tries auth/login, and Users/login when the
   * server does not have the newer endpoint.
   */
  async login(): Promise<void> {
    const current = await this.loginRequest("auth/login");
    if (current.status !== 404) {
      this.token = this.readToken(current, tokenResponseSchema, (d) => d.access_token);
      return;
    }
    const legacy = await this.loginRequest("Users/login");
    this.token = this.readToken(legacy, legacyTokenResponseSchema, (d) => d.id);
  }

  /** Create a dataset and return its pid */
  async createDataset(dataset: SciCatDataset): Promise<string> {
    const created = await this.request("POST", "datasets", createdDatasetSchema, { body: dataset });
    return created.pid;
  }

  /** pids of the datasets registered under exactly this name */
  async findDatasetPids(datasetName: string): Promise<string[]> {
    const filter = JSON.stringify({ where: { datasetName } });
    const found = await this.request("GET", `datasets?filter=${encodeURIComponent(filter)}`, datasetListSchema);
    return found.map((d) => d.pid);
  }

  /** Attach the list of data files to a dataset */
  async createOrigDatablock(pid: string, datablock: SciCatOrigDatablock): Promise<void> {
    const path = `datasets/${encodeURIComponent(pid)}/origdatablocks`;
    this.ensureOk(await this.send("POST", path, { body: datablock }), path);
  }

  async createAttachment(pid: string, attachment: SciCatAttachment): Promise<void> {
    const path = `datasets/${encodeURIComponent(pid)}/attachments`;
    this.ensureOk(await this.send("POST", path, { body: attachment }), path);
  }

  // ── Internals ──

  private async loginRequest(path: string): Promise<HttpResult> {
    try {
      return await this.send("POST", path, {
        body: { username: this.username, password: this.password },
        auth: false,
      });
    } catch (err) {
      throw new AuthenticationError(`Login to ${this.baseUrl} failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  private readToken<T>(res: HttpResult, schema: ZodType<T>, pick: (data: T) => string): string {
    if (!res.ok) {
      throw new AuthenticationError(`Login to ${this.baseUrl} was rejected (HTTP ${res.status})`, {
        status: res.status,
      });
    }
    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new AuthenticationError(`Login to ${this.baseUrl} returned no token`, {
        status: res.status,
      });
    }
    return pick(parsed.data);
  }

  private async request<T>(
    method: string,
    path: string,
    schema: ZodType<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const res = this.ensureOk(await this.send(method, path, options), path);
    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new SubmissionError(`Unexpected response from ${path}: ${parsed.error.message}`, {
        status: res.status,
      });
    }
    return parsed.data;
  }

  private ensureOk(res: HttpResult, path: string): HttpResult {
    if (res.ok) return res;
    const detail =
      typeof res.body === "object" && res.body !== null && "message" in res.body
        ? `: ${String(res.body.message)}`
        : "";
    throw new SubmissionError(`${path} failed with HTTP ${res.status}${detail}`, {
      status: res.status,
    });
  }

  /** Perform the call. Network failures and timeouts become SubmissionError. */
  private async send(method: string, path: string, options: RequestOptions = {}): Promise<HttpResult> {
    const auth = options.auth ?? true;
    if (auth && this.token === null) {
      throw new SubmissionError(`Not logged in to ${this.baseUrl}`);
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    if (auth && this.token !== null) headers.Authorization = `Bearer ${this.token}`;

    const url = new URL(path, this.baseUrl);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new SubmissionError(`${method} ${url.pathname} timed out after ${this.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new SubmissionError(`${method} ${url.pathname} failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const text = await response.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return { status: response.status, ok: response.ok, body };
  }
}
