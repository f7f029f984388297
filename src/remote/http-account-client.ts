/**
 * HTTP adapter for the remote account service.
 * Keeps a cookie jar in memory; the jar is what gets exported and persisted
 * as the session artifact, and restored on the next run.
 */

import { z } from "zod";
import type {
  IAliasOperations,
  IEmailAlias,
  ILoginResult,
  IRemoteAccountClient,
  IRemoteAccountClientFactory,
} from "../types/index.js";
import { AuthError, LoginRejectedError, NetworkError, errorMessage } from "../types/index.js";
import { logger } from "../utils/index.js";

const REQUEST_TIMEOUT_MS = 30_000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

// ── Wire Schemas ────────────────────────────────────────────────────────

const SessionBlobSchema = z.object({
  version: z.literal(1),
  cookies: z.record(z.string(), z.string()),
});

const LoginResponseSchema = z.object({
  requiresTwoFactor: z.boolean(),
});

const VerifyResponseSchema = z.object({
  valid: z.boolean(),
});

const TrustResponseSchema = z.object({
  trusted: z.boolean(),
});

const AliasSchema = z.object({
  anonymousId: z.string().default(""),
  hme: z.string().default(""),
  label: z.string().default(""),
  note: z.string().default(""),
  createTimestamp: z.number().optional(),
  isActive: z.boolean().default(true),
  forwardToEmail: z.string().default(""),
  domain: z.string().default(""),
});

const AliasListSchema = z.object({
  aliases: z.array(AliasSchema),
});

const ErrorBodySchema = z.object({
  error: z.string(),
});

// Timestamps arrive in milliseconds or seconds
function toDate(timestamp: number | undefined): Date | undefined {
  if (timestamp === undefined || timestamp <= 0) {
    return undefined;
  }
  return new Date(timestamp > 1e12 ? timestamp : timestamp * 1000);
}

function toAlias(data: z.infer<typeof AliasSchema>): IEmailAlias {
  const createdAt = toDate(data.createTimestamp);
  return {
    anonymousId: data.anonymousId,
    email: data.hme,
    label: data.label,
    note: data.note,
    ...(createdAt !== undefined ? { createdAt } : {}),
    isActive: data.isActive,
    forwardTo: data.forwardToEmail,
    domain: data.domain,
  };
}

function parseCookieJar(persisted: string | undefined): Map<string, string> {
  if (persisted === undefined || persisted.length === 0) {
    return new Map();
  }
  try {
    const parsed = SessionBlobSchema.safeParse(JSON.parse(persisted));
    if (parsed.success) {
      return new Map(Object.entries(parsed.data.cookies));
    }
  } catch {
    // fall through to an empty jar
  }
  logger.warn("Persisted session is unreadable, starting a fresh session");
  return new Map();
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const parsed = ErrorBodySchema.safeParse(await response.json());
    if (parsed.success) {
      return parsed.data.error;
    }
  } catch {
    // body was not JSON
  }
  return response.statusText || `HTTP ${response.status}`;
}

// ── Client ──────────────────────────────────────────────────────────────

export class HttpAccountClient implements IRemoteAccountClient {
  readonly aliases: IAliasOperations;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly cookies: Map<string, string>;

  constructor(baseUrl: string, persistedSession?: string, fetchFn?: FetchFn) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchFn = fetchFn ?? fetch;
    this.cookies = parseCookieJar(persistedSession);
    this.aliases = {
      list: async (): Promise<readonly IEmailAlias[]> => {
        const response = await this.request("GET", "/aliases");
        await this.ensureOk(response, "GET /aliases");
        return AliasListSchema.parse(await response.json()).aliases.map(toAlias);
      },
    };
  }

  async login(account: string, secret: string): Promise<ILoginResult> {
    const response = await this.request("POST", "/auth/login", { accountName: account, password: secret });
    if (response.status === 401 || response.status === 403) {
      throw new LoginRejectedError(await readErrorDetail(response), response.status);
    }
    await this.ensureOk(response, "POST /auth/login");
    return LoginResponseSchema.parse(await response.json());
  }

  async validateTwoFactorCode(code: string): Promise<boolean> {
    const response = await this.request("POST", "/auth/2fa/verify", { code });
    if (response.status === 400 || response.status === 401) {
      return false;
    }
    await this.ensureOk(response, "POST /auth/2fa/verify");
    return VerifyResponseSchema.parse(await response.json()).valid;
  }

  async isTrustedSession(): Promise<boolean> {
    const response = await this.request("GET", "/auth/trust");
    await this.ensureOk(response, "GET /auth/trust");
    return TrustResponseSchema.parse(await response.json()).trusted;
  }

  async trustSession(): Promise<void> {
    const response = await this.request("POST", "/auth/trust");
    await this.ensureOk(response, "POST /auth/trust");
  }

  async exportSession(): Promise<string> {
    return JSON.stringify({ version: 1, cookies: Object.fromEntries(this.cookies) });
  }

  // ── Transport ─────────────────────────────────────────────────────────

  private async request(method: string, path: string, body?: Record<string, string>): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.cookies.size > 0) {
      headers["Cookie"] = [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
    }

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error: unknown) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      throw new NetworkError(
        timedOut ? `${method} ${path} timed out after ${REQUEST_TIMEOUT_MS}ms` : `${method} ${path}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.storeCookies(response);
    logger.debug({ method, path, status: response.status }, "Account service response");
    return response;
  }

  private storeCookies(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(";", 1)[0] ?? "";
      const separator = pair.indexOf("=");
      if (separator <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  private async ensureOk(response: Response, operation: string): Promise<void> {
    if (response.ok) {
      return;
    }
    const detail = await readErrorDetail(response);
    if (response.status >= 500) {
      throw new NetworkError(`${operation} returned HTTP ${response.status}: ${detail}`);
    }
    throw new AuthError(`${operation} returned HTTP ${response.status}: ${detail}`, {
      diagnosticMessage: detail,
    });
  }
}

export class HttpAccountClientFactory implements IRemoteAccountClientFactory {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn | undefined;

  constructor(baseUrl: string, fetchFn?: FetchFn) {
    this.baseUrl = baseUrl;
    this.fetchFn = fetchFn;
  }

  create(_account: string, persistedSession?: string): IRemoteAccountClient {
    return new HttpAccountClient(this.baseUrl, persistedSession, this.fetchFn);
  }
}
