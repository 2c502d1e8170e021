import fetch, { FetchError } from "node-fetch";
import type { RequestInit } from "node-fetch";
import { Agent } from "https";
import { API_CONFIG, ERROR_MESSAGES } from "@/config";
import { AuthError, ConnectionError, DecodingError } from "@/lib/errors";
import { getLocalDateString } from "@/lib/date-utils";
import { parseJsonObject } from "@/lib/json";
import type { JsonRecord } from "@/lib/json";
import type { RequestStats } from "@/lib/transports/types";

export interface CloudCredentials {
  username: string;
  password: string;
  baseUrl?: string;
  verifySsl?: boolean;
}

export type CloudResponse = JsonRecord;

const SESSION_COOKIE = "JSESSIONID";

/**
 * Cloud monitor API client using node-fetch with manual cookie handling.
 *
 * Owns the session for one fleet entry. Every request counts towards the
 * request-rate diagnostics.
 */
export class CloudClient {
  private cookies: Map<string, string> = new Map();
  private sessionExpires?: number;
  private baseUrl: string;
  private agent?: Agent;
  private requestTimes: number[] = [];
  private requestsToday = 0;
  private requestDate?: string;
  private timezone?: string;
  private loginPromise?: Promise<void>;

  constructor(
    private credentials: CloudCredentials,
    private timeoutMs: number = API_CONFIG.timeout,
  ) {
    this.baseUrl = (credentials.baseUrl || API_CONFIG.baseUrl).replace(/\/+$/, "");
    if (credentials.verifySsl === false) {
      this.agent = new Agent({ rejectUnauthorized: false });
    }
  }

  /**
   * Station zone used to roll the per-day request counter
   */
  setTimezone(timezone: string | undefined): void {
    this.timezone = timezone;
  }

  /**
   * Parse cookies from Set-Cookie headers
   */
  private parseCookies(setCookieHeaders: string[]): void {
    for (const header of setCookieHeaders) {
      const [pair] = header.split(";");
      const separator = pair.indexOf("=");
      if (separator > 0) {
        this.cookies.set(
          pair.slice(0, separator).trim(),
          pair.slice(separator + 1).trim(),
        );
      }
    }
  }

  /**
   * Get cookie string for requests
   */
  private getCookieString(): string {
    return Array.from(this.cookies.entries())
      .map(([key, value]) => `${key}=${value}`)
      .join("; ");
  }

  isAuthenticated(): boolean {
    return (
      this.cookies.has(SESSION_COOKIE) &&
      this.sessionExpires !== undefined &&
      Date.now() < this.sessionExpires
    );
  }

  private recordRequest(): void {
    const now = Date.now();
    this.requestTimes = this.requestTimes.filter((time) => now - time < 60_000);
    this.requestTimes.push(now);

    const today = getLocalDateString(this.timezone, new Date(now));
    if (this.requestDate !== today) {
      this.requestDate = today;
      this.requestsToday = 0;
    }
    this.requestsToday++;
  }

  getRequestStats(): RequestStats {
    const now = Date.now();
    return {
      requestRatePerMinute: this.requestTimes.filter((time) => now - time < 60_000)
        .length,
      requestsToday: this.requestsToday,
    };
  }

  /**
   * Log in and store the session cookie. Concurrent callers share one login,
   * so a request arriving mid-login waits for it instead of clearing the
   * cookie jar under it.
   */
  async login(): Promise<void> {
    if (!this.loginPromise) {
      this.loginPromise = this.authenticate().finally(() => {
        this.loginPromise = undefined;
      });
    }
    await this.loginPromise;
  }

  private async authenticate(): Promise<void> {
    console.log(`[CloudClient] Authenticating ${this.credentials.username}...`);
    this.cookies.clear();
    this.sessionExpires = undefined;

    const result = await this.request(
      API_CONFIG.loginEndpoint,
      { account: this.credentials.username, password: this.credentials.password },
      false,
    );

    if (!this.cookies.has(SESSION_COOKIE)) {
      throw new AuthError(
        typeof result.message === "string" ? result.message : ERROR_MESSAGES.AUTH_FAILED,
      );
    }

    this.sessionExpires = Date.now() + API_CONFIG.sessionTtlMs;
    console.log("[CloudClient] Login successful");
  }

  /**
   * Drop the session. The API has no logout endpoint.
   */
  logout(): void {
    this.cookies.clear();
    this.sessionExpires = undefined;
  }

  /**
   * POST a form to an authenticated endpoint
   */
  async post(endpoint: string, form: Record<string, string>): Promise<CloudResponse> {
    if (!this.isAuthenticated()) {
      await this.login();
    }
    return this.request(endpoint, form, true);
  }

  private async request(
    endpoint: string,
    form: Record<string, string>,
    authenticated: boolean,
  ): Promise<CloudResponse> {
    const headers: Record<string, string> = {
      "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
      Accept: "application/json",
      "User-Agent": API_CONFIG.userAgent,
    };
    if (authenticated && this.cookies.size > 0) {
      headers.Cookie = this.getCookieString();
    }

    const init: RequestInit = {
      method: "POST",
      headers,
      body: new URLSearchParams(form).toString(),
      timeout: this.timeoutMs,
      agent: this.agent,
    };

    this.recordRequest();

    let status: number;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, init);
      const setCookieHeaders = response.headers.raw()["set-cookie"];
      if (setCookieHeaders) {
        this.parseCookies(setCookieHeaders);
      }
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw new ConnectionError(
          `${ERROR_MESSAGES.NETWORK_ERROR} ${error.message}`,
          error.type === "request-timeout" ? "timeout" : "io",
        );
      }
      throw error;
    }

    if (status === 401) {
      this.logout();
      throw new AuthError(ERROR_MESSAGES.AUTH_FAILED, status);
    }
    if (status < 200 || status >= 300) {
      throw new ConnectionError(`HTTP ${status} from ${endpoint}`, "io", status);
    }

    const body = parseJsonObject(text, endpoint);

    if (body.success === false) {
      const message =
        typeof body.message === "string" ? body.message : "Unknown API error";
      if (!authenticated || /login|auth/i.test(message)) {
        this.logout();
        throw new AuthError(message, status);
      }
      throw new DecodingError(`API error from ${endpoint}: ${message}`, body);
    }

    return body;
  }
}
