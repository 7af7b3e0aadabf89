import { SessionExpiredError } from "../sources/types.js";

/**
 * Authenticated session used for rendered lot pages.
 * Consumers only read it; the orchestrator is the one that renews.
 */
export interface AuthSession {
  isValid(): boolean;
  renew(): Promise<void>;
  requestHeaders(): Record<string, string>;
}

export type SessionCredentials = {
  cookie: string;
  /** Epoch ms; null when the server didn't say */
  expiresAt: number | null;
};

export type CookieSessionOptions = SessionCredentials & {
  refresh?: () => Promise<SessionCredentials>;
  now?: () => number;
};

export class CookieSession implements AuthSession {
  private cookie: string;
  private expiresAt: number | null;
  private readonly refresh?: () => Promise<SessionCredentials>;
  private readonly now: () => number;

  constructor(opts: CookieSessionOptions) {
    this.cookie = opts.cookie.trim();
    this.expiresAt = opts.expiresAt;
    this.refresh = opts.refresh;
    this.now = opts.now ?? Date.now;
  }

  isValid(): boolean {
    if (!this.cookie) return false;
    return this.expiresAt === null || this.now() < this.expiresAt;
  }

  async renew(): Promise<void> {
    if (!this.refresh) {
      throw new SessionExpiredError("Session cannot be renewed: no refresh handler configured", {
        source: "rendered",
      });
    }
    const next = await this.refresh();
    this.cookie = next.cookie.trim();
    this.expiresAt = next.expiresAt;
  }

  requestHeaders(): Record<string, string> {
    return this.cookie ? { Cookie: this.cookie } : {};
  }
}

export function sessionFromCredentials(creds: SessionCredentials): AuthSession | null {
  if (!creds.cookie.trim()) return null;
  return new CookieSession(creds);
}
