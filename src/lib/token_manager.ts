import { AuthError, errorMessage } from "./errors.js";
import { createLogger } from "./log.js";

const log = createLogger("token_manager");

export interface Credential {
  token: string;
  /** Epoch milliseconds. */
  expiresAt: number;
}

export type TokenExchange = () => Promise<Credential>;

export interface TokenManagerOptions {
  /** Refresh this long before the credential expires. */
  refreshMarginMs: number;
  now?: () => number;
  label?: string;
}

/**
 * Owns one short-lived credential. Concurrent callers that find it stale share
 * a single in-flight exchange.
 */
export class OAuthTokenManager {
  private credential: Credential | null = null;
  private inflight: Promise<Credential> | null = null;
  private refreshCount = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly exchange: TokenExchange;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly label: string;

  constructor(exchange: TokenExchange, opts: TokenManagerOptions) {
    this.exchange = exchange;
    this.refreshMarginMs = opts.refreshMarginMs;
    this.now = opts.now ?? Date.now;
    this.label = opts.label ?? "oauth";
  }

  /** True when there is no credential, or it is expired or inside the margin. */
  needsRefresh(credential: Credential | null = this.credential): boolean {
    if (!credential) return true;
    return this.now() >= credential.expiresAt - this.refreshMarginMs;
  }

  async getCredential(): Promise<Credential> {
    const current = this.credential;
    if (current && !this.needsRefresh(current)) return current;
    return this.refresh();
  }

  async getToken(): Promise<string> {
    return (await this.getCredential()).token;
  }

  /** Start a refresh, or join the one already running. */
  refresh(): Promise<Credential> {
    if (this.inflight) return this.inflight;

    const run = async (): Promise<Credential> => {
      const startedAt = this.now();
      let next: Credential;
      try {
        next = await this.exchange();
      } catch (error) {
        log.warn("token_refresh_failed", { label: this.label, error: errorMessage(error) });
        if (error instanceof AuthError) throw error;
        throw new AuthError(`Token exchange failed: ${errorMessage(error)}`, { cause: error });
      }
      if (!next.token) {
        throw new AuthError("Token exchange returned an empty token");
      }
      this.credential = next;
      this.refreshCount++;
      log.info("token_refreshed", {
        label: this.label,
        duration_ms: this.now() - startedAt,
        expires_in_s: Math.round((next.expiresAt - this.now()) / 1000),
      });
      return next;
    };

    const pending = run().finally(() => {
      this.inflight = null;
    });
    this.inflight = pending;
    return pending;
  }

  /**
   * Exchange now, then again every `intervalMs`, so requests rarely wait on
   * an exchange. A failed background refresh is logged; the next request
   * retries on its own.
   */
  async startBackgroundRefresh(intervalMs: number): Promise<void> {
    if (this.timer) return;
    await this.refresh();
    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        log.error("token_background_refresh_failed", { label: this.label, error: errorMessage(error) });
      });
    }, intervalMs);
    this.timer.unref();
    log.info("token_background_refresh_started", { label: this.label, interval_ms: intervalMs });
  }

  stopBackgroundRefresh(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info("token_background_refresh_stopped", { label: this.label });
  }

  /** Force the next `getCredential` to exchange again. */
  invalidate(): void {
    this.credential = null;
  }

  get refreshes(): number {
    return this.refreshCount;
  }
}
