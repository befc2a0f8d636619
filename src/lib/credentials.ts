import { AuthError, ConfigurationError, ConnectionError, errorMessage } from "./errors.js";
import type { WorkspaceConfig } from "./config.js";
import { OAuthTokenManager, type Credential } from "./token_manager.js";
import { toRecord } from "./validate.js";

export type FetchLike = typeof fetch;

/** Who the server is when it calls the workspace API. */
export interface CredentialSource {
  readonly kind: "service" | "per-request";
  /** Bearer token for one call. `userToken` is the caller's forwarded token, if any. */
  resolve(userToken?: string): Promise<string>;
}

/** A static personal access token. */
export class StaticTokenCredential implements CredentialSource {
  readonly kind = "service" as const;

  constructor(private readonly token: string) {}

  async resolve(): Promise<string> {
    return this.token;
  }
}

/**
 * OAuth machine-to-machine credential: a client id/secret exchanged at the
 * workspace token endpoint. Tokens are reused until they near expiry.
 */
export class ServiceCredential implements CredentialSource {
  readonly kind = "service" as const;
  readonly tokens: OAuthTokenManager;

  constructor(
    private readonly host: string,
    private readonly clientId: string,
    private readonly clientSecret: string,
    opts: { refreshMarginMs?: number; fetchImpl?: FetchLike; now?: () => number } = {},
  ) {
    const fetchImpl = opts.fetchImpl ?? fetch;
    const now = opts.now ?? Date.now;
    this.tokens = new OAuthTokenManager(() => this.exchange(fetchImpl, now), {
      refreshMarginMs: opts.refreshMarginMs ?? 60_000,
      now,
      label: "workspace_m2m",
    });
  }

  async resolve(): Promise<string> {
    return this.tokens.getToken();
  }

  private async exchange(fetchImpl: FetchLike, now: () => number): Promise<Credential> {
    const basic = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64");
    let response: Response;
    try {
      response = await fetchImpl(`${this.host}/oidc/v1/token`, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: new URLSearchParams({ grant_type: "client_credentials", scope: "all-apis" }).toString(),
      });
    } catch (error) {
      throw new ConnectionError(`Token endpoint unreachable: ${errorMessage(error)}`, { cause: error });
    }
    if (!response.ok) {
      const text = await response.text();
      throw new AuthError(`OAuth token exchange failed: ${response.status} ${text}`.trim());
    }
    const body = toRecord(await response.json());
    if (typeof body.access_token !== "string" || !body.access_token) {
      throw new AuthError("OAuth token response has no access_token");
    }
    const expiresIn = typeof body.expires_in === "number" ? body.expires_in : 3600;
    return { token: body.access_token, expiresAt: now() + expiresIn * 1000 };
  }
}

/** The calling user's own token, forwarded by the app proxy on every request. */
export class PerRequestCredential implements CredentialSource {
  readonly kind = "per-request" as const;

  async resolve(userToken?: string): Promise<string> {
    if (!userToken) {
      throw new AuthError("No user token on this request (X-Forwarded-Access-Token is missing)");
    }
    return userToken;
  }
}

/**
 * The app's own identity. Prefers OAuth M2M over a personal access token when
 * both are present.
 */
export function createServiceCredential(
  config: WorkspaceConfig,
  opts: { fetchImpl?: FetchLike; refreshMarginMs?: number; now?: () => number } = {},
): CredentialSource {
  if (config.host && config.clientId && config.clientSecret) {
    return new ServiceCredential(config.host, config.clientId, config.clientSecret, opts);
  }
  if (config.token) {
    return new StaticTokenCredential(config.token);
  }
  throw new ConfigurationError(
    "No workspace credential: set DATABRICKS_TOKEN, or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET",
  );
}

/** Pick the credential variant for user-facing calls once, from configuration. */
export function createCredentialSource(
  config: WorkspaceConfig,
  opts: { fetchImpl?: FetchLike; refreshMarginMs?: number } = {},
): CredentialSource {
  if (config.authMode === "per-request") {
    return new PerRequestCredential();
  }
  return createServiceCredential(config, opts);
}
