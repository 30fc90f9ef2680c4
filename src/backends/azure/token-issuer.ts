import type { CommandRunner, Token, TokenIssuer } from "../types";
import { execJson } from "./cli";
import { AccessTokenSchema } from "./schemas";

const FALLBACK_LIFETIME_MS = 60 * 60 * 1000;

/**
 * Issues bearer tokens through `az account get-access-token`, reusing the
 * CLI's signed-in session.
 */
export class AzCliTokenIssuer implements TokenIssuer {
  constructor(
    private readonly run: CommandRunner,
    private readonly now: () => number = Date.now
  ) {}

  async issueToken(tenantId: string, resource: string): Promise<Token> {
    const args = ["account", "get-access-token", "--resource", resource];
    if (tenantId) args.push("--tenant", tenantId);
    const payload = await execJson(this.run, args, AccessTokenSchema);

    // `expires_on` (epoch seconds) is only present on newer CLIs.
    let expiresOn = payload.expires_on !== undefined ? payload.expires_on * 1000 : NaN;
    if (Number.isNaN(expiresOn) && payload.expiresOn) {
      expiresOn = Date.parse(payload.expiresOn);
    }
    if (Number.isNaN(expiresOn)) expiresOn = this.now() + FALLBACK_LIFETIME_MS;

    return { accessToken: payload.accessToken, expiresOn };
  }
}
