import { describe, test, expect } from "vitest";
import { scopeToResource, TokenCache } from "../../src/auth/token-cache";
import type { Token, TokenIssuer } from "../../src/backends/types";
import { CommandError, ResourceError } from "../../src/errors";
import { LogChannel, silentLogger } from "../../src/logging";
import { deferred, flush, type Deferred } from "../helpers/fake-backend";

const MINUTE = 60 * 1000;
const NOW = 1_700_000_000_000;

class FakeIssuer implements TokenIssuer {
  readonly calls: { tenantId: string; resource: string }[] = [];
  lifetimeMs = 60 * MINUTE;
  pending?: Map<string, Deferred<void>>;
  failWith?: Error;

  async issueToken(tenantId: string, resource: string): Promise<Token> {
    this.calls.push({ tenantId, resource });
    const gate = this.pending?.get(tenantId);
    if (gate) await gate.promise;
    if (this.failWith) throw this.failWith;
    return {
      accessToken: `test-token-${this.calls.length}`,
      expiresOn: NOW + this.lifetimeMs,
    };
  }
}

function setup(issuer = new FakeIssuer()) {
  const tokens = new TokenCache(issuer, {
    now: () => NOW,
    logger: silentLogger().channel(LogChannel.auth),
  });
  return { issuer, tokens };
}

const ARM = "https://management.azure.com/.default";
const VAULT = "https://vault.azure.net/.default";

describe("scopeToResource", () => {
  test("strips /.default", () => {
    expect(scopeToResource(VAULT)).toBe("https://vault.azure.net");
  });

  test("leaves a bare resource alone", () => {
    expect(scopeToResource("https://vault.azure.net")).toBe("https://vault.azure.net");
  });
});

describe("TokenCache", () => {
  test("reuses a token with more than five minutes left", async () => {
    const { issuer, tokens } = setup();
    issuer.lifetimeMs = 6 * MINUTE;

    const first = await tokens.getToken("t1", ARM);
    const second = await tokens.getToken("t1", ARM);

    expect(issuer.calls).toHaveLength(1);
    expect(second).toBe(first);
  });

  test("refreshes a token with less than five minutes left", async () => {
    const { issuer, tokens } = setup();
    issuer.lifetimeMs = 4 * MINUTE;

    await tokens.getToken("t1", ARM);
    const second = await tokens.getToken("t1", ARM);

    expect(issuer.calls).toHaveLength(2);
    expect(second.accessToken).toBe("test-token-2");
  });

  test("passes the tenant and the resource without /.default to the issuer", async () => {
    const { issuer, tokens } = setup();
    await tokens.getToken("t1", VAULT);
    expect(issuer.calls).toEqual([{ tenantId: "t1", resource: "https://vault.azure.net" }]);
  });

  test("keeps separate tokens per resource within one tenant", async () => {
    const { issuer, tokens } = setup();
    const arm = await tokens.getToken("t1", ARM);
    const vault = await tokens.getToken("t1", VAULT);

    expect(issuer.calls).toHaveLength(2);
    expect(arm.accessToken).not.toBe(vault.accessToken);
    expect(await tokens.getToken("t1", VAULT)).toBe(vault);
  });

  test("concurrent callers for one tenant share a single issuance", async () => {
    const issuer = new FakeIssuer();
    const gate = deferred();
    issuer.pending = new Map([["t1", gate]]);
    const { tokens } = setup(issuer);

    const a = tokens.getToken("t1", ARM);
    const b = tokens.getToken("t1", ARM);
    await flush();
    expect(issuer.calls).toHaveLength(1);

    gate.resolve();
    const [ta, tb] = await Promise.all([a, b]);
    expect(issuer.calls).toHaveLength(1);
    expect(tb).toBe(ta);
  });

  test("different tenants issue in parallel", async () => {
    const issuer = new FakeIssuer();
    const g1 = deferred();
    const g2 = deferred();
    issuer.pending = new Map([
      ["t1", g1],
      ["t2", g2],
    ]);
    const { tokens } = setup(issuer);

    const a = tokens.getToken("t1", ARM);
    const b = tokens.getToken("t2", ARM);
    await flush();
    expect(issuer.calls.map((c) => c.tenantId)).toEqual(["t1", "t2"]);

    g2.resolve();
    g1.resolve();
    await Promise.all([a, b]);
  });

  test("an issuer failure surfaces as a classified error and is not cached", async () => {
    const { issuer, tokens } = setup();
    issuer.failWith = new CommandError(
      "az account",
      1,
      "ERROR: Please run 'az login' to setup account."
    );

    const err = await tokens.getToken("t1", ARM).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResourceError);
    expect(err instanceof ResourceError && err.kind).toBe("NotAuthenticated");

    issuer.failWith = undefined;
    const token = await tokens.getToken("t1", ARM);
    expect(token.accessToken).toBe("test-token-2");
  });

  test("a failure for one caller does not jam the tenant lock", async () => {
    const { issuer, tokens } = setup();
    issuer.failWith = new Error("boom");
    const results = await Promise.allSettled([
      tokens.getToken("t1", ARM),
      tokens.getToken("t1", ARM),
    ]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);

    issuer.failWith = undefined;
    await expect(tokens.getToken("t1", ARM)).resolves.toEqual({
      accessToken: "test-token-3",
      expiresOn: NOW + 60 * MINUTE,
    });
  });

  test("clearCache forces the next call to issue again", async () => {
    const { issuer, tokens } = setup();
    await tokens.getToken("t1", ARM);
    tokens.clearCache();
    await tokens.getToken("t1", ARM);
    expect(issuer.calls).toHaveLength(2);
  });

  test("a token issued across clearCache is returned but not kept", async () => {
    const issuer = new FakeIssuer();
    const gate = deferred();
    issuer.pending = new Map([["t1", gate]]);
    const { tokens } = setup(issuer);

    const inFlight = tokens.getToken("t1", ARM);
    await flush();
    tokens.clearCache();
    gate.resolve();
    expect((await inFlight).accessToken).toBe("test-token-1");

    issuer.pending = undefined;
    await tokens.getToken("t1", ARM);
    expect(issuer.calls).toHaveLength(2);
  });
});
