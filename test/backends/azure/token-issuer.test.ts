import { describe, test, expect } from "vitest";
import { AzCliTokenIssuer } from "../../../src/backends/azure/token-issuer";
import { FakeRunner } from "../../helpers/fake-runner";

const NOW = 1_700_000_000_000;
const PREFIX = ["account", "get-access-token"];

describe("AzCliTokenIssuer", () => {
  test("requests a token for the resource and tenant", async () => {
    const runner = new FakeRunner().json(PREFIX, {
      accessToken: "test-token",
      expires_on: 1_700_003_600,
    });
    const issuer = new AzCliTokenIssuer(runner.run, () => NOW);

    const token = await issuer.issueToken("tenant-1", "https://vault.azure.net");

    expect(token).toEqual({ accessToken: "test-token", expiresOn: 1_700_003_600_000 });
    expect(runner.calls).toEqual([
      [
        "account",
        "get-access-token",
        "--resource",
        "https://vault.azure.net",
        "--tenant",
        "tenant-1",
        "--output",
        "json",
      ],
    ]);
  });

  test("falls back to expiresOn when expires_on is missing", async () => {
    const runner = new FakeRunner().json(PREFIX, {
      accessToken: "test-token",
      expiresOn: "2030-01-01T10:00:00Z",
    });
    const token = await new AzCliTokenIssuer(runner.run, () => NOW).issueToken("t", "r");
    expect(token.expiresOn).toBe(Date.UTC(2030, 0, 1, 10));
  });

  test("assumes an hour when the CLI reports no usable expiry", async () => {
    const runner = new FakeRunner().json(PREFIX, {
      accessToken: "test-token",
      expiresOn: "soon",
    });
    const token = await new AzCliTokenIssuer(runner.run, () => NOW).issueToken("t", "r");
    expect(token.expiresOn).toBe(NOW + 60 * 60 * 1000);
  });

  test("omits --tenant when no tenant is known", async () => {
    const runner = new FakeRunner().json(PREFIX, { accessToken: "test-token", expires_on: 1 });
    await new AzCliTokenIssuer(runner.run).issueToken("", "https://management.azure.com");
    expect(runner.calls[0]).not.toContain("--tenant");
  });

  test("propagates a CLI failure", async () => {
    const runner = new FakeRunner().on(PREFIX, {
      exitCode: 1,
      stderr: "AADSTS70043: The refresh token has expired",
    });
    await expect(new AzCliTokenIssuer(runner.run).issueToken("t", "r")).rejects.toThrow(
      "az account get-access-token failed: AADSTS70043: The refresh token has expired"
    );
  });
});
