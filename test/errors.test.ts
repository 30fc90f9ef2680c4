import { describe, test, expect } from "vitest";
import {
  classifyError,
  CommandError,
  describeError,
  type ErrorKind,
  HttpError,
  kindForStatus,
  ResourceError,
} from "../src/errors";

describe("kindForStatus", () => {
  test.each([
    [401, "NotAuthenticated"],
    [403, "AccessDenied"],
    [404, "NotFound"],
    [408, "NetworkOrThrottling"],
    [429, "NetworkOrThrottling"],
    [503, "NetworkOrThrottling"],
    [400, "Unknown"],
    [409, "Unknown"],
  ])("%i → %s", (status, kind) => {
    expect(kindForStatus(status)).toBe(kind);
  });
});

describe("CommandError", () => {
  test("carries trimmed stderr in its message", () => {
    const err = new CommandError("az account", 1, "  ERROR: boom\n");
    expect(err.message).toBe("az account failed: ERROR: boom");
    expect(err.exitCode).toBe(1);
  });

  test("falls back to the exit code when stderr is empty", () => {
    expect(new CommandError("az account", 2, "").message).toBe("az account failed: exit code 2");
  });
});

describe("classifyError", () => {
  test("keeps an already classified error", () => {
    const err = new ResourceError("NotFound", "gone");
    expect(classifyError(err)).toBe(err);
  });

  test("classifies HTTP failures by status", () => {
    const err = classifyError(new HttpError(403, "Forbidden: no list permission"));
    expect(err.kind).toBe("AccessDenied");
    expect(err.status).toBe(403);
    expect(err.message).toBe("Forbidden: no list permission");
  });

  test("classifies CLI failures by stderr", () => {
    expect(classifyError(new CommandError("az account", 1, "Please run 'az login'")).kind).toBe(
      "NotAuthenticated"
    );
    expect(
      classifyError(new CommandError("az containerapp", 1, "(AuthorizationFailed) no access"))
        .kind
    ).toBe("AccessDenied");
    expect(
      classifyError(new CommandError("az containerapp", 3, "(ResourceNotFound) app missing")).kind
    ).toBe("NotFound");
  });

  test("socket errors are network failures", () => {
    const err = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    expect(classifyError(err).kind).toBe("NetworkOrThrottling");

    const undiciErr = Object.assign(new Error("Connect Timeout Error"), {
      code: "UND_ERR_CONNECT_TIMEOUT",
    });
    expect(classifyError(undiciErr).kind).toBe("NetworkOrThrottling");
  });

  test("plain errors fall back to their message", () => {
    expect(classifyError(new Error("TooManyRequests")).kind).toBe("NetworkOrThrottling");
    expect(classifyError(new Error("something odd")).kind).toBe("Unknown");
  });

  test("non-errors become Unknown", () => {
    const err = classifyError("weird");
    expect(err.kind).toBe("Unknown");
    expect(err.message).toBe("weird");
  });
});

describe("describeError", () => {
  const cases: [ErrorKind, string][] = [
    ["NotAuthenticated", "Not signed in: expired. Run: az login"],
    ["AccessDenied", "Access denied: expired"],
    ["NotFound", "Not found: expired"],
    ["NetworkOrThrottling", "Network error or throttled: expired"],
    ["Unknown", "expired"],
  ];

  test.each(cases)("%s", (kind, text) => {
    expect(describeError(new ResourceError(kind, "expired"))).toBe(text);
  });
});
