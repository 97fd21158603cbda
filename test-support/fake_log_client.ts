import { vi } from "vitest";
import type { AuthVersion, RemoteClient } from "../src/client";
import type { IssuedCredential } from "../src/credential_fetcher";
import type { Logger } from "../src/logger";

export type Project = {
  name: string;
  description: string;
};

type RecordedCall = {
  method: string;
  args: unknown[];
  /** Access key id the client held when the call was made. */
  accessKeyId: string | undefined;
};

/**
 * In-memory stand-in for a remote client. Each operation consumes the next
 * queued handler for that operation, so tests script responses in order.
 */
export class FakeLogClient implements RemoteClient {
  readonly calls: RecordedCall[] = [];
  userAgent = "";
  retryTimeoutMs = 0;
  authVersion: AuthVersion = "v1";
  region = "";
  accessKeyId: string | undefined;

  readonly resetAccessKeyToken = vi.fn(
    (accessKeyId: string, _accessKeySecret: string, _securityToken: string) => {
      this.accessKeyId = accessKeyId;
    },
  );

  private readonly getProjectHandlers: Array<(name: string) => Project> = [];
  private readonly listProjectsHandlers: Array<() => string[]> = [];

  handleGetProject(handler: (name: string) => Project): void {
    this.getProjectHandlers.push(handler);
  }

  handleListProjects(handler: () => string[]): void {
    this.listProjectsHandlers.push(handler);
  }

  async getProject(name: string): Promise<Project> {
    this.record("getProject", [name]);
    return take(this.getProjectHandlers, "getProject")(name);
  }

  async listProjects(): Promise<string[]> {
    this.record("listProjects", []);
    return take(this.listProjectsHandlers, "listProjects")();
  }

  setUserAgent(userAgent: string): void {
    this.userAgent = userAgent;
  }

  setRetryTimeout(timeoutMs: number): void {
    this.retryTimeoutMs = timeoutMs;
  }

  setAuthVersion(version: AuthVersion): void {
    this.authVersion = version;
  }

  setRegion(region: string): void {
    this.region = region;
  }

  assertExhausted(): void {
    const outstanding = [
      ["getProject", this.getProjectHandlers.length] as const,
      ["listProjects", this.listProjectsHandlers.length] as const,
    ].filter(([, n]) => n > 0);
    if (outstanding.length > 0) {
      const details = outstanding
        .map(([k, n]) => `- ${k}: ${n} expectation(s) remaining`)
        .join("\n");
      throw new Error(`Not all expected calls were made:\n${details}`);
    }
  }

  private record(method: string, args: unknown[]): void {
    this.calls.push({ method, args, accessKeyId: this.accessKeyId });
  }
}

function take<H>(queue: H[], method: string): H {
  const handler = queue.shift();
  if (!handler) {
    throw new Error(`Unexpected call: ${method}`);
  }
  return handler;
}

export function testCredential(
  accessKeyId: string,
  expiresAt: Date,
): IssuedCredential {
  return {
    accessKeyId,
    accessKeySecret: "test-secret",
    securityToken: `token-for-${accessKeyId}`,
    expiresAt,
  };
}

export function mockLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}
