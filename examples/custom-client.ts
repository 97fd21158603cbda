// This example puts the refresh layer in front of a small hand-written HTTP
// client. Credentials come from a local issuer endpoint that returns
// `{ accessKeyId, accessKeySecret, securityToken, expiration }`.

import {
  RemoteServiceError,
  TokenAutoUpdateClient,
  type AuthVersion,
  type IssuedCredential,
  type RemoteClient,
} from "sts-autorefresh";

const ISSUER_URL = process.env.ISSUER_URL ?? "http://127.0.0.1:8700/credential";
const SERVICE_URL = process.env.SERVICE_URL ?? "http://127.0.0.1:8701";

class ProjectClient implements RemoteClient {
  #accessKeyId = "";
  #securityToken = "";
  #userAgent = "project-client/1.0";
  #region = "";
  #authVersion: AuthVersion = "v1";
  #timeoutMs = 10_000;

  resetAccessKeyToken(
    accessKeyId: string,
    _accessKeySecret: string,
    securityToken: string,
  ): void {
    this.#accessKeyId = accessKeyId;
    this.#securityToken = securityToken;
  }

  setUserAgent(userAgent: string): void {
    this.#userAgent = userAgent;
  }

  setRetryTimeout(timeoutMs: number): void {
    this.#timeoutMs = timeoutMs;
  }

  setAuthVersion(version: AuthVersion): void {
    this.#authVersion = version;
  }

  setRegion(region: string): void {
    this.#region = region;
  }

  async listProjects(): Promise<string[]> {
    const resp = await fetch(`${SERVICE_URL}/projects`, {
      headers: {
        "user-agent": this.#userAgent,
        "x-acs-access-key-id": this.#accessKeyId,
        "x-acs-security-token": this.#securityToken,
        "x-acs-signature-version": this.#authVersion,
        "x-acs-region": this.#region,
      },
      signal: AbortSignal.timeout(this.#timeoutMs),
    });
    const body: unknown = await resp.json();
    if (!resp.ok) {
      const code =
        typeof body === "object" && body !== null && "code" in body
          ? String(body.code)
          : "Unknown";
      throw new RemoteServiceError({
        code,
        message: `listProjects failed with HTTP ${resp.status}`,
        httpCode: resp.status,
        requestId: resp.headers.get("x-request-id") ?? undefined,
      });
    }
    if (!Array.isArray(body)) {
      throw new Error("listProjects returned a non-array body");
    }
    return body.map(String);
  }
}

async function issueCredential(): Promise<IssuedCredential> {
  const resp = await fetch(ISSUER_URL);
  if (!resp.ok) {
    throw new Error(`issuer returned HTTP ${resp.status}`);
  }
  const body: unknown = await resp.json();
  if (typeof body !== "object" || body === null) {
    throw new Error("issuer returned a non-object body");
  }
  const field = (key: string): string => {
    const value: unknown = Reflect.get(body, key);
    if (typeof value !== "string") {
      throw new Error(`issuer response is missing "${key}"`);
    }
    return value;
  };
  return {
    accessKeyId: field("accessKeyId"),
    accessKeySecret: field("accessKeySecret"),
    securityToken: field("securityToken"),
    expiresAt: new Date(field("expiration")),
  };
}

const client = await TokenAutoUpdateClient.create(
  new ProjectClient(),
  issueCredential,
  { logLevel: "debug" },
);
client.setRegion("cn-hangzhou");

console.log(await client.operations.listProjects());

await client.close();
