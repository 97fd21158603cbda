// This example calls a gRPC service through the refresh layer until the
// process receives SIGINT or SIGTERM, which stops the background refresh.

import {
  TokenAutoUpdateClient,
  createGrpcRemoteClient,
  type IssuedCredential,
} from "sts-autorefresh";

type PingRequest = { message: string };
type PingResponse = { message: string };

function encode(value: PingRequest | PingResponse): Uint8Array {
  return Buffer.from(JSON.stringify(value), "utf8");
}

function decodeMessage(bytes: Uint8Array): { message: string } {
  const value: unknown = JSON.parse(Buffer.from(bytes).toString("utf8"));
  const message =
    typeof value === "object" && value !== null
      ? Reflect.get(value, "message")
      : undefined;
  if (typeof message !== "string") {
    throw new Error('expected an object with a string "message"');
  }
  return { message };
}

const PingServiceDefinition = {
  ping: {
    path: "/example.PingService/Ping",
    requestStream: false,
    responseStream: false,
    requestSerialize: (value: PingRequest): Uint8Array => encode(value),
    requestDeserialize: (bytes: Uint8Array): PingRequest =>
      decodeMessage(bytes),
    responseSerialize: (value: PingResponse): Uint8Array => encode(value),
    responseDeserialize: (bytes: Uint8Array): PingResponse =>
      decodeMessage(bytes),
    options: {},
  },
} as const;

const shutdown = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => shutdown.abort());
}

// Stand-in issuer; a real one would call an STS AssumeRole endpoint.
async function issueCredential(): Promise<IssuedCredential> {
  return {
    accessKeyId: process.env.ACCESS_KEY_ID ?? "example-key",
    accessKeySecret: process.env.ACCESS_KEY_SECRET ?? "example-secret",
    securityToken: process.env.SECURITY_TOKEN ?? "",
    expiresAt: new Date(Date.now() + 15 * 60_000),
  };
}

const grpc = createGrpcRemoteClient(PingServiceDefinition, {
  address: process.env.PING_ADDRESS ?? "127.0.0.1:50051",
  timeoutMs: 5_000,
});
const client = await TokenAutoUpdateClient.create(grpc, issueCredential, {
  shutdownSignal: shutdown.signal,
});
const rpc = client.wrap(grpc.rpc);

while (!shutdown.signal.aborted) {
  const reply = await rpc.ping({ message: "hello" });
  console.log(reply.message);
  await new Promise((resolve) => setTimeout(resolve, 10_000));
}

await client.close();
grpc.close();
