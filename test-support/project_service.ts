// gRPC service used by tests, serialized as JSON so no generated code is needed.

export type GetProjectRequest = {
  name: string;
};

export type Project = {
  name: string;
  owner: string;
};

function encode(value: unknown): Uint8Array {
  return Buffer.from(JSON.stringify(value), "utf8");
}

function decodeObject(bytes: Uint8Array): Record<string, unknown> {
  const value: unknown = JSON.parse(Buffer.from(bytes).toString("utf8"));
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("expected a JSON object");
  }
  return Object.fromEntries(Object.entries(value));
}

function stringField(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new Error(`expected "${key}" to be a string`);
  }
  return value;
}

export const ProjectServiceDefinition = {
  getProject: {
    path: "/test.ProjectService/GetProject",
    requestStream: false,
    responseStream: false,
    requestSerialize: (value: GetProjectRequest): Uint8Array => encode(value),
    requestDeserialize: (bytes: Uint8Array): GetProjectRequest => ({
      name: stringField(decodeObject(bytes), "name"),
    }),
    responseSerialize: (value: Project): Uint8Array => encode(value),
    responseDeserialize: (bytes: Uint8Array): Project => {
      const obj = decodeObject(bytes);
      return {
        name: stringField(obj, "name"),
        owner: stringField(obj, "owner"),
      };
    },
    options: {},
  },
} as const;
