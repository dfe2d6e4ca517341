import { describe, it, expect } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      database: { url: null },
      api: { port: 4000, host: "0.0.0.0" },
      relations: { deletePolicy: "advisory", validateBeforeSave: true },
    });
  });

  it("reads every supported variable", () => {
    const config = loadConfig({
      DATABASE_URL: "postgres://localhost:5432/keepsync",
      API_PORT: "8080",
      API_HOST: "127.0.0.1",
      RELATION_DELETE_POLICY: "blocking",
      RELATION_VALIDATE_BEFORE_SAVE: "false",
    });

    expect(config.database.url).toBe("postgres://localhost:5432/keepsync");
    expect(config.api).toEqual({ port: 8080, host: "127.0.0.1" });
    expect(config.relations).toEqual({ deletePolicy: "blocking", validateBeforeSave: false });
  });

  it("throws on a malformed port", () => {
    expect(() => loadConfig({ API_PORT: "http" })).toThrow(
      'API_PORT must be a valid port number, got "http".'
    );
  });

  it("throws on an unknown delete policy", () => {
    expect(() => loadConfig({ RELATION_DELETE_POLICY: "strict" })).toThrow(
      'RELATION_DELETE_POLICY must be "advisory" or "blocking", got "strict".'
    );
  });

  it("throws on a malformed boolean", () => {
    expect(() => loadConfig({ RELATION_VALIDATE_BEFORE_SAVE: "yes" })).toThrow(
      'RELATION_VALIDATE_BEFORE_SAVE must be "true" or "false", got "yes".'
    );
  });
});
