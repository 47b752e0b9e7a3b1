import { describe, expect, it } from "vitest";

import { loadImporterConfig } from "@/config";
import { DEFAULT_SHEETS } from "@/lib/model/buildModel";

describe("loadImporterConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadImporterConfig({})).toEqual({
      endpoint: "http://localhost:3030/graphql",
      headers: {},
      dispatch: false,
      timeoutMs: 30_000,
      logLevel: "info",
      sheets: DEFAULT_SHEETS,
    });
  });

  it("reads variables and treats blank ones as unset", () => {
    const config = loadImporterConfig({
      GRAPHQL_ENDPOINT: "https://model.test/graphql",
      GRAPHQL_BEARER_TOKEN: "test-secret",
      GRAPHQL_HEADERS: '{"X-Tenant":"demo"}',
      DISPATCH_ENABLED: "Yes",
      REQUEST_TIMEOUT_MS: "5000",
      LOG_LEVEL: " ",
    });

    expect(config.endpoint).toBe("https://model.test/graphql");
    expect(config.headers).toEqual({ "X-Tenant": "demo", Authorization: "Bearer test-secret" });
    expect(config.dispatch).toBe(true);
    expect(config.timeoutMs).toBe(5000);
    expect(config.logLevel).toBe("info");
  });

  it("lets overrides win over the environment", () => {
    const config = loadImporterConfig(
      { DISPATCH_ENABLED: "true", GRAPHQL_ENDPOINT: "https://model.test/graphql" },
      { dispatch: false, endpoint: "http://localhost:4000/graphql" }
    );

    expect(config.dispatch).toBe(false);
    expect(config.endpoint).toBe("http://localhost:4000/graphql");
  });

  it("rejects invalid values", () => {
    expect(() => loadImporterConfig({ DISPATCH_ENABLED: "maybe" })).toThrow(
      "Invalid importer configuration: DISPATCH_ENABLED: expected true/false, 1/0 or yes/no"
    );
    expect(() => loadImporterConfig({ GRAPHQL_HEADERS: "[1" })).toThrow(
      "Invalid importer configuration: GRAPHQL_HEADERS: must be a JSON object"
    );
    expect(() => loadImporterConfig({ REQUEST_TIMEOUT_MS: "-1" })).toThrow(/REQUEST_TIMEOUT_MS/);
  });

  it("gives each config its own sheet layout", () => {
    const config = loadImporterConfig({});
    config.sheets.nodes = "other";
    expect(DEFAULT_SHEETS.nodes).toBe("nodes");
  });
});
