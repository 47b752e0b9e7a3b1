import { z } from "zod";

import { DEFAULT_SHEETS, type SheetLayout } from "@/lib/model/buildModel";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ["true", "false", "1", "0", "yes", "no", ""].includes(v), {
    message: "expected true/false, 1/0 or yes/no",
  })
  .transform((v) => v === "true" || v === "1" || v === "yes");

const headerMap = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string()));

const envSchema = z.object({
  GRAPHQL_ENDPOINT: z.string().url().default("http://localhost:3030/graphql"),
  GRAPHQL_BEARER_TOKEN: z.string().min(1).optional(),
  GRAPHQL_HEADERS: headerMap.optional(),
  DISPATCH_ENABLED: booleanFlag.default("false"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ImporterConfig = {
  endpoint: string;
  /** Sent with every request, besides Content-Type. */
  headers: Record<string, string>;
  /** When false only the envelope files are written. */
  dispatch: boolean;
  timeoutMs: number;
  logLevel: "debug" | "info" | "warn" | "error";
  sheets: SheetLayout;
};

export type ImporterConfigOverrides = Partial<
  Pick<ImporterConfig, "endpoint" | "dispatch" | "timeoutMs" | "logLevel">
>;

// Treat blank variables as unset.
function presentEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }
  return present;
}

/**
 * Builds the run configuration from environment variables, with explicit
 * overrides (command-line flags) taking precedence.
 */
export function loadImporterConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ImporterConfigOverrides = {}
): ImporterConfig {
  const parsed = envSchema.safeParse(presentEnv(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid importer configuration: ${issues}`);
  }

  const vars = parsed.data;
  const headers: Record<string, string> = { ...vars.GRAPHQL_HEADERS };
  if (vars.GRAPHQL_BEARER_TOKEN) {
    headers.Authorization = `Bearer ${vars.GRAPHQL_BEARER_TOKEN}`;
  }

  return {
    endpoint: overrides.endpoint ?? vars.GRAPHQL_ENDPOINT,
    headers,
    dispatch: overrides.dispatch ?? vars.DISPATCH_ENABLED,
    timeoutMs: overrides.timeoutMs ?? vars.REQUEST_TIMEOUT_MS,
    logLevel: overrides.logLevel ?? vars.LOG_LEVEL,
    sheets: { ...DEFAULT_SHEETS },
  };
}
