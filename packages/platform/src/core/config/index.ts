/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * Malformed values throw at startup.
 */

/** What a failed child-relation delete means for the parent's own delete */
export type DeletePolicy = "advisory" | "blocking";

export interface AppConfig {
  database: {
    /** Postgres connection string. Absent → in-memory storage. */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
  };
  relations: {
    deletePolicy: DeletePolicy;
    validateBeforeSave: boolean;
  };
}

function parsePort(raw: string | undefined): number {
  const port = parseInt(raw ?? "4000", 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`API_PORT must be a valid port number, got "${raw}".`);
  }
  return port;
}

function parseDeletePolicy(raw: string | undefined): DeletePolicy {
  const value = raw ?? "advisory";
  if (value !== "advisory" && value !== "blocking") {
    throw new Error(
      `RELATION_DELETE_POLICY must be "advisory" or "blocking", got "${value}".`
    );
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be "true" or "false", got "${raw}".`);
}

/**
 * Loads configuration from process.env.
 * Throws immediately if a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    database: {
      url: env.DATABASE_URL || null,
    },
    api: {
      port: parsePort(env.API_PORT),
      host: env.API_HOST ?? "0.0.0.0",
    },
    relations: {
      deletePolicy: parseDeletePolicy(env.RELATION_DELETE_POLICY),
      validateBeforeSave: parseBoolean(
        "RELATION_VALIDATE_BEFORE_SAVE",
        env.RELATION_VALIDATE_BEFORE_SAVE,
        true
      ),
    },
  };
}
