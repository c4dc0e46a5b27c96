import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

if (!process.env.DATABASE_URL) {
  throw new Error(
    "DATABASE_URL must be set to read the OMOP source tables.",
  );
}

const connectionString = process.env.DATABASE_URL;

// Managed Postgres commonly requires SSL; local dev typically does not.
const shouldUseSsl =
  !connectionString.includes("localhost") &&
  !connectionString.includes("127.0.0.1") &&
  !connectionString.includes("0.0.0.0");

export const pool = new Pool({
  connectionString,
  ...(shouldUseSsl ? { ssl: { rejectUnauthorized: false } } : {}),
  max: 5,
  connectionTimeoutMillis: 8000,
  idleTimeoutMillis: 30000,
  keepAlive: true,
  // Batch process: let the pool drain so the script can exit
  allowExitOnIdle: true,
});

pool.on("error", (err) => {
  console.error("[DB Pool] Unexpected error on idle client:", err.message);
});

pool.on("connect", (client) => {
  // Extract queries scan large event tables
  client.query("SET statement_timeout = 600000").catch((err: Error) => {
    console.warn("[DB Pool] Could not set statement_timeout:", err.message);
  });
});

export async function closePool(): Promise<void> {
  console.log("[DB Pool] Closing connections...");
  await pool.end();
  console.log("[DB Pool] All connections closed");
}

export const db = drizzle(pool, { schema });

function isMessageMatch(message: string, patterns: string[]): boolean {
  const lower = message.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

function readStringField(value: object, field: string): string {
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === "string" ? raw : "";
}

export function isDatabaseConnectionError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  const message = readStringField(error, "message");
  const code = readStringField(error, "code");
  if (
    [
      "ETIMEDOUT",
      "ECONNRESET",
      "ECONNREFUSED",
      "ENOTFOUND",
      "EHOSTUNREACH",
      "EPIPE",
    ].includes(code)
  ) {
    return true;
  }
  if (
    isMessageMatch(message, [
      "connection terminated",
      "connection reset",
      "connection ended",
      "getaddrinfo",
      "timeout",
    ])
  ) {
    return true;
  }
  const inner: unknown = Reflect.get(error, "errors");
  if (Array.isArray(inner)) {
    return inner.some((e: unknown) => isDatabaseConnectionError(e));
  }
  return false;
}

// Retry wrapper for database operations with exponential backoff
export async function withDbRetry<T>(
  operation: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    operationName?: string;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 500,
    maxDelayMs = 5000,
    operationName = "database operation",
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      if (!isDatabaseConnectionError(error) || attempt >= maxRetries) {
        if (attempt > 1) {
          console.error(`[DB Retry] ${operationName} failed after ${attempt} attempts`);
        }
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[DB Retry] ${operationName} attempt ${attempt} failed: ${message}. Retrying in ${delay}ms...`);

      await new Promise(resolve => setTimeout(resolve, delay));
      delay = Math.min(delay * 2, maxDelayMs);
    }
  }
}

// Connection health check
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  } catch (error: unknown) {
    console.warn("[DB Pool] Health check failed:", error instanceof Error ? error.message : String(error));
    return false;
  }
}
