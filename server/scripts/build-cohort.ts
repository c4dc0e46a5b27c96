import "dotenv/config";
import path from "path";
import { parseArgs } from "util";
import { DEFAULT_CONFIG_PATH, loadCohortConfig } from "../src/cohort/cohortConfig";
import { loadSnapshotSource, type IEventSource } from "../src/cohort/eventSource";
import { runCohortPipeline } from "../src/cohort/cohortPipeline";
import { writeCohortTable, type OutputFormat } from "../src/cohort/render/cohortTableWriter";

const USAGE = `Usage: build-cohort [--config <file>] [--snapshot <file>] [--out <file>] [--format csv|xlsx] --as-of <YYYY-MM-DD>

Reads from DATABASE_URL unless --snapshot points at a JSON extract.`;

function parseFormat(value: string | undefined, outPath: string | undefined): OutputFormat {
  const format = value ?? (outPath?.toLowerCase().endsWith(".xlsx") ? "xlsx" : "csv");
  if (format !== "csv" && format !== "xlsx") {
    throw new Error(`Unsupported format "${format}". Use csv or xlsx.`);
  }
  return format;
}

function parseAsOf(value: string | undefined): string {
  if (!value || !/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(value))) {
    throw new Error(`--as-of (or COHORT_AS_OF) must be a YYYY-MM-DD date, got "${value ?? ""}"`);
  }
  return value;
}

async function buildCohort(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      snapshot: { type: "string" },
      out: { type: "string" },
      format: { type: "string" },
      "as-of": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const config = loadCohortConfig(values.config ?? process.env.COHORT_CONFIG ?? DEFAULT_CONFIG_PATH);
  const asOf = parseAsOf(values["as-of"] ?? process.env.COHORT_AS_OF);
  const format = parseFormat(values.format, values.out);
  const outPath = path.resolve(values.out ?? path.join("output", `${config.name}.${format}`));

  let source: IEventSource;
  let closeSource: () => Promise<void> = async () => {};

  if (values.snapshot) {
    source = loadSnapshotSource(values.snapshot);
  } else {
    // Imported lazily: the db module requires DATABASE_URL at load time
    const { DrizzleEventSource } = await import("../src/cohort/drizzleEventSource");
    const { closePool, isPoolHealthy } = await import("../db");
    closeSource = closePool;
    if (!(await isPoolHealthy())) {
      await closePool();
      throw new Error("Source database is unreachable");
    }
    source = new DrizzleEventSource();
  }

  try {
    console.log(`[build-cohort] Building "${config.name}" as of ${asOf}`);
    const result = await runCohortPipeline(source, config, { asOf });
    const manifest = writeCohortTable(result, config, outPath, format);
    console.log(
      `[build-cohort] Done: ${manifest.rows} rows, ${manifest.summary.outputPersons} persons ` +
      `(${manifest.summary.personsWithoutVisit.length} cohort persons without a linked visit)`
    );
  } finally {
    await closeSource();
  }
}

buildCohort().catch((error: unknown) => {
  console.error("[build-cohort] Failed:", error instanceof Error ? error.message : error);
  console.error(USAGE);
  process.exitCode = 1;
});
