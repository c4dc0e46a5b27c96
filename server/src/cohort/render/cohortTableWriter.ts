import fs from "fs";
import path from "path";
import { createHash } from "crypto";
import * as XLSX from "xlsx";
import type { CohortConfig } from "../cohortConfig";
import { CALCULATION_FORMULAS } from "../cohortContract";
import type { CohortRunResult, CohortRunSummary } from "../cohortPipeline";
import type { VisitRecord } from "../engines/outputAssembler";

export type CellValue = string | number | null;

export type OutputFormat = "csv" | "xlsx";

export interface ColumnDef {
  header: string;
  value: (row: VisitRecord) => CellValue;
  /** Fixed decimals for numeric cells; integers and flags leave this unset */
  digits?: number;
}

export interface CohortTableManifest {
  cohortName: string;
  asOf: string;
  format: OutputFormat;
  file: string;
  rows: number;
  sha256: string;
  columns: string[];
  summary: CohortRunSummary;
  formulas: typeof CALCULATION_FORMULAS;
}

// ============================================================================
// COLUMNS
// ============================================================================

export function buildColumns(config: CohortConfig): ColumnDef[] {
  const labColumns: ColumnDef[] = config.measurements.map(m => ({
    header: m.name,
    value: r => r.labs[m.name] ?? null,
    digits: m.precision,
  }));

  const exposureColumns: ColumnDef[] = config.exposures.map(e => ({
    header: e.name,
    value: r => r.exposures[e.name] ?? 0,
  }));

  return [
    { header: "person_id", value: r => r.personId },
    { header: "visit_occurrence_id", value: r => r.visitId },
    { header: "patient_site", value: r => r.site },
    { header: "site_description", value: r => r.siteDescription },
    { header: "gender_concept_id", value: r => r.genderConceptId },
    { header: "gender", value: r => r.gender },
    { header: "race_concept_id", value: r => r.raceConceptId },
    { header: "race", value: r => r.race },
    { header: "ethnicity_concept_id", value: r => r.ethnicityConceptId },
    { header: "ethnicity", value: r => r.ethnicity },
    { header: "age_at_admission", value: r => r.ageAtAdmission },
    { header: "age_category", value: r => r.ageCategory },
    { header: "visit_start_date", value: r => r.visitStartDate },
    { header: "visit_ecmo_start_date", value: r => r.ecmoStartDate },
    { header: "visit_ecmo_end_date", value: r => r.ecmoEndDate },
    { header: "visit_ecmo_start_datetime", value: r => r.ecmoStartDatetime },
    { header: "visit_ecmo_end_datetime", value: r => r.ecmoEndDatetime },
    { header: "ecmo_duration_days", value: r => r.ecmoDurationDays },
    { header: "ecmo_duration_hours", value: r => r.ecmoDurationHours, digits: 1 },
    { header: "ecmo_duration_category", value: r => r.ecmoDurationCategory },
    ...labColumns,
    { header: "neutrophil_lymphocyte_ratio", value: r => r.neutrophilLymphocyteRatio, digits: 2 },
    { header: "pao2_fio2_ratio", value: r => r.pfRatio, digits: 1 },
    { header: "map_avg", value: r => r.mapAvg, digits: 1 },
    { header: "sofa_respiratory_score", value: r => r.sofa.respiratory },
    { header: "sofa_coagulation_score", value: r => r.sofa.coagulation },
    { header: "sofa_liver_score", value: r => r.sofa.liver },
    { header: "sofa_neurological_score", value: r => r.sofa.neurological },
    { header: "sofa_cardiovascular_score", value: r => r.sofa.cardiovascular },
    { header: "sofa_total_score", value: r => r.sofa.total },
    { header: "sofa_components_available", value: r => r.sofa.componentsAvailable },
    { header: "sofa_severity_category", value: r => r.sofaSeverityCategory },
    ...exposureColumns,
    { header: "received_any_vasopressor", value: r => r.anyVasopressor },
    { header: "received_crrt", value: r => r.crrt },
    { header: "died", value: r => r.died },
    { header: "death_date", value: r => r.deathDate },
    { header: "died_within_30_days_of_ecmo", value: r => r.diedWithin30DaysOfEcmo },
  ];
}

export function formatCell(value: CellValue, digits?: number): string {
  if (value === null) return "";
  if (typeof value === "number") {
    return digits === undefined ? String(value) : value.toFixed(digits);
  }
  return value;
}

// ============================================================================
// SERIALISATION
// ============================================================================

/** Text cells only, so the CSV carries each column's fixed precision. */
export function toCsv(rows: readonly VisitRecord[], columns: readonly ColumnDef[]): string {
  const aoa: string[][] = [
    columns.map(c => c.header),
    ...rows.map(row => columns.map(c => formatCell(c.value(row), c.digits))),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  return XLSX.utils.sheet_to_csv(sheet);
}

/** Numeric cells stay numeric in the workbook; nulls become empty cells. */
export function toXlsx(rows: readonly VisitRecord[], columns: readonly ColumnDef[], sheetName = "cohort"): Buffer {
  const aoa: CellValue[][] = [
    columns.map(c => c.header),
    ...rows.map(row => columns.map(c => c.value(row))),
  ];
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(aoa), sheetName);
  const written: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(written)) {
    throw new Error("XLSX writer did not return a buffer");
  }
  return written;
}

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function writeCohortTable(
  result: CohortRunResult,
  config: CohortConfig,
  outPath: string,
  format: OutputFormat
): CohortTableManifest {
  const columns = buildColumns(config);
  const content = format === "csv" ? toCsv(result.rows, columns) : toXlsx(result.rows, columns);

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, content);

  const manifest: CohortTableManifest = {
    cohortName: result.summary.cohortName,
    asOf: result.summary.asOf,
    format,
    file: path.basename(outPath),
    rows: result.rows.length,
    sha256: sha256(content),
    columns: columns.map(c => c.header),
    summary: result.summary,
    formulas: CALCULATION_FORMULAS,
  };
  fs.writeFileSync(`${outPath}.manifest.json`, `${JSON.stringify(manifest, null, 2)}\n`);

  console.log(`[CohortTableWriter] Wrote ${manifest.rows} rows to ${outPath} (sha256 ${manifest.sha256.substring(0, 16)})`);
  return manifest;
}
