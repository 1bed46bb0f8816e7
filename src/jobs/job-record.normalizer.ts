import { JobRecord } from "../shared/types/job.types";
import { toText } from "../shared/utils/text.util";
import { parseSalaryAmount } from "./parsers/salary.parser";

/**
 * Turns loosely shaped input (a parsed JSON file, a storage row) into a
 * JobRecord. Missing fields get neutral defaults: empty strings, salary 0,
 * no requirements. Requirements may be a list or a comma-separated string.
 */
export function normalizeJobRecord(input: unknown): JobRecord {
  const source = isRecord(input) ? input : {};
  const id = toText(source.id) || (typeof source.id === "number" ? String(source.id) : "");
  const culture = toText(source.culture);

  const record: JobRecord = {
    title: toText(source.title),
    company: toText(source.company),
    location: toText(source.location),
    salary: normalizeSalary(source.salary),
    industry: toText(source.industry),
    description: toText(source.description),
    requirements: normalizeRequirements(source.requirements),
  };
  if (id) {
    record.id = id;
  }
  if (culture) {
    record.culture = culture;
  }
  return record;
}

export function normalizeJobRecords(input: unknown): JobRecord[] {
  if (!Array.isArray(input)) {
    return [];
  }
  return input.map((item: unknown) => normalizeJobRecord(item));
}

function normalizeRequirements(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
  const output: string[] = [];
  for (const item of items) {
    const text = toText(item);
    if (text && !output.includes(text)) {
      output.push(text);
    }
  }
  return output;
}

function normalizeSalary(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.round(value) : 0;
  }
  // Free-text figures ("45K", "€45,000") go through the salary parser.
  return typeof value === "string" ? (parseSalaryAmount(value) ?? 0) : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
