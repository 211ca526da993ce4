// src/helpers/analysisOptions.ts
import type {
  AnalysisOptions,
  CreditConfig,
  ResultMode,
  SectionMapping,
  SectionRanges,
  SortMetric,
} from "../types/results";
import { httpError } from "../middleware/errorHandler";

const MODES: ResultMode[] = ["marks", "sgpa"];
const METRICS: SortMetric[] = ["total_marks", "total_internal", "total_external", "sgpa"];

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isScalar = (value: unknown): value is string | number =>
  typeof value === "string" || typeof value === "number";

function parseRanges(value: unknown, errors: string[]): SectionRanges | undefined {
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    errors.push("sections.ranges must be an object of section → [start, end]");
    return undefined;
  }

  const ranges: SectionRanges = {};
  for (const [name, bounds] of Object.entries(value)) {
    if (Array.isArray(bounds) && bounds.length === 2 && bounds.every(isScalar)) {
      ranges[name] = [String(bounds[0]), String(bounds[1])];
    } else if (isPlainObject(bounds) && isScalar(bounds.start) && isScalar(bounds.end)) {
      ranges[name] = [String(bounds.start), String(bounds.end)];
    } else {
      errors.push(`sections.ranges.${name} must be [start, end]`);
    }
  }
  return ranges;
}

function parseMapping(value: unknown, errors: string[]): SectionMapping | undefined {
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    errors.push("sections.mapping must be an object of student id → section");
    return undefined;
  }

  const mapping: SectionMapping = {};
  for (const [id, section] of Object.entries(value)) {
    if (isScalar(section)) mapping[id] = String(section);
    else errors.push(`sections.mapping.${id} must be a section name`);
  }
  return mapping;
}

// Range checks on the weights happen in the SGPA engine, which warns instead of failing
function parseCredits(value: unknown, errors: string[]): CreditConfig | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    errors.push("credits must be an object of subject code → credit");
    return undefined;
  }

  const credits: CreditConfig = {};
  for (const [code, weight] of Object.entries(value)) {
    const numeric = typeof weight === "string" && weight.trim() !== "" ? Number(weight) : weight;
    if (typeof numeric === "number" && Number.isFinite(numeric)) credits[code] = numeric;
    else errors.push(`credits.${code} must be a number`);
  }
  return credits;
}

/** Validates a request body into engine options; 400 with every problem found. */
export function parseAnalysisOptions(body: unknown): AnalysisOptions {
  if (body === undefined || body === null) return {};
  if (!isPlainObject(body)) throw httpError(400, "Invalid analysis options", ["body must be an object"]);

  const errors: string[] = [];
  const options: AnalysisOptions = {};

  if (body.sections !== undefined) {
    if (isPlainObject(body.sections)) {
      const ranges = parseRanges(body.sections.ranges, errors);
      const mapping = parseMapping(body.sections.mapping, errors);
      options.sections = { ...(ranges && { ranges }), ...(mapping && { mapping }) };
    } else {
      errors.push("sections must be an object");
    }
  }

  const credits = parseCredits(body.credits, errors);
  if (credits) options.credits = credits;

  if (body.mode !== undefined) {
    const mode = MODES.find((m) => m === body.mode);
    if (mode) options.mode = mode;
    else errors.push(`mode must be one of ${MODES.join(", ")}`);
  }

  if (body.metric !== undefined) {
    const metric = METRICS.find((m) => m === body.metric);
    if (metric) options.metric = metric;
    else errors.push(`metric must be one of ${METRICS.join(", ")}`);
  }

  if (body.subjects !== undefined) {
    if (Array.isArray(body.subjects) && body.subjects.every((s) => typeof s === "string")) {
      options.subjects = body.subjects;
    } else {
      errors.push("subjects must be an array of subject codes");
    }
  }

  if (errors.length) throw httpError(400, "Invalid analysis options", errors);
  return options;
}
