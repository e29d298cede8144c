import { COMPUTE_API_URL, SCAN_DEFAULTS } from "../constant.js";
import { CommandLineOptions, parseOutputFormat } from "../model/cli.js";
import { ValidationError } from "../model/error/ValidationError.js";
import { ScanOptions } from "../model/scan.js";
import { log } from "./logger.js";

// Project IDs: 6-30 characters, lowercase letters, digits and hyphens, starting with a letter
const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/;
const REGION_PATTERN = /^[a-z]+(?:-[a-z]+)*\d+$/;

function parseInteger(
  value: string | undefined,
  fallback: number,
  name: string,
  minimum: number,
  errors: string[],
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    errors.push(`Detected invalid ${name}: ${value} (expected an integer >= ${minimum}).`);
    return fallback;
  }
  return parsed;
}

function validateApiUrl(value: string | undefined, errors: string[]): string {
  const apiUrl = value && value.trim() !== "" ? value.trim() : COMPUTE_API_URL;

  try {
    const url = new URL(apiUrl);
    if (url.protocol !== "https:" && url.protocol !== "http:") {
      errors.push(`Detected invalid api url protocol: ${url.protocol}`);
    }
  } catch {
    errors.push(`Detected invalid api url: ${apiUrl}`);
  }

  return apiUrl.replace(/\/+$/, "");
}

export function validateAndParseOptions(options: CommandLineOptions): ScanOptions {
  const errors: string[] = [];

  const projectId = options.project?.trim() ?? "";
  if (projectId === "") {
    errors.push("Detected missing project parameter.");
  } else if (!PROJECT_ID_PATTERN.test(projectId)) {
    errors.push(`Detected invalid project id: ${projectId}`);
  }

  for (const region of options.regions) {
    if (!REGION_PATTERN.test(region)) {
      errors.push(`Detected invalid region: ${region}`);
    }
  }

  const outputFormat = parseOutputFormat(options.output);
  if (!outputFormat) {
    errors.push(`Detected invalid output format: ${options.output}`);
  }

  const concurrency = parseInteger(options.concurrency, SCAN_DEFAULTS.CONCURRENCY, "concurrency", 1, errors);
  const timeoutMs = parseInteger(options.timeout, SCAN_DEFAULTS.TIMEOUT_MS, "timeout", 1, errors);
  const retries = parseInteger(options.retries, SCAN_DEFAULTS.RETRIES, "retries", 0, errors);
  const apiUrl = validateApiUrl(options.apiUrl, errors);

  if (errors.length > 0 || !outputFormat) {
    throw ValidationError.fromErrors(errors);
  }

  log.debug(`Scan configuration: project=${projectId}, regions=${options.regions.join(",") || "none"}`);

  return {
    projectId,
    regions: options.regions,
    outputFormat,
    concurrency,
    timeoutMs,
    retries,
    apiUrl,
    accessToken: options.accessToken?.trim() || undefined,
  };
}
