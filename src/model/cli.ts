export enum OptOutputFormat {
  Text = "text",
  Json = "json",
}

export function parseOutputFormat(value: string): OptOutputFormat | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(OptOutputFormat).find((format) => String(format) === normalized);
}

export function parseRegions(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((region) => region.trim().toLowerCase())
    .filter((region) => region.length > 0)
    .filter((region, index, all) => all.indexOf(region) === index);
}

export interface CommandLineOptions {
  project?: string;
  regions: string[];
  output: string;
  concurrency?: string;
  timeout?: string;
  retries?: string;
  apiUrl?: string;
  accessToken?: string;
}
