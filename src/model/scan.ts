import { OptOutputFormat } from "./cli.js";

export interface ScanOptions {
  projectId: string;
  regions: string[];
  outputFormat: OptOutputFormat;
  concurrency: number;
  timeoutMs: number;
  retries: number;
  apiUrl: string;
  accessToken?: string;
}
