import { Command, CommanderError, Option, OutputConfiguration } from "commander";
import { readFileSync } from "fs";
import path from "path";
import { COMPUTE_API_URL, EXIT_CODES, SCAN_DEFAULTS } from "./constant.js";
import { CommandLineOptions, OptOutputFormat, parseRegions } from "./model/cli.js";
import { TrackerError } from "./model/error/TrackerError.js";
import { ValidationError } from "./model/error/ValidationError.js";
import { ScanOptions } from "./model/scan.js";
import { createControlPlaneClient, runCertificateScan } from "./scan.js";
import { ControlPlaneClient } from "./services/interfaces/controlPlane.js";
import { renderJsonReport, renderTextReport } from "./services/reportRenderer.js";
import { log } from "./util/logger.js";
import { validateAndParseOptions } from "./util/optsValidation.js";

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  output?: Required<Pick<OutputConfiguration, "writeOut" | "writeErr">>;
  createClient?: (options: ScanOptions) => ControlPlaneClient;
  now?: Date;
}

const standardOutput = {
  writeOut: (text: string): void => {
    process.stdout.write(text);
  },
  writeErr: (text: string): void => {
    process.stderr.write(text);
  },
};

function readVersion(): string {
  const packageJson: { version?: string } = JSON.parse(
    readFileSync(path.join(__dirname, "..", "package.json"), "utf-8"),
  );
  return packageJson.version ?? "0.0.0";
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return (
    new Command()
      .name("tls-cert-tracker")
      .description("Reports TLS certificates of HTTPS load balancers that are close to expiry")
      .version(readVersion())
      // Usage errors surface as CommanderError instead of exiting the process
      .exitOverride()
      .addOption(new Option("-p, --project <projectId>", "Cloud project ID").default(env.GOOGLE_CLOUD_PROJECT))
      .option(
        "-r, --regions <regions>",
        "Comma-separated regions whose regional HTTPS proxies are scanned as well",
        parseRegions,
        parseRegions(env.CERT_SCAN_REGIONS),
      )
      .option(
        "-o, --output <format>",
        `Report format. (choices: "${Object.values(OptOutputFormat).join('", "')}")`,
        env.CERT_SCAN_OUTPUT || OptOutputFormat.Text,
      )
      .option(
        "--concurrency <number>",
        "Certificates fetched in parallel",
        env.CERT_SCAN_CONCURRENCY || String(SCAN_DEFAULTS.CONCURRENCY),
      )
      .option(
        "--timeout <ms>",
        "Timeout for a single control plane request",
        env.CERT_SCAN_TIMEOUT_MS || String(SCAN_DEFAULTS.TIMEOUT_MS),
      )
      .option(
        "--retries <number>",
        "Retries after a transient certificate fetch failure",
        env.CERT_SCAN_RETRIES || String(SCAN_DEFAULTS.RETRIES),
      )
      .option("--api-url <url>", "Compute API endpoint", env.COMPUTE_API_URL || COMPUTE_API_URL)
      // No default here, so --help never prints a token taken from the environment
      .option("--access-token <token>", "OAuth access token (defaults to GOOGLE_OAUTH_ACCESS_TOKEN, then ADC)")
  );
}

/**
 * Parses the arguments, runs one scan and writes the report.
 * Resolves to the process exit code: ERROR findings still count as a completed scan.
 */
export async function runCli(args: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const env = dependencies.env ?? process.env;
  const output = dependencies.output ?? standardOutput;
  const program = createProgram(env).configureOutput(output);

  try {
    program.parse(args, { from: "user" });

    const cliOptions = program.opts<CommandLineOptions>();
    const options = validateAndParseOptions({
      ...cliOptions,
      accessToken: cliOptions.accessToken ?? env.GOOGLE_OAUTH_ACCESS_TOKEN,
    });

    const createClient = dependencies.createClient ?? createControlPlaneClient;
    const report = await runCertificateScan(options, createClient(options), dependencies.now);

    output.writeOut(
      options.outputFormat === OptOutputFormat.Json ? renderJsonReport(report) : renderTextReport(report),
    );
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed the usage error, help or version
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_OPTIONS;
    }

    if (error instanceof ValidationError) {
      log.error(error.message);
      if (env.NODE_ENV !== "production") {
        program.outputHelp({ error: true });
      }
    } else {
      log.fatal(String(error));
    }
    return error instanceof TrackerError ? error.getExitCode() : EXIT_CODES.FAILURE;
  }
}
