#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadDiagnosticSettings } from "./config/env";
import { ConfigurationError, InvalidInputError } from "./lib/errors";
import { type DiagnosticDeps, diagnose } from "./services/diagnostics";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export type CliOptions = {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  deps?: Partial<DiagnosticDeps>;
  now?: Date;
};

const consoleIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;

  try {
    const argv = await yargs(args)
      .scriptName("email-diag")
      .usage("$0 <email> [options]\n\nScores the risk of the domain behind an email address.")
      .demandCommand(1, 1, "Provide an email like name@example.com")
      .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Include raw DNS records and the full registration record" })
      .option("abuseipdb-key", { type: "string", describe: "AbuseIPDB API key (or env ABUSEIPDB_KEY)" })
      .option("ipqs-key", { type: "string", describe: "IPQualityScore API key (or env IPQS_KEY)" })
      .option("timeout-ms", { type: "number", describe: "Per-probe timeout (or env PROBE_TIMEOUT_MS)" })
      .option("home-country", { type: "string", describe: "ISO country treated as home (or env HOME_COUNTRY)" })
      .strictOptions()
      .exitProcess(false)
      .fail((message, err) => {
        throw err ?? new InvalidInputError(message);
      })
      .parse();

    const email = argv._[0];
    if (email === undefined) return 0;

    const overrides: Record<string, string> = {};
    if (argv["abuseipdb-key"] !== undefined) overrides.ABUSEIPDB_KEY = argv["abuseipdb-key"];
    if (argv["ipqs-key"] !== undefined) overrides.IPQS_KEY = argv["ipqs-key"];
    if (argv["timeout-ms"] !== undefined) overrides.PROBE_TIMEOUT_MS = String(argv["timeout-ms"]);
    if (argv["home-country"] !== undefined) overrides.HOME_COUNTRY = argv["home-country"];

    const settings = loadDiagnosticSettings({ ...(options.env ?? process.env), ...overrides });
    const result = await diagnose(String(email), { verbose: argv.verbose, settings, deps: options.deps, now: options.now });
    io.stdout(JSON.stringify(result, null, 2));
    return 0;
  } catch (err) {
    if (err instanceof InvalidInputError) {
      io.stderr(JSON.stringify({ error: err.message }));
      return 1;
    }
    if (err instanceof ConfigurationError) {
      io.stderr(JSON.stringify({ error: err.message, issues: err.issues }));
      return 2;
    }
    throw err;
  }
}

if (require.main === module) {
  runCli(hideBin(process.argv)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
