#!/usr/bin/env node

/**
 * scanvault CLI entry point
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { isRecord, type GetOptions, type HostRecord, type PassiveRecord, type Sort } from "@scanvault/sdk";
import { withDatabases } from "./lib/databases.js";
import { hostFilter, passiveFilter, type FilterFlags } from "./lib/filters.js";
import { DEBUG_VAR, resolveRoot } from "./lib/env.js";
import { parseList, parseNonNegativeInt, parsePort, parseSort } from "./lib/arg.js";
import { readJsonInput, type JsonSourceOptions } from "./lib/io.js";
import { printJson, colorize } from "./lib/render.js";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

type GlobalOptions = {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface ReadOptions extends FilterFlags {
  fields?: string[];
  sort?: Sort;
  limit?: number;
  skip?: number;
  one?: boolean;
}

interface TopOptions extends FilterFlags {
  topnbr?: number;
  weighted?: boolean;
}

interface StoreOptions extends JsonSourceOptions {
  scanId?: string;
}

interface InsertOptions extends JsonSourceOptions {
  timestamp?: string;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  return isRecord(manifest) && typeof manifest["version"] === "string" ? manifest["version"] : "0.0.0";
}

const program = new Command();

program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    if (err.code !== "commander.help" && err.code !== "commander.version" && err.code !== "commander.helpDisplayed") {
      process.exit(err.exitCode);
    }
    throw err;
  });

program
  .name("scanvault")
  .description("Query and aggregate host scan results and passive observations")
  .version(readVersion())
  .option("--root <path>", "Data directory root")
  .option("--verbose", "Verbose diagnostics and command metrics")
  .option("--quiet", "Suppress non-error output")
  .hook("preAction", () => {
    if (globals().verbose) {
      process.env[DEBUG_VAR] = "1";
    }
  });

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function root(): string {
  return resolveRoot(globals().root);
}

function info(message: string): void {
  if (!globals().quiet) {
    console.error(message);
  }
}

function addressFlags(command: Command): Command {
  return command
    .option("--host <addr>", "Only this address")
    .option("--range <range>", "Only addresses in start-stop or a CIDR network")
    .option("--port <port>", "Only records with this open TCP port", (val) => parsePort(val, "--port"))
    .option("--service <name>", "Only records with this service");
}

function readFlags(command: Command): Command {
  return command
    .option("--fields <paths>", "Comma-separated dotted paths to keep", parseList)
    .option("--sort <keys>", "Sort keys, e.g. addr,starttime:desc", parseSort)
    .option("--limit <n>", "Maximum number of records", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--skip <n>", "Skip N records", (val) => parseNonNegativeInt(val, "--skip"))
    .option("--one", "Print the first record only; exit 2 when there is none");
}

function topFlags(command: Command): Command {
  return command.option("--topnbr <n>", "Number of values (default: 10)", (val) =>
    parseNonNegativeInt(val, "--topnbr")
  );
}

function queryOptions(options: ReadOptions): GetOptions {
  return { fields: options.fields, sort: options.sort, limit: options.limit, skip: options.skip };
}

/**
 * A single record or a list of records
 */
function recordList(input: unknown): Record<string, unknown>[] {
  const items = Array.isArray(input) ? input : [input];
  if (!items.every(isRecord)) {
    throw new InvalidArgumentError("Input must be a JSON object or an array of objects");
  }
  return items;
}

/**
 * Narrow the fields the record types require; the SDK validates the rest
 */
function asHost(record: Record<string, unknown>): HostRecord {
  const { addr, starttime, endtime } = record;
  if (typeof addr !== "string") {
    throw new InvalidArgumentError("Host records need a text addr");
  }
  return { ...record, addr, starttime: timeInput("starttime", starttime), endtime: timeInput("endtime", endtime) };
}

function asPassive(record: Record<string, unknown>): PassiveRecord {
  const { recontype } = record;
  if (typeof recontype !== "string") {
    throw new InvalidArgumentError("Passive records need a recontype");
  }
  return { ...record, recontype };
}

function timeInput(name: string, value: unknown): string | number {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  throw new InvalidArgumentError(`Host records need a ${name} given as epoch seconds or date text`);
}

function printResult(docs: unknown[], one: boolean | undefined): void {
  if (!one) {
    printJson(docs);
    return;
  }
  const [first] = docs;
  if (first === undefined) {
    throw new CliError("No matching record", { exitCode: 2 });
  }
  printJson(first);
}

program
  .command("init")
  .description("Remove every host, scan and passive record")
  .action(async () => {
    await withTiming("cli.init", async () => {
      const dir = root();
      await withDatabases(dir, async ({ hosts, passive }) => {
        await hosts.init();
        await passive.init();
      });
      info(`Initialized databases at ${dir}`);
    });
  });

readFlags(addressFlags(program.command("hosts:get")))
  .description("Print matching host records")
  .option("--country <code>", "Only hosts in this country")
  .action(async (options: ReadOptions) => {
    await withTiming("cli.hosts.get", async () => {
      const docs = await withDatabases(root(), ({ hosts }) =>
        hosts.get(hostFilter(options), { ...queryOptions(options), limit: options.one ? 1 : options.limit })
      );
      printResult(docs, options.one);
    });
  });

addressFlags(program.command("hosts:count"))
  .description("Count matching host records")
  .option("--country <code>", "Only hosts in this country")
  .action(async (options: FilterFlags) => {
    await withTiming("cli.hosts.count", async () => {
      const count = await withDatabases(root(), ({ hosts }) => hosts.count(hostFilter(options)));
      printJson(count);
    });
  });

addressFlags(program.command("hosts:distinct <field>"))
  .description("Print the distinct values of a field over matching hosts")
  .option("--country <code>", "Only hosts in this country")
  .action(async (field: string, options: FilterFlags) => {
    await withTiming("cli.hosts.distinct", async () => {
      const values = await withDatabases(root(), ({ hosts }) =>
        hosts.distinct(field, { filter: hostFilter(options) })
      );
      printJson(values);
    });
  });

topFlags(addressFlags(program.command("hosts:top <field>")))
  .description("Print the most frequent values of a field or pseudo-field over matching hosts")
  .option("--country <code>", "Only hosts in this country")
  .action(async (field: string, options: TopOptions) => {
    await withTiming("cli.hosts.top", async () => {
      const top = await withDatabases(root(), ({ hosts }) =>
        hosts.topvalues(field, { filter: hostFilter(options), topnbr: options.topnbr })
      );
      printJson(top);
    });
  });

program
  .command("hosts:store")
  .description("Store host records read from --file, --data or stdin")
  .option("--file <path>", "Read records from JSON file")
  .option("--data <json>", "Inline JSON record or array of records")
  .option("--scan-id <id>", "Store a scan document and tag every host with its id")
  .action(async (options: StoreOptions) => {
    await withTiming("cli.hosts.store", async () => {
      const records = recordList(await readJsonInput(options)).map(asHost);
      const { scanId } = options;
      const ids = await withDatabases(root(), async ({ hosts }) => {
        if (scanId !== undefined) {
          await hosts.storeScanDoc({ _id: scanId });
        }
        const stored: string[] = [];
        for (const record of records) {
          stored.push(await hosts.storeHost(scanId === undefined ? record : { ...record, scanid: scanId }));
        }
        return stored;
      });
      printJson(ids);
      info(`Stored ${ids.length} host(s)`);
    });
  });

readFlags(addressFlags(program.command("passive:get")))
  .description("Print matching passive records")
  .option("--recontype <type>", "Only records of this kind")
  .option("--sensor <name>", "Only records from this sensor")
  .action(async (options: ReadOptions) => {
    await withTiming("cli.passive.get", async () => {
      const docs = await withDatabases(root(), ({ passive }) =>
        passive.get(passiveFilter(options), { ...queryOptions(options), limit: options.one ? 1 : options.limit })
      );
      printResult(docs, options.one);
    });
  });

program
  .command("passive:insert")
  .description("Record sightings of passive observations read from --file, --data or stdin")
  .option("--file <path>", "Read records from JSON file")
  .option("--data <json>", "Inline JSON record or array of records")
  .option("--timestamp <time>", "Time of the sightings without their own firstseen (default: now)")
  .action(async (options: InsertOptions) => {
    await withTiming("cli.passive.insert", async () => {
      const records = recordList(await readJsonInput(options)).map(asPassive);
      const now = options.timestamp ?? new Date();
      const ids = await withDatabases(root(), async ({ passive }) => {
        const seen: unknown[] = [];
        for (const record of records) {
          const { firstseen = now, lastseen } = record;
          seen.push(await passive.insertOrUpdate(firstseen, record, undefined, lastseen));
        }
        return seen;
      });
      printJson(ids);
      info(`Recorded ${ids.length} sighting(s)`);
    });
  });

topFlags(addressFlags(program.command("passive:top <field>")))
  .description("Print the most frequent values of a field or pseudo-field over matching passive records")
  .option("--recontype <type>", "Only records of this kind")
  .option("--sensor <name>", "Only records from this sensor")
  .option("--weighted", "Weigh each record by its sighting count")
  .action(async (field: string, options: TopOptions) => {
    await withTiming("cli.passive.top", async () => {
      const top = await withDatabases(root(), ({ passive }) =>
        passive.topvalues(field, {
          filter: passiveFilter(options),
          topnbr: options.topnbr,
          distinct: !options.weighted,
        })
      );
      printJson(top);
    });
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) {
      return;
    }
    const exitCode = mapSdkErrorToExitCode(err);
    console.error(`Error: ${formatCliError(err, globals().verbose)}`);
    process.exit(exitCode);
  }
}

await main();
