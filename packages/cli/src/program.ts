/**
 * TableDB command-line program
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createInterface } from "node:readline/promises";
import { parseTableSchema, unwrap, type Database, type JsonRecord } from "@tabledb/sdk";
import {
  IMPORT_MODES,
  isImportMode,
  parseChanges,
  parseNonNegativeInt,
  parsePipeline,
  parseWhere,
  toArray,
  toRecord,
} from "./lib/arg.js";
import { withDatabase, type GlobalOptions } from "./lib/database.js";
import { isStdinTTY, readJsonFromFile, readJsonInput } from "./lib/io.js";
import {
  colorize,
  databaseInfoLines,
  printJson,
  printLines,
  tableInfoLines,
} from "./lib/render.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { timeCommand } from "./lib/telemetry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    return String(manifest.version);
  }
  return "0.0.0";
}

type WhereOptions = { where?: JsonRecord };
type SelectCommandOptions = WhereOptions & { limit?: number; offset?: number; raw?: boolean };

/**
 * Build the command tree. Errors propagate out of `parseAsync`; see `run`.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("tabledb")
    .description("TableDB - single-file document store with schemas, indexes and transactions")
    .version(readVersion())
    .option("--db <path>", "Database file")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  /** Print a status line unless --quiet */
  const say = (message: string): void => {
    if (!globals().quiet) {
      console.log(message);
    }
  };

  /** Run a command body against the database with timing */
  const command = <T>(label: string, fn: (db: Database) => Promise<T> | T): Promise<T> =>
    timeCommand(label, () => withDatabase(globals(), fn));

  const whereOption = () =>
    new Option("--where <json>", "Condition as a JSON object").argParser(parseWhere);

  // Tables

  program
    .command("create-table <name>")
    .description("Create a table, optionally with a schema")
    .option("--schema <file>", "Read the table schema from a JSON file")
    .action(async (name: string, options: { schema?: string }) => {
      const schema =
        options.schema !== undefined
          ? parseTableSchema(await readJsonFromFile(options.schema))
          : undefined;

      await command("create-table", (db) => {
        if (!unwrap(db.createTable(name, schema))) {
          throw new CliError(`Table '${name}' already exists`);
        }
      });
      say(`Created table ${name}`);
    });

  program
    .command("drop-table <name>")
    .description("Drop a table with its schema and indexes")
    .option("--force", "Drop without confirmation")
    .action(async (name: string, options: { force?: boolean }) => {
      if (!options.force) {
        if (!isStdinTTY()) {
          throw new CliError("Use --force to confirm dropping in non-interactive mode");
        }
        const rl = createInterface({ input: process.stdin, output: process.stderr });
        const answer = (await rl.question(`Drop table ${name}? (y/N) `)).trim().toLowerCase();
        rl.close();
        if (answer !== "y") {
          throw new CliError("Aborted by user");
        }
      }

      await command("drop-table", (db) => unwrap(db.dropTable(name)));
      say(`Dropped table ${name}`);
    });

  program
    .command("rename-table <old> <new>")
    .description("Rename a table")
    .action(async (from: string, to: string) => {
      await command("rename-table", (db) => {
        if (!unwrap(db.renameTable(from, to))) {
          throw new CliError(`Table '${to}' already exists`);
        }
      });
      say(`Renamed table ${from} to ${to}`);
    });

  program
    .command("truncate <name>")
    .description("Remove every record of a table")
    .action(async (name: string) => {
      const removed = await command("truncate", (db) => unwrap(db.truncateTable(name)));
      say(`Removed ${removed} record(s) from ${name}`);
    });

  program
    .command("list-tables")
    .description("List tables")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      const tables = await command("list-tables", (db) => db.listTables());
      if (options.json) {
        printJson(tables);
      } else {
        printLines(tables);
      }
    });

  program
    .command("info [table]")
    .description("Show database or table information")
    .option("--json", "Output as JSON")
    .action(async (table: string | undefined, options: { json?: boolean }) => {
      if (table !== undefined) {
        const info = await command("info", (db) => unwrap(db.getTableInfo(table)));
        if (options.json) {
          printJson(info);
          return;
        }
        printLines(tableInfoLines(info));
        return;
      }

      const info = await command("info", (db) => db.getDatabaseInfo());
      if (options.json) {
        printJson(info);
        return;
      }
      printLines(databaseInfoLines(info));
    });

  // Records

  program
    .command("insert <table>")
    .description("Insert a record from --data, --file or stdin")
    .option("--file <path>", "Read the record from a JSON file")
    .option("--data <json>", "Inline JSON record")
    .action(async (table: string, options: { file?: string; data?: string }) => {
      const record = toRecord(await readJsonInput(options), "record");
      const inserted = await command("insert", (db) => unwrap(db.insert(table, record)));
      printJson(inserted);
    });

  program
    .command("select <table>")
    .description("Select matching records")
    .addOption(whereOption())
    .option("--limit <n>", "Maximum results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--offset <n>", "Skip N results", (val) => parseNonNegativeInt(val, "--offset"))
    .option("--raw", "Output raw JSON without formatting")
    .action(async (table: string, options: SelectCommandOptions) => {
      const rows = await command("select", (db) =>
        unwrap(db.select(table, options.where, { limit: options.limit, offset: options.offset }))
      );
      printJson(rows, { raw: options.raw });
    });

  program
    .command("update <table>")
    .description("Update matching records")
    .addOption(whereOption().makeOptionMandatory())
    .requiredOption("--set <json>", "Changes as a JSON object", parseChanges)
    .action(async (table: string, options: WhereOptions & { set: JsonRecord }) => {
      const updated = await command("update", (db) =>
        unwrap(db.update(table, options.where ?? {}, options.set))
      );
      say(`Updated ${updated} record(s)`);
    });

  program
    .command("delete <table>")
    .description("Delete matching records")
    .addOption(whereOption().makeOptionMandatory())
    .action(async (table: string, options: WhereOptions) => {
      const deleted = await command("delete", (db) => unwrap(db.delete(table, options.where ?? {})));
      say(`Deleted ${deleted} record(s)`);
    });

  program
    .command("count <table>")
    .description("Count matching records")
    .addOption(whereOption())
    .action(async (table: string, options: WhereOptions) => {
      console.log(await command("count", (db) => unwrap(db.count(table, options.where))));
    });

  // Indexes

  program
    .command("create-index <table> <column>")
    .description("Create an equality index on a column")
    .action(async (table: string, column: string) => {
      await command("create-index", (db) => {
        if (!unwrap(db.createIndex(table, column))) {
          throw new CliError(`Index on ${table}.${column} already exists`);
        }
      });
      say(`Created index on ${table}.${column}`);
    });

  program
    .command("drop-index <table> <column>")
    .description("Drop a column index")
    .action(async (table: string, column: string) => {
      await command("drop-index", (db) => {
        if (!unwrap(db.dropIndex(table, column))) {
          throw new CliError(`No index on ${table}.${column}`);
        }
      });
      say(`Dropped index on ${table}.${column}`);
    });

  program
    .command("list-indexes <table>")
    .description("List indexed columns of a table")
    .action(async (table: string) => {
      printLines(await command("list-indexes", (db) => unwrap(db.listIndexes(table))));
    });

  // Queries and maintenance

  program
    .command("aggregate <table>")
    .description("Run a $match/$group pipeline")
    .requiredOption("--pipeline <json>", "Stages as a JSON array", parsePipeline)
    .action(async (table: string, options: { pipeline: ReturnType<typeof parsePipeline> }) => {
      printJson(await command("aggregate", (db) => unwrap(db.aggregate(table, options.pipeline))));
    });

  program
    .command("explain <table>")
    .description("Show how a select would be answered")
    .addOption(whereOption())
    .action(async (table: string, options: WhereOptions) => {
      printJson(await command("explain", (db) => unwrap(db.explain(table, options.where))));
    });

  program
    .command("analyze <table>")
    .description("Show per-column statistics")
    .action(async (table: string) => {
      printJson(await command("analyze", (db) => unwrap(db.analyzeTable(table))));
    });

  program
    .command("optimize <table>")
    .description("Rebuild indexes and renumber _id")
    .action(async (table: string) => {
      await command("optimize", (db) => unwrap(db.optimizeTable(table)));
      say(`Optimized table ${table}`);
    });

  program
    .command("vacuum")
    .description("Optimize every table and rewrite the file")
    .action(async () => {
      await command("vacuum", (db) => unwrap(db.vacuum()));
      say("Vacuum complete");
    });

  program
    .command("backup")
    .description("Copy the database file")
    .option("--path <path>", "Backup destination")
    .action(async (options: { path?: string }) => {
      const target = await command("backup", (db) => unwrap(db.backup(options.path)));
      say(`Backup written to ${target}`);
    });

  program
    .command("restore <path>")
    .description("Replace the database with a backup")
    .action(async (source: string) => {
      await command("restore", (db) => unwrap(db.restore(source)));
      say(`Restored from ${source}`);
    });

  // Import / export / statements

  program
    .command("import <table>")
    .description("Import records from a JSON array file")
    .requiredOption("--file <path>", "JSON file holding an array of records")
    .addOption(
      new Option("--mode <mode>", "Import mode").choices(IMPORT_MODES).default("insert")
    )
    .action(async (table: string, options: { file: string; mode: string }) => {
      const mode = options.mode;
      if (!isImportMode(mode)) {
        throw new InvalidArgumentError(`Unknown import mode: ${mode}`);
      }
      const records = toArray(await readJsonFromFile(options.file), `file ${options.file}`);
      const summary = await command("import", (db) =>
        unwrap(db.importRecords(table, records, mode))
      );
      say(
        `Imported ${summary.imported}, skipped ${summary.skipped}, errors ${summary.errors}`
      );
    });

  program
    .command("export <table>")
    .description("Print matching records as JSON")
    .addOption(whereOption())
    .action(async (table: string, options: WhereOptions) => {
      console.log(await command("export", (db) => unwrap(db.exportRecords(table, options.where))));
    });

  program
    .command("exec <statement>")
    .description("Run SELECT COUNT(*) FROM <table> or SHOW TABLES")
    .action(async (statement: string) => {
      const result = await command("exec", (db) => unwrap(db.execute(statement)));
      if (typeof result === "number") {
        console.log(result);
      } else {
        printLines(result);
      }
    });

  return program;
}

/**
 * Parse `argv` and run the selected command
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander writes its own message for parse errors; argument errors
    // raised inside actions are reported here
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }
    const verbose = Boolean(program.opts<GlobalOptions>().verbose);
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapErrorToExitCode(err);
  }
}
