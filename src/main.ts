/**
 * CLI entrypoint
 *
 * Usage:
 *   npm start -- aggregate --name "MAGNA Real Estate GmbH" --register "HRB 182742"
 *   npm start -- batch data/companies.json --concurrency 2
 *   npm start -- session set linkedin <li_at cookie>
 *   npm start -- session status
 *
 * Results are printed to stdout as JSON, logs go to stderr.
 * Exit code 0 when runs complete (even with failed sources), 1 on an
 * invalid identity, a fatal error, a failed persist or a failed batch entry.
 *
 * Environment variables: see .env.example
 */

import "dotenv/config";
import { existsSync } from "fs";
import { Command } from "commander";
import type { AggregationConfig, AggregationResult, KnownCompany, SourceId } from "@/types";
import { aggregate, aggregateBatch, loadIdentities, loadKnownCompanies } from "@/aggregation";
import type { AggregateDeps } from "@/aggregation";
import { loadAggregationConfig } from "@/config";
import { sourceIdSchema } from "@/config/schemas";
import { SOURCE_IDS } from "@/constants";
import { applyMigrations, closeDb, openDb, sqliteSessionStore } from "@/db";
import { InvalidIdentityError, errorMessage } from "@/errors";
import { sqlitePersistenceSink } from "@/persistence";
import { SessionManager } from "@/sessions";
import { createDefaultAdapters } from "@/sources";
import * as logger from "@/logger";

type AggregateOptions = {
  name?: string;
  register?: string;
  vat?: string;
  persist: boolean;
};

type BatchOptions = {
  concurrency: string;
  persist: boolean;
};

function loadKnown(): KnownCompany[] | undefined {
  const path = process.env.KNOWN_COMPANIES_PATH;
  if (!path || !existsSync(path)) {
    return undefined;
  }
  return loadKnownCompanies(path);
}

/**
 * Open the store and assemble everything one run needs
 */
function createRuntime(persistResults: boolean): { config: AggregationConfig; deps: AggregateDeps } {
  const config = loadAggregationConfig();
  applyMigrations(openDb());

  return {
    config,
    deps: {
      adapters: createDefaultAdapters(),
      sessionManager: new SessionManager(sqliteSessionStore),
      knownCompanies: loadKnown(),
      sink: persistResults ? sqlitePersistenceSink : undefined,
    },
  };
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function outputOf(result: AggregationResult) {
  return {
    record: result.record,
    report: result.report,
    ...(result.persistence?.ok ? { recordId: result.persistence.recordId } : {}),
  };
}

function parseSource(value: string): SourceId {
  const parsed = sourceIdSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unknown source "${value}" (expected one of ${SOURCE_IDS.join(", ")})`);
  }
  return parsed.data;
}

async function runAggregate(options: AggregateOptions): Promise<void> {
  const { config, deps } = createRuntime(options.persist);
  const result = await aggregate(
    { company_name: options.name, registernummer: options.register, ust_idnr: options.vat },
    config,
    deps,
  );

  printJson(outputOf(result));
  if (result.persistence && !result.persistence.ok) {
    process.exitCode = 1;
  }
}

async function runBatch(file: string, options: BatchOptions): Promise<void> {
  const concurrency = Number.parseInt(options.concurrency, 10);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency "${options.concurrency}"`);
  }

  const inputs = loadIdentities(file);
  const { config, deps } = createRuntime(options.persist);
  const entries = await aggregateBatch(inputs, config, deps, concurrency);

  printJson(
    entries.map((entry) =>
      entry.ok ? { input: entry.input, ...outputOf(entry.result) } : { input: entry.input, error: entry.error },
    ),
  );
  if (entries.some((entry) => !entry.ok || (entry.result.persistence && !entry.result.persistence.ok))) {
    process.exitCode = 1;
  }
}

function runSessionSet(sourceArg: string, credential: string): void {
  const source = parseSource(sourceArg);
  applyMigrations(openDb());
  const state = new SessionManager(sqliteSessionStore).refresh(source, credential);
  printJson({ source: state.source, valid: state.valid, lastValidatedAt: state.lastValidatedAt });
}

function runSessionStatus(): void {
  applyMigrations(openDb());
  const manager = new SessionManager(sqliteSessionStore);
  printJson(
    SOURCE_IDS.map((source) => {
      const state = manager.load(source);
      return state
        ? { source, stored: true, valid: state.valid, lastValidatedAt: state.lastValidatedAt }
        : { source, stored: false };
    }),
  );
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name("company-aggregator")
    .description("Aggregate one canonical record of German company facts from several sources");

  program
    .command("aggregate")
    .description("Aggregate one company")
    .option("-n, --name <name>", "Company name")
    .option("-r, --register <registernummer>", "Register number, e.g. \"HRB 182742\"")
    .option("-v, --vat <ust_idnr>", "VAT id (USt-IdNr.), e.g. DE305962143")
    .option("--no-persist", "Do not store the result")
    .action(runAggregate);

  program
    .command("batch")
    .description("Aggregate every identity in a JSON file")
    .argument("<file>", "JSON array of {company_name, registernummer?, ust_idnr?}")
    .option("-c, --concurrency <n>", "Identities aggregated at the same time", "2")
    .option("--no-persist", "Do not store the results")
    .action(runBatch);

  const session = program.command("session").description("Manage source sessions");
  session
    .command("set")
    .description("Store a freshly obtained credential for a source")
    .argument("<source>", SOURCE_IDS.join(" | "))
    .argument("<credential>", "Opaque credential, e.g. the li_at cookie value")
    .action(runSessionSet);
  session.command("status").description("Show stored sessions").action(runSessionStatus);

  return program;
}

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } finally {
    closeDb();
  }
}

main().catch((error: unknown) => {
  if (error instanceof InvalidIdentityError) {
    logger.error("Invalid identity", { error: error.message });
  } else {
    logger.error("Fatal error", {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exitCode = 1;
});
