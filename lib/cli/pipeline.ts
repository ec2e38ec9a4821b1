#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Run the document pipeline locally against the filesystem store.
 *
 * Usage:
 *   npm run pipeline -- ingest <file...>      Upload files and run every stage
 *   npm run pipeline -- status <documentId>   Show where a document is
 */

import fs from "node:fs";
import path from "node:path";
import {
  CachedParameters,
  chainSources,
  envSource,
  loadConfig,
  yamlSource,
  type AppConfig,
} from "../config.js";
import { errorMessage } from "../errors.js";
import { CombineAssembler } from "../pipeline/combine.js";
import { documentIdFromKey } from "../pipeline/types.js";
import { LocalDriver } from "../pipeline/local-driver.js";
import {
  createConsoleProgress,
  createJsonProgress,
  nullProgress,
  type Progress,
} from "../pipeline/runner/index.js";
import { createObjectStore } from "../storage/index.js";

const USAGE = `Usage: npm run pipeline -- <command> [args] [options]

Commands:
  ingest <file...>          Upload files under the raw prefix and run every stage
  status <documentId>       Show the assembly state of a document

Options:
  --config <path>       YAML config file (default: ./config.yaml)
  --json                Print progress as JSON lines
  --quiet               No progress output`;

// Local runs default to the filesystem store
const LOCAL_DEFAULTS = {
  STORAGE_BACKEND: "fs",
  BUCKET_NAME: "local",
};

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;
  const config = await loadConfig(
    new CachedParameters(
      chainSources(
        envSource(process.env),
        yamlSource(flags.configPath ?? path.resolve(process.cwd(), "config.yaml")),
        envSource(LOCAL_DEFAULTS)
      )
    )
  );

  switch (command) {
    case "ingest": {
      if (positional.length === 0) {
        console.error("Usage: npm run pipeline -- ingest <file...>");
        process.exit(1);
      }
      for (const file of positional) {
        if (!fs.existsSync(file)) {
          console.error(`File not found: ${file}`);
          process.exit(1);
        }
      }

      const driver = new LocalDriver(config, {
        store: createObjectStore(config),
        progress: selectProgress(flags),
      });

      for (const file of positional) {
        await driver.upload(path.basename(file), fs.readFileSync(file));
      }
      const deliveries = await driver.drain();
      const failed = deliveries.filter((d) => d.outcome.status === "error");

      console.log();
      for (const file of positional) {
        await printStatus(config, driver.pipeline.assembler, documentIdFromKey(file));
      }
      if (failed.length > 0) {
        console.error(`\n${failed.length} record(s) failed`);
        process.exit(1);
      }
      break;
    }

    case "status": {
      const [documentId] = positional;
      if (!documentId) {
        console.error("Usage: npm run pipeline -- status <documentId>");
        process.exit(1);
      }
      const assembler = new CombineAssembler(createObjectStore(config), config.prefixes);
      await printStatus(config, assembler, documentId);
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

async function printStatus(config: AppConfig, assembler: CombineAssembler, documentId: string) {
  const state = await assembler.status(documentId);
  switch (state.state) {
    case "splitting":
      console.log(`${documentId}: no manifest yet`);
      break;
    case "assembling":
      console.log(
        `${documentId}: ${state.pageCount - state.missingPages.length}/${state.pageCount} pages` +
          (state.missingPages.length > 0 ? `, missing ${state.missingPages.join(", ")}` : "")
      );
      break;
    case "complete":
      console.log(
        `${documentId}: complete (${state.pageCount} pages) -> ${config.prefixes.textDocs}${documentId}.json`
      );
      break;
  }
}

interface ParsedFlags {
  positional: string[];
  configPath?: string;
  json: boolean;
  quiet: boolean;
}

function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  let configPath: string | undefined;
  let json = false;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--quiet") {
      quiet = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, configPath, json, quiet };
}

function selectProgress(flags: ParsedFlags): Progress {
  if (flags.quiet) return nullProgress;
  return flags.json ? createJsonProgress() : createConsoleProgress();
}

main().catch((err: unknown) => {
  console.error("\nPipeline failed:", errorMessage(err));
  process.exit(1);
});
