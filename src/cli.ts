#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadCatalog } from "./relay/catalog/catalogXml.js";
import { resolveConfig } from "./relay/config.js";
import { toRelayError } from "./relay/errors.js";
import { createInstaller } from "./relay/installer/index.js";
import { Orchestrator } from "./relay/orchestrator/orchestrator.js";
import {
  EXIT_CODES,
  formatEvent,
  formatResult,
  parseCommandOption,
  parseContextOption,
  parseRunLogOption,
  resultToExitCode
} from "./relay/report.js";

type RunOptions = {
  catalog?: string;
  maxRetries?: string;
  stepTimeout?: string;
  installTimeout?: string;
  killGrace?: string;
  installer?: string;
  context?: string;
  runLog?: string | true;
  dryRun: boolean;
  json: boolean;
  quiet: boolean;
};

const program = new Command();

program
  .name("relay")
  .description("Run a capability pipeline selected from a free-text request")
  .version("0.1.0")
  .argument("<query>", "Free-text request used to select a pipeline")
  .option("--catalog <path>", "Catalog document (defaults to ./relay.catalog.xml or RELAY_CATALOG)")
  .option("--max-retries <n>", "Attempts per step before the pipeline aborts")
  .option("--step-timeout <ms>", "Deadline per capability process in ms (0 disables)")
  .option("--install-timeout <ms>", "Deadline per prerequisite install in ms (0 disables)")
  .option("--kill-grace <ms>", "Time between SIGTERM and SIGKILL for stopped processes")
  .option("--installer <command>", "Installer command; the prerequisite name is appended")
  .option("--context <json>", "Initial context as a JSON object")
  .option("--run-log [dir]", "Write a paper trail for the run (defaults to ./.relay/runs)")
  .option("--dry-run", "Print the selected pipeline without running it", false)
  .option("--json", "Output the full JSON result", false)
  .option("--quiet", "Do not print progress to stderr", false)
  .action(async (query: string, opts: RunOptions) => {
    // Setup abort controller for graceful shutdown
    const abortController = new AbortController();
    let cancelled = false;

    const handleSignal = (signal: string) => {
      if (cancelled) {
        // Force exit on second signal
        process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
        process.exit(EXIT_CODES.CANCELLED);
      }
      cancelled = true;
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
      abortController.abort(new Error(`received ${signal}`));
    };

    process.on("SIGINT", () => handleSignal("SIGINT"));
    process.on("SIGTERM", () => handleSignal("SIGTERM"));

    try {
      const config = resolveConfig({
        catalogPath: opts.catalog,
        maxRetries: opts.maxRetries,
        stepTimeoutMs: opts.stepTimeout,
        installTimeoutMs: opts.installTimeout,
        killGraceMs: opts.killGrace,
        runLogDir: parseRunLogOption(opts.runLog, process.cwd())
      });
      const catalog = loadCatalog(config.catalogPath);
      const installerCommand = parseCommandOption(opts.installer) ?? catalog.installer;
      const orchestrator = new Orchestrator(catalog, {
        installer: createInstaller(installerCommand, catalog.baseDir)
      });

      if (opts.dryRun) {
        const selection = orchestrator.select(query);
        if (selection.pipeline === null) {
          process.stderr.write(chalk.yellow(`⚠ No pipeline matches: "${query}"\n`));
          process.exit(EXIT_CODES.NO_MATCH);
        }
        process.stdout.write(`${selection.pipeline} (matched "${selection.matchedTerm}")\n`);
        selection.steps.forEach((step, index) => {
          const requires = catalog.capabilities.get(step)?.requires ?? [];
          const suffix = requires.length > 0 ? ` [requires: ${requires.join(", ")}]` : "";
          process.stdout.write(`  ${index + 1}. ${step}${suffix}\n`);
        });
        process.exit(EXIT_CODES.OK);
      }

      const result = await orchestrator.run({
        query,
        context: parseContextOption(opts.context),
        config,
        abortSignal: abortController.signal,
        events: {
          onEvent: (event) => {
            if (opts.quiet) return;
            const line = formatEvent(event);
            if (line !== null) process.stderr.write(`${line}\n`);
          }
        }
      });

      if (opts.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      } else {
        for (const line of formatResult(result)) process.stderr.write(`${line}\n`);
        process.stdout.write(JSON.stringify(result.instance.context, null, 2) + "\n");
      }

      process.exit(resultToExitCode(result));
    } catch (err) {
      const relayErr = toRelayError(err);
      process.stderr.write(chalk.red(`Error: [${relayErr.code}] ${relayErr.message}\n`));
      process.exit(EXIT_CODES.ERROR);
    }
  });

await program.parseAsync(process.argv);
