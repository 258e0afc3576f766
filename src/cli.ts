/**
 * State Graph — CLI Commands
 */

import type { Command } from "commander";
import { createNameNormalizer, toAddress } from "./address.js";
import { loadConfig, type StateGraphConfig } from "./config.js";
import { inferDependencies } from "./deps.js";
import { explainDiff, normalizeDiff } from "./diff.js";
import { ConfigError } from "./errors.js";
import { createLogger, isLogLevel, type Logger } from "./logging.js";
import {
  readDepMapFile,
  readDiffFile,
  readStateFile,
  readTransformFile,
  writeDiffFile,
  writeStateFile,
} from "./state-file.js";
import { applyTransform, applyTransformToDiff, inverseTransform, normalizeStateKeys } from "./transform.js";

interface Runtime {
  config: StateGraphConfig;
  logger: Logger;
}

type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

export function createStateGraphCli() {
  return (program: Command) => {
    program
      .option("--config <file>", "Path to a JSON config file")
      .option("--log-level <level>", "Log level (trace, debug, info, warn, error, fatal)");

    const runtime = (): Runtime => {
      const opts = program.opts<GlobalOptions>();
      const config = loadConfig({ file: opts.config });
      const level = opts.logLevel ?? config.logging.level;
      if (!isLogLevel(level)) throw new ConfigError(`invalid log level "${level}"`);
      const logger = createLogger("stategraph", {
        level,
        timestamps: config.logging.timestamps,
        colors: config.logging.colors,
      });
      return { config, logger };
    };

    // ── list ────────────────────────────────────────────────────
    program
      .command("list")
      .description("List resource addresses and their dependencies")
      .argument("<state>", "State file (- for stdin)")
      .option("--json", "Output as JSON")
      .action((file: string, opts: { json?: boolean }) => {
        const { config } = runtime();
        const graph = readStateFile(file, config.io);
        const rows = [...graph.resources()].map(({ module, key, record }) => ({
          address: toAddress(module.path, key),
          dependencies: record.dependencies,
        }));
        rows.sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));

        if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        for (const r of rows) {
          console.log(r.dependencies.length > 0 ? `${r.address} -> ${r.dependencies.join(", ")}` : r.address);
        }
      });

    // ── transform ───────────────────────────────────────────────
    program
      .command("transform")
      .description("Rename, move, merge or delete resources by address")
      .argument("<state>", "State file (- for stdin)")
      .requiredOption("--map <file>", "JSON transform: source address -> destination address (\"\" deletes)")
      .option("-o, --out <file>", "Output state file", "-")
      .action((file: string, opts: { map: string; out: string }) => {
        const { config, logger } = runtime();
        const graph = readStateFile(file, config.io);
        const transform = readTransformFile(opts.map, config.io);
        const summary = applyTransform(graph, transform, { logger: logger.child("transform") });
        graph.serial++;
        writeStateFile(opts.out, graph);
        logger.info("transform complete", { ...summary });
      });

    // ── inverse ─────────────────────────────────────────────────
    program
      .command("inverse")
      .description("Print the inverse of a transform, if it has one")
      .requiredOption("--map <file>", "JSON transform")
      .action((opts: { map: string }) => {
        const { config } = runtime();
        const inverse = inverseTransform(readTransformFile(opts.map, config.io));
        if (!inverse) {
          console.error("transform has no inverse");
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify(inverse, null, 2));
      });

    // ── infer ───────────────────────────────────────────────────
    program
      .command("infer")
      .description("Infer missing dependencies from a rule table")
      .argument("<state>", "State file (- for stdin)")
      .requiredOption("--rules <file>", "JSON dependency rule table")
      .option("--permissive", "Skip ambiguous rules instead of failing")
      .option("-o, --out <file>", "Output state file", "-")
      .action((file: string, opts: { rules: string; permissive?: boolean; out: string }) => {
        const { config, logger } = runtime();
        const graph = readStateFile(file, config.io);
        const rules = readDepMapFile(opts.rules, config.io);
        const summary = inferDependencies(graph, rules, {
          onAmbiguousSource: opts.permissive ? "skip" : config.inference.onAmbiguousSource,
          logger: logger.child("deps"),
        });
        graph.serial++;
        writeStateFile(opts.out, graph);
        logger.info("inference complete", {
          updated: summary.updated,
          added: summary.added,
          skipped: summary.skipped.length,
        });
      });

    // ── norm-keys ───────────────────────────────────────────────
    program
      .command("norm-keys")
      .description("Rename managed resources after their provider and id")
      .argument("<state>", "State file (- for stdin)")
      .option("--apply", "Apply the renames and write the state")
      .option("-o, --out <file>", "Output file", "-")
      .action((file: string, opts: { apply?: boolean; out: string }) => {
        const { config, logger } = runtime();
        const graph = readStateFile(file, config.io);
        const transform = normalizeStateKeys(graph, createNameNormalizer()) ?? {};
        if (!opts.apply) {
          console.log(JSON.stringify(transform, null, 2));
          return;
        }
        applyTransform(graph, transform, { logger: logger.child("transform") });
        graph.serial++;
        writeStateFile(opts.out, graph);
      });

    // ── diff-transform ──────────────────────────────────────────
    program
      .command("diff-transform")
      .description("Apply a transform to a diff")
      .argument("<diff>", "Diff file (- for stdin)")
      .requiredOption("--map <file>", "JSON transform")
      .option("-o, --out <file>", "Output diff file", "-")
      .action((file: string, opts: { map: string; out: string }) => {
        const { config, logger } = runtime();
        const diff = readDiffFile(file, config.io);
        applyTransformToDiff(diff, readTransformFile(opts.map, config.io), { logger: logger.child("transform") });
        writeDiffFile(opts.out, diff);
      });

    // ── explain ─────────────────────────────────────────────────
    program
      .command("explain")
      .description("Describe a diff in human-readable form")
      .argument("<diff>", "Diff file (- for stdin)")
      .action((file: string) => {
        const { config } = runtime();
        const text = explainDiff(normalizeDiff(readDiffFile(file, config.io)));
        console.log(text === "" ? "No differences." : text);
      });
  };
}
