#!/usr/bin/env node
import { readFileSync, writeFileSync } from "node:fs";
import chalk from "chalk";
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { formatScore, logFailures, runBaseline, runBinarize, runDebinarize, runMask, runScore, type CommandResult } from "./commands";
import { resolveConfig, type ConfigOverrides, type TreebankConfig } from "./config";
import { readSentences } from "./corpus";
import { TreebankError } from "./errors";
import { createLogger, type TreebankLogger } from "./logging";

type GlobalArgs = {
  "log-level"?: string;
  top?: string;
};

function readText(path: string): string {
  return readFileSync(path, "utf8");
}

function emit(text: string, outfile: string | undefined): void {
  if (outfile) writeFileSync(outfile, text, "utf8");
  else process.stdout.write(text);
}

function report(logger: TreebankLogger, result: Pick<CommandResult, "failures">): void {
  logFailures(logger, result.failures);
  if (result.failures.length > 0) process.exitCode = 1;
}

function setup(args: GlobalArgs, overrides: ConfigOverrides = {}): { config: TreebankConfig; logger: TreebankLogger } {
  const config = resolveConfig({ ...overrides, topLabel: args.top, logLevel: args["log-level"] });
  return { config, logger: createLogger(config.logLevel) };
}

function withOutput<T>(argv: Argv<T>) {
  return argv.option("output", { alias: "o", type: "string", describe: "output file (default: stdout)" });
}

export function buildCli(argv: string[]) {
  return yargs(argv)
    .scriptName("treebank")
    .usage("Usage:\n  treebank <command> [options]")
    .option("log-level", { type: "string", describe: "error | warn | info | debug" })
    .option("top", { type: "string", describe: "label of the root wrapper node" })
    .command(
      "binarize <input>",
      "binarize a tree file for training",
      (cmd) =>
        withOutput(cmd)
          .positional("input", { type: "string", demandOption: true })
          .option("direction", { type: "string", choices: ["right", "left", "heuristic"] })
          .option("remove-empty", { type: "boolean", default: false, describe: "drop empty elements first" })
          .option("empty-label", { type: "string" })
          .option("mask", { type: "boolean", default: false, describe: "mask rare words after binarizing" })
          .option("min-count", { type: "number" })
          .option("sentinel", { type: "string" }),
      (args) => {
        const { config, logger } = setup(args, {
          direction: args.direction,
          emptyLabel: args["empty-label"],
          minCount: args["min-count"],
          sentinel: args.sentinel,
        });
        const result = runBinarize(readText(args.input), {
          ...config,
          removeEmpty: args["remove-empty"],
          mask: args.mask,
        });
        emit(result.output, args.output);
        report(logger, result);
        logger.info(result.summary);
      },
    )
    .command(
      "debinarize <input>",
      "restore parser output to the original tree form",
      (cmd) =>
        withOutput(cmd)
          .positional("input", { type: "string", demandOption: true })
          .option("words", { type: "string", describe: "sentence file whose words replace masked terminals" }),
      (args) => {
        const { logger } = setup(args);
        const sentences = args.words ? readSentences(readText(args.words)) : undefined;
        const result = runDebinarize(readText(args.input), sentences);
        emit(result.output, args.output);
        report(logger, result);
        logger.info(result.summary);
      },
    )
    .command(
      "mask <input>",
      "replace words seen fewer than min-count times with the sentinel",
      (cmd) =>
        withOutput(cmd)
          .positional("input", { type: "string", demandOption: true })
          .option("min-count", { type: "number" })
          .option("sentinel", { type: "string" }),
      (args) => {
        const { config, logger } = setup(args, { minCount: args["min-count"], sentinel: args.sentinel });
        const result = runMask(readText(args.input), config);
        emit(result.output, args.output);
        report(logger, result);
        logger.info(result.summary);
      },
    )
    .command(
      "score <hypothesis> <gold>",
      "labeled bracket precision, recall and F1",
      (cmd) =>
        cmd
          .positional("hypothesis", { type: "string", demandOption: true })
          .positional("gold", { type: "string", demandOption: true })
          .option("json", { type: "boolean", default: false })
          .option("ignore-labels", { type: "string", array: true, describe: "labels left out of the counts" }),
      (args) => {
        const { config, logger } = setup(args);
        const { score, failures } = runScore(readText(args.hypothesis), readText(args.gold), {
          topLabel: config.topLabel,
          ignoreLabels: args["ignore-labels"] ?? [],
        });
        if (args.json) {
          const { perSentence, errors, ...totals } = score;
          const flagged = errors.map(({ index, error }) => ({ index, message: error.message }));
          console.log(JSON.stringify({ ...totals, perSentence, errors: flagged }, null, 2));
        } else {
          console.log(chalk.green("*** bracket scores ***"));
          console.log(formatScore(score));
        }
        report(logger, { failures });
      },
    )
    .command(
      "baseline <input>",
      "right-branching trees for whitespace-tokenized sentences",
      (cmd) => withOutput(cmd).positional("input", { type: "string", demandOption: true }),
      (args) => {
        const { config, logger } = setup(args);
        const result = runBaseline(readText(args.input), config.topLabel);
        emit(result.output, args.output);
        report(logger, result);
        logger.info(result.summary);
      },
    )
    .demandCommand(1, "Select a command")
    .strict()
    .alias("h", "help")
    .fail((message, error) => {
      if (error) throw error;
      console.error(chalk.red(message));
      process.exit(1);
    });
}

export function main(argv: string[] = hideBin(process.argv)): void {
  try {
    buildCli(argv).parseSync();
  } catch (error) {
    if (!(error instanceof TreebankError)) throw error;
    createLogger().error(error.message);
    process.exitCode = 1;
  }
}

if (require.main === module) main();
