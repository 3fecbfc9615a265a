import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { QcheckConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version }: { version: string } = require("../../package.json");

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`expected a positive integer, received "${value}"`);
  }
  return parsed;
};

const createBaseCommand = (): Command =>
  new Command()
    .name("qcheck")
    .description("Type, ownership and linearity checker for quantum programs")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

export const parseCliArgs = (argv: readonly string[]): QcheckConfig => {
  const program = createBaseCommand();

  program
    .argument("<unit>", "JSON unit file with the definitions to check")
    .option("--emit-typed", "write the checked definitions to stdout")
    .option("--monomorphise", "specialize every root and write the concrete program")
    .option(
      "--max-specialization-depth <n>",
      "longest chain of nested specializations",
      parsePositiveInteger,
    )
    .option("--fail-fast", "stop at the first rejected definition")
    .option("--no-color", "disable colored diagnostics");

  program.parse(["node", "qcheck", ...argv]);
  const opts = program.opts<{
    emitTyped?: boolean;
    monomorphise?: boolean;
    maxSpecializationDepth?: number;
    failFast?: boolean;
    color: boolean;
  }>();
  const [unit] = program.args;

  return {
    unit: unit ?? "",
    emitTyped: opts.emitTyped,
    monomorphise: opts.monomorphise,
    maxSpecializationDepth: opts.maxSpecializationDepth,
    failFast: opts.failFast,
    color: opts.color,
  };
};

export const getConfigFromCli = (): QcheckConfig =>
  parseCliArgs(process.argv.slice(2));
