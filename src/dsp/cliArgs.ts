import { CLASSIFICATIONS, INFRASTRUCTURE_TYPES } from "./metadata";
import type { MetadataOverrides, RunStatus } from "./types";

export type GenerateCliArgs = {
  summary?: string;
  output?: string;
  projectName?: string;
  maxConcurrency?: number;
  retrievalK?: number;
  retryLimit?: number;
  noPartial: boolean;
  metadata: MetadataOverrides;
  verbose: boolean;
  version: boolean;
  help: boolean;
};

export const USAGE = `Usage: generate_dsp [options] [summary]

  -s, --summary <id>        summary text, file path, project name, or "-" for stdin
  -o, --output <dir>        output directory (default: DSP_OUTPUT_DIR or ./projects)
  -p, --project-name <name> project name for the document and output folder
      --max-concurrency <n> sections generated at once
      --retrieval-k <n>     reference excerpts per section
      --retry-limit <n>     retries per generation call after the first attempt
      --no-partial          fail the run on the first section failure
  -v, --verbose             debug logging
      --version             print the version and exit
  -h, --help                print this help and exit

Metadata overrides (win over facts extracted from the summary):
      --pi <name>               Principal Investigator
      --uisl <name>             Unit Information Security Lead
      --department <name>       research unit or department
      --classification <level>  ${CLASSIFICATIONS.join(" | ")}
      --cui                     the project involves CUI
      --provider <name>         data provider
      --infrastructure <type>   ${INFRASTRUCTURE_TYPES.join(" | ")}`;

function readCount(flag: string, value: string | undefined, min: number): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < min) {
    throw new Error(`${flag} expects an integer >= ${min}`);
  }
  return n;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-") && value !== "-") {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function readChoice<T extends string>(flag: string, value: string | undefined, choices: readonly T[]): T {
  const wanted = requireValue(flag, value).toLowerCase();
  const match = choices.find((c) => c.toLowerCase() === wanted);
  if (match === undefined) {
    throw new Error(`${flag} expects one of: ${choices.join(", ")}`);
  }
  return match;
}

export function parseGenerateArgs(argv: string[]): GenerateCliArgs {
  const args: GenerateCliArgs = { noPartial: false, metadata: {}, verbose: false, version: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-s":
      case "--summary":
        args.summary = requireValue(arg, argv[++i]);
        break;
      case "-o":
      case "--output":
        args.output = requireValue(arg, argv[++i]);
        break;
      case "-p":
      case "--project-name":
        args.projectName = requireValue(arg, argv[++i]);
        break;
      case "--max-concurrency":
        args.maxConcurrency = readCount(arg, argv[++i], 1);
        break;
      case "--retrieval-k":
        args.retrievalK = readCount(arg, argv[++i], 0);
        break;
      case "--retry-limit":
        args.retryLimit = readCount(arg, argv[++i], 0);
        break;
      case "--no-partial":
        args.noPartial = true;
        break;
      case "--pi":
        args.metadata.piName = requireValue(arg, argv[++i]);
        break;
      case "--uisl":
        args.metadata.uislName = requireValue(arg, argv[++i]);
        break;
      case "--department":
        args.metadata.department = requireValue(arg, argv[++i]);
        break;
      case "--classification":
        args.metadata.classification = readChoice(arg, argv[++i], CLASSIFICATIONS);
        break;
      case "--cui":
        args.metadata.isCui = true;
        break;
      case "--provider":
        args.metadata.dataProvider = requireValue(arg, argv[++i]);
        break;
      case "--infrastructure":
        args.metadata.infrastructure = readChoice(arg, argv[++i], INFRASTRUCTURE_TYPES);
        break;
      case "-v":
      case "--verbose":
        args.verbose = true;
        break;
      case "--version":
        args.version = true;
        break;
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        if (arg !== undefined && !args.summary && (arg === "-" || !arg.startsWith("-"))) {
          args.summary = arg;
        } else {
          throw new Error(`Unknown argument: ${arg}`);
        }
    }
  }
  return args;
}

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case "complete":
      return 0;
    case "partial":
      return 2;
    case "failed":
      return 1;
  }
}
