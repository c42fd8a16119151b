/**
 * Command-line dispatcher
 *
 * Parses arguments per command and hands typed options to src/commands.
 * Defaults for --lang and --domain come from CATALOG_LANG / CATALOG_DOMAIN.
 */

import { parseArgs } from "node:util";
import type { CatalogLocation } from "@/types";
import {
  CATALOG_DOMAIN_ENV,
  CATALOG_LANG_ENV,
  DEFAULT_DOMAIN,
  DEFAULT_EXTRACTION_OUTPUT,
  DEFAULT_LANG,
  DEFAULT_TEMPLATE_EXTRACTION_OUTPUT,
  TEMPLATE_SUFFIX,
} from "@/constants";
import {
  compile,
  extractModules,
  extractSymbols,
  extractTemplates,
  update,
} from "@/commands";
import * as logger from "@/logger";
import { describeError } from "@/utils/errors";
import packageJson from "../package.json";

export const USAGE = `Usage: l10n-reach <command> [options]

Extract only the catalog strings your application reaches, and merge
translations back into the catalog.

Commands:
  symbols    Untranslated strings attached to loaded symbols (help texts)
             -l, --locale-root <dir>  (required)
             -s, --symbols <file>     dotted key -> string JSON (required)
             -m, --modules <file>     loaded-module manifest JSON (required)
             -o, --output <file>      default: ${DEFAULT_EXTRACTION_OUTPUT}
  modules    Untranslated strings whose source module is loaded
             -l, --locale-root <dir>  (required)
             -p, --package-root <dir> (required)
             -m, --modules <file>     loaded-module manifest JSON (required)
             -o, --output <file>      default: ${DEFAULT_EXTRACTION_OUTPUT}
  templates  Untranslated strings found in templates
             -l, --locale-root <dir>  (required)
             --suffix <ext>           default: ${TEMPLATE_SUFFIX}
             -o, --output <file>      default: ${DEFAULT_TEMPLATE_EXTRACTION_OUTPUT}
  update     Merge translation JSON files into the catalog and compile it
             -t, --translations <file>  (required, repeatable)
             -l, --locale-root <dir>    (required)
  compile    Compile a .po file into its .mo sibling
             <po-file>

Catalog options (all extraction commands and update):
  -L, --lang <code>      default: $${CATALOG_LANG_ENV} or ${DEFAULT_LANG}
  -d, --domain <name>    default: $${CATALOG_DOMAIN_ENV} or ${DEFAULT_DOMAIN}

  -h, --help             Show this help
  --version              Show version
`;

/**
 * Error for invalid command lines (printed with usage, exit code 1).
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const locationOptions = {
  "locale-root": { type: "string", short: "l" },
  lang: { type: "string", short: "L" },
  domain: { type: "string", short: "d" },
} as const;

type LocationValues = {
  "locale-root"?: string;
  lang?: string;
  domain?: string;
};

function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new UsageError(`Missing required option ${flag}`);
  }
  return value;
}

function readLocation(values: LocationValues): CatalogLocation {
  return {
    localeRoot: required(values["locale-root"], "--locale-root"),
    lang: values.lang || process.env[CATALOG_LANG_ENV] || DEFAULT_LANG,
    domain: values.domain || process.env[CATALOG_DOMAIN_ENV] || DEFAULT_DOMAIN,
  };
}

function dispatch(command: string, args: string[]): void {
  switch (command) {
    case "symbols": {
      const { values } = parseArgs({
        args,
        options: {
          ...locationOptions,
          symbols: { type: "string", short: "s" },
          modules: { type: "string", short: "m" },
          output: { type: "string", short: "o" },
        },
      });
      extractSymbols({
        ...readLocation(values),
        symbolsFile: required(values.symbols, "--symbols"),
        manifestFile: required(values.modules, "--modules"),
        outputFile: values.output || DEFAULT_EXTRACTION_OUTPUT,
      });
      return;
    }
    case "modules": {
      const { values } = parseArgs({
        args,
        options: {
          ...locationOptions,
          "package-root": { type: "string", short: "p" },
          modules: { type: "string", short: "m" },
          output: { type: "string", short: "o" },
        },
      });
      extractModules({
        ...readLocation(values),
        packageRoot: required(values["package-root"], "--package-root"),
        manifestFile: required(values.modules, "--modules"),
        outputFile: values.output || DEFAULT_EXTRACTION_OUTPUT,
      });
      return;
    }
    case "templates": {
      const { values } = parseArgs({
        args,
        options: {
          ...locationOptions,
          suffix: { type: "string" },
          output: { type: "string", short: "o" },
        },
      });
      extractTemplates({
        ...readLocation(values),
        suffix: values.suffix || TEMPLATE_SUFFIX,
        outputFile: values.output || DEFAULT_TEMPLATE_EXTRACTION_OUTPUT,
      });
      return;
    }
    case "update": {
      const { values } = parseArgs({
        args,
        options: {
          ...locationOptions,
          translations: { type: "string", short: "t", multiple: true },
        },
      });
      const translationFiles = values.translations ?? [];
      if (translationFiles.length === 0) {
        throw new UsageError("Missing required option --translations");
      }
      update({ ...readLocation(values), translationFiles });
      return;
    }
    case "compile": {
      const { positionals } = parseArgs({
        args,
        options: {},
        allowPositionals: true,
      });
      const [poFile] = positionals;
      compile({ poFile: required(poFile, "<po-file>") });
      return;
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run the CLI with the given arguments (without node and script path).
 *
 * @returns Process exit code
 */
export function runCli(argv: readonly string[]): number {
  const [command, ...args] = argv;

  if (command === "--version") {
    console.log(`l10n-reach ${packageJson.version}`);
    return 0;
  }
  if (command === undefined || command === "-h" || command === "--help") {
    console.log(USAGE);
    return command === undefined ? 1 : 0;
  }
  if (args.includes("-h") || args.includes("--help")) {
    console.log(USAGE);
    return 0;
  }

  try {
    dispatch(command, args);
    return 0;
  } catch (error) {
    if (error instanceof UsageError || isParseArgsError(error)) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    logger.error("Command failed", {
      command,
      error: describeError(error),
      name: error instanceof Error ? error.name : undefined,
    });
    return 1;
  }
}
