/**
 * `symbols` command: strings attached to loaded symbols (help texts)
 */

import type { ExtractSymbolsOptions, ExtractionResult } from "@/types";
import { loadModuleRegistry, loadSymbolMap } from "@/reachability";
import * as logger from "@/logger";
import { runExtraction } from "./runExtraction";

export function extractSymbols(options: ExtractSymbolsOptions): ExtractionResult {
  const symbols = loadSymbolMap(options.symbolsFile);
  const source = loadModuleRegistry(options.manifestFile);
  logger.debug("Loaded symbol map and module manifest", {
    symbols: Object.keys(symbols).length,
    modules: source.size,
  });

  return runExtraction({
    location: options,
    strategy: { kind: "dottedSymbol", symbols, source },
    outputFile: options.outputFile,
    label: "loaded symbols",
  });
}
