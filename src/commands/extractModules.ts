/**
 * `modules` command: strings whose source module is loaded
 */

import type { ExtractModulesOptions, ExtractionResult } from "@/types";
import { createModulePathStrategy, loadModuleRegistry } from "@/reachability";
import * as logger from "@/logger";
import { runExtraction } from "./runExtraction";

export function extractModules(options: ExtractModulesOptions): ExtractionResult {
  const source = loadModuleRegistry(options.manifestFile);
  const strategy = createModulePathStrategy(options.packageRoot, source);
  logger.debug("Loaded module manifest", {
    modules: source.size,
    packageRoot: strategy.packageRoot,
  });

  return runExtraction({
    location: options,
    strategy,
    outputFile: options.outputFile,
    label: "imported modules",
  });
}
