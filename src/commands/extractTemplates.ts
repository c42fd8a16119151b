/**
 * `templates` command: strings found in markup templates
 */

import type { ExtractTemplatesOptions, ExtractionResult } from "@/types";
import { runExtraction } from "./runExtraction";

export function extractTemplates(
  options: ExtractTemplatesOptions,
): ExtractionResult {
  return runExtraction({
    location: options,
    strategy: { kind: "templateSource", suffix: options.suffix },
    outputFile: options.outputFile,
    label: `${options.suffix} templates`,
  });
}
