/**
 * `compile` command: write the `.mo` beside a `.po` file
 */

import type { CompileOptions } from "@/types";
import { compileCatalogFile } from "@/catalog/compile";

export function compile(options: CompileOptions): string {
  return compileCatalogFile(options.poFile);
}
