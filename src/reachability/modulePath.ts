/**
 * Module-path reachability
 *
 * An entry is reachable when one of its recorded source files maps to a
 * module the ReachabilitySource knows, either directly or as an attribute
 * path below a known prefix.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CatalogEntry,
  ModulePathStrategy,
  ReachabilitySource,
  ReachabilityVerdict,
} from "@/types";
import { MODULE_SOURCE_EXTENSIONS } from "@/constants";
import { PackageRootUnresolvableError } from "@/catalog/errors";
import * as logger from "@/logger";
import { describeError } from "@/utils/errors";
import { resolveByLongestPrefix } from "./dottedPath";

/**
 * Convert a source file path into a dotted module name.
 *
 * A known source extension is stripped. Paths under the package root are
 * expressed relative to it with separators replaced by dots. Paths outside
 * the root fall back to the bare file name without extension; that name can
 * collide with unrelated modules and is only a weak signal.
 *
 * @example
 * moduleNameForPath("/srv/app/shop/models.py", "/srv/app") // => "shop.models"
 * moduleNameForPath("/elsewhere/utils.py", "/srv/app")     // => "utils"
 */
export function moduleNameForPath(filePath: string, packageRoot: string): string {
  const extension = path.extname(filePath);
  const withoutExtension = MODULE_SOURCE_EXTENSIONS.includes(extension)
    ? filePath.slice(0, -extension.length)
    : filePath;

  const relative = path.relative(packageRoot, withoutExtension);
  const outsideRoot =
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative);

  if (outsideRoot) {
    return path.parse(withoutExtension).name;
  }
  return relative.split(/[\\/]+/).join(".");
}

/**
 * Build a module-path strategy after checking the package root.
 *
 * @param packageRoot - Directory occurrence paths are resolved against
 * @throws {PackageRootUnresolvableError} If the root is missing or not a directory
 */
export function createModulePathStrategy(
  packageRoot: string,
  source: ReachabilitySource,
): ModulePathStrategy {
  const absoluteRoot = path.resolve(packageRoot);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(absoluteRoot);
  } catch (err) {
    throw new PackageRootUnresolvableError(absoluteRoot, describeError(err));
  }
  if (!stats.isDirectory()) {
    throw new PackageRootUnresolvableError(absoluteRoot, "not a directory");
  }

  return { kind: "modulePath", packageRoot: absoluteRoot, source };
}

/**
 * Check one entry against the module-path strategy.
 *
 * Occurrences whose file is missing are skipped, never fatal. The first
 * occurrence that resolves decides; later ones are not checked.
 */
export function checkModulePath(
  entry: CatalogEntry,
  strategy: ModulePathStrategy,
): ReachabilityVerdict {
  const fileExists = strategy.fileExists ?? fs.existsSync;

  for (const occurrence of entry.occurrences) {
    const filePath = path.isAbsolute(occurrence.path)
      ? occurrence.path
      : path.resolve(strategy.packageRoot, occurrence.path);

    if (!fileExists(filePath)) {
      logger.warn("File does not exist, skipping occurrence", {
        file: filePath,
        line: occurrence.line,
      });
      continue;
    }

    const moduleName = moduleNameForPath(filePath, strategy.packageRoot);
    logger.debug("Resolved occurrence to module", {
      file: occurrence.path,
      module: moduleName,
    });

    if (resolveByLongestPrefix(moduleName, strategy.source) !== undefined) {
      return { reachable: true, via: moduleName };
    }
  }

  return { reachable: false };
}
