/**
 * Manifest-backed ReachabilitySource
 *
 * The host application dumps what it has loaded (module names and the
 * attributes they expose) into a JSON manifest; this registry answers
 * reachability questions from that snapshot without any global state.
 */

import type {
  ModuleManifestRaw,
  ReachabilitySource,
  ReachableHandle,
} from "@/types";
import {
  ManifestValidationError,
  validateModuleManifest,
} from "@/utils/manifestValidation";
import { readJsonFile } from "@/utils/jsonFile";

/**
 * Node of the name tree. Every listed module, attribute path and the
 * intermediate names between them get a node.
 */
class RegistryNode implements ReachableHandle {
  readonly children = new Map<string, RegistryNode>();
  /** True when the full dotted name is a loaded module or parent package */
  isModule = false;

  attribute(name: string): ReachableHandle | undefined {
    return this.children.get(name);
  }

  child(name: string): RegistryNode {
    let node = this.children.get(name);
    if (node === undefined) {
      node = new RegistryNode();
      this.children.set(name, node);
    }
    return node;
  }
}

/**
 * ReachabilitySource over a static snapshot of loaded modules.
 *
 * `resolve` only succeeds for module names. Registering "a.b.c" also marks
 * "a" and "a.b" as loaded, since a submodule is never loaded without its
 * parent packages. Attribute lookups follow the name tree, so "c" is also
 * reachable as an attribute of "a.b".
 *
 * @example
 * const registry = new ModuleRegistry({ "shop.models": ["Invoice.help_text"] });
 * registry.resolve("shop.models")?.attribute("Invoice") // => handle
 * registry.resolve("shop")                             // => handle (parent package)
 * registry.resolve("shop.models.Invoice")              // => undefined (attribute, not module)
 */
export class ModuleRegistry implements ReachabilitySource {
  private readonly root = new RegistryNode();
  private moduleCount = 0;

  constructor(manifest: ModuleManifestRaw = []) {
    const entries: Array<[string, string[]]> = Array.isArray(manifest)
      ? manifest.map((name): [string, string[]] => [name, []])
      : Object.entries(manifest);

    for (const [moduleName, attributes] of entries) {
      this.register(moduleName, attributes);
    }
  }

  /**
   * Mark a module as loaded, optionally with the attribute paths it exposes.
   */
  register(moduleName: string, attributes: readonly string[] = []): void {
    let moduleNode = this.root;
    for (const segment of moduleName.split(".")) {
      moduleNode = moduleNode.child(segment);
      if (!moduleNode.isModule) {
        moduleNode.isModule = true;
        this.moduleCount++;
      }
    }
    for (const attributePath of attributes) {
      this.nodeFor(moduleNode, attributePath);
    }
  }

  resolve(dottedPath: string): ReachableHandle | undefined {
    let node: RegistryNode | undefined = this.root;
    for (const segment of dottedPath.split(".")) {
      node = node.children.get(segment);
      if (node === undefined) {
        return undefined;
      }
    }
    return node.isModule ? node : undefined;
  }

  get size(): number {
    return this.moduleCount;
  }

  private nodeFor(start: RegistryNode, dottedPath: string): RegistryNode {
    let node = start;
    for (const segment of dottedPath.split(".")) {
      node = node.child(segment);
    }
    return node;
  }
}

/**
 * Load and validate a manifest file into a ModuleRegistry.
 *
 * @throws {ManifestValidationError} If the file is missing, not JSON or malformed
 */
export function loadModuleRegistry(manifestPath: string): ModuleRegistry {
  const raw = readJsonFile(
    manifestPath,
    (reason) => new ManifestValidationError(reason),
  );
  return new ModuleRegistry(validateModuleManifest(raw));
}
