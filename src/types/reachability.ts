/**
 * Reachability type definitions
 *
 * A reachability strategy answers "is the code or template that uses this
 * string part of the running application?" for a single catalog entry.
 */

/**
 * A resolved object supporting attribute-style traversal.
 */
export interface ReachableHandle {
  /** Returns the named attribute, or undefined if the object has none */
  attribute(name: string): ReachableHandle | undefined;
}

/**
 * Read-only oracle for "what is currently loaded".
 *
 * Supplied by the caller; strategies never inspect how it was populated.
 */
export interface ReachabilitySource {
  /** Returns a handle if the dotted path is directly known, undefined otherwise */
  resolve(dottedPath: string): ReachableHandle | undefined;
}

/**
 * Entry is reachable when a source occurrence maps to a loaded module
 * (or to an attribute path below one).
 */
export type ModulePathStrategy = {
  kind: "modulePath";
  /** Absolute directory module names are expressed relative to */
  packageRoot: string;
  source: ReachabilitySource;
  /** File existence check, defaults to fs.existsSync */
  fileExists?: (filePath: string) => boolean;
};

/**
 * Entry is reachable when a dotted symbol key whose string equals the
 * entry's msgid resolves against the source (e.g. model help texts).
 */
export type DottedSymbolStrategy = {
  kind: "dottedSymbol";
  /** Dotted key → raw string value */
  symbols: Readonly<Record<string, string>>;
  source: ReachabilitySource;
};

/**
 * Entry is reachable when any occurrence path ends with the template suffix.
 */
export type TemplateSourceStrategy = {
  kind: "templateSource";
  /** Defaults to TEMPLATE_SUFFIX */
  suffix?: string;
};

export type ReachabilityStrategy =
  | ModulePathStrategy
  | DottedSymbolStrategy
  | TemplateSourceStrategy;

export type ReachabilityKind = ReachabilityStrategy["kind"];

/**
 * Result of a reachability check.
 *
 * `via` names what matched (module name, symbol key, template path) and is
 * only used for progress logging.
 */
export type ReachabilityVerdict =
  | { reachable: true; via: string }
  | { reachable: false };

/**
 * Loaded-module manifest as read from JSON.
 *
 * Either a list of dotted module names, or a mapping from dotted module
 * name to the attribute paths it exposes (dotted for nested attributes).
 */
export type ModuleManifestRaw = string[] | Record<string, string[]>;
