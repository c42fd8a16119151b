/**
 * Entrypoint
 *
 * Usage:
 *   npm run cli -- modules -l ./myapp -p . -m loaded-modules.json
 *   npm run cli -- update -l ./myapp -t translated.json
 *
 * Environment variables (optionally from .env):
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - CATALOG_LANG: Default target language (defaults to bn)
 *   - CATALOG_DOMAIN: Default gettext domain (defaults to django)
 */

import "dotenv/config";
import { runCli } from "./cli";

process.exitCode = runCli(process.argv.slice(2));
