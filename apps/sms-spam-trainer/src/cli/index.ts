/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export { parseArgs, USAGE, type CliArgs } from "./args.js";
