/**
 * Central format module exports
 *
 * Single import point for readers, writers and their utilities.
 */

export { AbstractParser, type ResolvedOptions } from "./abstract-parser";
export * from "./dsv";
