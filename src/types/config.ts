/**
 * Validated generator configuration
 */

import type { FieldSpec, Operation } from "./cdc.js";

export const FORMAT_TYPES = ["raw", "structured", "file"] as const;

export type FormatType = (typeof FORMAT_TYPES)[number];

export type FormatConfig =
  | { type: "raw"; fields: FieldSpec }
  | { type: "structured"; fields: FieldSpec; schemaSubject?: string }
  | { type: "file"; path: string };

export interface CollectionConfig {
  /** Empty string is the default (unnamed) collection. */
  name: string;
  operations: Operation[];
  format: FormatConfig;
}

export interface BurstConfig {
  /** 0 disables bursts. */
  sleepTimeMs: number;
  generateTimeMs: number;
}

export interface GeneratorConfig {
  /** 0 means unlimited. */
  recordCount: number;
  /** Records per second, 0 means unlimited. */
  rate: number;
  /** @deprecated per-record delay, use `rate` */
  readTimeMs: number;
  burst: BurstConfig;
  collections: CollectionConfig[];
  seed?: string | number;
}

/**
 * Configuration as read from a file or flat settings, before validation.
 */
export interface RawFormatConfig {
  type?: string;
  options?: Record<string, string>;
  path?: string;
  schemaSubject?: string;
}

export interface RawCollectionConfig {
  operations?: string | string[];
  format?: RawFormatConfig;
}

export interface RawGeneratorConfig extends RawCollectionConfig {
  recordCount?: number;
  rate?: number;
  readTime?: string | number;
  seed?: string | number;
  burst?: {
    sleepTime?: string | number;
    generateTime?: string | number;
  };
  collections?: Record<string, RawCollectionConfig>;
}
