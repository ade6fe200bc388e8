/**
 * In-memory schema registry using Ajv
 */

import AjvModule from "ajv";
import type { ValidateFunction } from "ajv";
import { SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { PayloadJsonSchema, SchemaRef, SchemaRegistry } from "./types.js";

// ajv is CommonJS; under NodeNext the class sits on the default export's `default`
const Ajv = AjvModule.default;

interface StoredSchema {
  version: number;
  schema: PayloadJsonSchema;
  fingerprint: string;
  validate: ValidateFunction;
}

export class InMemorySchemaRegistry implements SchemaRegistry {
  private readonly ajv = new Ajv({ strict: false, allErrors: true });
  private readonly subjects = new Map<string, StoredSchema[]>();

  async register(subject: string, schema: PayloadJsonSchema): Promise<SchemaRef> {
    const fingerprint = JSON.stringify(schema);
    const versions = this.subjects.get(subject) ?? [];

    const existing = versions.find((v) => v.fingerprint === fingerprint);
    if (existing) {
      return { subject, version: existing.version };
    }

    let validate: ValidateFunction;
    try {
      validate = this.ajv.compile(schema);
    } catch (error) {
      throw new SchemaError(
        `invalid schema for subject "${subject}"`,
        { subject },
        { cause: error },
      );
    }

    const version = versions.length + 1;
    versions.push({ version, schema, fingerprint, validate });
    this.subjects.set(subject, versions);

    logger.debug("Registered payload schema", { subject, version });
    return { subject, version };
  }

  get(ref: SchemaRef): PayloadJsonSchema | undefined {
    return this.find(ref)?.schema;
  }

  /**
   * Validate a payload against a registered schema. The value is normalized
   * through JSON first, so dates are checked as the strings they serialize to.
   *
   * @returns violation messages, empty when the value conforms
   */
  validate(ref: SchemaRef, value: unknown): string[] {
    const stored = this.find(ref);
    if (!stored) {
      throw new SchemaError(
        `unknown schema ${ref.subject} version ${ref.version}`,
        ref,
      );
    }

    const normalized: unknown = JSON.parse(JSON.stringify(value));
    if (stored.validate(normalized)) {
      return [];
    }
    return (stored.validate.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
    );
  }

  private find(ref: SchemaRef): StoredSchema | undefined {
    return this.subjects.get(ref.subject)?.find((v) => v.version === ref.version);
  }
}
