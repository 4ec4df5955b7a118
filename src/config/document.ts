/**
 * Document Shape Validator for hostctl
 *
 * Checks that a parsed configuration document is a mapping whose keys
 * are all declared fields, using AJV. Field values are checked later by
 * the descriptor validator when the record is constructed.
 */

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ConfigError } from '../types.js';

import { documentShapeSchema } from './json-schema.js';
import type { RecordSchema } from './schema.js';

// AJV is CommonJS; under ESM the class is exposed as the default property
const Ajv = AjvModule.default;

/**
 * Validation result returned by the validator.
 */
export interface ShapeResult {
  /** Whether validation passed */
  valid: boolean;
  /** Array of error messages (empty if valid) */
  errors: string[];
}

/**
 * Document shape validator for one record schema.
 */
export class DocumentValidator<T extends Record<string, unknown>> {
  private readonly validateShape: ValidateFunction<T>;

  constructor(schema: RecordSchema) {
    const ajv = new Ajv({
      allErrors: true,
      verbose: true,
      strict: true,
    });

    this.validateShape = ajv.compile<T>(documentShapeSchema(schema));
  }

  /**
   * Validate a document and narrow it to the record input type.
   *
   * @param document - Parsed document
   * @param source - Name used in the error message (usually the file path)
   * @throws ConfigError listing every shape problem
   */
  validate(document: unknown, source: string): T {
    if (this.validateShape(document)) {
      return document;
    }

    const errors = this.formatErrors(this.validateShape.errors ?? []);
    throw new ConfigError(
      `Invalid ${source}:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  /**
   * Validate without throwing.
   */
  check(document: unknown): ShapeResult {
    if (this.validateShape(document)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: this.formatErrors(this.validateShape.errors ?? []) };
  }

  /**
   * Format AJV errors into human-readable messages.
   */
  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((error) => {
      const path = error.instancePath || 'root';
      return `${path}: ${this.getErrorMessage(error)}`;
    });
  }

  /**
   * Get a human-readable message for an AJV error.
   */
  private getErrorMessage(error: ErrorObject): string {
    const params: Record<string, unknown> = error.params;

    switch (error.keyword) {
      case 'additionalProperties':
        return `unexpected property "${String(params['additionalProperty'])}"`;

      case 'type':
        return `expected ${String(params['type'])}, got ${Array.isArray(error.data) ? 'array' : typeof error.data}`;

      default:
        return error.message ?? 'validation failed';
    }
  }
}
