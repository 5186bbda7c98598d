import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { FIELD_NAMES, type FieldName } from '../core/types.js';

/**
 * JSON Schema Validator
 *
 * Validates the JSON files the pipeline reads (sections interchange file,
 * rule-check configuration) before any processing touches them.
 */

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors: string[];
  data?: T;
}

/**
 * Compiled validator bound to one schema
 */
export class SchemaValidator<T> {
  private validateFn: ValidateFunction<T>;

  constructor(schema: SchemaObject) {
    this.validateFn = ajv.compile<T>(schema);
  }

  validate(data: unknown): ValidationResult<T> {
    if (this.validateFn(data)) {
      return { valid: true, errors: [], data };
    }

    return {
      valid: false,
      errors: formatErrors(this.validateFn.errors),
    };
  }
}

/**
 * Format validation errors as readable lines
 */
function formatErrors(errors?: ErrorObject[] | null): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || 'root';
    const message = error.message || 'validation failed';
    return `${path}: ${message}`;
  });
}

/**
 * Sections file as written by the extraction stage.
 * Everything is optional here; defaults are applied by the loader.
 */
export interface RawSection {
  title?: string | null;
  text?: string | null;
}

export interface RawSectionsDocument {
  sections?: RawSection[] | null;
}

const sectionsDocumentSchema: SchemaObject = {
  type: 'object',
  properties: {
    sections: {
      type: ['array', 'null'],
      items: {
        type: 'object',
        properties: {
          title: { type: ['string', 'null'] },
          text: { type: ['string', 'null'] },
        },
      },
    },
  },
};

/**
 * Rule-check configuration file (config/rule-checks.json)
 */
export interface RuleCheckFile {
  keywords: Record<FieldName, string[]>;
  rules: Array<{ rule: string; field: FieldName }>;
}

const keywordListSchema = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
};

const ruleCheckFileSchema: SchemaObject = {
  type: 'object',
  required: ['keywords', 'rules'],
  properties: {
    keywords: {
      type: 'object',
      required: [...FIELD_NAMES],
      properties: Object.fromEntries(FIELD_NAMES.map((field) => [field, keywordListSchema])),
      additionalProperties: false,
    },
    rules: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['rule', 'field'],
        properties: {
          rule: { type: 'string', minLength: 1 },
          field: { enum: [...FIELD_NAMES] },
        },
      },
    },
  },
};

export const sectionsDocumentValidator = new SchemaValidator<RawSectionsDocument>(
  sectionsDocumentSchema
);

export const ruleCheckFileValidator = new SchemaValidator<RuleCheckFile>(ruleCheckFileSchema);
