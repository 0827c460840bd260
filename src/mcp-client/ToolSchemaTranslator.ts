/**
 * Tool Schema Translator
 *
 * Compiles MCP tool input schemas (JSON Schema) into zod validators and
 * converts tool descriptors into LLM-compatible tool formats (OpenAI and
 * Anthropic).
 */

import { z, type ZodIssue, type ZodTypeAny } from 'zod';
import { SchemaValidationError, formatViolation, type SchemaViolation } from './errors.js';
import type { AnthropicTool, JsonSchema, OpenAITool, ToolDescriptor } from './types.js';

/**
 * Translates MCP tool definitions into validators and LLM tool formats
 */
export class ToolSchemaTranslator {
  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  /**
   * Build a validator for a JSON Schema.
   *
   * Nested objects and typed arrays recurse; `enum` and `const` become closed
   * sets; `anyOf`/`oneOf` and type arrays are tried in declared order; `allOf`
   * parts are merged into one schema.
   */
  static toValidator(schema: JsonSchema): ZodTypeAny {
    if (schema.allOf && schema.allOf.length > 0) {
      return this.toValidator(flattenAllOf(schema));
    }

    const alternatives = schema.anyOf ?? schema.oneOf;
    let validator: ZodTypeAny;

    if (alternatives && alternatives.length > 0) {
      // every alternative is also bound by the keywords beside it
      const shared = inheritedKeywords(schema);
      validator = this.unionOf(alternatives.map(alternative => mergeSchemas(shared, alternative)));
    } else {
      const types = this.typesOf(schema);
      if (types.length === 0) {
        validator = z.unknown();
      } else if (types.length === 1) {
        validator = this.typed(types[0], schema);
      } else {
        validator = this.unionOf(
          types.map(type => ({ ...schema, type, enum: undefined, const: undefined, nullable: undefined }))
        );
      }
    }

    if (schema.enum) {
      validator = this.closedSet(validator, schema.enum);
    }
    if (schema.const !== undefined) {
      validator = this.closedSet(validator, [schema.const]);
    }
    if (schema.nullable === true) {
      validator = validator.nullable();
    }
    return validator;
  }

  /**
   * Validate a value against a schema, returning the normalised value
   * (defaults filled in) or throwing with every violation found.
   */
  static validate(schema: JsonSchema, value: unknown): unknown {
    return this.check(this.toValidator(schema), value);
  }

  /**
   * Run an already compiled validator
   */
  static check(validator: ZodTypeAny, value: unknown): unknown {
    const result = validator.safeParse(value);
    if (!result.success) {
      throw new SchemaValidationError(result.error.issues.map(toViolation));
    }
    return result.data;
  }

  private static typesOf(schema: JsonSchema): string[] {
    if (Array.isArray(schema.type)) return schema.type;
    if (typeof schema.type === 'string') return [schema.type];
    if (schema.properties) return ['object'];
    if (schema.items) return ['array'];
    return [];
  }

  private static typed(type: string, schema: JsonSchema): ZodTypeAny {
    switch (type) {
      case 'string': {
        let validator = z.string();
        const minLength = numberField(schema, 'minLength');
        const maxLength = numberField(schema, 'maxLength');
        const pattern = compilePattern(schema.pattern);
        if (minLength !== undefined) validator = validator.min(minLength);
        if (maxLength !== undefined) validator = validator.max(maxLength);
        if (pattern) validator = validator.regex(pattern, `must match pattern ${pattern.source}`);
        return validator;
      }
      case 'integer':
        return this.bounded(z.number().int(), schema);
      case 'number':
        return this.bounded(z.number(), schema);
      case 'boolean':
        return z.boolean();
      case 'null':
        return z.null();
      case 'array': {
        let validator = z.array(schema.items ? this.toValidator(schema.items) : z.unknown());
        const minItems = numberField(schema, 'minItems');
        const maxItems = numberField(schema, 'maxItems');
        if (minItems !== undefined) validator = validator.min(minItems);
        if (maxItems !== undefined) validator = validator.max(maxItems);
        return validator;
      }
      case 'object':
        return this.objectOf(schema);
      default:
        console.warn(`[ToolSchemaTranslator] Unsupported schema type '${type}', accepting any value`);
        return z.unknown();
    }
  }

  private static bounded(validator: z.ZodNumber, schema: JsonSchema): z.ZodNumber {
    let bounded = validator;
    const minimum = numberField(schema, 'minimum');
    const maximum = numberField(schema, 'maximum');
    const exclusiveMinimum = numberField(schema, 'exclusiveMinimum');
    const exclusiveMaximum = numberField(schema, 'exclusiveMaximum');
    if (minimum !== undefined) bounded = bounded.gte(minimum);
    if (maximum !== undefined) bounded = bounded.lte(maximum);
    if (exclusiveMinimum !== undefined) bounded = bounded.gt(exclusiveMinimum);
    if (exclusiveMaximum !== undefined) bounded = bounded.lt(exclusiveMaximum);
    return bounded;
  }

  private static objectOf(schema: JsonSchema): ZodTypeAny {
    const required = new Set(schema.required ?? []);
    const shape: Record<string, ZodTypeAny> = {};

    for (const [key, propSchema] of Object.entries(schema.properties ?? {})) {
      let property = this.toValidator(propSchema);
      if (required.has(key)) {
        // schemas that accept undefined would otherwise let a missing key through
        if (property.safeParse(undefined).success) {
          property = property.superRefine(requirePresence);
        }
      } else if (propSchema.default !== undefined) {
        property = property.default(propSchema.default);
      } else {
        property = property.optional();
      }
      shape[key] = property;
    }

    for (const key of required) {
      if (!(key in shape)) {
        shape[key] = z.unknown().superRefine(requirePresence);
      }
    }

    const base = z.object(shape);
    const extra = schema.additionalProperties;
    if (extra === false) {
      return base.strict();
    }
    if (extra !== undefined && extra !== true) {
      return base.catchall(this.toValidator(extra));
    }
    return base.passthrough();
  }

  private static unionOf(alternatives: JsonSchema[]): ZodTypeAny {
    const options = alternatives.map((alternative, index) => ({
      label: describeAlternative(alternative, index),
      validator: this.toValidator(alternative),
    }));

    return z.unknown().transform((value, ctx) => {
      const failures: string[] = [];
      for (const option of options) {
        const result = option.validator.safeParse(value);
        if (result.success) {
          return result.data;
        }
        const reasons = result.error.issues.map(issue => formatViolation(toViolation(issue)));
        failures.push(`${option.label}: ${reasons.join(', ')}`);
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `does not match any alternative (${failures.join(' | ')})`,
        params: { alternatives: failures },
      });
      return z.NEVER;
    });
  }

  private static closedSet(validator: ZodTypeAny, allowed: unknown[]): ZodTypeAny {
    return validator.superRefine((value, ctx) => {
      if (!allowed.some(candidate => isDeepEqual(candidate, value))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be one of ${allowed.map(candidate => JSON.stringify(candidate)).join(', ')}`,
        });
      }
    });
  }

  // ==========================================================================
  // LLM TOOL FORMATS
  // ==========================================================================

  /**
   * Convert a tool descriptor to OpenAI function format
   */
  static toOpenAITool(tool: ToolDescriptor): OpenAITool {
    return {
      type: 'function',
      function: {
        name: this.sanitizeToolName(tool.name),
        description: tool.description || `Tool: ${tool.name}`,
        parameters: this.toParameters(tool.inputSchema),
      },
    };
  }

  static toOpenAITools(tools: readonly ToolDescriptor[]): OpenAITool[] {
    return tools.map(tool => this.toOpenAITool(tool));
  }

  /**
   * Convert a tool descriptor to Anthropic format
   */
  static toAnthropicTool(tool: ToolDescriptor): AnthropicTool {
    return {
      name: this.sanitizeToolName(tool.name),
      description: tool.description || `Tool: ${tool.name}`,
      input_schema: this.toParameters(tool.inputSchema),
    };
  }

  static toAnthropicTools(tools: readonly ToolDescriptor[]): AnthropicTool[] {
    return tools.map(tool => this.toAnthropicTool(tool));
  }

  /**
   * Sanitize tool name to be compatible with LLM APIs
   * OpenAI requires: ^[a-zA-Z0-9_-]+$
   */
  static sanitizeToolName(name: string): string {
    return name
      .replace(/\./g, '__')
      .replace(/[^a-zA-Z0-9_-]/g, '_')
      .replace(/^_+|_+$/g, '')
      .substring(0, 64); // OpenAI has a 64 char limit
  }

  /**
   * Coerce an arbitrary value received from the wire into a JsonSchema
   */
  static normalizeJsonSchema(raw: unknown): JsonSchema {
    if (!isRecord(raw)) {
      return {};
    }

    const normalized: JsonSchema = {};
    for (const [key, value] of Object.entries(raw)) {
      switch (key) {
        case 'type':
          if (typeof value === 'string' || isStringArray(value)) normalized.type = value;
          break;
        case 'properties':
          if (isRecord(value)) {
            const properties: Record<string, JsonSchema> = {};
            for (const [name, property] of Object.entries(value)) {
              properties[name] = this.normalizeJsonSchema(property);
            }
            normalized.properties = properties;
          }
          break;
        case 'required':
          normalized.required = isStringArray(value) ? value : [];
          break;
        case 'items':
          // tuple form: validate against the first position only
          if (Array.isArray(value)) {
            if (value.length > 0) normalized.items = this.normalizeJsonSchema(value[0]);
          } else {
            normalized.items = this.normalizeJsonSchema(value);
          }
          break;
        case 'additionalProperties':
          if (typeof value === 'boolean') normalized.additionalProperties = value;
          else if (isRecord(value)) normalized.additionalProperties = this.normalizeJsonSchema(value);
          break;
        case 'anyOf':
          if (Array.isArray(value)) normalized.anyOf = value.map(item => this.normalizeJsonSchema(item));
          break;
        case 'oneOf':
          if (Array.isArray(value)) normalized.oneOf = value.map(item => this.normalizeJsonSchema(item));
          break;
        case 'allOf':
          if (Array.isArray(value)) normalized.allOf = value.map(item => this.normalizeJsonSchema(item));
          break;
        case 'enum':
          if (Array.isArray(value)) normalized.enum = [...value];
          break;
        case 'description':
          if (typeof value === 'string') normalized.description = value;
          break;
        case 'nullable':
          if (typeof value === 'boolean') normalized.nullable = value;
          break;
        default:
          normalized[key] = value;
      }
    }

    if (normalized.properties && !normalized.type) {
      normalized.type = 'object';
    }
    return normalized;
  }

  /**
   * Generate a human-readable description of a tool's parameters
   */
  static describeParameters(schema: JsonSchema): string {
    if (!schema.properties || Object.keys(schema.properties).length === 0) {
      return 'No parameters';
    }

    const required = new Set(schema.required ?? []);
    const params: string[] = [];

    for (const [name, prop] of Object.entries(schema.properties)) {
      const type = Array.isArray(prop.type) ? prop.type.join(' | ') : (prop.type ?? 'any');
      const reqStr = required.has(name) ? '(required)' : '(optional)';
      const enumStr = prop.enum ? ` one of ${prop.enum.map(value => JSON.stringify(value)).join(', ')}` : '';
      params.push(`  - ${name}: ${type} ${reqStr}${enumStr}${prop.description ? ` - ${prop.description}` : ''}`);
    }

    return params.join('\n');
  }

  /**
   * Create a tool summary for debugging/logging
   */
  static summarizeTool(tool: ToolDescriptor): string {
    const params = this.describeParameters(tool.inputSchema);
    return `Tool: ${tool.name}\nDescription: ${tool.description || 'N/A'}\nParameters:\n${params}`;
  }

  private static toParameters(schema: JsonSchema): JsonSchema {
    const parameters: JsonSchema = { ...schema };
    if (parameters.type !== 'object') {
      parameters.type = 'object';
    }
    if (!parameters.properties) {
      parameters.properties = {};
    }
    return parameters;
  }
}

/** Keywords that describe or close over the whole schema rather than constrain its shape */
const NOT_INHERITED = new Set(['anyOf', 'oneOf', 'allOf', 'enum', 'const', 'nullable', 'default', 'title', 'description']);

function inheritedKeywords(schema: JsonSchema): JsonSchema {
  const inherited: JsonSchema = {};
  for (const [key, value] of Object.entries(schema)) {
    if (!NOT_INHERITED.has(key)) {
      inherited[key] = value;
    }
  }
  return inherited;
}

/**
 * Overlay `extra` on `base`; properties and required names accumulate
 */
function mergeSchemas(base: JsonSchema, extra: JsonSchema): JsonSchema {
  const merged: JsonSchema = { ...base, ...extra };
  if (base.properties && extra.properties) {
    merged.properties = { ...base.properties, ...extra.properties };
  }
  if (base.required && extra.required) {
    merged.required = [...new Set([...base.required, ...extra.required])];
  }
  return merged;
}

function flattenAllOf(schema: JsonSchema): JsonSchema {
  const { allOf = [], ...rest } = schema;
  return allOf.reduce<JsonSchema>((merged, part) => mergeSchemas(merged, part), rest);
}

function requirePresence(value: unknown, ctx: z.RefinementCtx): void {
  if (value === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Required' });
  }
}

function toViolation(issue: ZodIssue): SchemaViolation {
  return { path: formatPath(issue.path), message: issue.message };
}

function formatPath(path: readonly (string | number)[]): string {
  let formatted = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted ? `.${segment}` : segment;
    }
  }
  return formatted;
}

function describeAlternative(schema: JsonSchema, index: number): string {
  const title = typeof schema.title === 'string' ? schema.title : undefined;
  const type = Array.isArray(schema.type)
    ? schema.type.join('|')
    : (schema.type ?? (schema.properties ? 'object' : 'any'));
  return `alternative ${index + 1} (${title ?? type})`;
}

function numberField(schema: JsonSchema, key: string): number | undefined {
  const value = schema[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function compilePattern(pattern: unknown): RegExp | undefined {
  if (typeof pattern !== 'string') {
    return undefined;
  }
  try {
    return new RegExp(pattern, 'u');
  } catch (err) {
    console.warn(`[ToolSchemaTranslator] Ignoring invalid pattern ${JSON.stringify(pattern)}:`, err);
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isDeepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => isDeepEqual(item, b[index]));
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every(key => key in b && isDeepEqual(a[key], b[key]));
  }
  return false;
}

export default ToolSchemaTranslator;
