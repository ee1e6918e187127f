/**
 * Helpers that translate Zod schemas into JSON metadata suitable for the
 * OpenRouter tool definition payloads.
 */
import { z } from "zod";

export function zodToJson(schema: z.ZodTypeAny) {
  const jsonSchema = schemaToOpenAPI(schema);
  return {
    type: "object",
    ...jsonSchema,
  };
}

export function schemaToOpenAPI(schema: z.ZodTypeAny): Record<string, unknown> {
  const description = schema.description
    ? { description: schema.description }
    : {};

  if (schema instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = schemaToOpenAPI(value);
      if (!(value.isOptional() || value.isNullable())) {
        required.push(key);
      }
    }
    return {
      type: "object",
      ...description,
      properties,
      ...(required.length ? { required } : {}),
    };
  }
  if (schema instanceof z.ZodEnum) {
    const values: string[] = schema.options;
    return { type: "string", ...description, enum: values };
  }
  if (schema instanceof z.ZodString) {
    return { type: "string", ...description };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: "boolean", ...description };
  }
  if (schema instanceof z.ZodNumber) {
    const result: Record<string, unknown> = {
      type: schema.isInt ? "integer" : "number",
      ...description,
    };
    if (schema.minValue !== null) {
      result.minimum = schema.minValue;
    }
    if (schema.maxValue !== null) {
      result.maximum = schema.maxValue;
    }
    return result;
  }
  if (schema instanceof z.ZodNullable) {
    return {
      anyOf: [schemaToOpenAPI(schema.unwrap()), { type: "null" }],
    };
  }
  if (schema instanceof z.ZodOptional) {
    return schemaToOpenAPI(schema.unwrap());
  }
  return {};
}
