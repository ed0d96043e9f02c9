import {
  EnumDescriptor,
  FieldDescriptor,
  MessageDescriptor,
  OpenAPISchema,
  ProtoDescriptorSet,
  RegistryEntry,
  SchemaNode,
} from "../types";
import UnsupportedFieldTypeError from '../utils/custom-errors/UnsupportedFieldTypeError';

export const SCHEMA_REF_PREFIX = '#/components/schemas/';
export const EMPTY_MESSAGE = 'google.protobuf.Empty';

const SCALAR_SCHEMAS = new Map<string, SchemaNode>([
  ['string', {kind: 'primitive', type: 'string'}],
  ['bytes', {kind: 'primitive', type: 'string', format: 'binary'}],
  ['bool', {kind: 'primitive', type: 'boolean'}],
  ['double', {kind: 'primitive', type: 'number', format: 'double'}],
  ['float', {kind: 'primitive', type: 'number', format: 'float'}],
  ['int32', {kind: 'primitive', type: 'integer', format: 'int32'}],
  ['sint32', {kind: 'primitive', type: 'integer', format: 'int32'}],
  ['sfixed32', {kind: 'primitive', type: 'integer', format: 'int32'}],
  // unsigned 32-bit values exceed the int32 range
  ['uint32', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['fixed32', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['int64', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['sint64', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['sfixed64', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['uint64', {kind: 'primitive', type: 'integer', format: 'int64'}],
  ['fixed64', {kind: 'primitive', type: 'integer', format: 'int64'}],
]);

// Well-known types with a dedicated JSON representation
const INLINE_MESSAGES = new Map<string, SchemaNode>([
  ['google.protobuf.Timestamp', {kind: 'primitive', type: 'string', format: 'date-time'}],
  ['google.protobuf.Duration', {kind: 'primitive', type: 'string', format: 'duration'}],
]);

/**
 * Maps protobuf messages to OpenAPI schemas.
 *
 * Every message or enum reached from a mapped type is stored once in the
 * registry under its fully-qualified name. A message is marked in progress
 * before its fields are visited, so a field pointing back at it (directly or
 * through other messages) becomes a reference instead of recursing again.
 */
export default class SchemaMapper {
  private readonly registry = new Map<string, RegistryEntry>();

  constructor(private readonly descriptors: ProtoDescriptorSet) {}

  /**
   * Maps a message type, registering it and everything it references.
   * @returns A reference to the registered schema, or an inline schema for well-known types
   */
  mapMessage(fullName: string, context: {message?: string; field?: string} = {}): SchemaNode {
    const inline = INLINE_MESSAGES.get(fullName);
    if (inline) {
      return inline;
    }

    if (this.registry.has(fullName)) {
      return {kind: 'reference', name: fullName};
    }

    const message = this.descriptors.messages.get(fullName);
    if (!message) {
      throw this.unsupported(fullName, context);
    }

    this.registry.set(fullName, {state: 'in-progress'});
    this.registry.set(fullName, {state: 'complete', node: this.buildObject(message)});

    return {kind: 'reference', name: fullName};
  }

  /**
   * Whether a message carries no content, used to drop empty request bodies.
   */
  isEmptyMessage(fullName: string): boolean {
    return fullName === EMPTY_MESSAGE;
  }

  /**
   * Renders the registry as `components.schemas`, in registration order.
   */
  toComponents(): Record<string, OpenAPISchema> {
    const schemas: Array<[string, OpenAPISchema]> = [];
    for (const [name, entry] of this.registry) {
      if (entry.state === 'complete') {
        schemas.push([name, toOpenApiSchema(entry.node)]);
      }
    }
    return Object.fromEntries(schemas);
  }

  private mapEnum(enumType: EnumDescriptor): SchemaNode {
    if (!this.registry.has(enumType.fullName)) {
      const description = enumType.values
        .map((value) => `${value.name} = ${value.number}`)
        .join('\n\n');
      this.registry.set(enumType.fullName, {
        state: 'complete',
        node: {kind: 'enum', values: enumType.values, description},
      });
    }
    return {kind: 'reference', name: enumType.fullName};
  }

  private buildObject(message: MessageDescriptor): SchemaNode {
    const properties: Array<[string, SchemaNode]> = [];
    const required: string[] = [];
    const oneofs = new Map<string, Array<[string, SchemaNode]>>();

    for (const field of message.fields) {
      const node = this.mapField(message, field);

      if (field.oneof) {
        let variants = oneofs.get(field.oneof);
        if (!variants) {
          variants = [];
          oneofs.set(field.oneof, variants);
          properties.push([field.oneof, {kind: 'oneOf', variants}]);
        }
        variants.push([field.name, node]);
        continue;
      }

      properties.push([field.name, node]);
      if (field.required) {
        required.push(field.name);
      }
    }

    return {kind: 'object', properties, required, description: message.comment};
  }

  private mapField(message: MessageDescriptor, field: FieldDescriptor): SchemaNode {
    const value = this.mapFieldType(message, field);

    if (field.mapKeyType !== undefined) {
      return {kind: 'map', values: value};
    }
    if (field.repeated) {
      return {kind: 'array', items: value};
    }
    return value;
  }

  private mapFieldType(message: MessageDescriptor, field: FieldDescriptor): SchemaNode {
    const context = {message: message.fullName, field: field.name};

    switch (field.kind) {
      case 'scalar': {
        const scalar = SCALAR_SCHEMAS.get(field.type);
        if (!scalar) {
          throw this.unsupported(field.type, context);
        }
        return scalar;
      }
      case 'enum': {
        const enumType = this.descriptors.enums.get(field.type);
        if (!enumType) {
          throw this.unsupported(field.type, context);
        }
        return this.mapEnum(enumType);
      }
      case 'message':
        return this.mapMessage(field.type, context);
    }
  }

  private unsupported(type: string, context: {message?: string; field?: string}): UnsupportedFieldTypeError {
    const location = context.message && context.field
      ? `field "${context.field}" of message "${context.message}"`
      : 'method signature';
    return new UnsupportedFieldTypeError(
      'mapSchema',
      `Unsupported type "${type}" for ${location}`,
      {type, ...context}
    );
  }
}

/**
 * Converts a schema node into its OpenAPI representation.
 */
export function toOpenApiSchema(node: SchemaNode): OpenAPISchema {
  switch (node.kind) {
    case 'primitive':
      return node.format ? {type: node.type, format: node.format} : {type: node.type};
    case 'reference':
      return {$ref: `${SCHEMA_REF_PREFIX}${node.name}`};
    case 'array':
      return {type: 'array', items: toOpenApiSchema(node.items)};
    case 'map':
      return {type: 'object', additionalProperties: toOpenApiSchema(node.values)};
    case 'enum': {
      const schema: OpenAPISchema = {type: 'integer'};
      if (node.description) {
        schema.description = node.description;
      }
      schema.enum = node.values.map((value) => value.number);
      return schema;
    }
    case 'oneOf':
      return {
        oneOf: node.variants.map(([name, variant]) => ({
          type: 'object',
          properties: {[name]: toOpenApiSchema(variant)},
        })),
      };
    case 'object': {
      const schema: OpenAPISchema = {type: 'object'};
      if (node.description) {
        schema.description = node.description;
      }
      schema.properties = Object.fromEntries(
        node.properties.map(([name, property]) => [name, toOpenApiSchema(property)])
      );
      if (node.required.length > 0) {
        schema.required = node.required;
      }
      return schema;
    }
  }
}
