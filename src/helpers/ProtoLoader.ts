import * as protobuf from 'protobufjs';
import axios, {AxiosResponse} from 'axios';
import {existsSync} from 'fs';
import {readFile} from 'fs/promises';
import {dirname, resolve} from 'path';
import {
  EnumDescriptor,
  FieldDescriptor,
  MessageDescriptor,
  MethodDescriptor,
  ProtoDescriptorSet,
  ServiceDescriptor,
} from "../types";
import isValidUrl from './isValidUrl';
import ContentParsingError from '../utils/custom-errors/ContentParsingError';
import ValidationError from '../utils/custom-errors/ValidationError';
import NetworkError from '../utils/custom-errors/NetworkError';

const PARSE_OPTIONS: protobuf.IParseOptions = {
  keepCase: true,
  alternateCommentMode: true,
};

type LoadContext = {
  root: protobuf.Root;
  loaded: Set<string>;
  includeDirs: string[];
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const normalizeFullName = (fullName: string): string =>
  fullName.startsWith('.') ? fullName.substring(1) : fullName;

class ProtoLoader {
  /**
   * Loads proto sources (file paths or URLs) together with their imports and
   * converts them into a descriptor set.
   */
  static async load(inputs: string[]): Promise<ProtoDescriptorSet> {
    if (!Array.isArray(inputs) || inputs.length === 0) {
      throw new ValidationError('load', 'At least one proto file is required');
    }

    const locations = inputs.map((input) => (isValidUrl(input) ? input : resolve(input)));
    const context: LoadContext = {
      root: new protobuf.Root(),
      loaded: new Set(),
      includeDirs: locations.filter((location) => !isValidUrl(location)).map((location) => dirname(location)),
    };

    let packageName = '';
    for (const location of locations) {
      const parsedPackage = await this.loadSource(location, context);
      if (!packageName && parsedPackage) {
        packageName = parsedPackage;
      }
    }

    try {
      context.root.resolveAll();
    } catch (error) {
      throw new ContentParsingError(
        'resolve',
        `Failed to resolve proto types: ${errorMessage(error)}`,
        {inputs}
      );
    }

    return this.toDescriptorSet(context.root, packageName);
  }

  private static async loadSource(location: string, context: LoadContext): Promise<string | undefined> {
    if (context.loaded.has(location)) {
      return undefined;
    }
    context.loaded.add(location);

    const content = await this.readSource(location);
    const parsed = this.parseInto(context.root, content, location);

    for (const name of this.importsOf(parsed)) {
      if (context.loaded.has(name) || this.addCommon(context.root, name)) {
        context.loaded.add(name);
        continue;
      }
      await this.loadSource(this.resolveImport(location, name, context.includeDirs), context);
    }

    return parsed.package;
  }

  /**
   * Reads raw proto content from a URL or the file system
   */
  private static async readSource(location: string): Promise<string> {
    if (isValidUrl(location)) {
      try {
        const response: AxiosResponse<string> = await axios.get(location, {
          responseType: 'text',
          headers: {
            Accept: 'text/plain, application/octet-stream, */*',
          },
        });
        return response.data;
      } catch (error) {
        throw new NetworkError(
          'readSource',
          `Failed to fetch proto file ${location}`,
          error,
          {location}
        );
      }
    }

    try {
      return await readFile(location, 'utf-8');
    } catch (error) {
      throw new ValidationError(
        'readSource',
        `Failed to read proto file: ${errorMessage(error)}`,
        {location}
      );
    }
  }

  private static parseInto(root: protobuf.Root, content: string, location: string): protobuf.IParserResult {
    try {
      return protobuf.parse(content, root, PARSE_OPTIONS);
    } catch (error) {
      throw new ContentParsingError(
        'parse',
        `Failed to parse ${location}: ${errorMessage(error)}`,
        {location}
      );
    }
  }

  private static importsOf(parsed: protobuf.IParserResult): string[] {
    return [...(parsed.imports ?? []), ...(parsed.weakImports ?? [])];
  }

  /**
   * Adds one of the google/protobuf definitions bundled with protobufjs
   * @returns false when the import is not a bundled definition
   */
  private static addCommon(root: protobuf.Root, name: string): boolean {
    const definition = protobuf.common.get(name);
    if (!definition) {
      return false;
    }
    if (definition.nested) {
      root.addJSON(definition.nested);
    }
    return true;
  }

  /**
   * Resolves an import against the importing source, then against the
   * directories of the proto files given on the command line
   */
  private static resolveImport(from: string, name: string, includeDirs: string[]): string {
    if (isValidUrl(from)) {
      return new URL(name, from).toString();
    }

    const candidates = [dirname(from), ...includeDirs].map((dir) => resolve(dir, name));
    return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
  }

  private static toDescriptorSet(root: protobuf.Root, packageName: string): ProtoDescriptorSet {
    const result: ProtoDescriptorSet = {
      packageName,
      services: [],
      messages: new Map(),
      enums: new Map(),
    };
    const queue: protobuf.NamespaceBase[] = [root];

    while (queue.length > 0) {
      const namespace = queue.shift();
      if (!namespace) {
        break;
      }

      for (const element of namespace.nestedArray) {
        if (element instanceof protobuf.Type) {
          const message = this.convertMessage(element);
          result.messages.set(message.fullName, message);
          queue.push(element);
        } else if (element instanceof protobuf.Enum) {
          const enumType = this.convertEnum(element);
          result.enums.set(enumType.fullName, enumType);
        } else if (element instanceof protobuf.Service) {
          result.services.push(this.convertService(element));
        } else if (element instanceof protobuf.Namespace) {
          queue.push(element);
        }
      }
    }

    return result;
  }

  private static convertService(service: protobuf.Service): ServiceDescriptor {
    return {
      name: service.name,
      fullName: normalizeFullName(service.fullName),
      methods: service.methodsArray.map((method) => this.convertMethod(service, method)),
    };
  }

  private static convertMethod(service: protobuf.Service, method: protobuf.Method): MethodDescriptor {
    const {resolvedRequestType, resolvedResponseType} = method;
    if (!resolvedRequestType || !resolvedResponseType) {
      throw new ContentParsingError(
        'convertMethod',
        `Unresolved request or response type on ${normalizeFullName(service.fullName)}.${method.name}`,
        {service: service.fullName, method: method.name}
      );
    }

    return {
      name: method.name,
      comment: method.comment ?? undefined,
      inputType: normalizeFullName(resolvedRequestType.fullName),
      outputType: normalizeFullName(resolvedResponseType.fullName),
    };
  }

  private static convertMessage(message: protobuf.Type): MessageDescriptor {
    return {
      fullName: normalizeFullName(message.fullName),
      name: message.name,
      fields: message.fieldsArray.map((field) => this.convertField(field)),
      comment: message.comment ?? undefined,
    };
  }

  private static convertField(field: protobuf.Field): FieldDescriptor {
    const {resolvedType} = field;
    const optional = field.options?.['proto3_optional'] === true;
    const descriptor: FieldDescriptor = {
      name: field.name,
      type: field.type,
      kind: 'scalar',
      repeated: field.repeated,
      required: field.required,
    };

    if (resolvedType instanceof protobuf.Type) {
      descriptor.kind = 'message';
      descriptor.type = normalizeFullName(resolvedType.fullName);
    } else if (resolvedType instanceof protobuf.Enum) {
      descriptor.kind = 'enum';
      descriptor.type = normalizeFullName(resolvedType.fullName);
    }

    if (field instanceof protobuf.MapField) {
      descriptor.mapKeyType = field.keyType;
    }
    // proto3 `optional` is carried by a synthetic oneof, not a real one
    if (field.partOf && !optional) {
      descriptor.oneof = field.partOf.name;
    }

    return descriptor;
  }

  private static convertEnum(enumType: protobuf.Enum): EnumDescriptor {
    return {
      fullName: normalizeFullName(enumType.fullName),
      name: enumType.name,
      values: Object.entries(enumType.values).map(([name, number]) => ({name, number})),
      comment: enumType.comment ?? undefined,
    };
  }
}

export default ProtoLoader;
