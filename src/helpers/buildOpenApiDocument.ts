import {
  AnnotationRecord,
  CompiledPath,
  HttpMethod,
  MethodDescriptor,
  OpenAPIDocument,
  OpenAPIInfo,
  OpenAPIOperation,
  OpenAPIParameter,
  OpenAPIPathItem,
  ProtoDescriptorSet,
  ServiceDescriptor,
} from "../types";
import {extractDescription, parseAnnotations} from './parseAnnotation';
import compilePath from './compilePath';
import SchemaMapper, {toOpenApiSchema} from './SchemaMapper';
import DuplicatePathOperationError from '../utils/custom-errors/DuplicatePathOperationError';

export const OPENAPI_VERSION = '3.0.0';

const OPERATION_KEYS: Record<HttpMethod, keyof OpenAPIPathItem> = {
  GET: 'get',
  PUT: 'put',
  POST: 'post',
  DELETE: 'delete',
};

const shortName = (fullName: string): string => fullName.split('.').pop() ?? fullName;

/**
 * `pkg.Users` + `List` gives `pkg_Users_List`. Routes after the first one of
 * the same method get a `_2`, `_3`, ... suffix.
 */
const operationIdOf = (service: ServiceDescriptor, method: MethodDescriptor, route: number): string => {
  const base = `${service.fullName.replace(/\./g, '_')}_${method.name}`;
  return route > 1 ? `${base}_${route}` : base;
};

const toParameter = ({name, type}: CompiledPath['parameters'][number]): OpenAPIParameter => ({
  name,
  in: 'path',
  required: true,
  schema: {type: type === 'int' ? 'integer' : 'string'},
});

/**
 * Builds one operation for an annotated RPC method.
 */
function buildOperation(
  mapper: SchemaMapper,
  service: ServiceDescriptor,
  method: MethodDescriptor,
  annotation: AnnotationRecord,
  compiled: CompiledPath,
  operationId: string
): OpenAPIOperation {
  const response = mapper.mapMessage(method.outputType);
  const operation: OpenAPIOperation = {
    operationId,
    tags: [...annotation.tags],
    parameters: compiled.parameters.map(toParameter),
    responses: {
      '200': {
        description: `A response containing ${shortName(method.outputType)}`,
        content: {'application/json': {schema: toOpenApiSchema(response)}},
      },
    },
  };

  const summary = extractDescription(method.comment);
  if (summary) {
    operation.summary = summary;
  }

  if (!annotation.omitBody && !mapper.isEmptyMessage(method.inputType)) {
    const request = mapper.mapMessage(method.inputType);
    operation.requestBody = {
      required: true,
      content: {'application/json': {schema: toOpenApiSchema(request)}},
    };
  }

  return operation;
}

/**
 * Builds an OpenAPI document from the annotated methods of the given services.
 * Methods without an annotation are left out. Any failure aborts the build.
 */
export default function buildOpenApiDocument(
  descriptors: ProtoDescriptorSet,
  info: OpenAPIInfo
): OpenAPIDocument {
  const mapper = new SchemaMapper(descriptors);
  const paths: OpenAPIDocument['paths'] = {};
  // "METHOD /template" -> rpc that declared it
  const owners = new Map<string, string>();
  // operationId -> rpc that uses it
  const operationIds = new Map<string, string>();

  for (const service of descriptors.services) {
    for (const method of service.methods) {
      const rpcName = `${service.fullName}.${method.name}`;

      const annotations = parseAnnotations(method.comment, rpcName);

      annotations.forEach((annotation, index) => {
        const compiled = compilePath(annotation.rawPath, rpcName);
        const key = `${annotation.method} ${compiled.template}`;

        const owner = owners.get(key);
        if (owner) {
          throw new DuplicatePathOperationError(
            'buildOpenApiDocument',
            `${key} is declared by both ${owner} and ${rpcName}`,
            {path: compiled.template, method: annotation.method, rpcNames: [owner, rpcName], line: annotation.line}
          );
        }
        owners.set(key, rpcName);

        const operationId = operationIdOf(service, method, index + 1);
        const idOwner = operationIds.get(operationId);
        if (idOwner) {
          throw new DuplicatePathOperationError(
            'buildOpenApiDocument',
            `Operation id "${operationId}" of ${key} is already used by ${idOwner}`,
            {path: compiled.template, method: annotation.method, rpcNames: [idOwner, rpcName], line: annotation.line}
          );
        }
        operationIds.set(operationId, rpcName);

        const pathItem = paths[compiled.template] ?? {};
        pathItem[OPERATION_KEYS[annotation.method]] = buildOperation(
          mapper, service, method, annotation, compiled, operationId
        );
        paths[compiled.template] = pathItem;
      });
    }
  }

  return {
    openapi: OPENAPI_VERSION,
    info: {title: info.title, version: info.version},
    paths,
    components: {schemas: mapper.toComponents()},
  };
}
