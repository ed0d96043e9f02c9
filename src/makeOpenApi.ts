import {GeneratorOptions, OpenAPIDocument} from "./types";
import ProtoLoader from './helpers/ProtoLoader';
import buildOpenApiDocument from './helpers/buildOpenApiDocument';
import writeDocument from './helpers/writeDocument';
import ValidationError from './utils/custom-errors/ValidationError';

function validateOptions(options: GeneratorOptions) {
  if (!options.outputPath?.trim()) {
    throw new ValidationError('makeOpenApi', 'Output path is required');
  }
  if (!options.title?.trim()) {
    throw new ValidationError('makeOpenApi', 'API title is required');
  }
  if (!options.version?.trim()) {
    throw new ValidationError('makeOpenApi', 'API version is required');
  }
}

export function countOperations(document: OpenAPIDocument): number {
  return Object.values(document.paths)
    .reduce((total, pathItem) => total + Object.keys(pathItem).length, 0);
}

/**
 * Loads the proto inputs, builds the OpenAPI document and writes it.
 * Nothing is written when any step fails.
 */
export default async function makeOpenApi(options: GeneratorOptions): Promise<OpenAPIDocument> {
  validateOptions(options);

  const descriptors = await ProtoLoader.load(options.protoInputs);
  console.log(`Loaded ${descriptors.services.length} service(s) from ${options.protoInputs.length} proto file(s)`);

  const document = buildOpenApiDocument(descriptors, {
    title: options.title,
    version: options.version,
  });
  console.log(`Generated ${countOperations(document)} operation(s) across ${Object.keys(document.paths).length} path(s)`);

  await writeDocument(document, options.outputPath);
  console.log(`OpenAPI document written to ${options.outputPath}`);

  return document;
}
