import {CompiledPath, PathParameter, PathParameterType} from "../types";
import MalformedAnnotationError from '../utils/custom-errors/MalformedAnnotationError';
import UnknownParameterTypeError from '../utils/custom-errors/UnknownParameterTypeError';
import DuplicateParameterNameError from '../utils/custom-errors/DuplicateParameterNameError';

const PARAMETER_TYPES: readonly PathParameterType[] = ['string', 'int'];

// Characters allowed outside of `{name:type}` segments
const LITERAL_CHAR = /^[\w\-./]$/;

const isParameterType = (value: string): value is PathParameterType =>
  PARAMETER_TYPES.some((type) => type === value);

/**
 * Converts an annotated path such as `/users/{userId:int}` into an OpenAPI
 * path template (`/users/{userId}`) and its typed parameters.
 * @param rawPath - Path as written in the annotation
 * @param rpcName - RPC method the path belongs to, used in error messages
 */
export default function compilePath(rawPath: string, rpcName = ''): CompiledPath {
  const details = { rpcName, rawPath };
  const where = rpcName ? ` in annotation of ${rpcName}` : '';
  const parameters: PathParameter[] = [];
  let template = '';
  let index = 0;

  while (index < rawPath.length) {
    const char = rawPath[index];

    if (char === '}') {
      throw new MalformedAnnotationError(
        'compilePath',
        `Unexpected '}' at position ${index} of path "${rawPath}"${where}`,
        details
      );
    }

    if (char !== '{') {
      if (!LITERAL_CHAR.test(char)) {
        throw new MalformedAnnotationError(
          'compilePath',
          `Unexpected '${char}' at position ${index} of path "${rawPath}"${where}`,
          details
        );
      }
      template += char;
      index++;
      continue;
    }

    const close = rawPath.indexOf('}', index + 1);
    const nestedOpen = rawPath.indexOf('{', index + 1);
    if (close === -1 || (nestedOpen !== -1 && nestedOpen < close)) {
      throw new MalformedAnnotationError(
        'compilePath',
        `Unterminated '{' at position ${index} of path "${rawPath}"${where}`,
        details
      );
    }

    const inner = rawPath.slice(index + 1, close);
    const separator = inner.indexOf(':');
    if (separator === -1) {
      throw new MalformedAnnotationError(
        'compilePath',
        `Path parameter "{${inner}}" has no type${where}, expected {name:type}`,
        details
      );
    }

    const name = inner.slice(0, separator);
    const type = inner.slice(separator + 1);
    if (!/^\w+$/.test(name)) {
      throw new MalformedAnnotationError(
        'compilePath',
        `Invalid path parameter name "${name}" in path "${rawPath}"${where}`,
        details
      );
    }

    if (!isParameterType(type)) {
      throw new UnknownParameterTypeError(
        'compilePath',
        `Unknown type "${type}" for path parameter "${name}"${where}, expected one of ${PARAMETER_TYPES.join(', ')}`,
        {...details, parameter: name, type}
      );
    }

    if (parameters.some((parameter) => parameter.name === name)) {
      throw new DuplicateParameterNameError(
        'compilePath',
        `Path parameter "${name}" is declared more than once in path "${rawPath}"${where}`,
        {...details, parameter: name}
      );
    }

    parameters.push({name, type});
    template += `{${name}}`;
    index = close + 1;
  }

  return {template, parameters};
}
