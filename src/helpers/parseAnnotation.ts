import {AnnotationRecord, HTTP_METHODS, HttpMethod} from "../types";
import compilePath from './compilePath';
import MalformedAnnotationError from '../utils/custom-errors/MalformedAnnotationError';

const isHttpMethod = (token: string): token is HttpMethod =>
  HTTP_METHODS.some((method) => method === token);

const BODY_FLAG = /^([+-])\s+BODY(?=\s|\[|$)/;
const TAG_LIST = /^\[([^\]]*)\]/;

function splitLines(comment: string): string[] {
  return comment
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*(\/\/+|\*+)/, '').trim());
}

function isAnnotationLine(line: string): boolean {
  const [keyword] = line.split(/\s+/, 1);
  return isHttpMethod(keyword);
}

/**
 * Parses one annotation line, `<METHOD> <path> [- BODY] [[tag, ...]]`.
 * The line must already be known to start with a supported method keyword.
 */
function parseLine(line: string, rpcName: string): AnnotationRecord {
  const fail = (reason: string): never => {
    throw new MalformedAnnotationError(
      'parseAnnotation',
      `Malformed annotation on ${rpcName}: ${reason} in "${line}"`,
      {rpcName, line}
    );
  };

  const match = /^(\S+)(?:\s+(\S+))?/.exec(line);
  const keyword = match?.[1] ?? '';
  const rawPath = match?.[2];
  if (!isHttpMethod(keyword)) {
    return fail(`unknown method "${keyword}"`);
  }
  if (!rawPath) {
    return fail('missing path');
  }
  if (!rawPath.startsWith('/')) {
    return fail(`path "${rawPath}" must start with "/"`);
  }

  // Validates braces and parameter types at the line that carries them
  compilePath(rawPath, rpcName);

  let bodyFlag: '+' | '-' | undefined;
  let tags: string[] | undefined;
  let rest = line.slice(match?.[0].length ?? 0).trim();

  while (rest.length > 0) {
    const body = BODY_FLAG.exec(rest);
    if (body) {
      if (bodyFlag) {
        return fail('BODY flag given more than once');
      }
      bodyFlag = body[1] === '-' ? '-' : '+';
      rest = rest.slice(body[0].length).trim();
      continue;
    }

    const tagList = TAG_LIST.exec(rest);
    if (tagList) {
      if (tags) {
        return fail('tag list given more than once');
      }
      tags = tagList[1]
        .split(',')
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0);
      rest = rest.slice(tagList[0].length).trim();
      continue;
    }

    return fail(`unexpected "${rest}"`);
  }

  return Object.freeze({
    method: keyword,
    rawPath,
    // GET requests never carry a body
    omitBody: keyword === 'GET' || bodyFlag === '-',
    tags: Object.freeze(tags ?? []),
    line,
  });
}

/**
 * Returns every annotation found in a method comment, in order.
 * Lines that do not start with GET, PUT, POST or DELETE are ignored.
 */
export function parseAnnotations(comment: string | undefined, rpcName: string): AnnotationRecord[] {
  if (!comment) {
    return [];
  }

  return splitLines(comment)
    .filter(isAnnotationLine)
    .map((line) => parseLine(line, rpcName));
}

/**
 * Returns the comment text that is not an annotation, e.g. for an operation summary.
 */
export function extractDescription(comment: string | undefined): string | undefined {
  if (!comment) {
    return undefined;
  }

  const text = splitLines(comment)
    .filter((line) => line.length > 0 && !isAnnotationLine(line))
    .join(' ');

  return text.length > 0 ? text : undefined;
}

/**
 * Parses the annotation of an RPC method comment.
 * @returns The first annotation, or null when the method is not annotated
 */
export default function parseAnnotation(comment: string | undefined, rpcName: string): AnnotationRecord | null {
  const [first] = parseAnnotations(comment, rpcName);
  return first ?? null;
}
