import parseAnnotation, {extractDescription, parseAnnotations} from './parseAnnotation';
import MalformedAnnotationError from '../utils/custom-errors/MalformedAnnotationError';
import UnknownParameterTypeError from '../utils/custom-errors/UnknownParameterTypeError';

describe('parseAnnotation', () => {
  const rpcName = 'greeter.Greeter.SayHello';

  describe('annotated comments', () => {
    it('should parse method, path and tags', () => {
      expect(parseAnnotation('GET /hello [Greeting]', rpcName)).toEqual({
        method: 'GET',
        rawPath: '/hello',
        omitBody: true,
        tags: ['Greeting'],
        line: 'GET /hello [Greeting]',
      });
    });

    it('should keep the body of PUT and POST by default', () => {
      expect(parseAnnotation('PUT /users/{id:int}', rpcName)).toMatchObject({
        method: 'PUT',
        rawPath: '/users/{id:int}',
        omitBody: false,
        tags: [],
      });
      expect(parseAnnotation('POST /users', rpcName)?.omitBody).toBe(false);
    });

    it('should always omit the body of GET', () => {
      expect(parseAnnotation('GET /hello', rpcName)?.omitBody).toBe(true);
      expect(parseAnnotation('GET /hello - BODY', rpcName)?.omitBody).toBe(true);
      expect(parseAnnotation('GET /hello + BODY', rpcName)?.omitBody).toBe(true);
    });

    it('should honor an explicit - BODY on DELETE', () => {
      const annotation = parseAnnotation('DELETE /users/{userId:int} - BODY', rpcName);

      expect(annotation).toMatchObject({method: 'DELETE', rawPath: '/users/{userId:int}', omitBody: true});
    });

    it('should accept the body flag and tags in any order', () => {
      const expected = {method: 'POST', rawPath: '/users/{userId:int}', omitBody: true, tags: ['Users', 'Admin']};

      expect(parseAnnotation('POST /users/{userId:int} - BODY [Users, Admin]', rpcName)).toMatchObject(expected);
      expect(parseAnnotation('POST /users/{userId:int} [Users, Admin] - BODY', rpcName)).toMatchObject(expected);
      expect(parseAnnotation('POST /users/{userId:int}   [ Users ,Admin ]-  BODY', rpcName)).toMatchObject(expected);
    });

    it('should keep the body with + BODY', () => {
      expect(parseAnnotation('POST /users + BODY [Users]', rpcName)).toMatchObject({omitBody: false, tags: ['Users']});
    });

    it('should represent an empty tag list as an empty array', () => {
      expect(parseAnnotation('POST /users []', rpcName)?.tags).toEqual([]);
      expect(parseAnnotation('POST /users [ , ]', rpcName)?.tags).toEqual([]);
    });

    it('should find the annotation among other comment lines', () => {
      const comment = 'Returns a single user.\nGET /users/{id:int} [Users]\nFails when the user does not exist.';

      expect(parseAnnotation(comment, rpcName)).toMatchObject({method: 'GET', rawPath: '/users/{id:int}'});
    });

    it('should strip comment markers', () => {
      expect(parseAnnotation('  // GET /hello [Greeting]', rpcName)?.line).toBe('GET /hello [Greeting]');
      expect(parseAnnotation(' * DELETE /hello', rpcName)?.method).toBe('DELETE');
    });

    it('should return a frozen record', () => {
      const annotation = parseAnnotation('POST /users [Users]', rpcName);

      expect(Object.isFrozen(annotation)).toBe(true);
      expect(Object.isFrozen(annotation?.tags)).toBe(true);
    });
  });

  describe('comments without annotation', () => {
    it('should return null', () => {
      expect(parseAnnotation(undefined, rpcName)).toBeNull();
      expect(parseAnnotation('', rpcName)).toBeNull();
      expect(parseAnnotation('Says hello to the caller.', rpcName)).toBeNull();
    });

    it('should match method keywords case-sensitively', () => {
      expect(parseAnnotation('get /hello', rpcName)).toBeNull();
      expect(parseAnnotation('Get /hello', rpcName)).toBeNull();
    });

    it('should ignore unsupported methods', () => {
      expect(parseAnnotation('PATCH /users/{id:int}', rpcName)).toBeNull();
    });
  });

  describe('malformed annotations', () => {
    it('should reject a path without a leading slash', () => {
      expect(() => parseAnnotation('GET hello', rpcName)).toThrow(MalformedAnnotationError);
      expect(() => parseAnnotation('GET hello', rpcName)).toThrow(
        'Malformed annotation on greeter.Greeter.SayHello: path "hello" must start with "/" in "GET hello"'
      );
    });

    it('should reject a missing path', () => {
      expect(() => parseAnnotation('POST', rpcName)).toThrow('missing path');
    });

    it('should reject an unterminated parameter brace', () => {
      expect(() => parseAnnotation('GET /users/{id:int [Users]', rpcName)).toThrow(MalformedAnnotationError);
    });

    it('should reject unknown parameter types', () => {
      expect(() => parseAnnotation('GET /users/{id:uuid}', rpcName)).toThrow(UnknownParameterTypeError);
    });

    it('should reject repeated suffixes', () => {
      expect(() => parseAnnotation('POST /users - BODY - BODY', rpcName)).toThrow('BODY flag given more than once');
      expect(() => parseAnnotation('POST /users [A] [B]', rpcName)).toThrow('tag list given more than once');
    });

    it('should reject a tag list glued to the path', () => {
      expect(() => parseAnnotation('GET /hello[Greeting]', rpcName)).toThrow(MalformedAnnotationError);
      expect(() => parseAnnotation('GET /hello[Greeting]', rpcName)).toThrow(
        `Unexpected '[' at position 6 of path "/hello[Greeting]" in annotation of greeter.Greeter.SayHello`
      );
    });

    it('should reject unexpected trailing text', () => {
      expect(() => parseAnnotation('POST /users please', rpcName)).toThrow('unexpected "please"');
    });

    it('should carry the method name and line in the error details', () => {
      let caught: unknown;
      try {
        parseAnnotation('Creates a user.\nPOST users', 'users.Users.Create');
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({
        kind: 'MalformedAnnotation',
        details: {rpcName: 'users.Users.Create', line: 'POST users'},
      });
    });
  });

  describe('parseAnnotations', () => {
    it('should return every annotation of a comment', () => {
      const annotations = parseAnnotations('GET /users/{id:int} [Users]\nGET /people/{id:int} [People]', rpcName);

      expect(annotations.map((annotation) => annotation.rawPath)).toEqual(['/users/{id:int}', '/people/{id:int}']);
    });

    it('should return an empty list for unannotated comments', () => {
      expect(parseAnnotations('Nothing to see here', rpcName)).toEqual([]);
    });
  });

  describe('extractDescription', () => {
    it('should drop annotation lines', () => {
      expect(extractDescription('Creates a user.\nPOST /users [Users]\nReturns the stored user.'))
        .toBe('Creates a user. Returns the stored user.');
    });

    it('should return undefined when only the annotation is present', () => {
      expect(extractDescription('GET /hello [Greeting]')).toBeUndefined();
      expect(extractDescription(undefined)).toBeUndefined();
    });
  });
});
