export type ErrorKind =
    | 'MalformedAnnotation'
    | 'UnknownParameterType'
    | 'DuplicateParameterName'
    | 'UnsupportedFieldType'
    | 'DuplicatePathOperation'
    | 'Validation'
    | 'Network'
    | 'ContentParsing';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class of every error the generator raises.
 * `operation` names the step that failed, `details` carries the context needed
 * to locate the offending proto source.
 */
export default class GeneratorError extends Error {
    readonly kind: ErrorKind;
    readonly operation: string;
    readonly details: ErrorDetails;

    constructor(kind: ErrorKind, operation: string, message: string, details: ErrorDetails = {}) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
        this.operation = operation;
        this.details = details;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
