import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class MalformedAnnotationError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('MalformedAnnotation', operation, message, details);
    }
}
