import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class NetworkError extends GeneratorError {
    readonly originalError?: unknown;

    constructor(operation: string, message: string, originalError?: unknown, details: ErrorDetails = {}) {
        super('Network', operation, message, details);
        this.originalError = originalError;
    }
}
