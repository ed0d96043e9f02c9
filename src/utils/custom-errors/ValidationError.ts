import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class ValidationError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('Validation', operation, message, details);
    }
}
