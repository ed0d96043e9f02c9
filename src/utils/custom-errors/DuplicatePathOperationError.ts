import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class DuplicatePathOperationError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('DuplicatePathOperation', operation, message, details);
    }
}
