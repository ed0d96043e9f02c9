import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class DuplicateParameterNameError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('DuplicateParameterName', operation, message, details);
    }
}
