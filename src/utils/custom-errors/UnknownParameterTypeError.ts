import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class UnknownParameterTypeError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('UnknownParameterType', operation, message, details);
    }
}
