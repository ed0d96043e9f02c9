import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class UnsupportedFieldTypeError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('UnsupportedFieldType', operation, message, details);
    }
}
