import GeneratorError, {ErrorDetails} from './GeneratorError';

export default class ContentParsingError extends GeneratorError {
    constructor(operation: string, message: string, details: ErrorDetails = {}) {
        super('ContentParsing', operation, message, details);
    }
}
