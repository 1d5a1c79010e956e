/**
 * Error taxonomy for dictionary and classification operations.
 *
 * All of these are recoverable: callers catch them, surface the message and
 * carry on. "No match" is a normal result and never raised.
 */

export type ClassifierErrorCode =
    | 'NOT_FOUND'
    | 'DUPLICATE_CATEGORY'
    | 'DUPLICATE_KEYWORD'
    | 'INVALID_FORMAT'
    | 'MISSING_COLUMN';

export abstract class ClassifierError extends Error {
    abstract readonly code: ClassifierErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Category or keyword lookup miss.
 */
export class NotFoundError extends ClassifierError {
    readonly code = 'NOT_FOUND';
}

export class DuplicateCategoryError extends ClassifierError {
    readonly code = 'DUPLICATE_CATEGORY';
}

export class DuplicateKeywordError extends ClassifierError {
    readonly code = 'DUPLICATE_KEYWORD';
}

/**
 * Malformed dictionary payload. `issues` lists every problem found.
 */
export class InvalidFormatError extends ClassifierError {
    readonly code = 'INVALID_FORMAT';

    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}

/**
 * Dataset has no resolvable statement field.
 */
export class MissingColumnError extends ClassifierError {
    readonly code = 'MISSING_COLUMN';

    constructor(message: string, readonly columns: string[] = []) {
        super(message);
    }
}

export function isClassifierError(err: unknown): err is ClassifierError {
    return err instanceof ClassifierError;
}
