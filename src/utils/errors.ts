/**
 * Error taxonomy. The engines throw these synchronously at the point of
 * detection; the CLI prints them through describeError.
 */

export type ClerkErrorKind =
    | 'SchemaError'
    | 'EmptyKeyError'
    | 'DerivationError'
    | 'WorkbookError'
    | 'ConfigError';

export class SheetClerkError extends Error {
    constructor(public readonly kind: ClerkErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = kind;
    }
}

/** A required column is absent */
export class SchemaError extends SheetClerkError {
    constructor(
        public readonly column: string,
        public readonly dataset?: string,
        public readonly rowIndex?: number
    ) {
        const where = rowIndex !== undefined
            ? ` in row ${rowIndex}`
            : dataset ? ` in ${dataset} dataset` : '';
        super('SchemaError', `Column "${column}" not found${where}`);
    }
}

export class EmptyKeyError extends SheetClerkError {
    constructor() {
        super('EmptyKeyError', 'Identity key must name at least one column');
    }
}

/** A group-key function threw for a specific row */
export class DerivationError extends SheetClerkError {
    constructor(public readonly rowIndex: number, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('DerivationError', `Group key derivation failed at row ${rowIndex}: ${reason}`, { cause });
    }
}

export class WorkbookError extends SheetClerkError {
    constructor(public readonly filePath: string, message: string, cause?: unknown) {
        super('WorkbookError', `${filePath}: ${message}`, { cause });
    }
}

export class ConfigError extends SheetClerkError {
    constructor(public readonly key: string, message: string) {
        super('ConfigError', `Config "${key}": ${message}`);
    }
}

export function isSheetClerkError(err: unknown): err is SheetClerkError {
    return err instanceof SheetClerkError;
}

/**
 * One-line rendering for users: the error kind followed by its message,
 * which already carries the column name or row index.
 */
export function describeError(err: unknown): string {
    if (isSheetClerkError(err)) return `${err.kind}: ${err.message}`;
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}
