// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
    INVALID_CONFIG: 'INVALID_CONFIG',
    DICTIONARY_READ_FAILED: 'DICTIONARY_READ_FAILED',
    INPUT_READ_FAILED: 'INPUT_READ_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/** Failure the CLI reports to the user and turns into an exit status */
export class CliError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CliError';
        this.code = code;
    }
}

export function isCliError(error: unknown): error is CliError {
    return error instanceof CliError;
}

/** 1 for bad usage or configuration, 2 for I/O failures */
export function exitCodeFor(code: ErrorCode): number {
    switch (code) {
        case ErrorCodes.INVALID_CONFIG:
            return 1;
        case ErrorCodes.DICTIONARY_READ_FAILED:
        case ErrorCodes.INPUT_READ_FAILED:
            return 2;
    }
}
