import { classify, DEFAULT_TAIL_MARKER } from '@jamo/engine';
import { CliError, ErrorCodes } from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface CliConfig {
    tailMarker: string;
    dictionaryPath: string | null;
    logLevel: LogLevel;
}

/** Unvalidated settings, as read from the environment or flags */
export interface RawConfig {
    tailMarker: string;
    dictionaryPath: string | null;
    logLevel: string;
}

export type ConfigOverrides = Partial<Record<keyof CliConfig, string>>;

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Build the configuration from environment variables, with command-line
 * values taking precedence:
 *
 *   JAMO_TAIL_MARKER  tail marker character (default "-")
 *   JAMO_DICTIONARY   pronunciation dictionary file (default none)
 *   LOG_LEVEL         pino log level (default "warn")
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): CliConfig {
    const dictionaryPath = overrides.dictionaryPath ?? env['JAMO_DICTIONARY'];
    return validateConfig({
        tailMarker: overrides.tailMarker ?? env['JAMO_TAIL_MARKER'] ?? DEFAULT_TAIL_MARKER,
        dictionaryPath: dictionaryPath ? dictionaryPath : null,
        logLevel: (overrides.logLevel ?? env['LOG_LEVEL'] ?? DEFAULT_LOG_LEVEL).toLowerCase(),
    });
}

/** Check every setting and report all problems at once */
export function validateConfig(raw: RawConfig): CliConfig {
    const errors: string[] = [];

    const markerChars = Array.from(raw.tailMarker);
    if (markerChars.length !== 1) {
        errors.push(`Tail marker must be a single character, got "${raw.tailMarker}"`);
    } else if (classify(markerChars[0].codePointAt(0) ?? 0).kind !== 'other') {
        errors.push(`Tail marker cannot be a Hangul character, got "${raw.tailMarker}"`);
    }

    const logLevel = isLogLevel(raw.logLevel) ? raw.logLevel : null;
    if (logLevel === null) {
        errors.push(`Log level must be one of ${LOG_LEVELS.join(', ')}, got "${raw.logLevel}"`);
    }

    if (errors.length > 0 || logLevel === null) {
        throw new CliError(ErrorCodes.INVALID_CONFIG, `Configuration validation failed:\n${errors.join('\n')}`);
    }

    return {
        tailMarker: raw.tailMarker,
        dictionaryPath: raw.dictionaryPath,
        logLevel,
    };
}
