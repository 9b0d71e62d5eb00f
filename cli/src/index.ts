#!/usr/bin/env node

/**
 * Command line interface: composes decomposed jamo given as arguments or on
 * stdin, optionally looking each word up in a pronunciation dictionary first.
 *
 *   jamo-compose 'ㅎㅏ-ㄴㄱㅡ-ㄹ'            # 한글
 *   jamo-compose -d words.dict 'hangul'      # 한글
 */

import { realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { config } from 'dotenv';
import type { Logger } from 'pino';
import { composeJamo, transliterate, PronunciationDictionary } from '@jamo/engine';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { CliError, ErrorCodes, exitCodeFor, isCliError } from './errors.js';

export interface CliOptions {
    dictionary?: string;
    tailMarker?: string;
    logLevel?: string;
}

export interface CliContext {
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Read and parse a pronunciation dictionary file */
export async function loadDictionary(path: string, logger: Logger): Promise<PronunciationDictionary> {
    let source: string;
    try {
        source = await readFile(path, 'utf8');
    } catch (error) {
        logger.error({ path, err: error }, 'dictionary read failed');
        throw new CliError(ErrorCodes.DICTIONARY_READ_FAILED, `Cannot read dictionary ${path}: ${errorMessage(error)}`, {
            cause: error,
        });
    }

    const dictionary = PronunciationDictionary.fromText(source);
    logger.debug({ path, entries: dictionary.size }, 'dictionary loaded');
    return dictionary;
}

/**
 * Programmatic interface for CLI operations.
 * Returns the output string that would be printed to stdout.
 */
export async function runCli(input: string, options: CliOptions = {}, context: CliContext = {}): Promise<string> {
    const settings = loadConfig(context.env ?? process.env, {
        tailMarker: options.tailMarker,
        dictionaryPath: options.dictionary,
        logLevel: options.logLevel,
    });
    const logger = context.logger ?? createLogger(settings.logLevel);
    const composeOptions = { tailMarker: settings.tailMarker };

    logger.debug({ length: input.length, dictionary: settings.dictionaryPath }, 'composing input');

    if (settings.dictionaryPath === null) {
        return composeJamo(input, composeOptions);
    }

    const dictionary = await loadDictionary(settings.dictionaryPath, logger);
    return input
        .split(/\r?\n/)
        .map((line) => transliterate(line, dictionary.lookupFn, composeOptions))
        .join('\n');
}

async function readStdin(): Promise<string> {
    try {
        const input = await text(process.stdin);
        return input.replace(/\r?\n$/, '');
    } catch (error) {
        throw new CliError(ErrorCodes.INPUT_READ_FAILED, `Cannot read stdin: ${errorMessage(error)}`, { cause: error });
    }
}

async function main(): Promise<void> {
    config();

    const program = new Command();

    program
        .name('jamo-compose')
        .description('Compose decomposed Hangul jamo into syllable blocks')
        .usage('[options] [input...]')
        .version('0.1.0')
        .argument('[input...]', 'text to compose (read from stdin when omitted)')
        .option('-d, --dictionary <file>', 'look words up in a pronunciation dictionary before composing')
        .option('-m, --tail-marker <char>', 'character that marks the next consonant as a tail')
        .option('-l, --log-level <level>', 'log level (fatal, error, warn, info, debug, trace, silent)')
        .helpOption('-h, --help', 'print this help text');

    program.parse(process.argv);
    const options = program.opts<CliOptions>();

    try {
        const input = program.args.length > 0 ? program.args.join(' ') : await readStdin();
        const output = await runCli(input, options);
        process.stdout.write(`${output}\n`);
    } catch (error) {
        if (!isCliError(error)) throw error;
        process.stderr.write(`ERROR: ${error.message}\n`);
        process.exitCode = exitCodeFor(error.code);
    }
}

function isEntryPoint(): boolean {
    const entry = process.argv[1];
    if (!entry) return false;
    try {
        return import.meta.url === pathToFileURL(realpathSync(entry)).href;
    } catch {
        return false;
    }
}

// Run main if this is the entry point
if (isEntryPoint()) {
    main().catch((error: unknown) => {
        process.stderr.write(`FATAL: ${errorMessage(error)}\n`);
        process.exitCode = 2;
    });
}
