#!/usr/bin/env node

import chalk from 'chalk';
import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ERROR_CODES, ErrorCode, TRANSPORT_MODES } from '@toolbridge/constants';
import { Env, KnowledgeBaseResult, SearchKbResults, isRecord, isToolGatewayError, logger } from '@toolbridge/gateway-client';
import { searchKb } from './tools/bindings';

export interface CliArgs {
    query: string;
    mode?: string;
    url?: string;
    json: boolean;
}

const EXIT_CODES: Record<ErrorCode, number> = {
    [ERROR_CODES.CONFIGURATION_ERROR]: 2,
    [ERROR_CODES.TRANSPORT_ERROR]: 3,
    [ERROR_CODES.CONTRACT_MISMATCH]: 4,
    [ERROR_CODES.TOOL_FAILURE]: 5,
    [ERROR_CODES.MALFORMED_RESPONSE]: 6
};

export const exitCodeFor = (error: unknown): number => {
    return isToolGatewayError(error) ? EXIT_CODES[error.code] : 1;
};

export const parseArgs = async (args: string[]): Promise<CliArgs> => {
    const argv = await yargs(args)
        .scriptName('search-kb')
        .usage('$0 <query> [options]')
        .option('mode', {
            alias: 'm',
            type: 'string',
            choices: Object.values(TRANSPORT_MODES),
            description: 'Transport to use (overrides TOOL_GATEWAY_MODE)'
        })
        .option('url', {
            alias: 'u',
            type: 'string',
            description: 'Tool Gateway base URL (overrides TOOL_GATEWAY_URL)'
        })
        .option('json', {
            type: 'boolean',
            default: false,
            description: 'Print the raw results as JSON'
        })
        // Queries are text: keep "007" or "1e3" as typed.
        .parserConfiguration({ 'parse-positional-numbers': false })
        .demandCommand(1, 'A search query is required')
        .strict()
        .help()
        .parse();

    return {
        query: argv._.map(String).join(' '),
        mode: argv.mode,
        url: argv.url,
        json: argv.json
    };
};

export const applyOverrides = (env: Env, args: CliArgs): Env => ({
    ...env,
    ...(args.mode ? { TOOL_GATEWAY_MODE: args.mode } : {}),
    ...(args.url ? { TOOL_GATEWAY_URL: args.url } : {})
});

export const renderResults = (results: KnowledgeBaseResult[], color: chalk.Chalk = chalk): string[] => {
    if (results.length === 0) {
        return [color.yellow('No results.')];
    }

    return results.map((result, index) => {
        const id = typeof result.id === 'string' || typeof result.id === 'number' ? String(result.id) : '(no id)';
        const label = typeof result.title === 'string' ? result.title : typeof result.text === 'string' ? result.text : '';
        return `${color.gray(`${index + 1}.`)} ${color.bold(id)}${label ? ` ${label}` : ''}`;
    });
};

// Anything other than a list of records is printed as the gateway sent it.
export const renderOutput = (results: SearchKbResults, color: chalk.Chalk = chalk): string[] => {
    if (Array.isArray(results) && results.every(isRecord)) {
        return renderResults(results, color);
    }
    return [JSON.stringify(results, null, 2)];
};

export const renderError = (error: unknown, color: chalk.Chalk = chalk): string => {
    const code = isToolGatewayError(error) ? error.code : 'ERROR';
    const message = error instanceof Error ? error.message : String(error);
    return color.red(`${code}: ${message}`);
};

const main = async () => {
    dotenv.config();
    if (!process.env.LOG_LEVEL) {
        logger.level = 'warn';
    }

    const args = await parseArgs(hideBin(process.argv));

    try {
        const results = await searchKb(args.query, applyOverrides(process.env, args));
        if (args.json) {
            console.log(JSON.stringify(results, null, 2));
        } else {
            renderOutput(results).forEach((line) => console.log(line));
        }
    } catch (error) {
        console.error(renderError(error));
        process.exitCode = exitCodeFor(error);
    }
};

if (require.main === module) {
    main().catch((error) => {
        console.error(renderError(error));
        process.exitCode = 1;
    });
}
