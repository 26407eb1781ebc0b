#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { CliOptions, CurioConfig, applyCliOptions, loadConfigFromEnv } from './config';
import { TransientStoreFailure, errorMessage } from './errors';
import { createRuntime, formatGapReport, Runtime } from './cli/runtime';
import { saveAfterTurn, startShell } from './cli/shell';
import { dbg, say } from './utils';

const GENERAL_ERROR = 1;
const STORE_ERROR = 2;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

async function main() {
    const program = new Command();

    // --- Global Options ---
    program
        .name('curio')
        .version('1.0.0')
        .description('Curio - a chat companion that learns concepts from what you tell it')
        .option('--memory-file <path>', 'Path to the memory file')
        .option('--phrases-config <path>', 'Path to a JSON file overriding the built-in phrases')
        .option('--seed <n>', 'Seed for reproducible template choices', parseInteger)
        .option('--debug', 'Show internal reasoning')
        .option('--no-game', 'Reply with plain confirmations instead of scored candidates');

    const resolveConfig = (): CurioConfig => applyCliOptions(loadConfigFromEnv(), program.opts<CliOptions>());

    /**
     * Builds the runtime and runs a command action; failures map to the program's exit codes.
     */
    const withRuntime = (action: (runtime: Runtime) => Promise<void>) => async () => {
        const config = resolveConfig();
        try {
            await action(await createRuntime(config));
        } catch (error) {
            say(`Error: ${errorMessage(error)}`);
            process.exit(error instanceof TransientStoreFailure ? STORE_ERROR : GENERAL_ERROR);
        }
    };

    // --- Define Commands ---

    program
        .command('chat', { isDefault: true })
        .description('Start an interactive conversation')
        .action(withRuntime(async ({ engine, store }) => {
            await startShell(engine, store);
        }));

    program
        .command('teach')
        .description('Say one sentence to Curio and print the reply')
        .argument('<sentence...>', 'The sentence to say')
        .action(async (sentenceParts: string[]) => {
            await withRuntime(async ({ engine, store }) => {
                const response = engine.processTurn(sentenceParts.join(' '));
                say(response.message);
                if (!await saveAfterTurn(store)) {
                    process.exit(STORE_ERROR);
                }
            })();
        });

    program
        .command('stats')
        .description('Show what Curio knows')
        .action(withRuntime(async ({ engine }) => {
            say(engine.describeStats());
        }));

    program
        .command('gaps')
        .description('List concepts with missing attributes, most incomplete first')
        .option('-l, --limit <n>', 'Show at most n concepts', parseInteger)
        .action(async (options: { limit?: number }) => {
            await withRuntime(async ({ store }) => {
                const lines = formatGapReport(store, options.limit);
                say(lines.length > 0 ? lines.join('\n') : 'Every concept is complete.');
            })();
        });

    // --- Parse and Execute ---
    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        dbg(`Error during command parsing or execution: ${error}`);
        process.exit(COMMAND_PARSING_ERROR);
    }
}

main().catch(error => {
    // Catch errors from the main async function itself
    dbg(`Unhandled application error: ${error}`);
    process.exit(UNHANDLED_ERROR);
});
