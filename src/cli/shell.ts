import inquirer from 'inquirer';
import { ConversationEngine } from '../conversation/ConversationEngine';
import { TransientStoreFailure } from '../errors';
import { ConceptStore } from '../memory/ConceptStore';
import { say } from '../utils';

export type InputFn = () => Promise<string>;

/**
 * Prompts the user for the next utterance in the interactive shell.
 * 
 * Uses inquirer to display a prompt with "curio> " and collect user input.
 * Trims whitespace from the input before returning.
 * 
 * @returns Promise that resolves to the trimmed utterance entered by the user
 */
export async function getUserInput(): Promise<string> {
    const answers = await inquirer.prompt<{ utterance: string }>([
        { type: 'input', name: 'utterance', message: 'curio> ' }
    ]);
    return answers.utterance.trim();
}

/**
 * Saves the concept store after a turn.
 * 
 * A write that still fails after the store's own retry is reported to the user and the
 * conversation goes on. Any other error propagates.
 * 
 * @param store - The store holding what was learned so far
 * @returns Promise that resolves to true when the store was saved, false when the save was given up
 */
export async function saveAfterTurn(store: ConceptStore): Promise<boolean> {
    try {
        await store.saveMemory();
        return true;
    } catch (error) {
        if (error instanceof TransientStoreFailure) {
            say(`(Could not save what I learned: ${error.message})`);
            return false;
        }
        throw error;
    }
}

/**
 * Starts the interactive conversation shell.
 * 
 * Each line read is handed to the conversation engine and the reply is printed as "Curio: ...".
 * The store is saved after every turn, the last one included. The loop ends on 'quit', 'exit' or 'bye'.
 * 
 * @param engine - Conversation engine that turns each utterance into a reply
 * @param store - Concept store saved after every turn
 * @param readInput - Source of user lines; defaults to the inquirer prompt
 */
export async function startShell(engine: ConversationEngine, store: ConceptStore, readInput: InputFn = getUserInput): Promise<void> {
    say('Curio is listening. Type "help" for commands or "quit" to leave.');

    let shellRunning = true;
    while (shellRunning) {
        const utterance = await readInput();
        const response = engine.processTurn(utterance);
        say(`Curio: ${response.message}`);

        if (response.kind === 'quit') {
            shellRunning = false;
        }
        await saveAfterTurn(store);
    }
}
