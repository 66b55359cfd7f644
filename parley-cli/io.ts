/**
 * Parley: Shell I/O
 *
 * The three ways the shell talks to the terminal. `createReadlineIO`
 * backs them with a readline interface; tests pass scripted fakes.
 */

import type { Interface as ReadlineInterface } from 'node:readline';

export interface ShellIO {
	/** Write text as-is (streamed fragments). */
	readonly write: (text: string) => void;
	/** Write one line. */
	readonly print: (line?: string) => void;
	/** Prompt and resolve with the entered line. */
	readonly ask: (question: string) => Promise<string>;
}

export function createReadlineIO(
	rl: ReadlineInterface,
	stream: NodeJS.WritableStream = process.stdout,
): ShellIO {
	return Object.freeze({
		write: (text: string) => {
			stream.write(text);
		},
		print: (line = '') => {
			stream.write(`${line}\n`);
		},
		ask: (question: string) =>
			new Promise<string>((resolve) => {
				rl.question(question, resolve);
			}),
	});
}
