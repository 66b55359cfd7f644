/**
 * Parley: Command Registry
 *
 * Named shell commands with aliases. Lookup is case-insensitive on the
 * whole trimmed input, so `Save` and ` save ` both resolve.
 */

export interface CommandResult {
	/** End the REPL after this command. */
	readonly quit?: boolean;
}

export interface CommandDefinition {
	readonly name: string;
	readonly aliases?: readonly string[];
	/** Shown in help; defaults to the name. */
	readonly usage?: string;
	readonly description: string;
	readonly execute: () => Promise<CommandResult | undefined>;
}

export interface CommandRegistry {
	readonly register: (command: CommandDefinition) => void;
	readonly registerAll: (commands: readonly CommandDefinition[]) => void;
	readonly get: (nameOrAlias: string) => CommandDefinition | undefined;
	readonly getAll: () => readonly CommandDefinition[];
	/** Every name and alias, in registration order. */
	readonly names: () => readonly string[];
}

const normalize = (input: string): string => input.trim().toLowerCase();

export function createCommandRegistry(): CommandRegistry {
	const commands = new Map<string, CommandDefinition>();
	const aliases = new Map<string, string>();

	function register(command: CommandDefinition): void {
		commands.set(normalize(command.name), command);
		for (const alias of command.aliases ?? []) {
			aliases.set(normalize(alias), normalize(command.name));
		}
	}

	function registerAll(cmds: readonly CommandDefinition[]): void {
		for (const cmd of cmds) register(cmd);
	}

	function get(nameOrAlias: string): CommandDefinition | undefined {
		const key = normalize(nameOrAlias);
		return commands.get(key) ?? commands.get(aliases.get(key) ?? '');
	}

	function getAll(): readonly CommandDefinition[] {
		return [...commands.values()];
	}

	function names(): readonly string[] {
		return [...commands.values()].flatMap((c) => [
			c.name,
			...(c.aliases ?? []),
		]);
	}

	return Object.freeze({ register, registerAll, get, getAll, names });
}
