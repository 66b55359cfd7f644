/**
 * Parley: Multi-line Input
 *
 * A line of `"""` on its own opens a block; the next such line closes it
 * and the collected lines are submitted as one message.
 */

export const MULTILINE_FENCE = '"""';

export type LineResult =
	| { readonly kind: 'opened' }
	| { readonly kind: 'pending' }
	| { readonly kind: 'complete'; readonly text: string };

export interface LineCollector {
	readonly feed: (line: string) => LineResult;
	readonly collecting: boolean;
	readonly reset: () => void;
}

export function createLineCollector(): LineCollector {
	let collecting = false;
	let buffer: string[] = [];

	const feed = (line: string): LineResult => {
		const isFence = line.trim() === MULTILINE_FENCE;

		if (!collecting) {
			if (!isFence) return { kind: 'complete', text: line };
			collecting = true;
			return { kind: 'opened' };
		}

		if (!isFence) {
			buffer.push(line);
			return { kind: 'pending' };
		}

		const text = buffer.join('\n');
		collecting = false;
		buffer = [];
		return { kind: 'complete', text };
	};

	const reset = (): void => {
		collecting = false;
		buffer = [];
	};

	return Object.freeze({
		feed,
		reset,
		get collecting() {
			return collecting;
		},
	});
}
