/**
 * Parley: Interactive Picker
 *
 * Numbered-table selection prompt. Empty input cancels; anything that is
 * not a listed number is rejected and asked again.
 */

import type { ShellIO } from './io.js';
import { renderTable, type TermColors } from './ui.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PickerItem {
	readonly label: string;
	readonly detail?: string;
	/** Marks the active entry. */
	readonly current?: boolean;
}

export interface PickerOptions {
	readonly title: string;
	readonly detailHeader?: string;
	readonly colors: TermColors;
}

// ---------------------------------------------------------------------------
// Picker
// ---------------------------------------------------------------------------

export const pickerPrompt = (count: number): string =>
	`Enter 1-${count} (or empty to cancel) > `;

/**
 * Show a numbered table and return the selected index, or -1 when the
 * user cancels.
 *
 * @example
 * ```ts
 * const idx = await showPicker(
 *   [{ label: 'Opus', detail: 'Most powerful' }, { label: 'Haiku' }],
 *   io,
 *   { title: 'Pick a Model', colors },
 * );
 * ```
 */
export async function showPicker(
	items: readonly PickerItem[],
	io: ShellIO,
	options: PickerOptions,
): Promise<number> {
	const { colors } = options;
	if (items.length === 0) return -1;

	io.print();
	io.print(
		renderTable(
			[
				{ header: '#', style: colors.bold },
				{ header: 'Option', style: colors.bold },
				{ header: options.detailHeader ?? 'Description', style: colors.dim },
			],
			items.map((item, i) => [
				String(i + 1),
				item.current ? `${item.label} (current)` : item.label,
				item.detail ?? '',
			]),
			{ title: options.title, colors },
		),
	);

	for (;;) {
		const answer = (await io.ask(pickerPrompt(items.length))).trim();
		if (answer === '') return -1;

		const num = Number(answer);
		if (Number.isInteger(num) && num >= 1 && num <= items.length) {
			return num - 1;
		}
		io.print(
			`  ${colors.error(`Invalid choice. Enter a number from 1 to ${items.length}.`)}`,
		);
	}
}
