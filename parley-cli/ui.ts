/**
 * Parley: Terminal UI Primitives
 *
 * Theme-aware colours (chalk), tables, and the formatters for every
 * block the shell prints. Renderers return strings; the caller writes.
 */

import {
	Chalk,
	type ChalkInstance,
	type ColorSupportLevel,
	supportsColor,
} from 'chalk';
import type { SearchResult } from '../src/ai/search/index.js';
import { sourceDomain } from '../src/ai/search/index.js';
import type { ExchangeUsage, SessionTotals } from '../src/ai/session/index.js';
import type { ThemeDefinition, ThemeRole } from './themes.js';

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

type Style = (s: string) => string;

export interface TermColors extends Readonly<Record<ThemeRole, Style>> {
	readonly bold: Style;
	readonly dim: Style;
	readonly italic: Style;
	readonly strong: (role: ThemeRole, s: string) => string;
	readonly enabled: boolean;
}

export interface TermColorsOptions {
	readonly enabled?: boolean;
}

const colorLevel = (enabled: boolean): ColorSupportLevel => {
	if (!enabled) return 0;
	return supportsColor ? supportsColor.level || 1 : 1;
};

export function createColors(
	theme: ThemeDefinition,
	options?: TermColorsOptions,
): TermColors {
	const enabled =
		options?.enabled ??
		(process.stdout.isTTY === true && !process.env.NO_COLOR);
	const chalk: ChalkInstance = new Chalk({ level: colorLevel(enabled) });
	const role = (r: ThemeRole): Style => {
		const styled = chalk.hex(theme.palette[r]);
		return (s: string) => styled(s);
	};

	return Object.freeze({
		bold: (s: string) => chalk.bold(s),
		dim: (s: string) => chalk.dim(s),
		italic: (s: string) => chalk.italic(s),
		primary: role('primary'),
		secondary: role('secondary'),
		accent: role('accent'),
		success: role('success'),
		warning: role('warning'),
		error: role('error'),
		strong: (r: ThemeRole, s: string) => chalk.bold.hex(theme.palette[r])(s),
		enabled,
	});
}

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

export const formatTokens = (n: number): string => n.toLocaleString('en-US');

export const formatCost = (usd: number): string => `$${usd.toFixed(4)}`;

export const truncate = (text: string, max: number): string =>
	text.length > max ? `${text.slice(0, max)}...` : text;

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export interface TableColumn {
	readonly header: string;
	readonly align?: 'left' | 'right';
	readonly style?: Style;
	/** Cells longer than this are cut. */
	readonly maxWidth?: number;
}

export interface TableOptions {
	readonly title?: string;
	readonly colors: TermColors;
	readonly headerRole?: ThemeRole;
}

/**
 * Render rows as aligned columns, indented two spaces. Widths are taken
 * from the unstyled text; styles are applied after padding.
 */
export function renderTable(
	columns: readonly TableColumn[],
	rows: ReadonlyArray<readonly string[]>,
	options: TableOptions,
): string {
	const { colors } = options;
	const cell = (row: readonly string[], i: number): string => {
		const text = row[i] ?? '';
		const max = columns[i].maxWidth;
		return max !== undefined && text.length > max ? text.slice(0, max) : text;
	};
	const widths = columns.map((col, i) =>
		Math.max(col.header.length, ...rows.map((row) => cell(row, i).length)),
	);
	const pad = (text: string, i: number): string => {
		if (columns[i].align === 'right') return text.padStart(widths[i]);
		return i === columns.length - 1 ? text : text.padEnd(widths[i]);
	};
	const headerStyle = (s: string): string =>
		colors.strong(options.headerRole ?? 'primary', s);

	const lines: string[] = [];
	if (options.title) lines.push(`  ${colors.bold(options.title)}`);
	lines.push(
		`  ${columns.map((col, i) => headerStyle(pad(col.header, i))).join('  ')}`,
	);
	lines.push(
		`  ${colors.dim(widths.map((w) => '─'.repeat(Math.max(w, 1))).join('  '))}`,
	);
	for (const row of rows) {
		const cells = columns.map((col, i) => {
			const padded = pad(cell(row, i), i);
			return col.style ? col.style(padded) : padded;
		});
		lines.push(`  ${cells.join('  ')}`);
	}
	return lines.map((line) => line.trimEnd()).join('\n');
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export const renderSuccess = (message: string, colors: TermColors): string =>
	`  ${colors.strong('success', `-> ${message}`)}`;

export const renderWarning = (message: string, colors: TermColors): string =>
	`  ${colors.warning(message)}`;

export const renderInfo = (message: string, colors: TermColors): string =>
	`  ${colors.dim(message)}`;

export function renderError(
	title: string,
	hint: string | undefined,
	colors: TermColors,
): string {
	const head = `  ${colors.strong('error', `✖ ${title}`)}`;
	return hint ? `${head}\n    ${colors.dim(hint)}` : head;
}

export const renderAssistantHeader = (colors: TermColors): string =>
	`\n  ${colors.strong('primary', 'Assistant')}\n`;

// ---------------------------------------------------------------------------
// Status line
// ---------------------------------------------------------------------------

export interface StatusLineData {
	readonly model: string;
	readonly depthName: string;
	readonly maxTokens: number;
	readonly persona: string;
	readonly themeName: string;
}

const PERSONA_PREVIEW_LENGTH = 30;

export function renderStatusLine(
	data: StatusLineData,
	colors: TermColors,
): string {
	const sep = colors.dim('|');
	const persona = data.persona
		? colors.italic(truncate(data.persona, PERSONA_PREVIEW_LENGTH))
		: colors.dim('None');
	return [
		`  ${colors.dim('Model:')} ${colors.strong('primary', data.model)}`,
		`${colors.dim('Brain:')} ${colors.secondary(data.depthName)} ${colors.dim(`(${data.maxTokens} tokens)`)}`,
		`${colors.dim('Persona:')} ${persona}`,
		`${colors.dim('Theme:')} ${colors.primary(data.themeName)}`,
	].join(`  ${sep}  `);
}

// ---------------------------------------------------------------------------
// Usage and summary
// ---------------------------------------------------------------------------

export function renderUsage(
	modelName: string,
	usage: ExchangeUsage,
	session: SessionTotals,
	colors: TermColors,
): string {
	return renderTable(
		[
			{ header: '', style: colors.dim },
			{ header: 'Input', align: 'right', style: colors.primary },
			{ header: 'Output', align: 'right', style: colors.secondary },
			{ header: 'Cost', align: 'right', style: colors.warning },
		],
		[
			[
				'This msg',
				formatTokens(usage.inputTokens),
				formatTokens(usage.outputTokens),
				formatCost(usage.costUsd),
			],
			[
				'Session',
				formatTokens(session.totalInputTokens),
				formatTokens(session.totalOutputTokens),
				formatCost(session.totalCostUsd),
			],
		],
		{ title: `Usage (${modelName})`, colors, headerRole: 'warning' },
	);
}

export interface SessionSummary extends SessionTotals {
	readonly exchanges: number;
	readonly model: string;
	readonly themeName: string;
}

export function renderSessionSummary(
	summary: SessionSummary,
	colors: TermColors,
): string {
	const goodbye = `  ${colors.strong('warning', 'Goodbye!')}`;
	if (summary.exchanges === 0) return goodbye;

	const rows: ReadonlyArray<readonly [string, string]> = [
		['Messages', `${summary.exchanges} exchanges`],
		['Model', summary.model],
		['Theme', summary.themeName],
		[
			'Tokens used',
			`${formatTokens(summary.totalInputTokens)} in + ${formatTokens(summary.totalOutputTokens)} out`,
		],
		['Total cost', formatCost(summary.totalCostUsd)],
	];
	const width = Math.max(...rows.map(([label]) => label.length));
	const body = rows.map(
		([label, value]) =>
			`  ${colors.dim(label.padEnd(width))}  ${colors.bold(value)}`,
	);
	return [
		`  ${colors.strong('warning', 'Session Summary')}`,
		...body,
		'',
		goodbye,
	].join('\n');
}

// ---------------------------------------------------------------------------
// Search results
// ---------------------------------------------------------------------------

export function renderSearchResults(
	results: readonly SearchResult[],
	colors: TermColors,
): string {
	return renderTable(
		[
			{ header: '#', style: colors.bold },
			{ header: 'Title', style: colors.bold, maxWidth: 40 },
			{ header: 'Source', style: colors.dim, maxWidth: 25 },
		],
		results.map((r, i) => [String(i + 1), r.title, sourceDomain(r.url)]),
		{ title: `Web Results (${results.length})`, colors, headerRole: 'accent' },
	);
}

// ---------------------------------------------------------------------------
// Banner, help and setup
// ---------------------------------------------------------------------------

export function renderBanner(colors: TermColors): string {
	return [
		'',
		`  ${colors.strong('primary', 'Parley')} ${colors.dim('terminal chat')}`,
		`  ${colors.dim('Type')} ${colors.bold('help')} ${colors.dim('for commands.')}`,
		'',
	].join('\n');
}

export interface HelpEntry {
	readonly usage: string;
	readonly description: string;
}

export function renderHelp(
	entries: readonly HelpEntry[],
	colors: TermColors,
): string {
	const width = Math.max(...entries.map((e) => e.usage.length));
	return [
		`  ${colors.bold('Commands')}`,
		...entries.map(
			(e) =>
				`  ${colors.accent(e.usage.padEnd(width))}  ${colors.dim(`- ${e.description}`)}`,
		),
	].join('\n');
}

export function renderSetupPanel(variable: string, colors: TermColors): string {
	return [
		`  ${colors.strong('error', 'Setup Required: API key not found')}`,
		'',
		`  ${colors.dim('1. Create a')} ${colors.bold('.env')} ${colors.dim('file in the project root')}`,
		`  ${colors.dim('2. Add this line:')} ${colors.bold(`${variable}=your-key-here`)}`,
		`  ${colors.dim('3. Get a key at:')} ${colors.accent('https://console.anthropic.com/')}`,
	].join('\n');
}
