/**
 * Parley: Theme System
 *
 * Built-in colour themes. Each theme maps UI roles to hex colours that
 * `createColors` turns into chalk styles.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ThemeRole =
	| 'primary'
	| 'secondary'
	| 'accent'
	| 'success'
	| 'warning'
	| 'error';

export interface ThemeDefinition {
	readonly key: string;
	readonly name: string;
	readonly description: string;
	readonly palette: Readonly<Record<ThemeRole, string>>;
}

// ---------------------------------------------------------------------------
// Built-in themes
// ---------------------------------------------------------------------------

const theme = (
	key: string,
	name: string,
	description: string,
	palette: Record<ThemeRole, string>,
): ThemeDefinition =>
	Object.freeze({ key, name, description, palette: Object.freeze(palette) });

export const THEMES: readonly ThemeDefinition[] = Object.freeze([
	theme('ocean', 'Ocean', 'Cool blues and teals', {
		primary: '#00afff',
		secondary: '#5fd7d7',
		accent: '#87d7ff',
		success: '#5fd787',
		warning: '#ffd75f',
		error: '#ff5f5f',
	}),
	theme('sunset', 'Sunset', 'Warm oranges and pinks', {
		primary: '#ff8700',
		secondary: '#ff5f87',
		accent: '#ffaf5f',
		success: '#afd75f',
		warning: '#ffd700',
		error: '#d70000',
	}),
	theme('forest', 'Forest', 'Earthy greens', {
		primary: '#5faf5f',
		secondary: '#87af5f',
		accent: '#afd787',
		success: '#00d75f',
		warning: '#d7af5f',
		error: '#d75f5f',
	}),
	theme('neon', 'Neon', 'Bright electric colours', {
		primary: '#ff00ff',
		secondary: '#00ffff',
		accent: '#5fff00',
		success: '#00ff87',
		warning: '#ffff00',
		error: '#ff005f',
	}),
	theme('monochrome', 'Monochrome', 'Shades of grey', {
		primary: '#ffffff',
		secondary: '#bcbcbc',
		accent: '#e4e4e4',
		success: '#d0d0d0',
		warning: '#a8a8a8',
		error: '#ffffff',
	}),
	theme('dracula', 'Dracula', 'Dark purple classic', {
		primary: '#bd93f9',
		secondary: '#ff79c6',
		accent: '#8be9fd',
		success: '#50fa7b',
		warning: '#f1fa8c',
		error: '#ff5555',
	}),
]);

export const DEFAULT_THEME_KEY = 'ocean';

export const getTheme = (key: string): ThemeDefinition | undefined =>
	THEMES.find((t) => t.key === key);

export const isThemeKey = (key: string): boolean => getTheme(key) !== undefined;

/** The named theme, or the default for an unknown key. */
export function resolveTheme(key: string): ThemeDefinition {
	return getTheme(key) ?? getTheme(DEFAULT_THEME_KEY) ?? THEMES[0];
}
