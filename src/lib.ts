// ---------------------------------------------------------------------------
// Parley: public library API
//
// The session engine behind the terminal client: ledger, context budget,
// augmentation, streaming exchange, persistence, and the provider, search
// and file-attachment collaborators it drives.
// ---------------------------------------------------------------------------

// ---- Files -----------------------------------------------------------------
export * from './ai/files/index.js';
// ---- Pricing ---------------------------------------------------------------
export * from './ai/pricing/index.js';
// ---- Provider --------------------------------------------------------------
export * from './ai/provider/index.js';
// ---- Search ----------------------------------------------------------------
export * from './ai/search/index.js';
// ---- Session ---------------------------------------------------------------
export * from './ai/session/index.js';
// ---- Config ----------------------------------------------------------------
export {
	BASE_INSTRUCTIONS,
	buildSystemPrompt,
	DEFAULT_DEPTH,
	DEFAULT_MODEL,
	DEPTH_PRESETS,
	type DepthPreset,
	findDepthPreset,
	findModelPreset,
	MODEL_PRESETS,
	type ModelPreset,
	PERSONA_PRESETS,
	type PersonaPreset,
} from './config/presets.js';
export { validateEngineConfig } from './config/schema.js';
export {
	DEFAULT_ENGINE_CONFIG,
	DEFAULT_PREFERENCES,
	DEFAULT_THEME,
	defineEngineConfig,
	type EngineConfig,
	type EngineConfigInput,
	type Environment,
	loadEnvironment,
	loadPreferences,
	type Preferences,
	parsePreferences,
	preferencesPath,
	savePreferences,
	type ValidationIssue,
} from './config/settings.js';
// ---- Errors ----------------------------------------------------------------
export * from './errors/index.js';
// ---- Logger ----------------------------------------------------------------
export {
	type ConsoleTransportOptions,
	createConsoleTransport,
	createLogger,
	createMemoryTransport,
	formatLogEntry,
	getDefaultLogger,
	isLogLevel,
	type LogEntry,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	type LogTransport,
	type MemoryTransportHandle,
	setDefaultLogger,
} from './logger.js';
// ---- Utils -----------------------------------------------------------------
export { readJsonFile, writeJsonFile, writeTextFile } from './utils/json-io.js';
