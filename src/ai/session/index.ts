export {
	CONTEXT_SEPARATOR,
	type ComposedMessage,
	composeMessage,
	composeSearchMessage,
	EMPTY_MESSAGE_PLACEHOLDER,
} from './augmentation.js';
export {
	type ContextBudgetMonitor,
	type ContextBudgetMonitorOptions,
	createContextBudgetMonitor,
	DEFAULT_TARGET_RATIO,
	DEFAULT_TRIGGER_RATIO,
	shouldTrim,
	type TrimResult,
	trimTurns,
} from './budget.js';
export {
	createExchangeDriver,
	type ExchangeDriver,
	type ExchangeDriverOptions,
	type ExchangeFailure,
	type ExchangeHooks,
	type ExchangeOutcome,
	type ExchangeState,
	type ExchangeSuccess,
	trimNotice,
} from './exchange.js';
export { createSessionLedger } from './ledger.js';
export {
	displayTimestamp,
	type ExportOptions,
	exportTranscript,
	fileTimestamp,
	listSavedSessions,
	loadSession,
	parseSessionFile,
	renderTranscript,
	SAVED_CHATS_DIR,
	type SavedSessionSummary,
	type SaveOptions,
	type SessionFile,
	saveSession,
	savedChatsDir,
	snapshotFromSessionFile,
	toSessionFile,
} from './persistence.js';
export type {
	DepthSelection,
	ExchangeUsage,
	ModelSelection,
	SessionLedger,
	SessionLedgerOptions,
	SessionSnapshot,
	SessionTotals,
	Turn,
	TurnRole,
} from './types.js';
