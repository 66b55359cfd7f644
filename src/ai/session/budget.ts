// ---------------------------------------------------------------------------
// Context Budget Monitor
//
// Reactive eviction: the service reports input usage only after a call,
// so the previous exchange's input tokens decide whether to drop the
// oldest (user, assistant) pairs before the next one.
// ---------------------------------------------------------------------------

import { getDefaultLogger, type Logger } from '../../logger.js';
import type { SessionLedger, Turn } from './types.js';

export const DEFAULT_TRIGGER_RATIO = 0.85;
export const DEFAULT_TARGET_RATIO = 0.7;

export interface TrimResult {
	readonly turns: readonly Turn[];
	readonly pairsRemoved: number;
}

export function shouldTrim(
	lastInputTokens: number,
	contextLimit: number,
	triggerRatio: number = DEFAULT_TRIGGER_RATIO,
): boolean {
	return lastInputTokens >= contextLimit * triggerRatio;
}

/**
 * Remove whole oldest pairs until at most `floor(targetRatio * length)`
 * turns remain, never going below one pair. Stops at the first head that
 * is not a (user, assistant) pair. The input array is not modified.
 */
export function trimTurns(
	turns: readonly Turn[],
	targetRatio: number = DEFAULT_TARGET_RATIO,
): TrimResult {
	const target = Math.floor(turns.length * targetRatio);
	let start = 0;
	let pairsRemoved = 0;

	while (turns.length - start > target && turns.length - start > 2) {
		if (
			turns[start].role !== 'user' ||
			turns[start + 1].role !== 'assistant'
		) {
			break;
		}
		start += 2;
		pairsRemoved++;
	}

	return Object.freeze({
		turns: pairsRemoved > 0 ? Object.freeze(turns.slice(start)) : turns,
		pairsRemoved,
	});
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export interface ContextBudgetMonitorOptions {
	readonly contextLimit: number;
	readonly triggerRatio?: number;
	readonly targetRatio?: number;
	readonly logger?: Logger;
}

export interface ContextBudgetMonitor {
	readonly contextLimit: number;
	readonly shouldTrim: (lastInputTokens: number) => boolean;
	/**
	 * Trim the ledger in place when its last reported input usage crosses
	 * the trigger. Returns the number of pairs removed (0 when untouched).
	 */
	readonly check: (ledger: SessionLedger) => number;
}

export function createContextBudgetMonitor(
	options: ContextBudgetMonitorOptions,
): ContextBudgetMonitor {
	const { contextLimit } = options;
	const triggerRatio = options.triggerRatio ?? DEFAULT_TRIGGER_RATIO;
	const targetRatio = options.targetRatio ?? DEFAULT_TARGET_RATIO;
	const logger = options.logger ?? getDefaultLogger().child('budget');

	const check = (ledger: SessionLedger): number => {
		if (!shouldTrim(ledger.lastInputTokens, contextLimit, triggerRatio)) {
			return 0;
		}
		const result = trimTurns(ledger.turns, targetRatio);
		if (result.pairsRemoved > 0) {
			ledger.replaceTurns(result.turns);
		}
		logger.debug('context budget check triggered', {
			lastInputTokens: ledger.lastInputTokens,
			contextLimit,
			pairsRemoved: result.pairsRemoved,
		});
		return result.pairsRemoved;
	};

	return Object.freeze({
		contextLimit,
		shouldTrim: (lastInputTokens: number): boolean =>
			shouldTrim(lastInputTokens, contextLimit, triggerRatio),
		check,
	});
}
