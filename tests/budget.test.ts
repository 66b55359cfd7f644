import { describe, expect, it } from 'vitest';
import {
	createContextBudgetMonitor,
	shouldTrim,
	trimTurns,
} from '../src/ai/session/budget.js';
import { createSessionLedger } from '../src/ai/session/ledger.js';
import type { Turn } from '../src/ai/session/types.js';
import { createTestLogger } from './utils/fakes.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const pairs = (n: number): Turn[] =>
	Array.from({ length: n }, (_, i) => [
		{ role: 'user' as const, content: `q${i}` },
		{ role: 'assistant' as const, content: `a${i}` },
	]).flat();

const newLedger = () =>
	createSessionLedger({
		model: { name: 'Sonnet', id: 'claude-sonnet-4-20250514' },
		depth: { name: 'Standard', maxTokens: 1024 },
	});

// ===========================================================================
// shouldTrim
// ===========================================================================

describe('shouldTrim', () => {
	it('should trigger at exactly the threshold', () => {
		expect(shouldTrim(153_000, 180_000)).toBe(true);
		expect(shouldTrim(152_999, 180_000)).toBe(false);
	});

	it('should honour a custom trigger ratio', () => {
		expect(shouldTrim(50, 100, 0.5)).toBe(true);
		expect(shouldTrim(49, 100, 0.5)).toBe(false);
	});
});

// ===========================================================================
// trimTurns
// ===========================================================================

describe('trimTurns', () => {
	it('should drop the oldest pairs down to the target', () => {
		const turns = pairs(5);
		const result = trimTurns(turns);

		expect(result.pairsRemoved).toBe(2);
		expect(result.turns).toHaveLength(6);
		expect(result.turns[0]).toBe(turns[4]);
	});

	it('should not modify the input', () => {
		const turns = pairs(5);
		trimTurns(turns);
		expect(turns).toHaveLength(10);
	});

	it('should never go below one pair', () => {
		const turns = pairs(1);
		const result = trimTurns(turns, 0);

		expect(result.pairsRemoved).toBe(0);
		expect(result.turns).toBe(turns);
	});

	it('should stop at a head that is not a user/assistant pair', () => {
		const turns: Turn[] = [
			{ role: 'assistant', content: 'stray' },
			...pairs(4),
		];
		const result = trimTurns(turns);

		expect(result.pairsRemoved).toBe(0);
		expect(result.turns).toBe(turns);
	});

	it('should keep a trailing unpaired user turn', () => {
		const turns: Turn[] = [...pairs(2), { role: 'user', content: 'pending' }];
		const result = trimTurns(turns);

		expect(result.pairsRemoved).toBe(1);
		expect(result.turns.map((t) => t.content)).toEqual([
			'q1',
			'a1',
			'pending',
		]);
	});
});

// ===========================================================================
// createContextBudgetMonitor
// ===========================================================================

describe('createContextBudgetMonitor', () => {
	it('should leave the ledger alone below the trigger', () => {
		const { logger } = createTestLogger();
		const monitor = createContextBudgetMonitor({
			contextLimit: 180_000,
			logger,
		});
		const ledger = newLedger();
		ledger.replaceTurns(pairs(5));
		ledger.recordUsage({ inputTokens: 1000, outputTokens: 10, costUsd: 0 });

		expect(monitor.check(ledger)).toBe(0);
		expect(ledger.turnCount).toBe(10);
	});

	it('should trim the ledger in place above the trigger', () => {
		const { logger, transport } = createTestLogger();
		const monitor = createContextBudgetMonitor({
			contextLimit: 180_000,
			logger,
		});
		const ledger = newLedger();
		ledger.replaceTurns(pairs(5));
		ledger.recordUsage({ inputTokens: 160_000, outputTokens: 10, costUsd: 0 });

		expect(monitor.check(ledger)).toBe(2);
		expect(ledger.turnCount).toBe(6);
		expect(ledger.turns[0].content).toBe('q2');
		expect(transport.filter('debug')[0].metadata).toEqual({
			lastInputTokens: 160_000,
			contextLimit: 180_000,
			pairsRemoved: 2,
		});
	});

	it('should use configured ratios', () => {
		const { logger } = createTestLogger();
		const monitor = createContextBudgetMonitor({
			contextLimit: 1000,
			triggerRatio: 0.5,
			targetRatio: 0.5,
			logger,
		});
		const ledger = newLedger();
		ledger.replaceTurns(pairs(4));
		ledger.recordUsage({ inputTokens: 500, outputTokens: 1, costUsd: 0 });

		expect(monitor.shouldTrim(499)).toBe(false);
		expect(monitor.check(ledger)).toBe(2);
		expect(ledger.turnCount).toBe(4);
	});
});
