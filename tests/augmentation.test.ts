import { describe, expect, it } from 'vitest';
import {
	composeMessage,
	composeSearchMessage,
	EMPTY_MESSAGE_PLACEHOLDER,
} from '../src/ai/session/augmentation.js';

describe('composeMessage', () => {
	it('should pass a message through when there is no context', () => {
		expect(composeMessage('hi', null)).toEqual({
			storedMessage: 'hi',
			requestMessage: 'hi',
		});
	});

	it('should put context before the message in the request only', () => {
		expect(composeMessage('review this', 'CTX')).toEqual({
			storedMessage: 'review this',
			requestMessage: 'CTX\n\n---\n\nreview this',
		});
	});

	it('should store the placeholder for an empty message', () => {
		const composed = composeMessage('   ', 'CTX');

		expect(composed.storedMessage).toBe(EMPTY_MESSAGE_PLACEHOLDER);
		expect(composed.requestMessage).toBe('CTX\n\n---\n\nExplain this code.');
	});
});

describe('composeSearchMessage', () => {
	it('should append results and a citation instruction', () => {
		const composed = composeSearchMessage('search for cats', 'cats', 'R');

		expect(composed.storedMessage).toBe('search for cats');
		expect(composed.requestMessage).toBe(
			'search for cats\n\n[Web search results for: cats]\n\nR\n\n' +
				'Use the above web search results to help answer my question. ' +
				'Cite sources when relevant.',
		);
	});

	it('should send the message unchanged without results', () => {
		expect(composeSearchMessage('search for cats', 'cats', null)).toEqual({
			storedMessage: 'search for cats',
			requestMessage: 'search for cats',
		});
	});
});
