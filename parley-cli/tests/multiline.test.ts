import { describe, expect, it } from 'vitest';
import { createLineCollector } from '../multiline.js';

describe('createLineCollector', () => {
	it('should pass single lines straight through', () => {
		const collector = createLineCollector();

		expect(collector.feed('hello')).toEqual({ kind: 'complete', text: 'hello' });
		expect(collector.collecting).toBe(false);
	});

	it('should join lines between fences', () => {
		const collector = createLineCollector();

		expect(collector.feed('"""')).toEqual({ kind: 'opened' });
		expect(collector.collecting).toBe(true);
		expect(collector.feed('function f() {')).toEqual({ kind: 'pending' });
		expect(collector.feed('  return 1;')).toEqual({ kind: 'pending' });
		expect(collector.feed('}')).toEqual({ kind: 'pending' });
		expect(collector.feed('  """  ')).toEqual({
			kind: 'complete',
			text: 'function f() {\n  return 1;\n}',
		});
		expect(collector.collecting).toBe(false);
	});

	it('should keep blank lines inside a block', () => {
		const collector = createLineCollector();
		collector.feed('"""');
		collector.feed('a');
		collector.feed('');
		collector.feed('b');

		expect(collector.feed('"""')).toEqual({ kind: 'complete', text: 'a\n\nb' });
	});

	it('should give an empty text for an empty block', () => {
		const collector = createLineCollector();
		collector.feed('"""');

		expect(collector.feed('"""')).toEqual({ kind: 'complete', text: '' });
	});

	it('should discard a block on reset', () => {
		const collector = createLineCollector();
		collector.feed('"""');
		collector.feed('lost');
		collector.reset();

		expect(collector.collecting).toBe(false);
		expect(collector.feed('next')).toEqual({ kind: 'complete', text: 'next' });
	});
});
