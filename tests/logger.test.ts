import { Writable } from 'node:stream';
import { afterEach, describe, expect, it } from 'vitest';
import {
	createConsoleTransport,
	createLogger,
	createMemoryTransport,
	formatLogEntry,
	getDefaultLogger,
	isLogLevel,
	type LogEntry,
	type Logger,
	setDefaultLogger,
} from '../src/logger.js';

// ===========================================================================
// createMemoryTransport
// ===========================================================================

describe('createMemoryTransport', () => {
	it('should store written entries', () => {
		const transport = createMemoryTransport();
		const entry: LogEntry = {
			level: 'info',
			message: 'test message',
			timestamp: '2024-01-01T00:00:00.000Z',
		};

		transport.write(entry);

		expect(transport.entries).toHaveLength(1);
		expect(transport.entries[0]).toBe(entry);
	});

	it('should clear and filter entries', () => {
		const transport = createMemoryTransport();

		transport.write({ level: 'debug', message: 'd', timestamp: 't' });
		transport.write({ level: 'warn', message: 'w1', timestamp: 't' });
		transport.write({ level: 'warn', message: 'w2', timestamp: 't' });

		expect(transport.filter('warn').map((e) => e.message)).toEqual([
			'w1',
			'w2',
		]);

		transport.clear();
		expect(transport.entries).toHaveLength(0);
	});
});

// ===========================================================================
// createLogger
// ===========================================================================

describe('createLogger', () => {
	it('should drop entries below the level', () => {
		const transport = createMemoryTransport();
		const logger = createLogger({ level: 'warn', transports: [transport] });

		logger.debug('d');
		logger.info('i');
		logger.warn('w');
		logger.error('e');

		expect(transport.entries.map((e) => e.level)).toEqual(['warn', 'error']);
	});

	it('should log nothing at level none', () => {
		const transport = createMemoryTransport();
		const logger = createLogger({ level: 'none', transports: [transport] });

		logger.error('e');

		expect(transport.entries).toHaveLength(0);
	});

	it('should extend context for child loggers and share level', () => {
		const transport = createMemoryTransport();
		const parent = createLogger({
			context: 'parley',
			level: 'info',
			transports: [transport],
		});
		const child = parent.child('shell');

		child.info('hello');
		parent.setLevel('error');
		child.warn('hidden');

		expect(transport.entries).toHaveLength(1);
		expect(transport.entries[0].context).toBe('parley:shell');
		expect(child.getLevel()).toBe('error');
	});

	it('should flatten an Error passed to error()', () => {
		const transport = createMemoryTransport();
		const logger = createLogger({ transports: [transport] });

		logger.error('failed', new Error('outer', { cause: new Error('inner') }));

		expect(transport.entries[0].metadata).toEqual({
			errorName: 'Error',
			errorMessage: 'outer',
			cause: 'inner',
		});
	});

	it('should add and clear transports', () => {
		const first = createMemoryTransport();
		const second = createMemoryTransport();
		const logger = createLogger({ transports: [first] });

		logger.addTransport(second);
		logger.info('both');
		logger.clearTransports();
		logger.info('neither');

		expect(first.entries).toHaveLength(1);
		expect(second.entries).toHaveLength(1);
	});
});

// ===========================================================================
// Formatting and console transport
// ===========================================================================

describe('formatLogEntry', () => {
	it('should format level, timestamp, context and metadata', () => {
		const line = formatLogEntry({
			level: 'info',
			message: 'saved',
			timestamp: '2024-01-01T00:00:00.000Z',
			context: 'parley:persistence',
			metadata: { turns: 2 },
		});

		expect(line).toBe(
			'INFO  2024-01-01T00:00:00.000Z [parley:persistence] saved {"turns":2}',
		);
	});

	it('should omit empty metadata', () => {
		const line = formatLogEntry({
			level: 'warn',
			message: 'x',
			timestamp: 't',
			metadata: {},
		});
		expect(line).toBe('WARN  t x');
	});
});

describe('createConsoleTransport', () => {
	it('should write one line per entry to the given stream', () => {
		const written: string[] = [];
		const stream = new Writable({
			write(chunk: Buffer, _encoding, callback) {
				written.push(chunk.toString());
				callback();
			},
		});
		const transport = createConsoleTransport({ colour: false, stream });

		transport.write({ level: 'error', message: 'oops', timestamp: 't' });

		expect(written).toEqual(['ERROR t oops\n']);
	});
});

// ===========================================================================
// Default logger
// ===========================================================================

describe('default logger', () => {
	let original: Logger | undefined;

	afterEach(() => {
		if (original) setDefaultLogger(original);
	});

	it('should return the replacement after setDefaultLogger', () => {
		original = getDefaultLogger();
		const replacement = createLogger({ transports: [] });

		setDefaultLogger(replacement);

		expect(getDefaultLogger()).toBe(replacement);
	});
});

describe('isLogLevel', () => {
	it('should accept known levels only', () => {
		expect(isLogLevel('debug')).toBe(true);
		expect(isLogLevel('none')).toBe(true);
		expect(isLogLevel('verbose')).toBe(false);
		expect(isLogLevel('constructor')).toBe(false);
	});
});
