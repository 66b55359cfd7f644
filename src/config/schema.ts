// ---------------------------------------------------------------------------
// Engine Configuration Validation
// ---------------------------------------------------------------------------
//
// Validators accept typed inputs and only check numeric ranges.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Validation primitives
// ---------------------------------------------------------------------------

export interface ValidationIssue {
	readonly path: string;
	readonly message: string;
}

const issue = (path: string, message: string): readonly ValidationIssue[] =>
	Object.freeze([Object.freeze({ path, message })]);

const ok: readonly ValidationIssue[] = Object.freeze([]);

const combine = (
	...results: ReadonlyArray<readonly ValidationIssue[]>
): readonly ValidationIssue[] => Object.freeze(results.flat());

const validateRange = (
	value: number,
	path: string,
	label: string,
	constraints: {
		readonly min?: number;
		readonly max?: number;
		readonly integer?: boolean;
		readonly exclusiveMin?: boolean;
	},
): readonly ValidationIssue[] => {
	if (Number.isNaN(value)) return issue(path, `${label} must be a number`);
	if (constraints.integer && !Number.isInteger(value))
		return issue(path, `${label} must be an integer`);
	if (constraints.min !== undefined) {
		const tooSmall = constraints.exclusiveMin
			? value <= constraints.min
			: value < constraints.min;
		if (tooSmall)
			return issue(
				path,
				`${label} must be ${constraints.exclusiveMin ? 'greater than' : 'at least'} ${constraints.min}`,
			);
	}
	if (constraints.max !== undefined && value > constraints.max)
		return issue(path, `${label} must be at most ${constraints.max}`);
	return ok;
};

// ---------------------------------------------------------------------------
// Engine config input
// ---------------------------------------------------------------------------

export interface EngineConfigInput {
	/** Conservative input-token ceiling; below the service's real limit. */
	readonly contextLimit?: number;
	/** Fraction of `contextLimit` at which trimming starts. */
	readonly triggerRatio?: number;
	/** Fraction of the current turn count kept after trimming. */
	readonly targetRatio?: number;
	/** Per-file byte ceiling for attachments. */
	readonly maxFileSize?: number;
	/** Result cap for web searches. */
	readonly maxSearchResults?: number;
}

export const validateEngineConfig = (
	value: EngineConfigInput,
): readonly ValidationIssue[] =>
	combine(
		value.contextLimit !== undefined
			? validateRange(value.contextLimit, 'contextLimit', 'contextLimit', {
					min: 1,
					integer: true,
				})
			: ok,
		value.triggerRatio !== undefined
			? validateRange(value.triggerRatio, 'triggerRatio', 'triggerRatio', {
					min: 0,
					max: 1,
					exclusiveMin: true,
				})
			: ok,
		value.targetRatio !== undefined
			? validateRange(value.targetRatio, 'targetRatio', 'targetRatio', {
					min: 0,
					max: 1,
				})
			: ok,
		value.maxFileSize !== undefined
			? validateRange(value.maxFileSize, 'maxFileSize', 'maxFileSize', {
					min: 1,
					integer: true,
				})
			: ok,
		value.maxSearchResults !== undefined
			? validateRange(
					value.maxSearchResults,
					'maxSearchResults',
					'maxSearchResults',
					{ min: 1, max: 25, integer: true },
				)
			: ok,
	);
