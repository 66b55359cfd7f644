// ---------------------------------------------------------------------------
// Augmentation Composer
//
// Side-channel context (attached files, search snippets) goes into the
// outbound request only.  The ledger stores the visible message, so
// repeated attachments never accumulate in history.
// ---------------------------------------------------------------------------

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/** Stored in place of an empty message that only carries attachments. */
export const EMPTY_MESSAGE_PLACEHOLDER = 'Explain this code.';

export interface ComposedMessage {
	/** What the ledger stores. */
	readonly storedMessage: string;
	/** What is sent for this exchange only. */
	readonly requestMessage: string;
}

export function composeMessage(
	visibleMessage: string,
	sideChannelContext: string | null,
): ComposedMessage {
	if (sideChannelContext === null) {
		return Object.freeze({
			storedMessage: visibleMessage,
			requestMessage: visibleMessage,
		});
	}

	const storedMessage =
		visibleMessage.trim().length > 0
			? visibleMessage
			: EMPTY_MESSAGE_PLACEHOLDER;

	return Object.freeze({
		storedMessage,
		requestMessage: `${sideChannelContext}${CONTEXT_SEPARATOR}${storedMessage}`,
	});
}

/**
 * Search variant: the question leads and the results follow, with an
 * instruction to cite them.
 */
export function composeSearchMessage(
	visibleMessage: string,
	query: string,
	results: string | null,
): ComposedMessage {
	if (results === null) {
		return composeMessage(visibleMessage, null);
	}

	return Object.freeze({
		storedMessage: visibleMessage,
		requestMessage:
			`${visibleMessage}\n\n` +
			`[Web search results for: ${query}]\n\n` +
			`${results}\n\n` +
			'Use the above web search results to help answer my question. ' +
			'Cite sources when relevant.',
	});
}
