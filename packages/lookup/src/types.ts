/**
 * Shared types and errors for collection lookups.
 */

/** Default similarity threshold for fuzzy lookups */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

export type Condition<T> = (item: T) => boolean;

/** Named field values of an item; absent values score 0 against any target */
export type FieldValues = Readonly<Record<string, string | null | undefined>>;

export type KeyExtractor<T> = (item: T) => string;

export type FieldsExtractor<T> = (item: T) => FieldValues;

export interface SimilarOneOptions<T> {
	/** Key string of an item; identity when omitted */
	key?: KeyExtractor<T>;
	threshold?: number;
}

export interface SimilarOneMultiKeysOptions<T> {
	/** Field values of an item; identity when omitted */
	keys?: FieldsExtractor<T>;
	threshold?: number;
}

/** Best-guess candidate attached to a {@link SuggestionError} */
export type Suggestion =
	| { kind: "key"; key: string }
	| { kind: "fields"; fields: Readonly<Record<string, string | undefined>> };

const NOT_FOUND_MESSAGE = "Failed to find item.";
const AMBIGUOUS_MESSAGE = "Failed to identify item.";

/** No item satisfies the condition, or none is similar enough to the target */
export class ItemNotFoundError extends Error {
	constructor(message: string = NOT_FOUND_MESSAGE) {
		super(message);
		this.name = "ItemNotFoundError";
	}
}

/** More than one item satisfies an exact-match condition */
export class MultipleItemFoundError extends Error {
	constructor(message: string = AMBIGUOUS_MESSAGE) {
		super(message);
		this.name = "MultipleItemFoundError";
	}
}

/**
 * No exact match, but one candidate scored above the threshold. The message
 * names the candidate so callers can surface a "did you mean" hint.
 */
export class SuggestionError extends ItemNotFoundError {
	constructor(
		public readonly suggestion: Suggestion,
		public readonly similarity: number,
	) {
		super(SuggestionError.formatMessage(suggestion));
		this.name = "SuggestionError";
	}

	static formatMessage(suggestion: Suggestion): string {
		if (suggestion.kind === "key") {
			return `Arguments may be wrong. Isn't it '${suggestion.key}'?`;
		}

		let message = "Arguments may be wrong. Aren't they below?\n";
		for (const [field, value] of Object.entries(suggestion.fields)) {
			message += value === undefined ? `${field}=<none>\n` : `${field}='${value}'\n`;
		}
		return message;
	}
}

/** A similarity score left [0, 1]; indicates a defect in the scorer, not bad input */
export class SimilarityInvariantError extends Error {
	constructor(public readonly similarity: number) {
		super(`Similarity ${similarity} is outside [0, 1].`);
		this.name = "SimilarityInvariantError";
	}
}
