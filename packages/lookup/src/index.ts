/**
 * Collection lookups for analysis tooling.
 *
 * Exact single-item lookup plus fuzzy lookups that tell a typo ("did you
 * mean ...?") apart from a target that does not exist at all.
 */
import { type LookupConfig, type LookupConfigLoadOptions, resolveLookupConfig } from "./config.js";
import { checkThreshold, findOne, searchSimilarOne, searchSimilarOneMultiKeys } from "./find.js";
import {
	type Condition,
	DEFAULT_SIMILARITY_THRESHOLD,
	type FieldsExtractor,
	type FieldValues,
	type KeyExtractor,
	type SimilarOneMultiKeysOptions,
	type SimilarOneOptions,
} from "./types.js";

export { loadLookupConfig, resolveLookupConfig } from "./config.js";
export type { LookupConfig, LookupConfigLoadOptions, ResolvedLookupConfig } from "./config.js";
export { filterItems, findOne, findSimilarOne, findSimilarOneMultiKeys } from "./find.js";
export { getMatchingBlocks, sequenceRatio } from "./sequence-matcher.js";
export type { MatchingBlock } from "./sequence-matcher.js";
export {
	DEFAULT_SIMILARITY_THRESHOLD,
	ItemNotFoundError,
	MultipleItemFoundError,
	SimilarityInvariantError,
	SuggestionError,
} from "./types.js";
export type {
	Condition,
	FieldsExtractor,
	FieldValues,
	KeyExtractor,
	SimilarOneMultiKeysOptions,
	SimilarOneOptions,
	Suggestion,
} from "./types.js";
export { ext, flatten, getExt, nsToMs, numDigit, toNsAndName } from "./util.js";

/** Lookups whose fuzzy methods default to a configured threshold */
export interface Lookup {
	readonly threshold: number;
	findOne<T>(condition: Condition<T>, items?: Iterable<T> | null): T;
	findSimilarOne(target: string, items: Iterable<string>, options?: SimilarOneOptions<string>): string;
	findSimilarOne<T>(target: string, items: Iterable<T>, options: SimilarOneOptions<T> & { key: KeyExtractor<T> }): T;
	findSimilarOneMultiKeys(
		target: Readonly<Record<string, string>>,
		items: Iterable<FieldValues>,
		options?: SimilarOneMultiKeysOptions<FieldValues>,
	): FieldValues;
	findSimilarOneMultiKeys<T>(
		target: Readonly<Record<string, string>>,
		items: Iterable<T>,
		options: SimilarOneMultiKeysOptions<T> & { keys: FieldsExtractor<T> },
	): T;
}

export function createLookup(config: Partial<LookupConfig> = {}): Lookup {
	const threshold = checkThreshold(config.threshold ?? DEFAULT_SIMILARITY_THRESHOLD);

	return {
		threshold,
		findOne,
		findSimilarOne<T>(target: string, items: Iterable<T>, options: SimilarOneOptions<T> = {}): T {
			return searchSimilarOne(target, items, { ...options, threshold: options.threshold ?? threshold });
		},
		findSimilarOneMultiKeys<T>(
			target: Readonly<Record<string, string>>,
			items: Iterable<T>,
			options: SimilarOneMultiKeysOptions<T> = {},
		): T {
			return searchSimilarOneMultiKeys(target, items, { ...options, threshold: options.threshold ?? threshold });
		},
	};
}

/** Resolve configuration from files and environment, then bind a {@link Lookup} to it */
export function createLookupFromConfig(options: LookupConfigLoadOptions = {}): Lookup {
	return createLookup(resolveLookupConfig(options));
}
