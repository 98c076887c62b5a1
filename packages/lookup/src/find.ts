/**
 * Exact and fuzzy single-item lookups over caller-supplied collections.
 */
import { type RatioFraction, sequenceRatio, sequenceRatioFraction } from "./sequence-matcher.js";
import {
	type Condition,
	DEFAULT_SIMILARITY_THRESHOLD,
	type FieldValues,
	type FieldsExtractor,
	ItemNotFoundError,
	type KeyExtractor,
	MultipleItemFoundError,
	SimilarityInvariantError,
	type SimilarOneMultiKeysOptions,
	type SimilarOneOptions,
	type Suggestion,
	SuggestionError,
} from "./types.js";

export interface Candidate<T> {
	item: T;
	similarity: number;
}

/** Items satisfying `condition`, in their original order; absent input yields `[]` */
export function filterItems<T>(condition: Condition<T>, items: Iterable<T> | null | undefined): T[] {
	if (items === null || items === undefined) {
		return [];
	}

	const filtered: T[] = [];
	for (const item of items) {
		if (condition(item)) {
			filtered.push(item);
		}
	}
	return filtered;
}

/**
 * Get the single item that matches `condition`.
 *
 * @throws ItemNotFoundError when nothing matches, including absent `items`.
 * @throws MultipleItemFoundError when two or more items match.
 */
export function findOne<T>(condition: Condition<T>, items?: Iterable<T> | null): T {
	const filtered = filterItems(condition, items);
	if (filtered.length === 0) {
		throw new ItemNotFoundError();
	}
	if (filtered.length >= 2) {
		throw new MultipleItemFoundError();
	}
	return filtered[0];
}

/**
 * Find the item whose key equals `target`. When none does, the most similar
 * item above `threshold` is reported through a {@link SuggestionError}.
 */
export function findSimilarOne(target: string, items: Iterable<string>, options?: SimilarOneOptions<string>): string;
export function findSimilarOne<T>(
	target: string,
	items: Iterable<T>,
	options: SimilarOneOptions<T> & { key: KeyExtractor<T> },
): T;
export function findSimilarOne<T>(target: string, items: Iterable<T>, options: SimilarOneOptions<T> = {}): T {
	return searchSimilarOne(target, items, options);
}

/** Non-overloaded form of {@link findSimilarOne}; the identity key rejects non-string items at run time */
export function searchSimilarOne<T>(target: string, items: Iterable<T>, options: SimilarOneOptions<T>): T {
	const key = options.key ?? identityKey;
	const threshold = checkThreshold(options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD);

	const best = pickMostSimilar(items, (item) => sequenceRatio(key(item), target));
	return settle(best, threshold, (item) => ({ kind: "key", key: key(item) }));
}

/**
 * Multi-field variant of {@link findSimilarOne}. An item scores the mean of its
 * per-field similarities over the fields named in `target`; a missing or null
 * field scores 0.
 */
export function findSimilarOneMultiKeys(
	target: Readonly<Record<string, string>>,
	items: Iterable<FieldValues>,
	options?: SimilarOneMultiKeysOptions<FieldValues>,
): FieldValues;
export function findSimilarOneMultiKeys<T>(
	target: Readonly<Record<string, string>>,
	items: Iterable<T>,
	options: SimilarOneMultiKeysOptions<T> & { keys: FieldsExtractor<T> },
): T;
export function findSimilarOneMultiKeys<T>(
	target: Readonly<Record<string, string>>,
	items: Iterable<T>,
	options: SimilarOneMultiKeysOptions<T> = {},
): T {
	return searchSimilarOneMultiKeys(target, items, options);
}

export function searchSimilarOneMultiKeys<T>(
	target: Readonly<Record<string, string>>,
	items: Iterable<T>,
	options: SimilarOneMultiKeysOptions<T>,
): T {
	const fields = Object.keys(target);
	if (fields.length === 0) {
		throw new RangeError("Multi-key lookup needs at least one target field.");
	}

	const keys = options.keys ?? identityFields;
	const threshold = checkThreshold(options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD);

	const best = pickMostSimilar(items, (item) => {
		const values = keys(item);
		return meanOfRatios(
			fields.map((field) => {
				const value = fieldValue(values, field);
				return value === undefined ? { numerator: 0, denominator: 1 } : sequenceRatioFraction(value, target[field]);
			}),
		);
	});

	return settle(best, threshold, (item) => {
		const values = keys(item);
		const suggested = Object.fromEntries(fields.map((field) => [field, fieldValue(values, field)] as const));
		return { kind: "fields", fields: suggested };
	});
}

/** @throws RangeError unless `threshold` is a finite number in [0, 1] */
export function checkThreshold(threshold: number): number {
	if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
		throw new RangeError(`Similarity threshold must be between 0 and 1, got ${threshold}.`);
	}
	return threshold;
}

/** Mean of exact ratios, rounded once so a mean equal to the threshold compares equal */
export function meanOfRatios(ratios: readonly RatioFraction[]): number {
	let numerator = 0n;
	let denominator = 1n;
	for (const ratio of ratios) {
		const ratioDenominator = BigInt(ratio.denominator);
		numerator = numerator * ratioDenominator + BigInt(ratio.numerator) * denominator;
		denominator *= ratioDenominator;
	}
	denominator *= BigInt(ratios.length);
	return fractionToNumber(numerator, denominator);
}

const MAX_EXACT = BigInt(Number.MAX_SAFE_INTEGER);
const QUOTIENT_BITS = 64;

/** Correctly rounded `numerator / denominator` for non-negative operands */
function fractionToNumber(numerator: bigint, denominator: bigint): number {
	if (numerator === 0n) return 0;

	const divisor = gcd(numerator, denominator);
	const p = numerator / divisor;
	const q = denominator / divisor;
	if (p <= MAX_EXACT && q <= MAX_EXACT) {
		return Number(p) / Number(q);
	}

	// Integer quotient with at least QUOTIENT_BITS bits plus a sticky bit, so Number() rounds once.
	const shift = Math.max(0, bitLength(q) - bitLength(p) + QUOTIENT_BITS);
	const scaled = p << BigInt(shift);
	const quotient = scaled / q;
	const sticky = scaled % q === 0n ? 0n : 1n;
	return Number((quotient << 1n) | sticky) / 2 ** (shift + 1);
}

function gcd(a: bigint, b: bigint): bigint {
	let x = a;
	let y = b;
	while (y !== 0n) {
		[x, y] = [y, x % y];
	}
	return x;
}

function bitLength(value: bigint): number {
	return value.toString(2).length;
}

export function pickMostSimilar<T>(items: Iterable<T>, score: (item: T) => number): Candidate<T> | undefined {
	let best: Candidate<T> | undefined;
	let bestScore = 0;

	for (const item of items) {
		const similarity = score(item);
		if (!(similarity >= 0 && similarity <= 1)) {
			throw new SimilarityInvariantError(similarity);
		}
		// Strictly greater: the first of equally similar items wins.
		if (similarity > bestScore) {
			bestScore = similarity;
			best = { item, similarity };
		}
	}

	return best;
}

function settle<T>(best: Candidate<T> | undefined, threshold: number, suggest: (item: T) => Suggestion): T {
	if (!best) {
		throw new ItemNotFoundError();
	}
	if (best.similarity === 1) {
		return best.item;
	}
	if (best.similarity > threshold) {
		throw new SuggestionError(suggest(best.item), best.similarity);
	}
	throw new ItemNotFoundError();
}

function fieldValue(values: FieldValues, field: string): string | undefined {
	if (!Object.hasOwn(values, field)) {
		return undefined;
	}
	return values[field] ?? undefined;
}

function identityKey(item: unknown): string {
	if (typeof item !== "string") {
		throw new TypeError("Items must be strings when no key extractor is given.");
	}
	return item;
}

function identityFields(item: unknown): FieldValues {
	if (!isObject(item)) {
		throw new TypeError("Items must be field objects when no keys extractor is given.");
	}

	return Object.fromEntries(
		Object.entries(item).map(([field, value]) => {
			if (typeof value !== "string" && value !== null && value !== undefined) {
				throw new TypeError(`Field '${field}' must be a string, null or undefined.`);
			}
			return [field, value] as const;
		}),
	);
}

function isObject(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}
