/**
 * Ratcliff/Obershelp similarity ("gestalt pattern matching").
 *
 * Lookup thresholds are calibrated against this score distribution.
 */

/** A run of equal characters: `a[a, a + size)` equals `b[b, b + size)` */
export interface MatchingBlock {
	a: number;
	b: number;
	size: number;
}

type Range = [aLow: number, aHigh: number, bLow: number, bHigh: number];

/** Sequences at least this long have their popular characters left out of the index */
const POPULAR_MIN_LENGTH = 200;

function indexPositions(chars: string[]): Map<string, number[]> {
	const positions = new Map<string, number[]>();
	for (let j = 0; j < chars.length; j++) {
		const list = positions.get(chars[j]);
		if (list) {
			list.push(j);
		} else {
			positions.set(chars[j], [j]);
		}
	}

	if (chars.length >= POPULAR_MIN_LENGTH) {
		const popularLimit = Math.floor(chars.length / 100) + 1;
		for (const [char, list] of positions) {
			if (list.length > popularLimit) {
				positions.delete(char);
			}
		}
	}

	return positions;
}

function findLongestMatch(
	a: string[],
	b: string[],
	positions: Map<string, number[]>,
	[aLow, aHigh, bLow, bHigh]: Range,
): MatchingBlock {
	let bestA = aLow;
	let bestB = bLow;
	let bestSize = 0;

	// runLengths[j] = length of the match ending at a[i - 1], b[j]
	let runLengths = new Map<number, number>();
	for (let i = aLow; i < aHigh; i++) {
		const next = new Map<number, number>();
		for (const j of positions.get(a[i]) ?? []) {
			if (j < bLow) continue;
			if (j >= bHigh) break;
			const size = (runLengths.get(j - 1) ?? 0) + 1;
			next.set(j, size);
			if (size > bestSize) {
				bestA = i - size + 1;
				bestB = j - size + 1;
				bestSize = size;
			}
		}
		runLengths = next;
	}

	// Popular characters never seed a match but may still extend one.
	while (bestA > aLow && bestB > bLow && a[bestA - 1] === b[bestB - 1]) {
		bestA--;
		bestB--;
		bestSize++;
	}
	while (bestA + bestSize < aHigh && bestB + bestSize < bHigh && a[bestA + bestSize] === b[bestB + bestSize]) {
		bestSize++;
	}

	return { a: bestA, b: bestB, size: bestSize };
}

function matchingBlocks(a: string[], b: string[]): MatchingBlock[] {
	const positions = indexPositions(b);
	const found: MatchingBlock[] = [];
	const queue: Range[] = [[0, a.length, 0, b.length]];

	for (let range = queue.pop(); range; range = queue.pop()) {
		const [aLow, aHigh, bLow, bHigh] = range;
		const block = findLongestMatch(a, b, positions, range);
		if (block.size === 0) continue;

		found.push(block);
		if (aLow < block.a && bLow < block.b) {
			queue.push([aLow, block.a, bLow, block.b]);
		}
		if (block.a + block.size < aHigh && block.b + block.size < bHigh) {
			queue.push([block.a + block.size, aHigh, block.b + block.size, bHigh]);
		}
	}

	found.sort((left, right) => left.a - right.a || left.b - right.b);

	const merged: MatchingBlock[] = [];
	for (const block of found) {
		const last = merged[merged.length - 1];
		if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
			last.size += block.size;
		} else {
			merged.push({ ...block });
		}
	}

	merged.push({ a: a.length, b: b.length, size: 0 });
	return merged;
}

/**
 * Matching blocks of `a` against `b`, ordered by position and terminated by a
 * zero-size block at `(a.length, b.length)`. Positions count code points.
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
	return matchingBlocks(Array.from(a), Array.from(b));
}

/** Exact form of a ratio, `2 * M` over `T` */
export interface RatioFraction {
	numerator: number;
	denominator: number;
}

/** {@link sequenceRatio} as an unrounded fraction; two empty strings give 1/1 */
export function sequenceRatioFraction(a: string, b: string): RatioFraction {
	const aChars = Array.from(a);
	const bChars = Array.from(b);
	const total = aChars.length + bChars.length;
	if (total === 0) return { numerator: 1, denominator: 1 };

	let matched = 0;
	for (const block of matchingBlocks(aChars, bChars)) {
		matched += block.size;
	}
	return { numerator: 2 * matched, denominator: total };
}

/** Similarity ratio `2 * M / T` in [0, 1]; two empty strings score 1 */
export function sequenceRatio(a: string, b: string): number {
	const { numerator, denominator } = sequenceRatioFraction(a, b);
	return numerator / denominator;
}
