/**
 * Small helpers used beside the lookups by trace-analysis code.
 */

/** Concatenate an iterable of iterables into one array */
export function flatten<T>(nested: Iterable<Iterable<T>>): T[] {
	const flat: T[] = [];
	for (const inner of nested) {
		for (const item of inner) {
			flat.push(item);
		}
	}
	return flat;
}

/** Number of decimal digits of `|value|` */
export function numDigit(value: number): number {
	if (!Number.isSafeInteger(value)) {
		throw new RangeError(`Expected a safe integer, got ${value}.`);
	}
	return String(Math.abs(value)).length;
}

/** Extension of the final path segment without its dot; leading dots do not start one */
export function ext(path: string): string {
	const stem = baseName(path).replace(/^\.+/, "");
	const dot = stem.lastIndexOf(".");
	return dot === -1 ? "" : stem.slice(dot + 1);
}

/** Text after the last dot of the final path segment, or the whole segment when it has no dot */
export function getExt(path: string): string {
	const parts = baseName(path).split(".");
	return parts[parts.length - 1];
}

export function nsToMs(ns: number): number {
	return ns * 1.0e-6;
}

/** Split a node path into its namespace (with trailing slash) and bare name */
export function toNsAndName(nodeName: string): [ns: string, name: string] {
	const parts = nodeName.split("/");
	const name = parts[parts.length - 1];
	const ns = `${parts.slice(0, -1).join("/")}/`;
	return [ns, name];
}

function baseName(path: string): string {
	return path.slice(path.lastIndexOf("/") + 1);
}
