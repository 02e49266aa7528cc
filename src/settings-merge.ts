import { readFile } from "node:fs/promises";
import { isDeepStrictEqual } from "node:util";
import { errorMessage, InvalidSettingsError, isNodeError } from "./errors.js";
import { writeFileAtomic } from "./fs-utils.js";

export type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| JsonObject;

export interface JsonObject {
	[key: string]: JsonValue;
}

/** The only top-level key the manager ever adds to or removes from. */
export const GOVERNED_KEY = "hooks";

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * An entry belongs to the manager when any `command` string nested inside
 * it references the ownership token (the deployed artifact's file name).
 */
export function isOwnedEntry(entry: JsonValue, token: string): boolean {
	if (Array.isArray(entry)) {
		return entry.some((item) => isOwnedEntry(item, token));
	}
	if (!isJsonObject(entry)) {
		return false;
	}
	return Object.entries(entry).some(([key, value]) =>
		key === "command" && typeof value === "string"
			? value.includes(token)
			: isOwnedEntry(value, token),
	);
}

function mergeOwnedList(
	current: JsonValue[],
	incoming: JsonValue[],
	token: string,
): JsonValue[] {
	const firstOwned = current.findIndex((e) => isOwnedEntry(e, token));
	if (firstOwned === -1) {
		return [...current, ...incoming];
	}

	const before = current.slice(0, firstOwned);
	const after = current.slice(firstOwned).filter((e) => !isOwnedEntry(e, token));
	return [...before, ...incoming, ...after];
}

/**
 * Deep-merges `fragment` into `existing`. Objects merge key by key; lists
 * keep every element the manager does not own, in order, and have the
 * manager's entries replaced in place (or appended on first merge).
 */
export function mergeSettings(
	existing: JsonObject,
	fragment: JsonObject,
	token: string,
	path: string[] = [],
): JsonObject {
	const result: JsonObject = { ...existing };

	for (const [key, incoming] of Object.entries(fragment)) {
		const current = existing[key];
		const keyPath = [...path, key].join(".");

		if (current === undefined) {
			result[key] = structuredClone(incoming);
		} else if (isJsonObject(incoming)) {
			if (!isJsonObject(current)) {
				throw new Error(`Cannot merge settings: "${keyPath}" is not an object`);
			}
			result[key] = mergeSettings(current, incoming, token, [...path, key]);
		} else if (Array.isArray(incoming)) {
			if (!Array.isArray(current)) {
				throw new Error(`Cannot merge settings: "${keyPath}" is not a list`);
			}
			result[key] = mergeOwnedList(current, incoming, token);
		} else {
			result[key] = incoming;
		}
	}

	return result;
}

/**
 * Drops the manager's entries from the governed sub-tree. Lists and the
 * governed object itself are deleted only when this removal emptied them.
 */
export function removeGoverned(doc: JsonObject, token: string): JsonObject {
	const governed = doc[GOVERNED_KEY];
	if (!isJsonObject(governed)) {
		return doc;
	}

	const next: JsonObject = {};
	for (const [event, value] of Object.entries(governed)) {
		if (!Array.isArray(value)) {
			next[event] = value;
			continue;
		}
		const kept = value.filter((e) => !isOwnedEntry(e, token));
		if (kept.length > 0 || value.length === 0) {
			next[event] = kept;
		}
	}

	const result: JsonObject = { ...doc };
	if (Object.keys(next).length === 0 && Object.keys(governed).length > 0) {
		delete result[GOVERNED_KEY];
	} else {
		result[GOVERNED_KEY] = next;
	}
	return result;
}

export function hasGovernedFragment(
	doc: JsonObject,
	fragment: JsonObject,
): boolean {
	const expected = fragment[GOVERNED_KEY];
	const actual = doc[GOVERNED_KEY];
	if (!isJsonObject(expected)) {
		return true;
	}
	if (!isJsonObject(actual)) {
		return false;
	}

	return Object.entries(expected).every(([event, entries]) => {
		const present = actual[event];
		if (!Array.isArray(entries) || !Array.isArray(present)) {
			return isDeepStrictEqual(entries, present);
		}
		return entries.every((entry) =>
			present.some((candidate) => isDeepStrictEqual(candidate, entry)),
		);
	});
}

export async function readSettings(filePath: string): Promise<JsonObject> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (err: unknown) {
		if (isNodeError(err) && err.code === "ENOENT") {
			return {};
		}
		throw err;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err: unknown) {
		throw new InvalidSettingsError(filePath, errorMessage(err));
	}

	if (!isJsonObject(parsed)) {
		throw new InvalidSettingsError(filePath, "top level is not an object");
	}
	return parsed;
}

export async function writeSettings(
	filePath: string,
	doc: JsonObject,
): Promise<void> {
	await writeFileAtomic(filePath, JSON.stringify(doc, null, 2) + "\n");
}
