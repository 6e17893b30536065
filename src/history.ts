import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { getErrnoCode, getErrorMessage } from "#core/errors";
import { resolveHistoryPath } from "#core/paths";
import type { HistoryRecord } from "#sync/types";

export const MAX_HISTORY_ENTRIES = 50;

export type HistoryEntry = {
	timestamp: string;
	command: string;
	target: string;
	size?: number;
};

type HistoryOptions = {
	historyPath?: string;
	now?: () => Date;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const toEntry = (value: unknown): HistoryEntry | null => {
	if (!isRecord(value)) return null;
	const { timestamp, command, target, size } = value;
	if (
		typeof timestamp !== "string" ||
		typeof command !== "string" ||
		typeof target !== "string"
	) {
		return null;
	}
	return {
		timestamp,
		command,
		target,
		...(typeof size === "number" && size > 0 ? { size } : {}),
	};
};

/**
 * Reads the history file. A missing file is an empty history; entries that
 * don't have the expected shape are skipped.
 */
export const readHistory = async (
	options: HistoryOptions = {},
): Promise<HistoryEntry[]> => {
	const historyPath = options.historyPath ?? resolveHistoryPath();
	let raw: string;
	try {
		raw = await readFile(historyPath, "utf8");
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return [];
		}
		throw error;
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new Error(`Invalid JSON in ${historyPath}: ${getErrorMessage(error)}`);
	}
	if (!Array.isArray(parsed)) {
		throw new Error(`History file ${historyPath} must contain a JSON array.`);
	}
	return parsed
		.map(toEntry)
		.filter((entry): entry is HistoryEntry => entry !== null);
};

/**
 * Appends one event and keeps the newest MAX_HISTORY_ENTRIES. A corrupt
 * history file is replaced rather than blocking new entries.
 */
export const recordHistory = async (
	record: HistoryRecord,
	options: HistoryOptions = {},
) => {
	const historyPath = options.historyPath ?? resolveHistoryPath();
	await mkdir(path.dirname(historyPath), { recursive: true });
	let history: HistoryEntry[];
	try {
		history = await readHistory({ historyPath });
	} catch {
		history = [];
	}
	const now = options.now ?? (() => new Date());
	history.push({
		timestamp: now().toISOString(),
		command: record.command,
		target: record.target,
		...(record.size > 0 ? { size: record.size } : {}),
	});
	const trimmed = history.slice(-MAX_HISTORY_ENTRIES);
	const data = `${JSON.stringify(trimmed, null, 2)}\n`;
	await writeFile(historyPath, data, { encoding: "utf8", mode: 0o600 });
};

export const createHistoryRecorder =
	(options: HistoryOptions = {}) =>
	(record: HistoryRecord) =>
		recordHistory(record, options);
