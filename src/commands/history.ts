import { formatSize } from "#core/format";
import type { HistoryEntry } from "#core/history";

export type HistoryFilter = {
	/** keep send, recv, peek and watch transfers */
	peer?: boolean;
	/** keep transform runs */
	fx?: boolean;
};

const PEER_COMMANDS = new Set([
	"send",
	"recv",
	"peek",
	"watch:send",
	"watch:recv",
]);

const isFiltered = (filter: HistoryFilter) =>
	Boolean(filter.peer) || Boolean(filter.fx);

/**
 * Keeps the entries every requested filter matches.
 */
export const filterHistory = (
	entries: HistoryEntry[],
	filter: HistoryFilter = {},
) =>
	entries.filter(
		(entry) =>
			(!filter.peer || PEER_COMMANDS.has(entry.command)) &&
			(!filter.fx || entry.command.startsWith("fx:")),
	);

const COLUMNS = ["TIME", "COMMAND", "TARGET", "SIZE"] as const;

const formatTimestamp = (timestamp: string) => {
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) {
		return timestamp;
	}
	// local time, second precision: 2025-01-31 14:05:09
	const pad = (value: number) => String(value).padStart(2, "0");
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
};

const formatRow = (cells: readonly [string, string, string, string]) =>
	`${cells[0].padEnd(20)}  ${cells[1].padEnd(12)}  ${cells[2].padEnd(15)}  ${cells[3]}`.trimEnd();

/**
 * Renders the entries a filter keeps, newest first, as a fixed-width table.
 */
export const formatHistory = (
	entries: HistoryEntry[],
	filter: HistoryFilter = {},
) => {
	if (entries.length === 0) {
		return ["No history yet."];
	}
	const matching = filterHistory(entries, filter);
	if (matching.length === 0 && isFiltered(filter)) {
		return ["No matching history entries."];
	}
	const rows = [formatRow(COLUMNS)];
	for (const entry of [...matching].reverse()) {
		rows.push(
			formatRow([
				formatTimestamp(entry.timestamp),
				entry.command,
				entry.target,
				entry.size ? formatSize(entry.size) : "",
			]),
		);
	}
	return rows;
};
