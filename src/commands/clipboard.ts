import { buffer } from "node:stream/consumers";
import type { ClipboardBackend } from "#clipboard/backend";
import { type LocalClipboard, SystemClipboard } from "#clipboard/local";

export type ManagedClipboard = LocalClipboard & {
	readonly backend: ClipboardBackend;
	clear(): Promise<void>;
};

type ClipboardDeps = {
	clipboard?: ManagedClipboard;
	stdin?: NodeJS.ReadableStream;
	output?: { write(chunk: Uint8Array | string): unknown };
};

const openClipboard = (deps: ClipboardDeps) => {
	const clipboard = deps.clipboard ?? new SystemClipboard();
	if (clipboard.backend.kind === "unknown") {
		throw new Error(clipboard.backend.notes ?? "no clipboard backend detected.");
	}
	return clipboard;
};

/**
 * Copies the joined arguments, or all of stdin when there are none. This is
 * also what a peer runs on our side for `ssh host clipbridge copy`.
 */
export const copyToClipboard = async (
	text: string[],
	deps: ClipboardDeps = {},
) => {
	const clipboard = openClipboard(deps);
	const data =
		text.length > 0
			? Buffer.from(text.join(" "), "utf8")
			: await buffer(deps.stdin ?? process.stdin);
	await clipboard.write(data);
	return { bytes: data.byteLength };
};

export const pasteFromClipboard = async (deps: ClipboardDeps = {}) => {
	const clipboard = openClipboard(deps);
	const data = await clipboard.read();
	(deps.output ?? process.stdout).write(data);
	return { bytes: data.byteLength };
};

export const clearClipboard = async (deps: ClipboardDeps = {}) => {
	await openClipboard(deps).clear();
};
