import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { ClipboardBackend } from "#clipboard/backend";
import {
	clearClipboard,
	copyToClipboard,
	pasteFromClipboard,
} from "#commands/clipboard";
import { FakeClipboard, text } from "./helpers/fake-clipboard";

const wayland: ClipboardBackend = {
	kind: "wayland",
	copyCmd: ["wl-copy"],
	pasteCmd: ["wl-paste", "--no-newline"],
	clearCmd: ["wl-copy", "--clear"],
	missing: [],
	envSource: "WAYLAND_DISPLAY",
};

class FakeSystemClipboard extends FakeClipboard {
	cleared = 0;

	constructor(
		readonly backend: ClipboardBackend,
		initial = "",
	) {
		super(initial);
	}

	async clear(): Promise<void> {
		this.cleared += 1;
		this.set("");
	}
}

describe("clipboard commands", () => {
	it("copies joined arguments", async () => {
		const clipboard = new FakeSystemClipboard(wayland);

		const result = await copyToClipboard(["hello", "world"], { clipboard });

		expect(result).toEqual({ bytes: 11 });
		expect(clipboard.current).toBe("hello world");
	});

	it("copies stdin when no text is given", async () => {
		const clipboard = new FakeSystemClipboard(wayland);
		const stdin = Readable.from([Buffer.from("piped "), Buffer.from("input")]);

		await copyToClipboard([], { clipboard, stdin });

		expect(clipboard.current).toBe("piped input");
	});

	it("pastes to the output unchanged", async () => {
		const clipboard = new FakeSystemClipboard(wayland, "line one\nline two\n");
		const chunks: string[] = [];
		const output = {
			write: (chunk: Uint8Array | string) =>
				chunks.push(typeof chunk === "string" ? chunk : text(chunk)),
		};

		const result = await pasteFromClipboard({ clipboard, output });

		expect(chunks).toEqual(["line one\nline two\n"]);
		expect(result).toEqual({ bytes: 18 });
	});

	it("clears the clipboard", async () => {
		const clipboard = new FakeSystemClipboard(wayland, "secret");

		await clearClipboard({ clipboard });

		expect(clipboard.cleared).toBe(1);
		expect(clipboard.current).toBe("");
	});

	it("refuses to work without a backend", async () => {
		const clipboard = new FakeSystemClipboard({
			kind: "unknown",
			copyCmd: [],
			pasteCmd: [],
			missing: [],
			notes: "No Wayland/X11/WSL clipboard command found.",
		});

		await expect(pasteFromClipboard({ clipboard })).rejects.toThrow(
			"No Wayland/X11/WSL clipboard command found.",
		);
		expect(clipboard.reads).toBe(0);
	});
});
