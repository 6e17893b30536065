import { describe, expect, it } from "vitest";
import type { ClipboardBackend } from "#clipboard/backend";
import { SystemClipboard } from "#clipboard/local";
import { runTransform } from "#core/transform";
import { bytes, text } from "./helpers/fake-clipboard";

// These run real `sh` processes, unlike the suites that mock execa.
describe.runIf(process.platform !== "win32")("subprocesses", () => {
	const backend = (overrides: Partial<ClipboardBackend>): ClipboardBackend => ({
		kind: "x11",
		copyCmd: ["sh", "-c", "cat >/dev/null"],
		pasteCmd: ["sh", "-c", "printf ''"],
		missing: [],
		...overrides,
	});

	it("returns from a write once a copy tool that forks has exited", async () => {
		const clipboard = new SystemClipboard({
			backend: backend({
				copyCmd: ["sh", "-c", "cat >/dev/null; (sleep 2) &"],
			}),
		});

		const started = Date.now();
		await clipboard.write(bytes("payload"));

		expect(Date.now() - started).toBeLessThan(1000);
	});

	it("returns from a clear once a clear tool that forks has exited", async () => {
		const clipboard = new SystemClipboard({
			backend: backend({ clearCmd: ["sh", "-c", "(sleep 2) &"] }),
		});

		const started = Date.now();
		await clipboard.clear();

		expect(Date.now() - started).toBeLessThan(1000);
	});

	it("keeps a trailing newline on read", async () => {
		const clipboard = new SystemClipboard({
			backend: backend({ pasteCmd: ["sh", "-c", "printf 'line\\n'"] }),
		});

		expect(text(await clipboard.read())).toBe("line\n");
	});

	it("pipes input through a transform byte for byte", async () => {
		const output = await runTransform(
			["sh", "-c", "tr a-z A-Z"],
			bytes("hello\n"),
		);

		expect(text(output)).toBe("HELLO\n");
	});

	it("puts a failed transform's stderr in the error", async () => {
		await expect(
			runTransform(["sh", "-c", "echo bad input >&2; exit 3"], bytes("x")),
		).rejects.toThrow(/exit code 3.*: bad input$/);
	});

	it("rejects a transform without a command", async () => {
		await expect(runTransform([], bytes("x"))).rejects.toThrow(
			"transform has no command",
		);
	});
});
