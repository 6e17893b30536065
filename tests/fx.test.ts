import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	type Mock,
	vi,
} from "vitest";
import { formatFxList, formatFxResult, runFx } from "#commands/fx";
import type { HistoryRecorder } from "#sync/types";
import { bytes, FakeClipboard, text } from "./helpers/fake-clipboard";

type Run = (command: string[], input: Uint8Array) => Promise<Uint8Array>;

describe("fx", () => {
	let dir: string;
	let configPath: string;
	let clipboard: FakeClipboard;
	let history: Mock<HistoryRecorder>;
	let run: Mock<Run>;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "clipbridge-fx-"));
		configPath = path.join(dir, "config.json");
		await writeFile(
			configPath,
			JSON.stringify({
				fx: {
					upper: { shell: "tr a-z A-Z", description: "Uppercase" },
					trim: { cmd: ["sed", "s/ *$//"] },
					fail: { cmd: ["false"] },
					blank: { shell: "true" },
				},
			}),
		);
		clipboard = new FakeClipboard("hello  ");
		history = vi.fn<HistoryRecorder>(async () => {});
		run = vi.fn<Run>(async (command, input) => {
			if (command[0] === "sed") return bytes(text(input).trimEnd());
			if (command[2] === "tr a-z A-Z") return bytes(text(input).toUpperCase());
			if (command[0] === "false") {
				throw new Error("Command failed with exit code 1: false");
			}
			return new Uint8Array();
		});
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	const deps = () => ({ clipboard, run, history });

	it("pipes the clipboard through each transform in order", async () => {
		const result = await runFx({ configPath, names: ["trim", "upper"] }, deps());

		expect(clipboard.current).toBe("HELLO");
		expect(run.mock.calls.map(([command]) => command)).toEqual([
			["sed", "s/ *$//"],
			["sh", "-c", "tr a-z A-Z"],
		]);
		expect(text(run.mock.calls[1]?.[1] ?? new Uint8Array())).toBe("hello");
		expect(result).toEqual({
			chain: "trim → upper",
			originalBytes: 7,
			bytes: 5,
			dryRun: false,
		});
		expect(formatFxResult(result)).toBe("fx trim → upper: 7 B → 5 B");
		expect(history).toHaveBeenCalledWith({
			command: "fx:trim → upper",
			target: "",
			size: 5,
		});
	});

	it("prints the result of a dry run and leaves the clipboard alone", async () => {
		const chunks: string[] = [];
		const output = {
			write: (chunk: Uint8Array | string) => {
				chunks.push(typeof chunk === "string" ? chunk : text(chunk));
				return true;
			},
		};

		const result = await runFx(
			{ configPath, names: ["upper"], dryRun: true },
			{ ...deps(), output },
		);

		expect(chunks).toEqual(["HELLO  "]);
		expect(result.dryRun).toBe(true);
		expect(clipboard.writes).toBe(0);
		expect(history).not.toHaveBeenCalled();
	});

	it("checks every name before reading the clipboard", async () => {
		await expect(
			runFx({ configPath, names: ["upper", "nope"] }, deps()),
		).rejects.toThrow(
			'unknown transform "nope". Known transforms: upper, trim, fail, blank.',
		);
		expect(clipboard.reads).toBe(0);
		expect(run).not.toHaveBeenCalled();
	});

	it("does not take inherited object keys as transform names", async () => {
		await expect(
			runFx({ configPath, names: ["constructor"] }, deps()),
		).rejects.toThrow('unknown transform "constructor".');
	});

	it("names the failing step and keeps the clipboard", async () => {
		await expect(
			runFx({ configPath, names: ["upper", "fail"] }, deps()),
		).rejects.toThrow(
			'transform "fail" (step 2) failed: Command failed with exit code 1: false; clipboard unchanged',
		);
		expect(clipboard.writes).toBe(0);
		expect(clipboard.current).toBe("hello  ");
		expect(history).not.toHaveBeenCalled();
	});

	it("refuses to copy empty output", async () => {
		await expect(
			runFx({ configPath, names: ["blank"] }, deps()),
		).rejects.toThrow(
			'transform "blank" (step 1) produced empty output; clipboard unchanged',
		);
		expect(clipboard.writes).toBe(0);
	});

	it("needs at least one name", async () => {
		await expect(runFx({ configPath, names: [] }, deps())).rejects.toThrow(
			"Usage: clipbridge fx <name> [name...] [--dry-run]",
		);
	});

	it("reports an empty config", async () => {
		await writeFile(configPath, JSON.stringify({}));

		await expect(
			runFx({ configPath, names: ["upper"] }, deps()),
		).rejects.toThrow('unknown transform "upper". No transforms are configured.');
	});
});

describe("formatFxList", () => {
	it("explains how to add transforms when there are none", () => {
		expect(formatFxList({})).toEqual([
			"No transforms defined.",
			"",
			"Add transforms to your config:",
			'  "fx": {',
			'    "pretty-json": { "cmd": ["jq", "."], "description": "Format JSON" }',
			"  }",
		]);
	});

	it("lists transforms by name with their description or command", () => {
		expect(
			formatFxList({
				fx: {
					upper: { shell: "tr a-z A-Z", description: "Uppercase" },
					"pretty-json": { cmd: ["jq", "."] },
					long: { shell: "x".repeat(60) },
				},
			}),
		).toEqual([
			`${"NAME".padEnd(20)}  DESCRIPTION`,
			`${"long".padEnd(20)}  sh -c "${"x".repeat(40)}...`,
			`${"pretty-json".padEnd(20)}  jq .`,
			`${"upper".padEnd(20)}  Uppercase`,
		]);
	});
});
