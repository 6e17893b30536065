import { describe, expect, it } from "vitest";
import { describeMissingTools, detectBackend } from "#clipboard/backend";
import { ConfigurationError } from "#core/errors";

const withTools =
	(...tools: string[]) =>
	(name: string) =>
		tools.includes(name);

describe("detectBackend", () => {
	it("uses pbcopy and pbpaste on macOS", () => {
		const backend = detectBackend({
			platform: "darwin",
			env: {},
			hasCommand: withTools("pbcopy", "pbpaste"),
		});
		expect(backend).toEqual({
			kind: "darwin",
			copyCmd: ["pbcopy"],
			pasteCmd: ["pbpaste"],
			missing: [],
		});
	});

	it("prefers Wayland when WAYLAND_DISPLAY is set", () => {
		const backend = detectBackend({
			platform: "linux",
			env: { WAYLAND_DISPLAY: "wayland-0", DISPLAY: ":0" },
			hasCommand: withTools("wl-copy", "wl-paste", "xclip"),
		});
		expect(backend.kind).toBe("wayland");
		expect(backend.pasteCmd).toEqual(["wl-paste", "--no-newline"]);
		expect(backend.clearCmd).toEqual(["wl-copy", "--clear"]);
		expect(backend.envSource).toBe("WAYLAND_DISPLAY");
		expect(backend.missing).toEqual([]);
	});

	it("lists missing Wayland tools", () => {
		const backend = detectBackend({
			platform: "linux",
			env: { WAYLAND_DISPLAY: "wayland-0" },
			hasCommand: withTools("wl-copy"),
		});
		expect(backend.missing).toEqual(["wl-paste"]);
		expect(describeMissingTools(backend)).toBe(
			"missing clipboard tools for backend wayland: wl-paste",
		);
	});

	it("uses xclip on X11", () => {
		const backend = detectBackend({
			platform: "linux",
			env: { DISPLAY: ":0" },
			hasCommand: withTools("xclip", "xsel"),
		});
		expect(backend.copyCmd).toEqual(["xclip", "-selection", "clipboard"]);
		expect(backend.pasteCmd).toEqual(["xclip", "-selection", "clipboard", "-o"]);
		expect(backend.missing).toEqual([]);
	});

	it("falls back to xsel when xclip is absent", () => {
		const backend = detectBackend({
			platform: "linux",
			env: { DISPLAY: ":0" },
			hasCommand: withTools("xsel"),
		});
		expect(backend.copyCmd).toEqual(["xsel", "--clipboard", "--input"]);
		expect(backend.pasteCmd).toEqual(["xsel", "--clipboard", "--output"]);
		expect(backend.clearCmd).toEqual(["xsel", "--clipboard", "--clear"]);
	});

	it("reports xclip/xsel missing when neither exists", () => {
		const backend = detectBackend({
			platform: "linux",
			env: { DISPLAY: ":0" },
			hasCommand: withTools(),
		});
		expect(backend.kind).toBe("x11");
		expect(backend.missing).toEqual(["xclip/xsel"]);
	});

	it("bridges to Windows from WSL", () => {
		const backend = detectBackend({
			platform: "linux",
			env: {},
			hasCommand: withTools("clip.exe"),
		});
		expect(backend.kind).toBe("wsl");
		expect(backend.copyCmd).toEqual(["clip.exe"]);
		expect(backend.missing).toEqual(["powershell.exe"]);
	});

	it("returns unknown with a note when nothing fits on Linux", () => {
		const backend = detectBackend({
			platform: "linux",
			env: {},
			hasCommand: withTools(),
		});
		expect(backend.kind).toBe("unknown");
		expect(backend.copyCmd).toEqual([]);
		expect(backend.notes).toContain("Install wl-clipboard or xclip/xsel");
	});

	it("uses clip and PowerShell on Windows", () => {
		const backend = detectBackend({
			platform: "win32",
			env: {},
			hasCommand: withTools("clip", "powershell"),
		});
		expect(backend).toEqual({
			kind: "windows",
			copyCmd: ["clip"],
			pasteCmd: ["powershell", "-NoProfile", "-Command", "Get-Clipboard"],
			missing: [],
		});
	});

	it("rejects other platforms", () => {
		expect(() =>
			detectBackend({ platform: "aix", env: {}, hasCommand: withTools() }),
		).toThrow(new ConfigurationError("unsupported OS: aix"));
	});
});
