import { accessSync, constants } from "node:fs";
import path from "node:path";
import { ConfigurationError } from "#core/errors";

export type BackendKind =
	| "darwin"
	| "wayland"
	| "x11"
	| "wsl"
	| "windows"
	| "unknown";

export type ClipboardBackend = {
	kind: BackendKind;
	copyCmd: string[];
	pasteCmd: string[];
	clearCmd?: string[];
	missing: string[];
	/** environment variable that selected this backend */
	envSource?: string;
	notes?: string;
};

export type DetectOptions = {
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	hasCommand?: (name: string) => boolean;
};

const WINDOWS_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/**
 * Looks `name` up on PATH the way a shell would.
 */
export const hasCommand = (
	name: string,
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
) => {
	const pathValue = env.PATH ?? env.Path ?? "";
	const extensions =
		platform === "win32"
			? ["", ...(env.PATHEXT ?? WINDOWS_PATHEXT).split(";")]
			: [""];
	for (const dir of pathValue.split(path.delimiter)) {
		if (!dir) continue;
		for (const ext of extensions) {
			try {
				accessSync(path.join(dir, `${name}${ext}`), constants.X_OK);
				return true;
			} catch {
				// keep looking
			}
		}
	}
	return false;
};

const missingOf = (has: (name: string) => boolean, names: string[]) =>
	names.filter((name) => !has(name));

const detectDarwin = (has: (name: string) => boolean): ClipboardBackend => ({
	kind: "darwin",
	copyCmd: ["pbcopy"],
	pasteCmd: ["pbpaste"],
	missing: missingOf(has, ["pbcopy", "pbpaste"]),
});

const detectWayland = (
	env: NodeJS.ProcessEnv,
	has: (name: string) => boolean,
): ClipboardBackend | null => {
	if (!env.WAYLAND_DISPLAY) return null;
	return {
		kind: "wayland",
		copyCmd: ["wl-copy"],
		pasteCmd: ["wl-paste", "--no-newline"],
		clearCmd: ["wl-copy", "--clear"],
		missing: missingOf(has, ["wl-copy", "wl-paste"]),
		envSource: "WAYLAND_DISPLAY",
	};
};

const detectX11 = (
	env: NodeJS.ProcessEnv,
	has: (name: string) => boolean,
): ClipboardBackend | null => {
	if (!env.DISPLAY) return null;
	if (!has("xclip") && has("xsel")) {
		return {
			kind: "x11",
			copyCmd: ["xsel", "--clipboard", "--input"],
			pasteCmd: ["xsel", "--clipboard", "--output"],
			clearCmd: ["xsel", "--clipboard", "--clear"],
			missing: [],
			envSource: "DISPLAY",
		};
	}
	return {
		kind: "x11",
		copyCmd: ["xclip", "-selection", "clipboard"],
		pasteCmd: ["xclip", "-selection", "clipboard", "-o"],
		missing: has("xclip") ? [] : ["xclip/xsel"],
		envSource: "DISPLAY",
	};
};

const detectWsl = (has: (name: string) => boolean): ClipboardBackend | null => {
	if (!has("clip.exe")) return null;
	return {
		kind: "wsl",
		copyCmd: ["clip.exe"],
		pasteCmd: ["powershell.exe", "-NoProfile", "-Command", "Get-Clipboard"],
		missing: missingOf(has, ["powershell.exe"]),
		notes: "WSL detection based on clip.exe in PATH.",
	};
};

const detectWindows = (has: (name: string) => boolean): ClipboardBackend => {
	const missing: string[] = [];
	if (!has("clip") && !has("clip.exe")) {
		missing.push("clip.exe");
	}
	if (!has("powershell.exe") && !has("powershell")) {
		missing.push("powershell.exe");
	}
	const psCmd =
		!has("powershell.exe") && has("powershell") ? "powershell" : "powershell.exe";
	const copyCmd = !has("clip.exe") && has("clip") ? ["clip"] : ["clip.exe"];
	return {
		kind: "windows",
		copyCmd,
		pasteCmd: [psCmd, "-NoProfile", "-Command", "Get-Clipboard"],
		missing,
	};
};

/**
 * Picks the clipboard tools for the current platform. Linux prefers
 * Wayland, then X11, then a WSL bridge.
 */
export const detectBackend = (options: DetectOptions = {}): ClipboardBackend => {
	const platform = options.platform ?? process.platform;
	const env = options.env ?? process.env;
	const has = options.hasCommand ?? ((name) => hasCommand(name, env, platform));

	switch (platform) {
		case "darwin":
			return detectDarwin(has);
		case "linux":
			return (
				detectWayland(env, has) ??
				detectX11(env, has) ??
				detectWsl(has) ?? {
					kind: "unknown",
					copyCmd: [],
					pasteCmd: [],
					missing: [],
					notes:
						"No Wayland/X11/WSL clipboard command found. Install wl-clipboard or xclip/xsel, or make clip.exe available for WSL.",
				}
			);
		case "win32":
			return detectWindows(has);
		default:
			throw new ConfigurationError(`unsupported OS: ${platform}`);
	}
};

export const describeMissingTools = (backend: ClipboardBackend) =>
	`missing clipboard tools for backend ${backend.kind}: ${backend.missing.join(", ")}`;
