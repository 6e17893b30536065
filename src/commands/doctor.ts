import process from "node:process";
import { type ClipboardBackend, detectBackend } from "#clipboard/backend";

type DoctorDeps = {
	backend?: ClipboardBackend;
	platform?: NodeJS.Platform;
};

export type DoctorReport = {
	os: NodeJS.Platform;
	backend: ClipboardBackend["kind"];
	envSource?: string;
	status: "ok" | "warning";
	copyCmd: string[];
	pasteCmd: string[];
	clearCmd?: string[];
	missing?: string[];
	notes?: string;
};

const TIPS = [
	"On macOS:   pbcopy / pbpaste should be available by default.",
	"On Wayland: install `wl-clipboard` (wl-copy, wl-paste).",
	"On X11:     install `xclip` or `xsel`.",
	"On WSL:     ensure `clip.exe` and `powershell.exe` are in PATH.",
];

const resolveDeps = (deps: DoctorDeps) => {
	const platform = deps.platform ?? process.platform;
	return { platform, backend: deps.backend ?? detectBackend({ platform }) };
};

export const getDoctorReport = (deps: DoctorDeps = {}): DoctorReport => {
	const { platform, backend } = resolveDeps(deps);
	const healthy = backend.missing.length === 0 && backend.kind !== "unknown";
	return {
		os: platform,
		backend: backend.kind,
		...(backend.envSource ? { envSource: backend.envSource } : {}),
		status: healthy ? "ok" : "warning",
		copyCmd: backend.copyCmd,
		pasteCmd: backend.pasteCmd,
		...(backend.clearCmd ? { clearCmd: backend.clearCmd } : {}),
		...(backend.missing.length > 0 ? { missing: backend.missing } : {}),
		...(backend.notes ? { notes: backend.notes } : {}),
	};
};

export const formatDoctorReport = (report: DoctorReport) => {
	const lines = [
		"clipbridge doctor",
		"-----------------",
		`OS:       ${report.os}`,
		`Backend:  ${report.backend}`,
	];
	if (report.envSource) {
		lines.push(`Env:      ${report.envSource}`);
	}
	lines.push("");
	if (report.status === "ok") {
		lines.push("Status:   OK");
		lines.push("Details:  All required commands for this backend are available.");
	} else {
		lines.push("Status:   WARNING");
		if (report.backend === "unknown") {
			lines.push(
				"Details:  Could not detect a suitable clipboard backend for this environment.",
			);
		}
		if (report.missing) {
			lines.push(`Missing:  ${report.missing.join(", ")}`);
		}
	}
	lines.push("", "Tips:", ...TIPS.map((tip) => `  - ${tip}`));
	return lines;
};

export const formatBackend = (
	backend: ClipboardBackend,
	platform: NodeJS.Platform = process.platform,
) => {
	const lines = [`Backend:   ${backend.kind}`, `OS:        ${platform}`];
	if (backend.envSource) {
		lines.push(`Env:       ${backend.envSource}`);
	}
	lines.push(`Copy cmd:  ${backend.copyCmd.join(" ")}`);
	lines.push(`Paste cmd: ${backend.pasteCmd.join(" ")}`);
	if (backend.clearCmd) {
		lines.push(`Clear cmd: ${backend.clearCmd.join(" ")}`);
	}
	if (backend.missing.length > 0) {
		lines.push(`Missing:   ${backend.missing.join(", ")}`);
	}
	if (backend.notes) {
		lines.push(`Notes:     ${backend.notes}`);
	}
	return lines;
};

export const getBackendLines = (deps: DoctorDeps = {}) => {
	const { platform, backend } = resolveDeps(deps);
	return formatBackend(backend, platform);
};
