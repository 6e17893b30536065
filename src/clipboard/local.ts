import { execa } from "execa";
import {
	type ClipboardBackend,
	describeMissingTools,
	detectBackend,
} from "#clipboard/backend";
import {
	getErrorMessage,
	TransientReadError,
	TransientWriteError,
} from "#core/errors";

/**
 * Read/write access to the clipboard of this machine. Both operations may
 * fail for ordinary reasons (empty clipboard, tool not installed, display
 * not reachable) and reject with a transient error when they do.
 */
export interface LocalClipboard {
	read(): Promise<Uint8Array>;
	write(data: Uint8Array): Promise<void>;
}

export type SystemClipboardOptions = {
	backend?: ClipboardBackend;
	logger?: (message: string) => void;
};

const MAX_BUFFER = 64 * 1024 * 1024;

const splitCommand = (cmd: string[]) => {
	const [file, ...args] = cmd;
	return file ? { file, args } : null;
};

const runPaste = async (cmd: string[]) => {
	const command = splitCommand(cmd);
	if (!command) {
		throw new Error("no paste command configured");
	}
	const { stdout } = await execa(command.file, command.args, {
		encoding: "buffer",
		stripFinalNewline: false,
		stdin: "ignore",
		stderr: "ignore",
		maxBuffer: MAX_BUFFER,
	});
	return stdout;
};

// Copy tools such as xclip and wl-copy fork a process that keeps serving
// the selection. It inherits every descriptor the tool had, so a piped
// stdout or stderr would stay open until the selection is lost.
const COPY_STDIO = { stdout: "ignore", stderr: "inherit" } as const;

const runCopy = async (cmd: string[], data: Uint8Array) => {
	const command = splitCommand(cmd);
	if (!command) {
		throw new Error("no copy command configured");
	}
	await execa(command.file, command.args, { input: data, ...COPY_STDIO });
};

/**
 * Clipboard backed by the platform tools picked by `detectBackend`.
 */
export class SystemClipboard implements LocalClipboard {
	readonly backend: ClipboardBackend;
	private readonly logger?: (message: string) => void;

	constructor(options: SystemClipboardOptions = {}) {
		this.backend = options.backend ?? detectBackend();
		this.logger = options.logger;
	}

	async read(): Promise<Uint8Array> {
		if (this.backend.missing.length > 0) {
			throw new TransientReadError(describeMissingTools(this.backend));
		}
		this.logger?.(`local read: ${this.backend.pasteCmd.join(" ")}`);
		try {
			return await runPaste(this.backend.pasteCmd);
		} catch (error) {
			throw new TransientReadError(
				`reading clipboard failed: ${getErrorMessage(error)}`,
				{ cause: error },
			);
		}
	}

	async write(data: Uint8Array): Promise<void> {
		if (this.backend.missing.length > 0) {
			throw new TransientWriteError(describeMissingTools(this.backend));
		}
		this.logger?.(`local write: ${this.backend.copyCmd.join(" ")}`);
		try {
			await runCopy(this.backend.copyCmd, data);
		} catch (error) {
			throw new TransientWriteError(
				`writing clipboard failed: ${getErrorMessage(error)}`,
				{ cause: error },
			);
		}
	}

	/**
	 * Empties the clipboard, via the backend's clear command when it has one.
	 */
	async clear(): Promise<void> {
		const command = splitCommand(this.backend.clearCmd ?? []);
		if (!command) {
			await this.write(new Uint8Array());
			return;
		}
		if (this.backend.missing.length > 0) {
			throw new TransientWriteError(describeMissingTools(this.backend));
		}
		try {
			await execa(command.file, command.args, {
				stdin: "ignore",
				...COPY_STDIO,
			});
		} catch (error) {
			throw new TransientWriteError(
				`clearing clipboard failed: ${getErrorMessage(error)}`,
				{ cause: error },
			);
		}
	}
}
