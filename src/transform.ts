import { ExecaError, execa } from "execa";
import type { TransformConfig } from "#config/schema";

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * The argv a transform runs: `sh -c <shell>` for shell transforms, `cmd`
 * otherwise.
 */
export const getTransformCommand = (transform: TransformConfig): string[] => {
	if (transform.shell !== undefined) {
		return ["sh", "-c", transform.shell];
	}
	return transform.cmd ?? [];
};

const decodeStderr = (stderr: unknown) => {
	if (typeof stderr === "string") return stderr.trim();
	if (stderr instanceof Uint8Array) {
		return Buffer.from(stderr).toString("utf8").trim();
	}
	return "";
};

/**
 * Pipes `input` through the command and returns its stdout unchanged.
 * A failure carries the command's stderr in its message.
 */
export const runTransform = async (
	command: string[],
	input: Uint8Array,
): Promise<Uint8Array> => {
	const [file, ...args] = command;
	if (!file) {
		throw new Error("transform has no command");
	}
	try {
		const { stdout } = await execa(file, args, {
			input,
			encoding: "buffer",
			stripFinalNewline: false,
			stderr: "pipe",
			maxBuffer: MAX_BUFFER,
		});
		return stdout;
	} catch (error) {
		if (error instanceof ExecaError) {
			const stderr = decodeStderr(error.stderr);
			throw new Error(
				stderr ? `${error.shortMessage}: ${stderr}` : error.shortMessage,
				{ cause: error },
			);
		}
		throw error;
	}
};
