import { execa } from "execa";
import type { PeerDescriptor } from "#config";
import { TransientReadError, TransientWriteError } from "#core/errors";

/**
 * The peer's clipboard, reached through one request per call. Failures are
 * expected while a peer is offline and carry no detail beyond the cause.
 */
export interface RemoteClipboard {
	read(): Promise<Uint8Array>;
	write(data: Uint8Array): Promise<void>;
}

export type RemoteVerb = "copy" | "paste";

export const SSH_COMMAND_ENV_VAR = "CLIPBRIDGE_SSH_COMMAND";

const MAX_BUFFER = 64 * 1024 * 1024;

export const resolveSshCommand = (env: NodeJS.ProcessEnv = process.env) =>
	env[SSH_COMMAND_ENV_VAR] || "ssh";

export const buildRemoteArgs = (peer: PeerDescriptor, verb: RemoteVerb) => [
	peer.address,
	peer.remoteCommand,
	verb,
];

export type SshRemoteOptions = {
	sshCommand?: string;
	/** forward ssh's stderr to ours instead of dropping it */
	showErrors?: boolean;
	logger?: (message: string) => void;
};

/**
 * Runs `<remoteCommand> paste|copy` on the peer over ssh. stderr is dropped
 * unless `showErrors` is set, so polling an unreachable peer stays quiet.
 */
export class SshRemoteClipboard implements RemoteClipboard {
	private readonly sshCommand: string;
	private readonly stderr: "ignore" | "inherit";
	private readonly logger?: (message: string) => void;

	constructor(
		readonly peer: PeerDescriptor,
		options: SshRemoteOptions = {},
	) {
		this.sshCommand = options.sshCommand ?? resolveSshCommand();
		this.stderr = options.showErrors ? "inherit" : "ignore";
		this.logger = options.logger;
	}

	async read(): Promise<Uint8Array> {
		const args = buildRemoteArgs(this.peer, "paste");
		this.logger?.(`${this.sshCommand} ${args.join(" ")}`);
		try {
			const { stdout } = await execa(this.sshCommand, args, {
				encoding: "buffer",
				stripFinalNewline: false,
				stdin: "ignore",
				stderr: this.stderr,
				maxBuffer: MAX_BUFFER,
			});
			return stdout;
		} catch (error) {
			throw new TransientReadError(`reading from ${this.peer.address} failed`, {
				cause: error,
			});
		}
	}

	async write(data: Uint8Array): Promise<void> {
		const args = buildRemoteArgs(this.peer, "copy");
		this.logger?.(`${this.sshCommand} ${args.join(" ")}`);
		try {
			await execa(this.sshCommand, args, {
				input: data,
				stdout: "ignore",
				stderr: this.stderr,
			});
		} catch (error) {
			throw new TransientWriteError(`writing to ${this.peer.address} failed`, {
				cause: error,
			});
		}
	}
}
