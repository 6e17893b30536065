import { beforeEach, describe, expect, it, vi } from "vitest";
import { TransientReadError, TransientWriteError } from "#core/errors";
import {
	buildRemoteArgs,
	resolveSshCommand,
	SshRemoteClipboard,
} from "#remote/ssh";
import { bytes, text } from "./helpers/fake-clipboard";

const execaMock = vi.hoisted(() =>
	vi.fn<
		(
			file: string,
			args: string[],
			options: Record<string, unknown>,
		) => Promise<{ stdout?: Uint8Array }>
	>(),
);

vi.mock("execa", () => ({ execa: execaMock }));

const peer = { address: "user@host", remoteCommand: "clipbridge" };

describe("ssh remote", () => {
	beforeEach(() => {
		execaMock.mockReset();
	});

	it("builds the remote command line", () => {
		expect(buildRemoteArgs(peer, "paste")).toEqual([
			"user@host",
			"clipbridge",
			"paste",
		]);
		expect(
			buildRemoteArgs({ address: "box", remoteCommand: "/opt/cb" }, "copy"),
		).toEqual(["box", "/opt/cb", "copy"]);
	});

	it("uses ssh unless overridden by the environment", () => {
		expect(resolveSshCommand({})).toBe("ssh");
		expect(resolveSshCommand({ CLIPBRIDGE_SSH_COMMAND: "autossh" })).toBe(
			"autossh",
		);
	});

	it("reads the peer clipboard through paste", async () => {
		execaMock.mockResolvedValueOnce({ stdout: bytes("remote text") });
		const remote = new SshRemoteClipboard(peer, { sshCommand: "ssh" });

		const data = await remote.read();

		expect(text(data)).toBe("remote text");
		expect(execaMock).toHaveBeenCalledWith(
			"ssh",
			["user@host", "clipbridge", "paste"],
			expect.objectContaining({
				encoding: "buffer",
				stripFinalNewline: false,
				stderr: "ignore",
			}),
		);
	});

	it("writes through copy with the payload on stdin", async () => {
		execaMock.mockResolvedValueOnce({});
		const remote = new SshRemoteClipboard(peer, {
			sshCommand: "ssh",
			showErrors: true,
		});
		const payload = bytes("hello");

		await remote.write(payload);

		expect(execaMock).toHaveBeenCalledWith(
			"ssh",
			["user@host", "clipbridge", "copy"],
			expect.objectContaining({ input: payload, stderr: "inherit" }),
		);
	});

	it("wraps read failures as transient", async () => {
		const cause = new Error("exit code 255");
		execaMock.mockRejectedValueOnce(cause);
		const remote = new SshRemoteClipboard(peer, { sshCommand: "ssh" });

		const error = await remote.read().catch((reason: unknown) => reason);

		expect(error).toBeInstanceOf(TransientReadError);
		expect(error).toMatchObject({
			message: "reading from user@host failed",
			cause,
		});
	});

	it("wraps write failures as transient", async () => {
		execaMock.mockRejectedValueOnce(new Error("exit code 1"));
		const remote = new SshRemoteClipboard(peer, { sshCommand: "ssh" });

		await expect(remote.write(bytes("x"))).rejects.toThrow(
			TransientWriteError,
		);
	});
});
