import process from "node:process";
import pc from "picocolors";
import { ExitCode } from "./exit-code";
import { parseArgs } from "./parse-args";
import type { CliCommand } from "./types";
import { setSilentMode, setVerboseMode, symbols, ui } from "./ui";

export const CLI_NAME = "clipbridge";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  watch [peer]   Keep the clipboard in sync with a peer
  send [peer]    Send the local clipboard to a peer
  recv [peer]    Replace the local clipboard with a peer's
  peek [peer]    Print a peer's clipboard
  copy [text]    Copy text (or stdin) to the clipboard
  paste          Print the clipboard
  clear          Empty the clipboard
  backend        Show the detected clipboard backend
  doctor         Check the clipboard setup
  history        Show recent transfers (--peer, --fx to filter)
  fx [names...]  Run clipboard transforms (--list, --dry-run)
  init           Create a config interactively

Global options:
  --config <path>
  --interval-ms <n> (watch only)
  --json
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const printJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const runCommand = async (parsed: CliCommand) => {
	const { options } = parsed;
	const logger = ui.debug;
	switch (parsed.command) {
		case "watch": {
			const { runWatch } = await import("#commands/watch");
			await runWatch({
				configPath: options.config,
				peer: parsed.peer,
				intervalMs: options.intervalMs,
				logger,
			});
			return;
		}
		case "send": {
			const { formatTransfer, sendToPeer } = await import("#commands/peer");
			const result = await sendToPeer({
				configPath: options.config,
				peer: parsed.peer,
				logger,
			});
			if (options.json) {
				printJson(result);
			} else {
				ui.line(`${symbols.success} ${formatTransfer("sent", result)}`);
			}
			return;
		}
		case "recv": {
			const { formatTransfer, receiveFromPeer } = await import(
				"#commands/peer"
			);
			const result = await receiveFromPeer({
				configPath: options.config,
				peer: parsed.peer,
				logger,
			});
			if (options.json) {
				printJson(result);
			} else {
				ui.line(`${symbols.success} ${formatTransfer("received", result)}`);
			}
			return;
		}
		case "peek": {
			const { peekAtPeer } = await import("#commands/peer");
			await peekAtPeer({
				configPath: options.config,
				peer: parsed.peer,
				logger,
			});
			return;
		}
		case "copy": {
			const { copyToClipboard } = await import("#commands/clipboard");
			await copyToClipboard(parsed.text);
			return;
		}
		case "paste": {
			const { pasteFromClipboard } = await import("#commands/clipboard");
			await pasteFromClipboard();
			return;
		}
		case "clear": {
			const { clearClipboard } = await import("#commands/clipboard");
			await clearClipboard();
			ui.line(`${symbols.success} Clipboard cleared`);
			return;
		}
		case "backend": {
			const { getBackendLines } = await import("#commands/doctor");
			for (const line of getBackendLines()) {
				ui.line(line);
			}
			return;
		}
		case "doctor": {
			const { formatDoctorReport, getDoctorReport } = await import(
				"#commands/doctor"
			);
			const report = getDoctorReport();
			if (options.json) {
				printJson(report);
				return;
			}
			for (const line of formatDoctorReport(report)) {
				ui.line(line);
			}
			return;
		}
		case "history": {
			const { readHistory } = await import("#core/history");
			const { filterHistory, formatHistory } = await import(
				"#commands/history"
			);
			const entries = await readHistory();
			if (options.json) {
				printJson(filterHistory(entries, parsed.filter));
				return;
			}
			for (const line of formatHistory(entries, parsed.filter)) {
				ui.line(line);
			}
			return;
		}
		case "fx": {
			const { formatFxResult, listTransforms, runFx } = await import(
				"#commands/fx"
			);
			if (parsed.list) {
				for (const line of await listTransforms(options.config)) {
					ui.line(line);
				}
				return;
			}
			const result = await runFx({
				configPath: options.config,
				names: parsed.names,
				dryRun: parsed.dryRun,
				logger,
			});
			if (result.dryRun) {
				return;
			}
			if (options.json) {
				printJson(result);
			} else {
				ui.line(formatFxResult(result));
			}
			return;
		}
		case "init": {
			const { initConfig } = await import("#commands/init");
			const result = await initConfig({ configPath: options.config });
			if (options.json) {
				printJson(result);
			} else if (result.written) {
				ui.line(
					`${symbols.success} Wrote ${pc.gray(ui.path(result.configPath))}`,
				);
			} else {
				ui.line(`${symbols.info} Kept existing config, nothing written.`);
			}
			return;
		}
		case null:
			printHelp();
			return;
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs();

		setSilentMode(parsed.options.silent);
		setVerboseMode(parsed.options.verbose);

		if (parsed.help) {
			printHelp();
			process.exit(ExitCode.Success);
		}

		if (!parsed.command) {
			printHelp();
			process.exit(ExitCode.InvalidArgument);
		}

		await runCommand(parsed.parsed);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message =
		error instanceof Error ? error.message || String(error) : String(error);
	printError(message);
	process.exit(ExitCode.FatalError);
}
