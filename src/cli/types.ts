export type CliOptions = {
	config?: string;
	intervalMs?: number;
	json: boolean;
	silent: boolean;
	verbose: boolean;
};

export type PeerCommandName = "watch" | "send" | "recv" | "peek";

export type CliCommand =
	| { command: PeerCommandName; peer?: string; options: CliOptions }
	| { command: "copy"; text: string[]; options: CliOptions }
	| { command: "paste"; options: CliOptions }
	| { command: "clear"; options: CliOptions }
	| { command: "backend"; options: CliOptions }
	| { command: "doctor"; options: CliOptions }
	| {
			command: "fx";
			names: string[];
			list: boolean;
			dryRun: boolean;
			options: CliOptions;
	  }
	| {
			command: "history";
			filter: { peer: boolean; fx: boolean };
			options: CliOptions;
	  }
	| { command: "init"; options: CliOptions }
	| { command: null; options: CliOptions };
