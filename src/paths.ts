import os from "node:os";
import path from "node:path";

export const APP_DIRNAME = "clipbridge";
export const DEFAULT_CONFIG_FILENAME = "config.json";
export const DEFAULT_HISTORY_FILENAME = "history.json";

export const CONFIG_ENV_VAR = "CLIPBRIDGE_CONFIG";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

/**
 * `$XDG_CONFIG_HOME/clipbridge`, falling back to `~/.config/clipbridge`.
 */
export const resolveConfigDir = (env: NodeJS.ProcessEnv = process.env) => {
	const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
	return path.join(base, APP_DIRNAME);
};

export const resolveConfigPath = (
	configPath?: string,
	env: NodeJS.ProcessEnv = process.env,
) => {
	if (configPath) {
		return path.resolve(configPath);
	}
	const override = env[CONFIG_ENV_VAR];
	if (override) {
		return path.resolve(override);
	}
	return path.join(resolveConfigDir(env), DEFAULT_CONFIG_FILENAME);
};

export const resolveHistoryPath = (env: NodeJS.ProcessEnv = process.env) =>
	path.join(resolveConfigDir(env), DEFAULT_HISTORY_FILENAME);
