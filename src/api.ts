export {
	type BackendKind,
	type ClipboardBackend,
	detectBackend,
	hasCommand,
} from "#clipboard/backend";
export { type LocalClipboard, SystemClipboard } from "#clipboard/local";
export {
	type ClipbridgeConfig,
	loadConfig,
	type PeerDescriptor,
	resolveConfigPath,
	resolvePeer,
	resolveWatchInterval,
	type TransformConfig,
	writeConfig,
} from "#config";
export {
	ConfigurationError,
	TransientReadError,
	TransientWriteError,
} from "#core/errors";
export { formatSize } from "#core/format";
export {
	type HistoryEntry,
	createHistoryRecorder,
	readHistory,
	recordHistory,
} from "#core/history";
export { getTransformCommand, runTransform } from "#core/transform";
export {
	type RemoteClipboard,
	SshRemoteClipboard,
	buildRemoteArgs,
} from "#remote/ssh";
export {
	type Fingerprint,
	fingerprint,
	ZERO_FINGERPRINT,
} from "#sync/fingerprint";
export type {
	PropagationEvent,
	PropagationFailure,
	SyncState,
	TickOutcome,
	WatchReporter,
	WatchSessionOptions,
} from "#sync/types";
export { validateInterval, WatchSession } from "#sync/watch-session";
