import * as z from "zod";

export const DEFAULT_REMOTE_COMMAND = "clipbridge";
export const DEFAULT_WATCH_INTERVAL_MS = 500;
export const MIN_WATCH_INTERVAL_MS = 100;

const PEER_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const PeerNameSchema = z
	.string()
	.min(1)
	.regex(PEER_NAME_RE, {
		message: "must start with a letter or digit and contain only [A-Za-z0-9._-]",
	});

export const PeerSchema = z
	.object({
		ssh: z.string().min(1),
		remoteCmd: z.string().min(1).optional(),
	})
	.strict();

export const WatchSchema = z
	.object({
		intervalMs: z
			.number()
			.int()
			.min(MIN_WATCH_INTERVAL_MS, {
				message: `must be at least ${MIN_WATCH_INTERVAL_MS}`,
			})
			.optional(),
	})
	.strict();

export const TransformSchema = z
	.object({
		cmd: z.array(z.string().min(1)).min(1).optional(),
		shell: z.string().min(1).optional(),
		description: z.string().optional(),
	})
	.strict()
	.superRefine((value, ctx) => {
		if (value.cmd === undefined && value.shell === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "needs either cmd or shell",
			});
		} else if (value.cmd !== undefined && value.shell !== undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "takes cmd or shell, not both",
			});
		}
	});

export const DefaultsSchema = z
	.object({
		peer: PeerNameSchema.optional(),
	})
	.strict();

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		peers: z.record(PeerNameSchema, PeerSchema).optional(),
		defaults: DefaultsSchema.optional(),
		watch: WatchSchema.optional(),
		fx: z.record(PeerNameSchema, TransformSchema).optional(),
	})
	.strict()
	.superRefine((value, ctx) => {
		const defaultPeer = value.defaults?.peer;
		if (defaultPeer && !Object.hasOwn(value.peers ?? {}, defaultPeer)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["defaults", "peer"],
				message: `names unknown peer "${defaultPeer}"`,
			});
		}
	});

export type PeerConfig = z.infer<typeof PeerSchema>;
export type WatchConfig = z.infer<typeof WatchSchema>;
export type TransformConfig = z.infer<typeof TransformSchema>;
export type ClipbridgeDefaults = z.infer<typeof DefaultsSchema>;
export type ClipbridgeConfig = z.infer<typeof ConfigSchema>;

/**
 * A configured peer with defaults applied. Immutable for a session.
 */
export type PeerDescriptor = {
	/** ssh destination, e.g. `user@host` or a Host alias */
	address: string;
	/** command run on the peer with `copy` or `paste` */
	remoteCommand: string;
};
