import { createHash } from "node:crypto";

/**
 * Hex-encoded SHA-256 of a clipboard payload. Compared for equality only.
 */
export type Fingerprint = string;

/** Stands in for a side that could not be read at session start. */
export const ZERO_FINGERPRINT: Fingerprint = "0".repeat(64);

export const fingerprint = (payload: Uint8Array): Fingerprint =>
	createHash("sha256").update(payload).digest("hex");
