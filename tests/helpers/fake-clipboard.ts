import type { LocalClipboard } from "#clipboard/local";
import type { RemoteClipboard } from "#remote/ssh";

export const bytes = (text: string) => new TextEncoder().encode(text);

export const text = (data: Uint8Array) => new TextDecoder().decode(data);

/**
 * In-memory clipboard usable as either side of a session.
 */
export class FakeClipboard implements LocalClipboard, RemoteClipboard {
	value: Uint8Array;
	readError: Error | null = null;
	writeError: Error | null = null;
	reads = 0;
	writes = 0;

	constructor(initial = "") {
		this.value = bytes(initial);
	}

	set(next: string) {
		this.value = bytes(next);
	}

	get current() {
		return text(this.value);
	}

	async read(): Promise<Uint8Array> {
		this.reads += 1;
		if (this.readError) throw this.readError;
		return this.value;
	}

	async write(data: Uint8Array): Promise<void> {
		this.writes += 1;
		if (this.writeError) throw this.writeError;
		this.value = data;
	}
}
