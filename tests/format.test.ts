import { describe, expect, it } from "vitest";
import { formatSize } from "#core/format";
import { fingerprint, ZERO_FINGERPRINT } from "#sync/fingerprint";
import { bytes } from "./helpers/fake-clipboard";

describe("formatSize", () => {
	it("prints bytes below one KiB as is", () => {
		expect(formatSize(0)).toBe("0 B");
		expect(formatSize(5)).toBe("5 B");
		expect(formatSize(1023)).toBe("1023 B");
	});

	it("uses binary units with one decimal", () => {
		expect(formatSize(1024)).toBe("1.0 KiB");
		expect(formatSize(1536)).toBe("1.5 KiB");
		expect(formatSize(3 * 1024 * 1024)).toBe("3.0 MiB");
		expect(formatSize(5 * 1024 ** 3)).toBe("5.0 GiB");
	});
});

describe("fingerprint", () => {
	it("is the hex SHA-256 of the payload", () => {
		expect(fingerprint(bytes("abc"))).toBe(
			"ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
		);
		expect(fingerprint(new Uint8Array())).toBe(
			"e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
		);
	});

	it("never equals the zero fingerprint for real input", () => {
		expect(ZERO_FINGERPRINT).toHaveLength(64);
		expect(fingerprint(new Uint8Array())).not.toBe(ZERO_FINGERPRINT);
	});
});
