const UNIT = 1024;
const PREFIXES = ["K", "M", "G", "T"];

/**
 * Binary-unit byte size: `512 B`, `1.5 KiB`, `3.0 MiB`.
 */
export const formatSize = (bytes: number) => {
	if (bytes < UNIT) {
		return `${bytes} B`;
	}
	let div = UNIT;
	let exp = 0;
	let n = Math.floor(bytes / UNIT);
	while (n >= UNIT && exp < PREFIXES.length - 1) {
		div *= UNIT;
		exp += 1;
		n = Math.floor(n / UNIT);
	}
	return `${(bytes / div).toFixed(1)} ${PREFIXES[exp]}iB`;
};
