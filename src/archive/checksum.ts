import { USTAR } from "./constants";
import { encoder, readOctal } from "./utils";

// ASCII code for a space character.
const CHECKSUM_SPACE = 32;

/**
 * Validates the checksum of a tar header block.
 */
export function validateChecksum(block: Uint8Array): boolean {
	const stored = readOctal(block, USTAR.checksum.offset, USTAR.checksum.size);
	const checksumEnd = USTAR.checksum.offset + USTAR.checksum.size;

	// The checksum field itself counts as if it were filled with spaces.
	let sum = CHECKSUM_SPACE * USTAR.checksum.size;
	for (let i = 0; i < block.length; i++) {
		if (i >= USTAR.checksum.offset && i < checksumEnd) continue;
		sum += block[i];
	}

	return stored === sum;
}

/**
 * Calculates and writes the checksum to a tar header block.
 */
export function writeChecksum(block: Uint8Array): void {
	const checksumEnd = USTAR.checksum.offset + USTAR.checksum.size;
	block.fill(CHECKSUM_SPACE, USTAR.checksum.offset, checksumEnd);

	let checksum = 0;
	for (const byte of block) {
		checksum += byte;
	}

	// 6-digit octal, NUL-terminated, then a space.
	const checksumString = `${checksum.toString(8).padStart(6, "0")}\0 `;
	block.set(encoder.encode(checksumString), USTAR.checksum.offset);
}
