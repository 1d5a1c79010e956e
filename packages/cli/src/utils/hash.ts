import { createHash } from 'node:crypto';

/**
 * Computes a SHA-256 hash of input bytes already read into memory,
 * so the file is read once for both hashing and decoding.
 * Returns the hash prefixed with 'sha256:'.
 */
export function hashBuffer(content: Uint8Array): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
