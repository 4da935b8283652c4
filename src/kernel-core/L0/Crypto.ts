// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON (sorted keys, recursive)
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortValue(value));
}

function sortValue(value: unknown): unknown {
    if (value === null || typeof value !== 'object') return value;
    if (Array.isArray(value)) return value.map(sortValue);

    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const sorted: Record<string, unknown> = {};
    for (const [key, v] of entries) {
        sorted[key] = sortValue(v);
    }
    return sorted;
}

// 1.3 Randomness
export function randomNonce(bytes: number = 32): string {
    return randomBytes(bytes).toString('hex');
}

// 1.4 Instance addressing: 20-byte hex handle, address-style
export function deriveHandle(seed: string): string {
    return `0x${hash(seed).slice(0, 40)}`;
}
