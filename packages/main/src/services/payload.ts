import { createHash } from 'crypto';

const PAYLOAD = Buffer.from('test file content for pcap', 'utf8');

export function digestOf(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/** SHA-256 of the fixed payload, lowercase hex. Computed once per process. */
export const FIXED_PAYLOAD_DIGEST = digestOf(PAYLOAD);

export const FIXED_PAYLOAD_SIZE = PAYLOAD.length;

// Callers get their own copy so the shared bytes behind the digest never change.
export function fixedPayload(): Buffer {
  return Buffer.from(PAYLOAD);
}
