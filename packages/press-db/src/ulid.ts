import { randomBytes } from 'crypto';

// ULID-like timestamped ID generator
// Format: timestamp (10 chars) + random (16 chars) = 26 chars
// Base32 encoding using Crockford's alphabet; sorts by creation time

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encodeTime(now: number, len = 10): string {
  let str = '';
  for (let i = 0; i < len; i++) {
    str = CROCKFORD[now % 32] + str;
    now = Math.floor(now / 32);
  }
  return str;
}

function encodeRandom(len = 16): string {
  const bytes = randomBytes(len);
  let str = '';
  for (const byte of bytes) {
    str += CROCKFORD[byte & 0x1f];
  }
  return str;
}

export function ulid(now: number = Date.now()): string {
  return encodeTime(now) + encodeRandom();
}
