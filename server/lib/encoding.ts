import fs from 'node:fs';

export type SnapshotEncoding = 'utf-8' | 'utf-16' | 'utf-32be' | 'utf-32le' | 'utf-16be' | 'utf-16le';

const SNIFF_BYTE_COUNT = 64;
const DEFAULT_ENCODING: SnapshotEncoding = 'utf-8';

// 'utf-16' carries the little-endian mark, as a native-order BOM on x86 hosts does.
const BYTE_ORDER_MARKS: Array<{ encoding: SnapshotEncoding; bom: number[] }> = [
  { encoding: 'utf-8', bom: [0xef, 0xbb, 0xbf] },
  { encoding: 'utf-16', bom: [0xff, 0xfe] },
  { encoding: 'utf-32be', bom: [0x00, 0x00, 0xfe, 0xff] },
  { encoding: 'utf-32le', bom: [0xff, 0xfe, 0x00, 0x00] },
  { encoding: 'utf-16be', bom: [0xfe, 0xff] },
  { encoding: 'utf-16le', bom: [0xff, 0xfe] }
];

function startsWithBytes(bytes: Uint8Array, prefix: number[]): boolean {
  if (bytes.length < prefix.length) {
    return false;
  }
  return prefix.every((value, index) => bytes[index] === value);
}

/**
 * Picks the encoding announced by a byte-order mark. The UTF-32LE mark begins
 * with the UTF-16 one, so the longest matching mark wins and equal lengths
 * fall back to table order.
 */
export function detectBomEncoding(bytes: Uint8Array): SnapshotEncoding {
  let best: { encoding: SnapshotEncoding; length: number } | null = null;
  for (const { encoding, bom } of BYTE_ORDER_MARKS) {
    if (!startsWithBytes(bytes, bom)) {
      continue;
    }
    if (best === null || bom.length > best.length) {
      best = { encoding, length: bom.length };
    }
  }
  return best?.encoding ?? DEFAULT_ENCODING;
}

export function readLeadingBytes(filePath: string, byteCount = SNIFF_BYTE_COUNT): Buffer {
  const handle = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(byteCount);
    const bytesRead = fs.readSync(handle, buffer, 0, byteCount, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    fs.closeSync(handle);
  }
}

export function sniffEncoding(filePath: string): SnapshotEncoding {
  return detectBomEncoding(readLeadingBytes(filePath));
}
