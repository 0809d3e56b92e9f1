export const ZIP_METHOD_STORE = 0;
export const ZIP_METHOD_DEFLATE = 8;

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_MIN_SIZE = 22;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const CENTRAL_HEADER_SIZE = 46;

/**
 * Compression method of every entry, keyed by name, read from the central directory.
 * jszip does not report how a loaded entry was stored. Zip64 archives and unreadable
 * directories yield an empty map.
 */
export function readEntryMethods(data: Buffer): Map<string, number> {
  const methods = new Map<string, number>();
  const eocd = findEndOfCentralDirectory(data);
  if (eocd < 0) return methods;

  const entries = data.readUInt16LE(eocd + 10);
  let p = data.readUInt32LE(eocd + 16);
  for (let i = 0; i < entries; i++) {
    if (p + CENTRAL_HEADER_SIZE > data.length || data.readUInt32LE(p) !== CENTRAL_HEADER_SIGNATURE) break;
    const method = data.readUInt16LE(p + 10);
    const nameLength = data.readUInt16LE(p + 28);
    const extraLength = data.readUInt16LE(p + 30);
    const commentLength = data.readUInt16LE(p + 32);
    const nameStart = p + CENTRAL_HEADER_SIZE;
    if (nameStart + nameLength > data.length) break;
    methods.set(data.toString('utf8', nameStart, nameStart + nameLength), method);
    p = nameStart + nameLength + extraLength + commentLength;
  }
  return methods;
}

function findEndOfCentralDirectory(data: Buffer): number {
  // the record sits at the end, followed by a comment of at most 0xffff bytes
  const lowest = Math.max(0, data.length - EOCD_MIN_SIZE - 0xffff);
  for (let p = data.length - EOCD_MIN_SIZE; p >= lowest; p--) {
    if (data.readUInt32LE(p) === EOCD_SIGNATURE) return p;
  }
  return -1;
}
