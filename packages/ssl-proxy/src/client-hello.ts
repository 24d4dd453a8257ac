const RECORD_HEADER_LENGTH = 5;
const CONTENT_TYPE_HANDSHAKE = 0x16;
const HANDSHAKE_CLIENT_HELLO = 0x01;
const EXTENSION_ALPN = 0x0010;

/** Largest TLS record body a ClientHello may arrive in. */
const MAX_RECORD_LENGTH = 16 * 1024;

/** Bounds-checked reader over a byte buffer. */
class Cursor {
  constructor(
    private readonly buf: Buffer,
    private offset = 0,
    private readonly end = buf.length
  ) {}

  get remaining(): number {
    return this.end - this.offset;
  }

  u8(): number | null {
    if (this.remaining < 1) return null;
    return this.buf[this.offset++];
  }

  u16(): number | null {
    if (this.remaining < 2) return null;
    const value = this.buf.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  u24(): number | null {
    if (this.remaining < 3) return null;
    const value = this.buf.readUIntBE(this.offset, 3);
    this.offset += 3;
    return value;
  }

  skip(length: number): boolean {
    if (this.remaining < length) return false;
    this.offset += length;
    return true;
  }

  /** Cursor over the next `length` bytes, consumed from this one. */
  slice(length: number): Cursor | null {
    if (this.remaining < length) return null;
    const sub = new Cursor(this.buf, this.offset, this.offset + length);
    this.offset += length;
    return sub;
  }

  bytes(length: number): Buffer | null {
    if (this.remaining < length) return null;
    const value = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }
}

/** Skip a vector whose length prefix is `prefixBytes` wide. */
function skipVector(cursor: Cursor, prefixBytes: 1 | 2): boolean {
  const length = prefixBytes === 1 ? cursor.u8() : cursor.u16();
  return length !== null && cursor.skip(length);
}

function parseAlpnExtension(cursor: Cursor): string[] {
  const listLength = cursor.u16();
  const list = listLength === null ? null : cursor.slice(listLength);
  if (!list) return [];

  const protocols: string[] = [];
  while (list.remaining > 0) {
    const length = list.u8();
    const name = length === null ? null : list.bytes(length);
    if (!name) break;
    protocols.push(name.toString("latin1"));
  }
  return protocols;
}

/**
 * Read the ALPN protocols a client offers in the first TLS record of a
 * connection.
 *
 * Returns undefined while the record is still incomplete, and an empty list
 * when the data is not a ClientHello or offers no ALPN extension.
 */
export function readAlpnProtocols(data: Buffer): string[] | undefined {
  if (data.length === 0) return undefined;
  if (data[0] !== CONTENT_TYPE_HANDSHAKE) return [];
  if (data.length < RECORD_HEADER_LENGTH) return undefined;

  const recordLength = data.readUInt16BE(3);
  if (recordLength > MAX_RECORD_LENGTH) return [];
  if (data.length < RECORD_HEADER_LENGTH + recordLength) return undefined;

  const record = new Cursor(data, RECORD_HEADER_LENGTH, RECORD_HEADER_LENGTH + recordLength);
  if (record.u8() !== HANDSHAKE_CLIENT_HELLO) return [];
  const helloLength = record.u24();
  // A ClientHello split across several records carries no ALPN we can see
  const hello = helloLength === null ? null : record.slice(helloLength);
  if (!hello) return [];

  // client_version, random, session_id, cipher_suites, compression_methods
  if (!hello.skip(2 + 32) || !skipVector(hello, 1) || !skipVector(hello, 2) || !skipVector(hello, 1)) {
    return [];
  }

  const extensionsLength = hello.u16();
  const extensions = extensionsLength === null ? null : hello.slice(extensionsLength);
  if (!extensions) return [];

  while (extensions.remaining > 0) {
    const type = extensions.u16();
    const length = extensions.u16();
    const body = length === null ? null : extensions.slice(length);
    if (type === null || !body) return [];
    if (type === EXTENSION_ALPN) return parseAlpnExtension(body);
  }
  return [];
}
