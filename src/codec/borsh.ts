/**
 * Minimal Borsh reader/writer for memo payloads and account data
 * @module codec/borsh
 */

import { PublicKey } from '@solana/web3.js';
import { InvalidParameterError, OtherError, TruncatedError } from '../errors.js';

const U64_MAX = (1n << 64n) - 1n;
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Byte length of a string once UTF-8 encoded. All text limits are
 * expressed in these bytes, not characters.
 */
export function utf8Length(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

export class BorshWriter {
  private readonly chunks: Buffer[] = [];

  u8(value: number): this {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(value);
    this.chunks.push(buf);
    return this;
  }

  u32(value: number): this {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value);
    this.chunks.push(buf);
    return this;
  }

  u64(value: bigint, field: string = 'u64'): this {
    if (value < 0n || value > U64_MAX) {
      throw new InvalidParameterError(field, `${field} out of u64 range: ${value}`);
    }
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64LE(value);
    this.chunks.push(buf);
    return this;
  }

  i64(value: number): this {
    const buf = Buffer.alloc(8);
    buf.writeBigInt64LE(BigInt(Math.trunc(value)));
    this.chunks.push(buf);
    return this;
  }

  /** Raw bytes, no length prefix */
  fixed(bytes: Uint8Array): this {
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  /** Vec<u8>: u32 length then bytes */
  bytes(bytes: Uint8Array): this {
    this.u32(bytes.length);
    return this.fixed(bytes);
  }

  string(value: string): this {
    return this.bytes(Buffer.from(value, 'utf8'));
  }

  pubkey(key: PublicKey): this {
    return this.fixed(key.toBytes());
  }

  option<T>(value: T | undefined, write: (writer: this, value: T) => void): this {
    if (value === undefined) {
      return this.u8(0);
    }
    this.u8(1);
    write(this, value);
    return this;
  }

  stringVec(values: readonly string[]): this {
    this.u32(values.length);
    for (const value of values) {
      this.string(value);
    }
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Cursor over Borsh data. Every read names the field it is for so a short
 * buffer reports exactly where it ran out.
 */
export class BorshReader {
  private readonly buf: Buffer;
  private position = 0;

  constructor(data: Uint8Array) {
    this.buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.buf.length - this.position;
  }

  private take(length: number, field: string): Buffer {
    if (this.remaining < length) {
      throw new TruncatedError(field, length, this.remaining);
    }
    const slice = this.buf.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  skip(length: number, field: string): void {
    this.take(length, field);
  }

  u8(field: string): number {
    return this.take(1, field).readUInt8(0);
  }

  u32(field: string): number {
    return this.take(4, field).readUInt32LE(0);
  }

  u64(field: string): bigint {
    return this.take(8, field).readBigUInt64LE(0);
  }

  i64(field: string): number {
    return Number(this.take(8, field).readBigInt64LE(0));
  }

  fixed(length: number, field: string): Buffer {
    return Buffer.from(this.take(length, field));
  }

  bytes(field: string): Buffer {
    const length = this.u32(`${field}.length`);
    return this.fixed(length, field);
  }

  string(field: string): string {
    const raw = this.bytes(field);
    try {
      return utf8Decoder.decode(raw);
    } catch (error) {
      throw new OtherError(`Invalid UTF-8 in ${field}`, error);
    }
  }

  pubkey(field: string): PublicKey {
    return new PublicKey(this.take(32, field));
  }

  bool(field: string): boolean {
    const tag = this.u8(field);
    if (tag > 1) {
      throw new OtherError(`Invalid bool tag ${tag} for ${field}`);
    }
    return tag === 1;
  }

  option<T>(field: string, read: (reader: this) => T): T | undefined {
    return this.bool(`${field}.tag`) ? read(this) : undefined;
  }

  stringVec(field: string): string[] {
    const count = this.u32(`${field}.length`);
    const values: string[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.string(`${field}[${i}]`));
    }
    return values;
  }

  /** Fail unless every byte was consumed */
  expectEnd(context: string): void {
    if (this.remaining !== 0) {
      throw new OtherError(`${context}: ${this.remaining} trailing bytes`);
    }
  }
}
