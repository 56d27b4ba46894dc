/**
 * Unit tests for the Borsh primitives and the BurnMemo envelope
 */

import { BorshReader, BorshWriter, utf8Length } from '../../src/codec/borsh';
import {
  MAX_MEMO_PAYLOAD,
  TOKEN_MEMO_BOUNDS,
  decodeBurnMemo,
  decodeMemoText,
  encodeMemo,
  encodedMemoLength,
  stripHistoryPrefix,
  validateMemoText,
} from '../../src/codec/memo';
import { InvalidParameterError, OtherError, TruncatedError } from '../../src/errors';

describe('Borsh codec', () => {
  it('should write little-endian integers and length-prefixed strings', () => {
    const buf = new BorshWriter().u8(1).u32(2).u64(3n).string('hi').toBuffer();

    expect(buf.toString('hex')).toBe('01' + '02000000' + '0300000000000000' + '02000000' + '6869');
  });

  it('should reject u64 values out of range, naming the field', () => {
    expect(() => new BorshWriter().u64(-1n, 'burnAmount')).toThrow(InvalidParameterError);
    expect(() => new BorshWriter().u64(1n << 64n, 'burnAmount')).toThrow('burnAmount out of u64 range');
  });

  it('should encode Option as a tag byte', () => {
    const none = new BorshWriter().option<string>(undefined, (w, v) => {
      w.string(v);
    });
    const some = new BorshWriter().option('a', (w, v) => {
      w.string(v);
    });

    expect(none.toBuffer().toString('hex')).toBe('00');
    expect(some.toBuffer().toString('hex')).toBe('01' + '01000000' + '61');
  });

  it('should report which field ran out', () => {
    const reader = new BorshReader(Buffer.from([1, 0]));
    reader.u8('version');

    expect(() => reader.u32('count')).toThrow(TruncatedError);
  });

  it('should reject invalid bool tags and invalid UTF-8', () => {
    expect(() => new BorshReader(Buffer.from([2])).bool('flag')).toThrow(OtherError);
    expect(() => new BorshReader(Buffer.from([1, 0, 0, 0, 0xff])).string('name')).toThrow('Invalid UTF-8 in name');
  });

  it('should measure text in UTF-8 bytes', () => {
    expect(utf8Length('abc')).toBe(3);
    expect(utf8Length('é')).toBe(2);
  });
});

describe('BurnMemo envelope', () => {
  const payload = Buffer.alloc(60, 0x41);

  it('should pre-compute the Base64 length', () => {
    expect(encodedMemoLength(60)).toBe(100);
    expect(encodeMemo(payload, 1_000_000n)).toHaveLength(100);
  });

  it('should round-trip version, amount and payload', () => {
    const text = encodeMemo(payload, 420_000_000n);
    const memo = decodeBurnMemo(Buffer.from(text, 'base64'));

    expect(memo.version).toBe(1);
    expect(memo.burnAmount).toBe(420_000_000n);
    expect(memo.payload.equals(payload)).toBe(true);
  });

  it('should reject memos shorter than 69 bytes', () => {
    // 13 + 30 = 43 bytes -> 60 Base64 chars
    expect(() => encodeMemo(Buffer.alloc(30), 1n)).toThrow('Memo too short: 60 bytes (min: 69)');
  });

  it('should reject payloads over the envelope capacity before encoding', () => {
    expect(() => encodeMemo(Buffer.alloc(MAX_MEMO_PAYLOAD + 1), 1n)).toThrow(InvalidParameterError);
  });

  it('should reject memos longer than the bounds', () => {
    // 13 + 600 = 613 bytes -> 820 Base64 chars
    expect(() => encodeMemo(Buffer.alloc(600), 1n)).toThrow('Memo too long: 820 bytes (max: 800)');
    // 13 + 520 = 533 bytes -> 712 Base64 chars
    expect(() => encodeMemo(Buffer.alloc(520), 1n, TOKEN_MEMO_BOUNDS)).toThrow('Memo too long: 712 bytes (max: 700)');
  });

  it('should accept plain memo text at both bounds', () => {
    expect(() => validateMemoText('x'.repeat(69))).not.toThrow();
    expect(() => validateMemoText('x'.repeat(800))).not.toThrow();
    expect(() => validateMemoText('x'.repeat(68))).toThrow(InvalidParameterError);
  });

  it('should reject trailing bytes and unknown versions', () => {
    const valid = Buffer.from(encodeMemo(payload, 1n), 'base64');

    expect(() => decodeBurnMemo(Buffer.concat([valid, Buffer.from([0])]))).toThrow('BurnMemo: 1 trailing bytes');

    const wrongVersion = Buffer.from(valid);
    wrongVersion[0] = 2;
    expect(() => decodeBurnMemo(wrongVersion)).toThrow('Unsupported burn memo version: 2');
  });

  describe('history text', () => {
    it('should strip the "[len] " prefix', () => {
      expect(stripHistoryPrefix('[100] abcd')).toBe('abcd');
      expect(stripHistoryPrefix('abcd')).toBe('abcd');
    });

    it('should decode listing memos and ignore foreign ones', () => {
      const text = encodeMemo(payload, 5_000_000n);

      expect(decodeMemoText(`[${text.length}] ${text}`)?.burnAmount).toBe(5_000_000n);
      expect(decodeMemoText('[11] hello world')).toBeUndefined();
      expect(decodeMemoText('[4] AAAA')).toBeUndefined();
      expect(decodeMemoText('')).toBeUndefined();
    });
  });
});
