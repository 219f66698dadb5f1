import { malformed } from './format.js';

/**
 * Forward-only cursor over serialized bytes
 */
export class ByteReader {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readChar(): string {
    const byte = this.bytes[this.offset];
    if (byte === undefined) {
      throw malformed('unexpected end of data', this.offset);
    }
    this.offset++;
    return String.fromCharCode(byte);
  }

  expect(char: string): void {
    const at = this.offset;
    const actual = this.readChar();
    if (actual !== char) {
      throw malformed(`expected '${char}', found '${actual}'`, at);
    }
  }

  /** ASCII text up to (and consuming) `terminator` */
  readToken(terminator: string): string {
    const start = this.offset;
    const end = this.bytes.indexOf(terminator.charCodeAt(0), start);
    if (end === -1) {
      throw malformed(`missing '${terminator}'`, start);
    }
    this.offset = end + 1;
    return this.bytes.subarray(start, end).toString('latin1');
  }

  readBytes(length: number): Buffer {
    if (length > this.remaining) {
      throw malformed(`expected ${length} bytes, ${this.remaining} left`, this.offset);
    }
    const out = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }
}
