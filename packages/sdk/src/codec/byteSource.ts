/**
 * Sequential reader over the bytes of one file, already decompressed.
 *
 * `read(size)` returns at most `size` bytes and an empty array once the source
 * is exhausted. Implementations may throw on I/O faults.
 */
export interface ByteSource {
  read(size: number): Uint8Array;
}

export class BufferByteSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(size: number): Uint8Array {
    if (size <= 0 || this.offset >= this.bytes.length) return new Uint8Array(0);
    const end = Math.min(this.offset + size, this.bytes.length);
    const out = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return out;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }
}
