/**
 * Little-endian reads at absolute offsets of an in-memory buffer.
 * Out-of-range reads throw a RangeError from Buffer itself; callers check
 * geometry first and turn violations into format errors.
 */
export class BinaryReader {
  private buffer: Buffer;

  constructor(buffer: Buffer) {
    this.buffer = buffer;
  }

  get length(): number {
    return this.buffer.length;
  }

  readUInt16(offset: number): number {
    return this.buffer.readUInt16LE(offset);
  }

  readUInt32(offset: number): number {
    return this.buffer.readUInt32LE(offset);
  }

  readFloat32(offset: number): number {
    return this.buffer.readFloatLE(offset);
  }

  /**
   * Read a 4-byte tag. latin1 keeps every byte value, so unknown or binary
   * tags survive the round trip to string.
   */
  readMagic(offset: number): string {
    if (offset < 0 || offset + 4 > this.buffer.length) {
      throw new RangeError(`Tag at ${offset} is outside buffer of ${this.buffer.length} bytes`);
    }
    return this.buffer.toString('latin1', offset, offset + 4);
  }

  /** View of [start, end) sharing memory with the source */
  slice(start: number, end: number): Buffer {
    return this.buffer.subarray(start, end);
  }
}
