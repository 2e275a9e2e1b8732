import { BinaryReader } from './binary-reader.js';
import { CorruptSectionError } from './errors.js';
import { Logger } from './logger.js';
import { SECTION_HEADER_SIZE, SECTION_MAGIC } from './lvb-constants.js';
import { MapperRegistry } from './mapper-registry.js';
import { Payload } from './payloads.js';

/*
 Section header, relative to the section start:
   0x00 magic
   0x04 section size including this header
   0x08 version
   0x0C entry count
   0x10 entry size
   0x14 index of the first INFO entry belonging to this section
   0x18 reserved (8 bytes)
 */
export interface SectionHeader {
  magic: string;
  size: number;
  version: number;
  entryCount: number;
  entrySize: number;
  infoBaseIndex: number;
}

/**
 * One decoded record. Links into INFO and XFRM are positions in those
 * sections' entry lists, filled in by the container once every section is
 * decoded.
 */
export class Entry {
  readonly payload: Payload;
  name: string | null = null;
  infoIndex: number | null = null;
  transformIndex: number | null = null;

  constructor(payload: Payload) {
    this.payload = payload;
  }
}

export class Section {
  readonly offset: number;
  readonly header: SectionHeader;
  readonly entries: Entry[];

  constructor(offset: number, header: SectionHeader, entries: Entry[]) {
    this.offset = offset;
    this.header = header;
    this.entries = entries;
  }

  get magic(): string {
    return this.header.magic;
  }

  get size(): number {
    return this.header.size;
  }

  get infoBaseIndex(): number {
    return this.header.infoBaseIndex;
  }

  entry(index: number): Entry | undefined {
    return this.entries[index];
  }
}

/**
 * Read the header of the section starting at `offset`. `end` is the
 * exclusive end of the region sections may occupy.
 */
export function readSectionHeader(reader: BinaryReader, offset: number, end: number): SectionHeader {
  if (offset + SECTION_HEADER_SIZE > end) {
    const magic = offset + 4 <= end ? reader.readMagic(offset) : '';
    throw new CorruptSectionError(offset, magic, `header needs ${SECTION_HEADER_SIZE} bytes, ${end - offset} left`);
  }

  const header: SectionHeader = {
    magic: reader.readMagic(offset),
    size: reader.readUInt32(offset + 4),
    version: reader.readUInt32(offset + 8),
    entryCount: reader.readUInt32(offset + 12),
    entrySize: reader.readUInt32(offset + 16),
    infoBaseIndex: reader.readUInt32(offset + 20),
  };

  if (header.size < SECTION_HEADER_SIZE) {
    throw new CorruptSectionError(offset, header.magic, `declared size ${header.size} is smaller than its header`);
  }
  if (offset + header.size > end) {
    throw new CorruptSectionError(offset, header.magic, `declared size ${header.size} runs past the end of the container`);
  }

  return header;
}

/**
 * Decode the section at `offset`, every entry through the decoder the
 * registry picks for its magic.
 */
export function decodeSection(
  reader: BinaryReader,
  modern: boolean,
  offset: number,
  end: number,
  registry: MapperRegistry,
): Section {
  const header = readSectionHeader(reader, offset, end);
  const decoder = registry.resolve(header.magic, modern);
  const entryStart = offset + SECTION_HEADER_SIZE;
  const sectionEnd = offset + header.size;

  Logger.log(`Section ${JSON.stringify(header.magic)} at 0x${offset.toString(16)}: size=${header.size} version=${header.version} entries=${header.entryCount}x${header.entrySize} infoBase=${header.infoBaseIndex} decoder=${decoder.name}`);

  // The string blob is one entry spanning the whole body
  if (header.magic === SECTION_MAGIC.STRG) {
    const entries = [new Entry(decoder.decode(reader.slice(entryStart, sectionEnd)))];
    return new Section(offset, header, entries);
  }

  if (header.entryCount > 0 && header.entrySize === 0) {
    throw new CorruptSectionError(offset, header.magic, `${header.entryCount} entries of 0 bytes`);
  }

  const bodySize = header.size - SECTION_HEADER_SIZE;
  if (header.entryCount * header.entrySize > bodySize) {
    throw new CorruptSectionError(
      offset,
      header.magic,
      `${header.entryCount} entries of ${header.entrySize} bytes do not fit in ${bodySize} bytes`,
    );
  }
  if (header.entryCount > 0 && header.entrySize < decoder.minSize) {
    throw new CorruptSectionError(
      offset,
      header.magic,
      `entry size ${header.entrySize} is smaller than the ${decoder.minSize} bytes ${decoder.name} reads`,
    );
  }

  const entries: Entry[] = [];
  for (let i = 0; i < header.entryCount; i++) {
    const start = entryStart + i * header.entrySize;
    entries.push(new Entry(decoder.decode(reader.slice(start, start + header.entrySize))));
  }

  return new Section(offset, header, entries);
}
