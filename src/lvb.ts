import { BinaryReader } from './binary-reader.js';
import {
  CorruptSectionError,
  InvalidEncodingError,
  LvbError,
  MalformedHeaderError,
  MissingRequiredSectionError,
  OffsetOutOfRangeError,
  UnresolvedReferenceError,
} from './errors.js';
import { GimmickKey } from './gimmick-key.js';
import { Logger } from './logger.js';
import {
  FILE_HEADER_SIZE,
  LVB_MAGIC,
  MODERN_FORMAT_VERSION,
  SECTION_MAGIC,
  SPECIAL_MAGICS,
} from './lvb-constants.js';
import { MapperRegistry } from './mapper-registry.js';
import { AnyInfoPayload, isInfoPayload, StringTable, TransformPayload } from './payloads.js';
import { decodeSection, Entry, Section } from './section.js';

export interface LvbOptions {
  /** Resolvers for section types beyond the built-in ones */
  registry?: MapperRegistry;
}

/*
 File header:
   0x00 "LVLB"
   0x04 total size including this header
   0x08 format version (>= 5 is the modern layout)
   0x0C hash / flags, unused
   0x10 reserved (16 bytes)
 */

/**
 * A decoded LVB container: gimmick sections with their entries linked to
 * info and transform records, plus lookup tables by name, hash and bdat id.
 */
export class Lvb {
  readonly version: number;
  readonly modern: boolean;
  readonly declaredSize: number;
  readonly headerHash: number;
  /** Gimmick sections in file order, without INFO/XFRM/DEBI/STRG */
  readonly sections: Section[];
  /** Every section in file order */
  readonly allSections: Section[];
  /** Names that could not be read; the affected entries stay unnamed */
  readonly nameErrors: LvbError[] = [];

  private infos: AnyInfoPayload[];
  private transforms: TransformPayload[];
  private strings: StringTable;
  private gimmickMap = new Map<GimmickKey, Entry>();
  private gimmickBdatMap = new Map<number, Entry>();

  constructor(data: Buffer, options: LvbOptions = {}) {
    const registry = options.registry ?? new MapperRegistry();
    const reader = new BinaryReader(data);

    if (data.length < FILE_HEADER_SIZE) {
      throw new MalformedHeaderError(`File is ${data.length} bytes, shorter than the ${FILE_HEADER_SIZE}-byte header`);
    }
    if (!data.subarray(0, 4).equals(LVB_MAGIC)) {
      throw new MalformedHeaderError(`Wrong file type, expected signature ${LVB_MAGIC.toString('hex')} but found ${data.subarray(0, 4).toString('hex')}`);
    }

    this.declaredSize = reader.readUInt32(4);
    this.version = reader.readUInt32(8);
    this.headerHash = reader.readUInt32(12);
    this.modern = this.version >= MODERN_FORMAT_VERSION;

    if (this.declaredSize < FILE_HEADER_SIZE || this.declaredSize > data.length) {
      throw new MalformedHeaderError(`Declared size ${this.declaredSize} does not fit a file of ${data.length} bytes`);
    }

    Logger.log(`LVB version ${this.version} (${this.modern ? 'modern' : 'legacy'} layout), ${this.declaredSize} bytes`);

    this.allSections = this.walk(reader, registry);
    this.sections = this.allSections.filter(s => !SPECIAL_MAGICS.includes(s.magic));

    const info = this.findSection(SECTION_MAGIC.INFO, true);
    const xfrm = this.findSection(SECTION_MAGIC.XFRM, true);
    const strg = this.findSection(SECTION_MAGIC.STRG, true);
    const debi = this.findSection(SECTION_MAGIC.DEBI, false);

    this.infos = info.entries.map(entry => {
      if (!isInfoPayload(entry.payload)) {
        throw new CorruptSectionError(info.offset, info.magic, `unexpected ${entry.payload.kind} payload`);
      }
      return entry.payload;
    });
    this.transforms = xfrm.entries.map(entry => {
      if (entry.payload.kind !== 'transform') {
        throw new CorruptSectionError(xfrm.offset, xfrm.magic, `unexpected ${entry.payload.kind} payload`);
      }
      return entry.payload;
    });
    const blob = strg.entry(0)?.payload;
    if (blob === undefined || blob.kind !== 'strings') {
      throw new CorruptSectionError(strg.offset, strg.magic, 'missing string blob');
    }
    this.strings = blob.table;

    this.link();

    if (this.modern && debi) {
      this.overlayDebugNames(debi);
    }

    Logger.log(`Indexed ${this.gimmickMap.size} gimmick keys, ${this.gimmickBdatMap.size} bdat ids`);
  }

  /** Section by magic, among the gimmick sections */
  section(magic: string): Section | undefined {
    return this.sections.find(s => s.magic === magic);
  }

  /** Gimmick by name, or by hash id in the modern format */
  gimmick(key: GimmickKey): Entry | undefined {
    return this.gimmickMap.get(key);
  }

  /** Gimmick by bdat id (modern format only) */
  bdatGimmick(bdatId: number): Entry | undefined {
    return this.gimmickBdatMap.get(bdatId);
  }

  infoOf(entry: Entry): AnyInfoPayload | undefined {
    return entry.infoIndex === null ? undefined : this.infos[entry.infoIndex];
  }

  transformOf(entry: Entry): TransformPayload | undefined {
    return entry.transformIndex === null ? undefined : this.transforms[entry.transformIndex];
  }

  /** Every entry of every gimmick section */
  get gimmicks(): Entry[] {
    return this.sections.flatMap(s => s.entries);
  }

  get gimmickKeyCount(): number {
    return this.gimmickMap.size;
  }

  get bdatIdCount(): number {
    return this.gimmickBdatMap.size;
  }

  // Section sizes are trusted to find the next section
  private walk(reader: BinaryReader, registry: MapperRegistry): Section[] {
    const sections: Section[] = [];
    let offset = FILE_HEADER_SIZE;

    while (offset < this.declaredSize) {
      const section = decodeSection(reader, this.modern, offset, this.declaredSize, registry);
      sections.push(section);
      offset += section.size;
    }

    return sections;
  }

  private findSection(magic: string, required: true): Section;
  private findSection(magic: string, required: false): Section | undefined;
  private findSection(magic: string, required: boolean): Section | undefined {
    const found = this.allSections.filter(s => s.magic === magic);
    if (found.length > 1) {
      throw new CorruptSectionError(found[1].offset, magic, `duplicate ${magic} section`);
    }
    if (found.length === 0 && required) {
      throw new MissingRequiredSectionError(magic);
    }
    return found[0];
  }

  private link(): void {
    for (const section of this.sections) {
      const base = section.infoBaseIndex;

      section.entries.forEach((entry, i) => {
        const context = `${section.magic} entry ${i}`;
        const infoIndex = base + i;
        const info = this.infos[infoIndex];
        if (info === undefined) {
          throw new UnresolvedReferenceError(SECTION_MAGIC.INFO, infoIndex, this.infos.length, context);
        }
        if (info.transformIndex >= this.transforms.length) {
          throw new UnresolvedReferenceError(SECTION_MAGIC.XFRM, info.transformIndex, this.transforms.length, context);
        }

        entry.infoIndex = infoIndex;
        entry.transformIndex = info.transformIndex;

        if (info.kind === 'info') {
          this.gimmickMap.set(info.hashId, entry);
          this.gimmickBdatMap.set(info.bdatId, entry);
        } else {
          const name = this.readName(info.nameId, context);
          if (name !== null) {
            entry.name = name;
            this.gimmickMap.set(name, entry);
          }
        }
      });
    }
  }

  // Best effort: debug records for unknown gimmicks are skipped
  private overlayDebugNames(debi: Section): void {
    let named = 0;

    debi.entries.forEach((record, i) => {
      const debug = record.payload;
      if (debug.kind !== 'debug') {
        return;
      }
      const gimmick = this.gimmickMap.get(debug.gimmickId);
      if (gimmick === undefined) {
        Logger.log(`  DEBI entry ${i}: no gimmick with hash 0x${debug.gimmickId.toString(16)}`);
        return;
      }
      const name = this.readName(debug.stringId, `DEBI entry ${i}`);
      if (name !== null) {
        // A later record renames the gimmick
        if (gimmick.name !== null && this.gimmickMap.get(gimmick.name) === gimmick) {
          this.gimmickMap.delete(gimmick.name);
        }
        gimmick.name = name;
        this.gimmickMap.set(name, gimmick);
        named++;
      }
    });

    Logger.log(`Debug names applied to ${named} of ${debi.entries.length} records`);
  }

  private readName(offset: number, context: string): string | null {
    try {
      return this.strings.read(offset);
    } catch (err) {
      if (err instanceof InvalidEncodingError || err instanceof OffsetOutOfRangeError) {
        Logger.warn(`${context}: ${err.message}`);
        this.nameErrors.push(err);
        return null;
      }
      throw err;
    }
  }
}
