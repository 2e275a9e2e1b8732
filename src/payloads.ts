import { TextDecoder } from 'util';
import { BinaryReader } from './binary-reader.js';
import { InvalidEncodingError, OffsetOutOfRangeError } from './errors.js';
import { PAYLOAD_SIZE } from './lvb-constants.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Modern (version >= 5) gimmick info record */
export interface InfoPayload {
  kind: 'info';
  /** Row id in the game's bdat tables */
  bdatId: number;
  transformIndex: number;
  shape: number;
  sequentialId: number;
  /** Murmur3 hash of the gimmick name, matched by DEBI records */
  hashId: number;
}

/** Legacy (version < 5) gimmick info record */
export interface LegacyInfoPayload {
  kind: 'legacyInfo';
  /** Offset of the gimmick name in the STRG blob */
  nameId: number;
  transformIndex: number;
  shape: number;
}

export type AnyInfoPayload = InfoPayload | LegacyInfoPayload;

/** Row-major 4x4 matrix */
export interface TransformPayload {
  kind: 'transform';
  matrix: number[];
}

export interface StringsPayload {
  kind: 'strings';
  table: StringTable;
}

export interface DebugPayload {
  kind: 'debug';
  /** Same value as InfoPayload.hashId of the gimmick it names */
  gimmickId: number;
  /** Shared by gimmicks of the same type */
  typeId: number;
  /** Offset of the readable name in the STRG blob */
  stringId: number;
  parentId: number;
}

/** Bytes of a section nobody knows how to decode */
export interface RawPayload {
  kind: 'raw';
  data: Buffer;
}

/** Result of a decoder registered from outside the core */
export interface ExtensionPayload {
  kind: 'extension';
  /** Decoder name */
  type: string;
  fields: JsonObject;
  data: Buffer;
}

export type Payload =
  | InfoPayload
  | LegacyInfoPayload
  | TransformPayload
  | StringsPayload
  | DebugPayload
  | RawPayload
  | ExtensionPayload;

/**
 * Turns the bytes of one entry into a payload. `decode` is only ever given
 * the entry's own slice, and only when it is at least `minSize` bytes long.
 */
export interface PayloadDecoder<P extends Payload = Payload> {
  readonly name: string;
  readonly minSize: number;
  decode(data: Buffer): P;
}

/**
 * Null-terminated UTF-8 strings addressed by byte offset.
 */
export class StringTable {
  private static decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private data: Buffer;

  constructor(data: Buffer) {
    this.data = data;
  }

  get length(): number {
    return this.data.length;
  }

  read(offset: number): string {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.data.length) {
      throw new OffsetOutOfRangeError(offset, this.data.length);
    }

    const end = this.data.indexOf(0, offset);
    if (end === -1) {
      throw new OffsetOutOfRangeError(offset, this.data.length, 'terminator for offset');
    }

    try {
      return StringTable.decoder.decode(this.data.subarray(offset, end));
    } catch (err) {
      if (err instanceof TypeError) {
        throw new InvalidEncodingError(offset);
      }
      throw err;
    }
  }
}

export const infoDecoder: PayloadDecoder<InfoPayload> = {
  name: 'Info',
  minSize: PAYLOAD_SIZE.INFO,
  decode(data) {
    const reader = new BinaryReader(data);
    return {
      kind: 'info',
      bdatId: reader.readUInt32(0),
      transformIndex: reader.readUInt32(4),
      shape: reader.readUInt16(8),
      sequentialId: reader.readUInt16(10),
      hashId: reader.readUInt32(12),
    };
  },
};

export const legacyInfoDecoder: PayloadDecoder<LegacyInfoPayload> = {
  name: 'LegacyInfo',
  minSize: PAYLOAD_SIZE.LEGACY_INFO,
  decode(data) {
    const reader = new BinaryReader(data);
    // bytes 4-7 are unused
    return {
      kind: 'legacyInfo',
      nameId: reader.readUInt32(0),
      transformIndex: reader.readUInt32(8),
      shape: reader.readUInt32(12),
    };
  },
};

export const transformDecoder: PayloadDecoder<TransformPayload> = {
  name: 'Transform',
  minSize: PAYLOAD_SIZE.XFRM,
  decode(data) {
    const reader = new BinaryReader(data);
    const matrix: number[] = [];
    for (let offset = 0; offset < PAYLOAD_SIZE.XFRM; offset += 4) {
      matrix.push(reader.readFloat32(offset));
    }
    return { kind: 'transform', matrix };
  },
};

export const stringsDecoder: PayloadDecoder<StringsPayload> = {
  name: 'Strings',
  minSize: 0,
  decode(data) {
    return { kind: 'strings', table: new StringTable(data) };
  },
};

export const debugDecoder: PayloadDecoder<DebugPayload> = {
  name: 'Debug',
  minSize: PAYLOAD_SIZE.DEBI,
  decode(data) {
    const reader = new BinaryReader(data);
    return {
      kind: 'debug',
      gimmickId: reader.readUInt32(0),
      typeId: reader.readUInt32(4),
      stringId: reader.readUInt32(8),
      parentId: reader.readUInt32(12),
    };
  },
};

export const rawDecoder: PayloadDecoder<RawPayload> = {
  name: 'Default',
  minSize: 0,
  decode(data) {
    return { kind: 'raw', data };
  },
};

export function isInfoPayload(payload: Payload): payload is AnyInfoPayload {
  return payload.kind === 'info' || payload.kind === 'legacyInfo';
}
