import { BinaryReader } from './binary-reader.js';
import { Logger } from './logger.js';
import { SECTION_MAGIC } from './lvb-constants.js';
import {
  debugDecoder,
  ExtensionPayload,
  infoDecoder,
  JsonObject,
  legacyInfoDecoder,
  PayloadDecoder,
  rawDecoder,
  stringsDecoder,
  transformDecoder,
} from './payloads.js';

/**
 * Picks a decoder for a section magic, or returns undefined to let the next
 * resolver in the chain try.
 */
export type MapperResolver = (magic: string, modern: boolean) => PayloadDecoder | undefined;

export function builtinResolver(magic: string, modern: boolean): PayloadDecoder | undefined {
  switch (magic) {
    case SECTION_MAGIC.INFO:
      return modern ? infoDecoder : legacyInfoDecoder;
    case SECTION_MAGIC.XFRM:
      return transformDecoder;
    case SECTION_MAGIC.DEBI:
      return debugDecoder;
    case SECTION_MAGIC.STRG:
      return stringsDecoder;
    default:
      return undefined;
  }
}

/**
 * Ordered chain of resolvers. Built-in section types always win, registered
 * resolvers are tried in registration order and anything left over decodes
 * as raw bytes, so an unknown section never stops decoding.
 */
export class MapperRegistry {
  private resolvers: MapperResolver[];

  constructor(resolvers: MapperResolver[] = []) {
    this.resolvers = [...resolvers];
  }

  register(resolver: MapperResolver): this {
    this.resolvers.push(resolver);
    return this;
  }

  get extensionCount(): number {
    return this.resolvers.length;
  }

  resolve(magic: string, modern: boolean): PayloadDecoder {
    const builtin = builtinResolver(magic, modern);
    if (builtin) {
      return builtin;
    }

    for (const resolver of this.resolvers) {
      const decoder = resolver(magic, modern);
      if (decoder) {
        Logger.log(`  Using extension decoder ${decoder.name} for ${JSON.stringify(magic)}`);
        return decoder;
      }
    }

    return rawDecoder;
  }
}

/**
 * Convenience for extension authors: wrap a field reader into a decoder
 * that produces an extension payload.
 */
export function extensionDecoder(
  name: string,
  minSize: number,
  readFields: (reader: BinaryReader) => JsonObject,
): PayloadDecoder<ExtensionPayload> {
  return {
    name,
    minSize,
    decode(data) {
      return { kind: 'extension', type: name, fields: readFields(new BinaryReader(data)), data };
    },
  };
}
