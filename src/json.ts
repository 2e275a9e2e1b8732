import { formatHash } from './gimmick-key.js';
import { Lvb } from './lvb.js';
import { AnyInfoPayload, JsonObject, JsonValue, Payload } from './payloads.js';
import { Entry, Section } from './section.js';

export interface JsonOptions {
  /** Include the hex bytes of sections nobody could decode */
  includeBytes: boolean;
}

export function infoToJson(info: AnyInfoPayload): JsonObject {
  if (info.kind === 'legacyInfo') {
    return { shape: info.shape };
  }
  return {
    bdat_id: formatHash(info.bdatId),
    shape: info.shape,
    sequential_id: info.sequentialId,
    hash_id: formatHash(info.hashId),
  };
}

/**
 * Fields a payload contributes to its entry's object. Transforms and
 * string blobs are shared tables and are only reached through `xform`.
 */
export function payloadToJson(payload: Payload, options: JsonOptions): JsonObject {
  switch (payload.kind) {
    case 'info':
    case 'legacyInfo':
      return infoToJson(payload);
    case 'transform':
      return { matrix: payload.matrix };
    case 'strings':
      return {};
    case 'debug':
      return {
        gimmick_id: formatHash(payload.gimmickId),
        type_id: payload.typeId,
        string_id: payload.stringId,
        parent_id: payload.parentId,
      };
    case 'raw':
      return options.includeBytes ? { bytes: payload.data.toString('hex') } : {};
    case 'extension':
      return options.includeBytes ? { ...payload.fields, bytes: payload.data.toString('hex') } : { ...payload.fields };
  }
}

export function entryToJson(lvb: Lvb, entry: Entry, options: JsonOptions): JsonObject {
  const info = lvb.infoOf(entry);
  const transform = lvb.transformOf(entry);
  return {
    name: entry.name,
    info: info ? infoToJson(info) : null,
    xform: transform ? transform.matrix : null,
    ...payloadToJson(entry.payload, options),
  };
}

export function sectionToJson(lvb: Lvb, section: Section, options: JsonOptions): JsonObject {
  const entries: JsonValue[] = section.entries.map(entry => entryToJson(lvb, entry, options));
  return {
    magic: section.magic,
    entries,
  };
}

/** Version plus every gimmick section */
export function lvbToJson(lvb: Lvb, options: JsonOptions): JsonObject {
  return {
    version: lvb.version,
    sections: lvb.sections.map(section => sectionToJson(lvb, section, options)),
  };
}
