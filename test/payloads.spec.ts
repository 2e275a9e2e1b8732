import { assert } from "chai";
import { InvalidEncodingError, OffsetOutOfRangeError } from '../src/errors.js';
import {
  debugDecoder,
  infoDecoder,
  legacyInfoDecoder,
  rawDecoder,
  StringTable,
  stringsDecoder,
  transformDecoder,
} from '../src/payloads.js';
import { debugEntry, infoEntry, legacyInfoEntry, transformEntry, translation } from './helpers/lvb-writer.js';

describe("payload decoders", () => {
  it("decodes the modern info layout", () => {
    const data = infoEntry({ bdatId: 0x00AB0001, transformIndex: 3, shape: 2, sequentialId: 17, hashId: 0xCAFEBABE });
    assert.deepEqual(infoDecoder.decode(data), {
      kind: 'info',
      bdatId: 0x00AB0001,
      transformIndex: 3,
      shape: 2,
      sequentialId: 17,
      hashId: 0xCAFEBABE,
    });
  });

  it("decodes the legacy info layout and skips bytes 4-7", () => {
    const data = legacyInfoEntry(40, 5, 9);
    assert.deepEqual(legacyInfoDecoder.decode(data), {
      kind: 'legacyInfo',
      nameId: 40,
      transformIndex: 5,
      shape: 9,
    });
  });

  it("decodes a row-major 4x4 transform", () => {
    const matrix = translation(10, -2.5, 0.75);
    assert.deepEqual(transformDecoder.decode(transformEntry(matrix)), { kind: 'transform', matrix });
  });

  it("decodes debug records", () => {
    assert.deepEqual(debugDecoder.decode(debugEntry(0x11223344, 8, 6, 0x55)), {
      kind: 'debug',
      gimmickId: 0x11223344,
      typeId: 6,
      stringId: 8,
      parentId: 0x55,
    });
  });

  it("keeps unknown entries as raw bytes", () => {
    const data = Buffer.from([1, 2, 3]);
    const payload = rawDecoder.decode(data);
    assert.strictEqual(payload.kind, 'raw');
    assert.deepEqual(payload.data, data);
  });

  it("declares the size of each fixed layout", () => {
    assert.strictEqual(infoDecoder.minSize, 16);
    assert.strictEqual(legacyInfoDecoder.minSize, 16);
    assert.strictEqual(transformDecoder.minSize, 64);
    assert.strictEqual(debugDecoder.minSize, 16);
    assert.strictEqual(rawDecoder.minSize, 0);
    assert.strictEqual(stringsDecoder.minSize, 0);
  });
});

describe("string table", () => {
  const table = new StringTable(Buffer.from("boss_01\0ev_door\0\0ギミック\0", 'utf8'));

  it("reads the string at offset 0", () => {
    assert.strictEqual(table.read(0), "boss_01");
  });

  it("reads a string in the middle of the blob", () => {
    assert.strictEqual(table.read(8), "ev_door");
    assert.strictEqual(table.read(11), "door");
  });

  it("reads an empty string at a terminator", () => {
    assert.strictEqual(table.read(16), "");
  });

  it("decodes multi-byte UTF-8", () => {
    assert.strictEqual(table.read(17), "ギミック");
  });

  it("keeps a leading byte order mark", () => {
    const withBom = new StringTable(Buffer.from([0xEF, 0xBB, 0xBF, 0x61, 0x00]));
    assert.strictEqual(withBom.read(0), "\uFEFFa");
  });

  it("rejects offsets outside the blob", () => {
    assert.throws(() => table.read(table.length), OffsetOutOfRangeError);
    assert.throws(() => table.read(-1), OffsetOutOfRangeError);
  });

  it("rejects a string without terminator", () => {
    const unterminated = new StringTable(Buffer.from("abc", 'utf8'));
    assert.throws(() => unterminated.read(0), OffsetOutOfRangeError);
  });

  it("rejects invalid UTF-8", () => {
    const broken = new StringTable(Buffer.from([0x61, 0xFF, 0xFE, 0x00]));
    try {
      broken.read(0);
      assert.fail("expected an encoding error");
    } catch (err) {
      assert.instanceOf(err, InvalidEncodingError);
      if (err instanceof InvalidEncodingError) {
        assert.strictEqual(err.code, 'InvalidEncoding');
        assert.strictEqual(err.offset, 0);
      }
    }
  });
});
