import { assert } from "chai";
import { extensionDecoder, MapperRegistry, MapperResolver } from '../src/mapper-registry.js';
import {
  debugDecoder,
  infoDecoder,
  legacyInfoDecoder,
  rawDecoder,
  stringsDecoder,
  transformDecoder,
} from '../src/payloads.js';

describe("mapper registry", () => {
  const enemyDecoder = extensionDecoder('Enemy', 8, reader => ({
    enemyId: reader.readUInt32(0),
    level: reader.readUInt32(4),
  }));
  const enemyResolver: MapperResolver = (magic, modern) => (magic === 'ENMY' && modern ? enemyDecoder : undefined);

  it("picks the info layout by format", () => {
    const registry = new MapperRegistry();
    assert.strictEqual(registry.resolve('INFO', true), infoDecoder);
    assert.strictEqual(registry.resolve('INFO', false), legacyInfoDecoder);
  });

  it("maps the other built-in sections", () => {
    const registry = new MapperRegistry();
    assert.strictEqual(registry.resolve('XFRM', true), transformDecoder);
    assert.strictEqual(registry.resolve('DEBI', true), debugDecoder);
    assert.strictEqual(registry.resolve('STRG', false), stringsDecoder);
  });

  it("falls back to raw bytes for unknown magics", () => {
    assert.strictEqual(new MapperRegistry().resolve('GMK1', true), rawDecoder);
  });

  it("asks registered resolvers before falling back", () => {
    const registry = new MapperRegistry().register(enemyResolver);
    assert.strictEqual(registry.resolve('ENMY', true), enemyDecoder);
    assert.strictEqual(registry.resolve('ENMY', false), rawDecoder);
    assert.strictEqual(registry.extensionCount, 1);
  });

  it("uses the first resolver that answers", () => {
    const other = extensionDecoder('Other', 0, () => ({}));
    const registry = new MapperRegistry([
      () => undefined,
      enemyResolver,
      () => other,
    ]);
    assert.strictEqual(registry.resolve('ENMY', true), enemyDecoder);
    assert.strictEqual(registry.resolve('ZZZZ', true), other);
  });

  it("does not let resolvers replace built-in sections", () => {
    const registry = new MapperRegistry([() => rawDecoder]);
    assert.strictEqual(registry.resolve('XFRM', true), transformDecoder);
  });

  it("wraps extension fields into a payload", () => {
    const data = Buffer.from([7, 0, 0, 0, 42, 0, 0, 0]);
    assert.deepEqual(enemyDecoder.decode(data), {
      kind: 'extension',
      type: 'Enemy',
      fields: { enemyId: 7, level: 42 },
      data,
    });
  });
});
