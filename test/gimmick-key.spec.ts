import { assert } from "chai";
import { formatHash, parseGimmickKey } from '../src/gimmick-key.js';

describe("gimmick keys", () => {
  it("reads <XXXXXXXX> as a number", () => {
    assert.strictEqual(parseGimmickKey("<CAFEBABE>"), 0xCAFEBABE);
    assert.strictEqual(parseGimmickKey("<00000010>"), 16);
  });

  it("keeps everything else as a name", () => {
    assert.strictEqual(parseGimmickKey("boss_01"), "boss_01");
    assert.strictEqual(parseGimmickKey("<cafebabe>"), "<cafebabe>");
    assert.strictEqual(parseGimmickKey("<CAFE>"), "<CAFE>");
    assert.strictEqual(parseGimmickKey("CAFEBABE"), "CAFEBABE");
  });

  it("formats hashes as eight upper-case digits", () => {
    assert.strictEqual(formatHash(0xABC), "<00000ABC>");
    assert.strictEqual(formatHash(0xFFFFFFFF), "<FFFFFFFF>");
  });
});
