import { assert, describe, test } from "@weft/testkit";
import { createDevLogger } from "../devWarnings.js";

describe("createDevLogger", () => {
  test("prefixes messages with their area", () => {
    const out: string[] = [];
    const logger = createDevLogger({ devMode: true, warn: (m) => out.push(m) });
    logger.warn("dispatch", "click handler threw");
    assert.deepEqual(out, ["[weft][dispatch] click handler threw"]);
  });

  test("warnOnce deduplicates by key until forgotten", () => {
    const out: string[] = [];
    const logger = createDevLogger({ devMode: true, warn: (m) => out.push(m) });
    logger.warnOnce("layout", "layout:a:box", "first");
    logger.warnOnce("layout", "layout:a:box", "second");
    logger.warnOnce("layout", "layout:b:box", "other");
    logger.forget("layout:a:");
    logger.warnOnce("layout", "layout:a:box", "third");
    assert.deepEqual(out, ["[weft][layout] first", "[weft][layout] other", "[weft][layout] third"]);
  });

  test("nothing is emitted outside dev mode", () => {
    const out: string[] = [];
    const logger = createDevLogger({ devMode: false, warn: (m) => out.push(m) });
    logger.warn("image", "x");
    logger.warnOnce("image", "k", "y");
    assert.deepEqual(out, []);
  });
});
