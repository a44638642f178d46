import { assert, describe, test } from "@weft/testkit";
import { DEFAULT_UI_CONFIG, resolveUiConfig } from "../config.js";
import { WeftError } from "../errors.js";

function expectConfigError(fn: () => unknown, message: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof WeftError);
    assert.equal(err.code, "WEFT_INVALID_CONFIG");
    assert.equal(err.message, message);
    return true;
  });
}

describe("resolveUiConfig", () => {
  test("undefined resolves to the defaults", () => {
    assert.equal(resolveUiConfig(undefined), DEFAULT_UI_CONFIG);
    assert.equal(DEFAULT_UI_CONFIG.dragThreshold, 3);
    assert.equal(DEFAULT_UI_CONFIG.wheelLineSize, 30);
    assert.deepEqual(DEFAULT_UI_CONFIG.defaultFont, { charWidth: 8, lineHeight: 16 });
  });

  test("overrides are applied field by field", () => {
    const cfg = resolveUiConfig({ dragThreshold: 0, defaultFont: { charWidth: 10, lineHeight: 20 }, devMode: false });
    assert.equal(cfg.dragThreshold, 0);
    assert.equal(cfg.wheelLineSize, 30);
    assert.deepEqual(cfg.defaultFont, { charWidth: 10, lineHeight: 20 });
    assert.equal(cfg.devMode, false);
    assert.ok(Object.isFrozen(cfg));
  });

  test("invalid values are rejected", () => {
    expectConfigError(
      () => resolveUiConfig({ dragThreshold: -1 }),
      "dragThreshold must be a finite non-negative number",
    );
    expectConfigError(() => resolveUiConfig({ wheelLineSize: 0 }), "wheelLineSize must be a finite positive number");
    expectConfigError(
      () => resolveUiConfig({ defaultFont: { charWidth: Number.NaN, lineHeight: 16 } }),
      "defaultFont.charWidth must be a finite positive number",
    );
  });
});
