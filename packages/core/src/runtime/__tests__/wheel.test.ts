import { assert, describe, test } from "@weft/testkit";
import { type WheelInput, routeWheel, wheelDeltaPixels } from "../router/wheel.js";

const ctx = {
  scrollX: 0,
  scrollY: 0,
  contentWidth: 500,
  contentHeight: 300,
  viewportWidth: 100,
  viewportHeight: 100,
  lineSize: 30,
};

function wheel(deltaY: number, extra: Partial<WheelInput> = {}): WheelInput {
  return { kind: "wheel", x: 0, y: 0, deltaX: 0, deltaY, ...extra };
}

describe("routeWheel", () => {
  test("pixel deltas scroll by that many pixels", () => {
    assert.deepEqual(routeWheel(wheel(50), ctx), { nextScrollX: 0, nextScrollY: 50 });
  });

  test("line deltas scale by the line size", () => {
    assert.deepEqual(routeWheel(wheel(3, { deltaMode: "line" }), ctx), { nextScrollX: 0, nextScrollY: 90 });
  });

  test("scroll clamps to the content extent", () => {
    assert.deepEqual(routeWheel(wheel(1000), ctx), { nextScrollX: 0, nextScrollY: 200 });
  });

  test("no change yields an empty result", () => {
    assert.deepEqual(routeWheel(wheel(10), { ...ctx, scrollY: 200 }), {});
    assert.deepEqual(routeWheel(wheel(-10), ctx), {});
    assert.deepEqual(routeWheel(wheel(Number.NaN), ctx), {});
  });

  test("Shift turns a vertical line scroll horizontal", () => {
    const ev = wheel(1, { deltaMode: "line", modifiers: { shift: true } });
    assert.deepEqual(wheelDeltaPixels(ev, 30), { dx: 30, dy: 0 });
    assert.deepEqual(routeWheel(ev, ctx), { nextScrollX: 30, nextScrollY: 0 });
  });
});
