import { assert, describe, test } from "@weft/testkit";
import { buildTree } from "../../testing/tree.js";
import { ui } from "../../ui.js";
import { computeFocusList, computeMovedFocusId, nearestFocusable } from "../focus.js";

const tree = buildTree(
  ui.container("root", {}, [
    ui.container("form", { focusable: true }, [ui.text("label", "Name"), ui.container("field", { focusable: true })]),
    ui.text("plain", "x"),
    ui.container("ok", { focusable: true }),
  ]),
);

describe("focus traversal", () => {
  test("focus list follows document order", () => {
    assert.deepEqual(computeFocusList(tree), ["form", "field", "ok"]);
  });

  test("nearest focusable walks up from the hit node", () => {
    assert.equal(nearestFocusable(tree, "label"), "form");
    assert.equal(nearestFocusable(tree, "field"), "field");
    assert.equal(nearestFocusable(tree, "plain"), null);
    assert.equal(nearestFocusable(tree, "missing"), null);
  });

  test("moves wrap at both ends", () => {
    const list = computeFocusList(tree);
    assert.equal(computeMovedFocusId(list, "ok", "next"), "form");
    assert.equal(computeMovedFocusId(list, "form", "prev"), "ok");
    assert.equal(computeMovedFocusId(list, "form", "next"), "field");
  });

  test("no focus starts at the first or last entry", () => {
    const list = computeFocusList(tree);
    assert.equal(computeMovedFocusId(list, null, "next"), "form");
    assert.equal(computeMovedFocusId(list, null, "prev"), "ok");
    assert.equal(computeMovedFocusId(list, "plain", "next"), "form");
    assert.equal(computeMovedFocusId([], null, "next"), null);
  });
});
