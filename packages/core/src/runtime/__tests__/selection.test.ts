import { assert, describe, test } from "@weft/testkit";
import { buildTree } from "../../testing/tree.js";
import { ui } from "../../ui.js";
import { SelectionManager, selectionMode } from "../selection.js";

function makeTree() {
  return buildTree(
    ui.container("root", {}, [
      ui.text("t1", "Hello"),
      ui.container("c", {}, [ui.text("t2", "big")]),
      ui.image("img", "a.png"),
      ui.text("t3", "World"),
    ]),
  );
}

describe("SelectionManager", () => {
  test("a range across runs concatenates partial and whole runs", () => {
    const sel = new SelectionManager(makeTree());
    sel.set({ id: "t1", offset: 2 }, { id: "t3", offset: 3 });
    assert.equal(sel.selectedText(), "llobigWor");
    assert.equal(sel.mode, "range");
  });

  test("swapping anchor and cursor does not change the text", () => {
    const sel = new SelectionManager(makeTree());
    sel.set({ id: "t3", offset: 3 }, { id: "t1", offset: 2 });
    assert.equal(sel.selectedText(), "llobigWor");
  });

  test("a range inside one run is normalized", () => {
    const sel = new SelectionManager(makeTree());
    sel.set({ id: "t1", offset: 4 }, { id: "t1", offset: 1 });
    assert.equal(sel.selectedText(), "ell");
  });

  test("caret is collapsed and selects nothing", () => {
    const sel = new SelectionManager(makeTree());
    assert.equal(sel.mode, "none");
    sel.setCaret({ id: "t1", offset: 2 });
    assert.equal(sel.mode, "collapsed");
    assert.equal(sel.selectedText(), "");
  });

  test("setCursor keeps the anchor", () => {
    const sel = new SelectionManager(makeTree());
    sel.setCursor({ id: "t3", offset: 1 });
    assert.equal(sel.mode, "collapsed");
    sel.setCursor({ id: "t3", offset: 4 });
    assert.deepEqual(sel.state, { anchor: { id: "t3", offset: 1 }, cursor: { id: "t3", offset: 4 } });
    assert.equal(sel.selectedText(), "orl");
  });

  test("selectAll covers one whole run", () => {
    const sel = new SelectionManager(makeTree());
    sel.selectAll("t3");
    assert.equal(sel.selectedText(), "World");
  });

  test("invalidate clears when an endpoint is gone", () => {
    const sel = new SelectionManager(makeTree());
    sel.set({ id: "t1", offset: 0 }, { id: "t2", offset: 1 });
    assert.equal(sel.invalidate(new Set(["t3"])), false);
    assert.equal(sel.invalidate(new Set(["t2"])), true);
    assert.equal(sel.mode, "none");
    assert.equal(selectionMode(sel.state), "none");
  });
});
