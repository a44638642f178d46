import { assert, describe, test } from "@weft/testkit";
import { NodeTree } from "../../tree/nodeTree.js";
import { EMPTY_STYLE, type Style } from "../../tree/types.js";
import { type NodeDescription, ui } from "../../ui.js";
import {
  type ReconcileOk,
  type StyleResolver,
  longestIncreasingRun,
  reconcile,
} from "../reconcile.js";

function countingResolver(): StyleResolver & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    resolve: (cls: string): Style => {
      calls.push(cls);
      return cls === "" ? EMPTY_STYLE : { gap: cls.length };
    },
  };
}

function apply(tree: NodeTree, desc: NodeDescription, resolver: StyleResolver = countingResolver()): ReconcileOk {
  const res = reconcile(tree, desc, { styleResolver: resolver });
  if (!res.ok) assert.fail(`reconcile failed: ${res.fatal.code}: ${res.fatal.detail}`);
  return res.value;
}

function list(ids: readonly string[]): NodeDescription {
  return ui.container(
    "root",
    {},
    ids.map((id) => ui.container(id)),
  );
}

describe("reconcile - insertion and idempotence", () => {
  test("initial pass inserts every node in preorder", () => {
    const tree = new NodeTree();
    const out = apply(tree, list(["a", "b"]));
    assert.deepEqual(out.edits, [
      { op: "insert", id: "root", parent: null, index: 0 },
      { op: "insert", id: "a", parent: "root", index: 0 },
      { op: "insert", id: "b", parent: "root", index: 1 },
    ]);
    assert.deepEqual(out.inserted, ["root", "a", "b"]);
    assert.deepEqual(tree.documentOrder(), ["root", "a", "b"]);
  });

  test("re-applying an identical description yields zero edits", () => {
    const tree = new NodeTree();
    const desc = ui.container("root", { attrs: { class: "col" } }, [
      ui.text("t", "hi", { focusable: true }),
      ui.image("img", "a.png"),
      ui.container("in", { editable: true, attrs: { value: "x" } }),
    ]);
    apply(tree, desc);
    const again = apply(tree, desc);
    assert.deepEqual(again.edits, []);
    assert.deepEqual(again.inserted, []);
    assert.deepEqual(again.removed, []);
    assert.deepEqual(again.restyled, []);
    assert.deepEqual(again.srcChanges, []);
  });

  test("handlers are rebound without producing edits", () => {
    const tree = new NodeTree();
    const first = () => {};
    const second = () => {};
    apply(tree, ui.container("root", { on: { click: first } }));
    const out = apply(tree, ui.container("root", { on: { click: second } }));
    assert.deepEqual(out.edits, []);
    assert.equal(tree.require("root").handlers.click, second);
  });
});

describe("reconcile - moves", () => {
  test("moving the last child to the front moves only that child", () => {
    const tree = new NodeTree();
    apply(tree, list(["a", "b", "c", "d"]));
    const out = apply(tree, list(["d", "a", "b", "c"]));
    assert.deepEqual(out.edits, [{ op: "move", id: "d", parent: "root", index: 0 }]);
    assert.deepEqual(tree.require("root").children, ["d", "a", "b", "c"]);
  });

  test("reversal keeps one child in place", () => {
    const tree = new NodeTree();
    apply(tree, list(["a", "b", "c"]));
    const out = apply(tree, list(["c", "b", "a"]));
    assert.deepEqual(out.edits, [
      { op: "move", id: "c", parent: "root", index: 0 },
      { op: "move", id: "b", parent: "root", index: 1 },
    ]);
  });

  test("a child moved to another parent keeps its record", () => {
    const tree = new NodeTree();
    apply(
      tree,
      ui.container("root", {}, [ui.container("p", {}, [ui.text("x", "x")]), ui.container("q")]),
    );
    const before = tree.require("x");
    const out = apply(
      tree,
      ui.container("root", {}, [ui.container("p"), ui.container("q", {}, [ui.text("x", "x")])]),
    );
    assert.deepEqual(out.edits, [{ op: "move", id: "x", parent: "q", index: 0 }]);
    assert.equal(tree.require("x"), before);
    assert.equal(tree.require("x").parent, "q");
    assert.deepEqual(tree.require("p").children, []);
  });
});

describe("reconcile - removal, replacement and updates", () => {
  test("removing a subtree reports one edit and every destroyed id", () => {
    const tree = new NodeTree();
    apply(
      tree,
      ui.container("root", {}, [
        ui.container("a", {}, [ui.text("a1", "1"), ui.text("a2", "2")]),
        ui.container("b"),
      ]),
    );
    const out = apply(tree, ui.container("root", {}, [ui.container("b")]));
    assert.deepEqual(out.edits, [{ op: "remove", id: "a" }]);
    assert.deepEqual(out.removed, ["a", "a1", "a2"]);
    assert.equal(tree.has("a1"), false);
    assert.equal(tree.size, 2);
  });

  test("a kind change removes and re-inserts the id", () => {
    const tree = new NodeTree();
    apply(tree, ui.container("root", {}, [ui.text("x", "x")]));
    const before = tree.require("x");
    const out = apply(tree, ui.container("root", {}, [ui.container("x")]));
    assert.deepEqual(out.edits, [
      { op: "remove", id: "x" },
      { op: "insert", id: "x", parent: "root", index: 0 },
    ]);
    assert.deepEqual(out.removed, ["x"]);
    assert.deepEqual(out.inserted, ["x"]);
    assert.notEqual(tree.require("x"), before);
    assert.equal(tree.require("x").kind, "container");
  });

  test("a new root replaces the old one", () => {
    const tree = new NodeTree();
    apply(tree, ui.container("r1"));
    const out = apply(tree, ui.container("r2"));
    assert.deepEqual(out.edits, [
      { op: "remove", id: "r1" },
      { op: "insert", id: "r2", parent: null, index: 0 },
    ]);
    assert.equal(tree.rootId, "r2");
  });

  test("changed fields are reported as one update edit", () => {
    const tree = new NodeTree();
    apply(tree, ui.container("root", {}, [ui.text("t", "a")]));
    const out = apply(
      tree,
      ui.container("root", {}, [ui.text("t", "b", { attrs: { role: "label" }, focusable: true })]),
    );
    assert.deepEqual(out.edits, [{ op: "update", id: "t", fields: ["attrs", "text", "focusable"] }]);
    assert.deepEqual(out.textChanged, ["t"]);
    assert.equal(tree.require("t").text, "b");
    assert.equal(tree.require("t").contentVersion, 2);
  });

  test("editable nodes are seeded from the value attribute", () => {
    const tree = new NodeTree();
    apply(tree, ui.container("in", { editable: true, attrs: { value: "hi" } }));
    assert.deepEqual(tree.require("in").editor, { value: "hi", cursor: 2, anchor: 2 });

    apply(tree, ui.container("in", { editable: true, attrs: { value: "h" } }));
    assert.deepEqual(tree.require("in").editor, { value: "h", cursor: 1, anchor: 1 });
  });

  test("image src changes are reported", () => {
    const tree = new NodeTree();
    const first = apply(tree, ui.container("root", {}, [ui.image("img", "a.png")]));
    assert.deepEqual(first.srcChanges, [{ id: "img", src: "a.png" }]);
    const second = apply(tree, ui.container("root", {}, [ui.image("img", "b.png")]));
    assert.deepEqual(second.srcChanges, [{ id: "img", src: "b.png" }]);
  });
});

describe("reconcile - style resolution", () => {
  test("resolver runs once per inserted node and once per class change", () => {
    const tree = new NodeTree();
    const resolver = countingResolver();
    const desc = (cls: string) =>
      ui.container("root", {}, [ui.text("a", "A", { attrs: { class: cls } }), ui.text("b", "B")]);

    apply(tree, desc("big"), resolver);
    assert.deepEqual(resolver.calls, ["", "big", ""]);

    apply(tree, desc("big"), resolver);
    assert.equal(resolver.calls.length, 3);

    const out = apply(tree, desc("small"), resolver);
    assert.deepEqual(resolver.calls.slice(3), ["small"]);
    assert.deepEqual(out.restyled, ["a"]);
    assert.deepEqual(tree.require("a").style, { gap: 5 });
  });
});

describe("reconcile - validation", () => {
  test("duplicate ids are rejected and the tree is untouched", () => {
    const tree = new NodeTree();
    const resolver = countingResolver();
    apply(tree, list(["a", "b"]), resolver);

    const res = reconcile(
      tree,
      ui.container("root", {}, [ui.container("a"), ui.container("c", {}, [ui.container("a")])]),
      { styleResolver: resolver },
    );
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "WEFT_DUPLICATE_ID");
    assert.equal(res.fatal.detail, 'duplicate node id "a" (under "root" and "c")');
    assert.deepEqual(tree.documentOrder(), ["root", "a", "b"]);
    assert.equal(resolver.calls.length, 3);
  });

  test("children on a text node are rejected", () => {
    const bad: NodeDescription = { id: "t", kind: "text", text: "x", children: [ui.container("c")] };
    const res = reconcile(new NodeTree(), bad, { styleResolver: countingResolver() });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "WEFT_INVALID_DESCRIPTION");
    assert.equal(res.fatal.detail, 'text node "t" cannot have children');
  });

  test("empty ids are rejected", () => {
    const res = reconcile(new NodeTree(), ui.container(""), { styleResolver: countingResolver() });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "WEFT_INVALID_DESCRIPTION");
  });
});

describe("longestIncreasingRun", () => {
  test("returns positions of one longest increasing subsequence", () => {
    assert.deepEqual([...longestIncreasingRun([3, 0, 1, 2])].sort(), [1, 2, 3]);
    assert.deepEqual([...longestIncreasingRun([0, 1, 2])].sort(), [0, 1, 2]);
    assert.equal(longestIncreasingRun([]).size, 0);
    assert.equal(longestIncreasingRun([2, 1, 0]).size, 1);
  });
});
