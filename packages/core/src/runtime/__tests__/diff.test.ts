import { assert, describe, test } from "@sprig-ui/testkit";
import type { ComponentConstructor, TreeItem } from "../../tree/items.js";
import { emptyStream, exitItem } from "../../tree/items.js";
import { component, el, onEvent, onMessage, text, treeItems } from "../../tree/vdom.js";
import type { VNode } from "../../tree/vdom.js";
import { diff } from "../diff.js";
import { formatPatches } from "../patch.js";
import { LiveNodeStorage } from "../storage.js";
import { Harness } from "./helpers.js";

function mounted<M>(tree: VNode<M> | readonly VNode<M>[]): Harness<M> {
  const h = new Harness<M>();
  h.render(tree);
  return h;
}

function patchesFor<M>(
  before: VNode<M> | readonly VNode<M>[],
  after: VNode<M> | readonly VNode<M>[],
): string[] {
  return formatPatches(mounted(before).diffTo(after).patches);
}

const noopComponent: ComponentConstructor<string> = () => ({
  dispatch: () => {},
  detach: () => {},
  listNodes: () => [],
});

const otherComponent: ComponentConstructor<string> = () => ({
  dispatch: () => {},
  detach: () => {},
  listNodes: () => [],
});

describe("diff - identical trees", () => {
  test("same tree twice is a no-op of retains and exits", () => {
    const tree = () =>
      el<string>("div", { attrs: { id: "app" }, on: [["click", onMessage("go")]] }, [
        el("p", {}, ["hello"]),
      ]);
    const seq = mounted(tree()).diffTo(tree());
    assert.deepEqual(formatPatches(seq.patches), [
      "retainElement #0",
      "retainListener #1",
      "retainElement #2",
      "retainText #3",
      "exit",
      "exit",
      "exit",
    ]);
    assert.equal(seq.isNoop(), true);
  });
});

describe("diff - against empty", () => {
  test("empty to tree creates in pre-order", () => {
    const seq = diff(
      emptyStream<string>(),
      treeItems(
        el<string>("div", { attrs: { id: "a" }, on: [["click", onMessage("x")]] }, [
          el("b", {}, ["t"]),
        ]),
      ),
      new LiveNodeStorage(),
    );
    assert.deepEqual(formatPatches(seq.patches), [
      "createElement div",
      'setAttribute id="a"',
      "addListener click",
      "createElement b",
      'createText "t"',
      "exit",
      "exit",
      "exit",
    ]);
    assert.equal(seq.isNoop(), false);
  });

  test("tree to empty removes each top-level sub-tree once", () => {
    const patches = patchesFor<string>(
      [el("div", { on: [["click", onMessage("x")]] }, [el("b", {}, ["t"])]), text("tail")],
      [],
    );
    assert.deepEqual(patches, ["remove #0..3", "remove #4"]);
  });
});

describe("diff - node identity", () => {
  test("changed text content is one replaceText", () => {
    const patches = patchesFor<string>(el("p", {}, ["hello"]), el("p", {}, ["world"]));
    assert.deepEqual(patches, ["retainElement #0", 'replaceText #1 "world"', "exit", "exit"]);
  });

  test("renamed child is removed and re-created; siblings are retained", () => {
    const patches = patchesFor<string>(
      el("ul", {}, [el("li", {}, ["a"]), el("li", {}, ["b"]), el("li", {}, ["c"])]),
      el("ul", {}, [el("li", {}, ["a"]), el("p", {}, ["b"]), el("li", {}, ["c"])]),
    );
    assert.deepEqual(patches, [
      "retainElement #0",
      "retainElement #1",
      "retainText #2",
      "exit",
      "exit",
      "remove #3..4",
      "createElement p",
      'createText "b"',
      "exit",
      "exit",
      "retainElement #5",
      "retainText #6",
      "exit",
      "exit",
      "exit",
    ]);
  });

  test("b to i keeps the div and rebuilds the child", () => {
    const patches = patchesFor<string>(
      el("div", {}, [el("b", { attrs: { id: "1" } }, ["click me"])]),
      el("div", {}, [el("i", { attrs: { id: "1" } }, ["click me"])]),
    );
    assert.deepEqual(patches, [
      "retainElement #0",
      "remove #1..2",
      "createElement i",
      'setAttribute id="1"',
      'createText "click me"',
      "exit",
      "exit",
      "exit",
    ]);
  });

  test("element replaced by text", () => {
    const patches = patchesFor<string>(el("div", {}, [el("b")]), el("div", {}, ["b"]));
    assert.deepEqual(patches, ["retainElement #0", "remove #1", 'createText "b"', "exit", "exit"]);
  });

  test("extra old children are removed, extra new children are added", () => {
    assert.deepEqual(
      patchesFor<string>(el("div", {}, ["a", "b"]), el("div", {}, ["a"])),
      ["retainElement #0", "retainText #1", "exit", "remove #2", "exit"],
    );
    assert.deepEqual(
      patchesFor<string>(el("div", {}, ["a"]), el("div", {}, ["a", "b"])),
      ["retainElement #0", "retainText #1", "exit", 'createText "b"', "exit", "exit"],
    );
  });
});

describe("diff - attributes", () => {
  test("changed value is set again", () => {
    assert.deepEqual(
      patchesFor<string>(el("a", { attrs: { href: "/x" } }), el("a", { attrs: { href: "/y" } })),
      ["retainElement #0", 'setAttribute href="/y"', "exit"],
    );
  });

  test("dropped attribute is removed", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("div", { attrs: { id: "a", title: "t" } }),
        el("div", { attrs: { id: "a" } }),
      ),
      ["retainElement #0", "removeAttribute title", "exit"],
    );
  });

  test("renamed attribute at the same position is removed then set", () => {
    assert.deepEqual(
      patchesFor<string>(el("div", { attrs: { a: "1" } }), el("div", { attrs: { b: "1" } })),
      ["retainElement #0", "removeAttribute a", 'setAttribute b="1"', "exit"],
    );
  });

  test("volatile attributes are re-set even when unchanged", () => {
    const tree = () => el<string>("input", { attrs: { type: "checkbox", checked: "" } });
    const seq = mounted(tree()).diffTo(tree());
    assert.deepEqual(formatPatches(seq.patches), [
      "retainElement #0",
      'setAttribute checked=""',
      "exit",
    ]);
    assert.equal(seq.isNoop(), false);
  });

  test("volatile set is configurable", () => {
    const h = new Harness<string>({ volatileAttributes: new Set() });
    h.render(el("input", { attrs: { value: "v" } }));
    assert.equal(h.diffTo(el("input", { attrs: { value: "v" } })).isNoop(), true);
  });
});

describe("diff - listeners", () => {
  test("different fixed message replaces the listener", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("button", { on: [["click", onMessage("a")]] }),
        el("button", { on: [["click", onMessage("b")]] }),
      ),
      ["retainElement #0", "removeListener #1", "addListener click", "exit"],
    );
  });

  test("structurally equal messages retain the listener", () => {
    const tree = () => el("button", { on: [["click", onMessage({ kind: "go", id: 3 })]] });
    assert.deepEqual(patchesFor(tree(), tree()), ["retainElement #0", "retainListener #1", "exit"]);
  });

  test("conversion functions compare by identity", () => {
    const convert = (): string | undefined => "x";
    assert.deepEqual(
      patchesFor<string>(
        el("button", { on: [["click", onEvent(convert)]] }),
        el("button", { on: [["click", onEvent(convert)]] }),
      ),
      ["retainElement #0", "retainListener #1", "exit"],
    );
    assert.deepEqual(
      patchesFor<string>(
        el("button", { on: [["click", onEvent(() => "x")]] }),
        el("button", { on: [["click", onEvent(() => "x")]] }),
      ),
      ["retainElement #0", "removeListener #1", "addListener click", "exit"],
    );
  });

  test("dropped listener is removed, new listener is added", () => {
    assert.deepEqual(
      patchesFor<string>(el("button", { on: [["click", onMessage("a")]] }), el("button")),
      ["retainElement #0", "removeListener #1", "exit"],
    );
    assert.deepEqual(
      patchesFor<string>(el("button"), el("button", { on: [["input", onMessage("a")]] })),
      ["retainElement #0", "addListener input", "exit"],
    );
  });
});

describe("diff - attributes beside unchanged listeners", () => {
  test("added attribute keeps the listener", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("button", { on: [["click", onMessage("go")]] }),
        el("button", { attrs: { class: "big" }, on: [["click", onMessage("go")]] }),
      ),
      ["retainElement #0", 'setAttribute class="big"', "retainListener #1", "exit"],
    );
  });

  test("dropped attribute keeps the listener", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("button", { attrs: { class: "big" }, on: [["click", onMessage("go")]] }),
        el("button", { on: [["click", onMessage("go")]] }),
      ),
      ["retainElement #0", "removeAttribute class", "retainListener #1", "exit"],
    );
  });

  test("added attribute and listener keep the existing listener", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("input", { on: [["input", onMessage("typed")]] }),
        el("input", {
          attrs: { name: "q" },
          on: [
            ["input", onMessage("typed")],
            ["blur", onMessage("left")],
          ],
        }),
      ),
      [
        "retainElement #0",
        'setAttribute name="q"',
        "retainListener #1",
        "addListener blur",
        "exit",
      ],
    );
  });

  test("markup added after listeners keeps them", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("div", { on: [["click", onMessage("go")]] }),
        el("div", { on: [["click", onMessage("go")]], rawMarkup: "<hr>" }),
      ),
      ["retainElement #0", "retainListener #1", 'setRawMarkup "<hr>"', "exit"],
    );
  });

  test("old markup meeting a new attribute keeps the markup", () => {
    assert.deepEqual(
      patchesFor<string>(
        el("div", { rawMarkup: "<hr>" }),
        el("div", { attrs: { id: "x" }, rawMarkup: "<hr>" }),
      ),
      ["retainElement #0", 'setAttribute id="x"', "exit"],
    );
  });
});

describe("diff - raw markup", () => {
  test("unchanged markup is a no-op, changed markup is set", () => {
    const h = mounted<string>(el("div", { rawMarkup: "<b>x</b>" }));
    assert.equal(h.diffTo(el("div", { rawMarkup: "<b>x</b>" })).isNoop(), true);
    assert.deepEqual(formatPatches(h.diffTo(el("div", { rawMarkup: "<i>y</i>" })).patches), [
      "retainElement #0",
      'setRawMarkup "<i>y</i>"',
      "exit",
    ]);
  });

  test("markup replacing children removes them first", () => {
    assert.deepEqual(
      patchesFor<string>(el("div", {}, [el("p")]), el("div", { rawMarkup: "<hr>" })),
      ["retainElement #0", "remove #1", 'setRawMarkup "<hr>"', "exit"],
    );
  });

  test("children replacing markup clear it first", () => {
    assert.deepEqual(
      patchesFor<string>(el("div", { rawMarkup: "<hr>" }), el("div", {}, ["t"])),
      ["retainElement #0", "clearRawMarkup", 'createText "t"', "exit", "exit"],
    );
  });
});

describe("diff - components", () => {
  test("same constructor and message is retained", () => {
    assert.deepEqual(
      patchesFor([component("m", noopComponent)], [component("m", noopComponent)]),
      ["retainComponent #0", "exit"],
    );
  });

  test("same constructor with a new message is updated", () => {
    assert.deepEqual(
      patchesFor([component("m", noopComponent)], [component("n", noopComponent)]),
      ["updateComponent #0", "exit"],
    );
  });

  test("different constructor is removed and created", () => {
    assert.deepEqual(
      patchesFor([component("m", noopComponent)], [component("m", otherComponent)]),
      ["remove #0", "createComponent", "exit"],
    );
  });
});

describe("diff - keyed siblings", () => {
  const item = (key: string): VNode<string> => el("li", { key }, [key]);
  const list = (...keys: string[]): VNode<string> => el("ul", {}, keys.map(item));

  test("swapped keys move one node and retain the other", () => {
    assert.deepEqual(patchesFor(list("a", "b"), list("b", "a")), [
      "retainElement #0",
      "moveElement #3",
      "retainText #4",
      "exit",
      "exit",
      "retainElement #1",
      "retainText #2",
      "exit",
      "exit",
      "exit",
    ]);
  });

  test("dropping the first key removes only that node", () => {
    assert.deepEqual(patchesFor(list("a", "b", "c"), list("b", "c")), [
      "retainElement #0",
      "remove #1..2",
      "retainElement #3",
      "retainText #4",
      "exit",
      "exit",
      "retainElement #5",
      "retainText #6",
      "exit",
      "exit",
      "exit",
    ]);
  });

  test("a new key in front is created, the rest retained", () => {
    assert.deepEqual(patchesFor(list("a"), list("z", "a")), [
      "retainElement #0",
      "createElement li",
      'createText "z"',
      "exit",
      "exit",
      "retainElement #1",
      "retainText #2",
      "exit",
      "exit",
      "exit",
    ]);
  });

  test("same key on a different tag is rebuilt", () => {
    assert.deepEqual(
      patchesFor<string>([el("li", { key: "a" })], [el("p", { key: "a" })]),
      ["remove #0", "createElement p", "exit"],
    );
  });

  test("an unkeyed node never pairs with a keyed one", () => {
    assert.deepEqual(
      patchesFor<string>([el("p"), el("li", { key: "a" })], [el("li", { key: "a" })]),
      ["remove #0", "retainElement #1", "exit"],
    );
  });

  test("keyed components move, with or without a new message", () => {
    const before = [el<string>("p", { key: "y" }), component("m", noopComponent, "x")];
    assert.deepEqual(
      patchesFor(before, [component("m", noopComponent, "x"), el("p", { key: "y" })]),
      ["moveComponent #1", "exit", "retainElement #0", "exit"],
    );
    assert.deepEqual(
      patchesFor(before, [component("n", noopComponent, "x"), el("p", { key: "y" })]),
      ["moveUpdateComponent #1", "exit", "retainElement #0", "exit"],
    );
  });

  test("a key before a text item is rejected", () => {
    const stream: TreeItem<string>[] = [
      { kind: "key", key: "k" },
      { kind: "text", content: "t" },
      exitItem(),
    ];
    assert.throws(() => diff(emptyStream<string>(), stream, new LiveNodeStorage()), {
      code: "SPRIG_UNBALANCED_STREAM",
    });
  });
});

describe("diff - malformed input", () => {
  const div: TreeItem<string> = { kind: "element", name: "div" };

  test("new stream ending inside a scope", () => {
    assert.throws(() => diff(emptyStream<string>(), [div], new LiveNodeStorage()), {
      code: "SPRIG_UNBALANCED_STREAM",
    });
  });

  test("exit with nothing open", () => {
    assert.throws(() => diff(emptyStream<string>(), [exitItem()], new LiveNodeStorage()), {
      code: "SPRIG_UNBALANCED_STREAM",
    });
  });

  test("storage shorter than the old stream", () => {
    assert.throws(() => diff([div, exitItem()], [div, exitItem()], new LiveNodeStorage()), {
      code: "SPRIG_STORAGE_MISALIGNED",
    });
  });

  test("storage longer than the old stream", () => {
    const h = mounted<string>(el("div"));
    assert.throws(() => diff(emptyStream<string>(), emptyStream<string>(), h.storage), {
      code: "SPRIG_STORAGE_MISALIGNED",
    });
  });

  test("storage kind not matching the old stream", () => {
    const h = mounted<string>(text("t"));
    assert.throws(() => diff([div, exitItem()], [div, exitItem()], h.storage), {
      code: "SPRIG_STORAGE_MISALIGNED",
    });
  });
});
