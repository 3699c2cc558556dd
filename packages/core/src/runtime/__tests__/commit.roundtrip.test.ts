import { type Rng, assert, createRng, describe, test } from "@trellis-ui/testkit";
import { createRoot, ui } from "../../index.js";
import type { UiChild, VNode } from "../../index.js";
import { childrenMarkup, createMemorySurface } from "../../testing/index.js";

const TAGS = ["div", "span", "p", "section"];
const KEYS = ["a", "b", "c", "d", "e", "f"];

function pick<T>(rng: Rng, items: readonly T[]): T {
  const item = items[rng.int(0, items.length - 1)];
  if (item === undefined) throw new Error("pick from an empty list");
  return item;
}

function keyedList(rng: Rng, depth: number): VNode {
  const keys = KEYS.filter(() => rng.int(0, 2) > 0);
  for (let i = keys.length - 1; i > 0; i--) {
    const j = rng.int(0, i);
    const a = keys[i];
    const b = keys[j];
    if (a === undefined || b === undefined) continue;
    keys[i] = b;
    keys[j] = a;
  }
  return ui.list(
    keys.map((k) =>
      rng.int(0, 3) === 0 ? ui.keyed(k, `t${k}`) : ui.el(pick(rng, TAGS), { key: k }, [randomChild(rng, depth + 1)]),
    ),
  );
}

function randomChild(rng: Rng, depth: number): UiChild {
  const roll = depth >= 3 ? rng.int(0, 2) : rng.int(0, 5);
  switch (roll) {
    case 0:
      return `text${String(rng.int(0, 3))}`;
    case 1:
      return null;
    case 2:
      return ui.el(pick(rng, TAGS), { attrs: { title: rng.int(0, 1) === 0 ? "x" : null } });
    case 3:
      return keyedList(rng, depth);
    case 4:
      return [randomChild(rng, depth + 1), randomChild(rng, depth + 1)];
    default:
      return randomElement(rng, depth + 1);
  }
}

function randomElement(rng: Rng, depth: number): VNode {
  const count = rng.int(0, 3);
  const children: UiChild[] = [];
  for (let i = 0; i < count; i++) children.push(randomChild(rng, depth));
  return ui.el(pick(rng, TAGS), { attrs: { "data-n": rng.int(0, 2) } }, children);
}

function freshMarkup(tree: VNode): string {
  const mem = createMemorySurface();
  const container = mem.createContainer();
  createRoot(mem.surface, container, { autoFlush: false, onDiagnostic: () => {} }).render(tree);
  return childrenMarkup(container);
}

describe("patch round trips", () => {
  test("patching T1 to T2 and back matches a fresh mount of T1", () => {
    const rng = createRng(0x51de);
    for (let round = 0; round < 40; round++) {
      const t1 = ui.el("main", {}, [randomElement(rng, 0)]);
      const t2 = ui.el("main", {}, [randomElement(rng, 0)]);

      const mem = createMemorySurface();
      const container = mem.createContainer();
      const root = createRoot(mem.surface, container, { autoFlush: false, onDiagnostic: () => {} });
      root.render(t1);
      root.render(t2);
      assert.equal(childrenMarkup(container), freshMarkup(t2), `round ${String(round)}: forward`);
      root.render(t1);
      assert.equal(childrenMarkup(container), freshMarkup(t1), `round ${String(round)}: back`);
    }
  });

  test("re-rendering the same tree issues no surface operations", () => {
    const rng = createRng(0x0b5e);
    const tree = ui.el("main", {}, [randomElement(rng, 0), randomElement(rng, 0)]);
    const mem = createMemorySurface();
    const container = mem.createContainer();
    const root = createRoot(mem.surface, container, { autoFlush: false, onDiagnostic: () => {} });
    root.render(tree);
    mem.clearOps();
    root.render(tree);
    assert.deepEqual(mem.ops(), []);
  });
});
