import { expect } from "chai";
import seedrandom from "seedrandom";
import { Deque } from "../src";

describe("Deque", () => {
  describe("construction", () => {
    it("new() is empty", () => {
      const deque = Deque.new<number>();
      expect(deque.isEmpty()).to.equal(true);
      expect(deque.size).to.equal(0);
      expect(deque.toArray()).to.deep.equal([]);
    });

    it("singleton() has one value", () => {
      const deque = Deque.singleton("a");
      expect(deque.isEmpty()).to.equal(false);
      expect(deque.size).to.equal(1);
      expect(deque.toArray()).to.deep.equal(["a"]);
    });

    it("from() keeps the given order", () => {
      const values = Array.from({ length: 100 }, (_, i) => i);
      const deque = Deque.from(values);
      expect(deque.size).to.equal(100);
      expect(deque.toArray()).to.deep.equal(values);
      expect(Deque.from([]).isEmpty()).to.equal(true);
    });

    it("accepts any iterable", () => {
      const deque = Deque.from(new Set(["x", "y", "z"]));
      expect(deque.toArray()).to.deep.equal(["x", "y", "z"]);
    });
  });

  describe("pushFront and pushBack", () => {
    it("pushFront onto pushBack gives front-to-back order", () => {
      const deque = Deque.new<number>().pushBack(1).pushFront(0);
      expect(deque.toArray()).to.deep.equal([0, 1]);
    });

    it("builds long sequences from both ends", () => {
      let deque = Deque.new<number>();
      const expected: number[] = [];
      for (let i = 0; i < 200; i++) {
        if (i % 3 === 0) {
          deque = deque.pushFront(i);
          expected.unshift(i);
        } else {
          deque = deque.pushBack(i);
          expected.push(i);
        }
      }
      expect(deque.size).to.equal(200);
      expect(deque.toArray()).to.deep.equal(expected);
    });

    it("stores undefined and null values", () => {
      const deque = Deque.from<number | null | undefined>([undefined, null, 1]);
      expect(deque.size).to.equal(3);
      expect(deque.head()).to.equal(undefined);
      expect(deque.at(1)).to.equal(null);
      const view = deque.tryViewFront();
      expect(view).to.not.equal(undefined);
      expect(view?.[0]).to.equal(undefined);
      expect(view?.[1].toArray()).to.deep.equal([null, 1]);
    });
  });

  describe("views", () => {
    it("tryViewFront on empty returns undefined", () => {
      expect(Deque.new<number>().tryViewFront()).to.equal(undefined);
    });

    it("tryViewBack on empty returns undefined", () => {
      expect(Deque.new<number>().tryViewBack()).to.equal(undefined);
    });

    it("tryViewFront returns the first value and the rest", () => {
      const deque = Deque.from([1, 2, 3]);
      const view = deque.tryViewFront();
      if (view === undefined) throw new Error("Expected a view");
      const [first, rest] = view;
      expect(first).to.equal(1);
      expect(rest.toArray()).to.deep.equal([2, 3]);
    });

    it("tryViewBack returns the rest and the last value", () => {
      const deque = Deque.from([1, 2, 3]);
      const view = deque.tryViewBack();
      if (view === undefined) throw new Error("Expected a view");
      const [rest, last] = view;
      expect(last).to.equal(3);
      expect(rest.toArray()).to.deep.equal([1, 2]);
    });

    it("drains a long deque from the front", () => {
      let deque = Deque.from(Array.from({ length: 150 }, (_, i) => i));
      const seen: number[] = [];
      for (;;) {
        const view = deque.tryViewFront();
        if (view === undefined) break;
        seen.push(view[0]);
        deque = view[1];
      }
      expect(seen).to.deep.equal(Array.from({ length: 150 }, (_, i) => i));
      expect(deque.isEmpty()).to.equal(true);
    });

    it("drains a long deque from the back", () => {
      let deque = Deque.from(Array.from({ length: 150 }, (_, i) => i));
      const seen: number[] = [];
      for (;;) {
        const view = deque.tryViewBack();
        if (view === undefined) break;
        seen.push(view[1]);
        deque = view[0];
      }
      expect(seen).to.deep.equal(
        Array.from({ length: 150 }, (_, i) => 149 - i)
      );
    });
  });

  describe("head, tail, last, init", () => {
    it("return the ends and the remainders", () => {
      const deque = Deque.from(["a", "b", "c"]);
      expect(deque.head()).to.equal("a");
      expect(deque.tail().toArray()).to.deep.equal(["b", "c"]);
      expect(deque.last()).to.equal("c");
      expect(deque.init().toArray()).to.deep.equal(["a", "b"]);
    });

    it("work on a singleton", () => {
      const deque = Deque.singleton(7);
      expect(deque.head()).to.equal(7);
      expect(deque.last()).to.equal(7);
      expect(deque.tail().isEmpty()).to.equal(true);
      expect(deque.init().isEmpty()).to.equal(true);
    });

    it("throw on an empty deque", () => {
      const deque = Deque.new<number>();
      expect(() => deque.head()).to.throw("Deque is empty");
      expect(() => deque.tail()).to.throw("Deque is empty");
      expect(() => deque.last()).to.throw("Deque is empty");
      expect(() => deque.init()).to.throw("Deque is empty");
    });
  });

  describe("at", () => {
    it("returns the value at each index", () => {
      const values = Array.from({ length: 300 }, (_, i) => i * 10);
      const deque = Deque.from(values);
      for (let i = 0; i < values.length; i++) {
        expect(deque.at(i)).to.equal(values[i]);
      }
    });

    it("throws on an out-of-bounds index", () => {
      const deque = Deque.from(["a", "b", "c"]);
      expect(() => deque.at(3)).to.throw("Index out of bounds: 3 (length: 3)");
      expect(() => deque.at(-1)).to.throw(
        "Index out of bounds: -1 (length: 3)"
      );
      expect(() => deque.at(0.5)).to.throw(
        "Index out of bounds: 0.5 (length: 3)"
      );
      expect(() => Deque.new<string>().at(0)).to.throw(
        "Index out of bounds: 0 (length: 0)"
      );
    });
  });

  describe("concat", () => {
    it("appends other after this", () => {
      const a = Deque.from([1, 2, 3]);
      const b = Deque.from([4, 5]);
      expect(a.concat(b).toArray()).to.deep.equal([1, 2, 3, 4, 5]);
      expect(b.concat(a).toArray()).to.deep.equal([4, 5, 1, 2, 3]);
    });

    it("handles empty operands", () => {
      const a = Deque.from([1, 2]);
      const empty = Deque.new<number>();
      expect(a.concat(empty).toArray()).to.deep.equal([1, 2]);
      expect(empty.concat(a).toArray()).to.deep.equal([1, 2]);
      expect(empty.concat(empty).isEmpty()).to.equal(true);
    });

    it("concatenates large deques of many sizes", () => {
      for (const [n1, n2] of [
        [1, 100],
        [100, 1],
        [37, 53],
        [200, 200],
        [5, 9],
      ]) {
        const left = Array.from({ length: n1 }, (_, i) => i);
        const right = Array.from({ length: n2 }, (_, i) => n1 + i);
        const deque = Deque.from(left).concat(Deque.from(right));
        expect(deque.size).to.equal(n1 + n2);
        expect(deque.toArray()).to.deep.equal([...left, ...right]);
        expect(deque.at(n1)).to.equal(n1);
      }
    });
  });

  describe("map", () => {
    it("maps each value in order", () => {
      const deque = Deque.from([1, 2, 3]).map((x) => `#${x}`);
      expect(deque.toArray()).to.deep.equal(["#1", "#2", "#3"]);
      expect(deque.size).to.equal(3);
    });
  });

  describe("iteration", () => {
    it("iterates front to back", () => {
      const deque = Deque.from([1, 2, 3]);
      expect([...deque]).to.deep.equal([1, 2, 3]);
      expect([...deque.values()]).to.deep.equal([1, 2, 3]);
    });

    it("reversed() iterates back to front", () => {
      const values = Array.from({ length: 60 }, (_, i) => i);
      const deque = Deque.from(values);
      expect([...deque.reversed()]).to.deep.equal(values.slice().reverse());
    });

    it("toString() lists the values", () => {
      expect(Deque.from([1, 2]).toString()).to.equal("Deque [1, 2]");
      expect(Deque.new().toString()).to.equal("Deque []");
    });
  });

  describe("persistence", () => {
    it("leaves the original unchanged", () => {
      const original = Deque.from([1, 2, 3]);
      original.pushFront(0);
      original.pushBack(4);
      original.tryViewFront();
      original.tail();
      original.init();
      original.concat(original);
      expect(original.toArray()).to.deep.equal([1, 2, 3]);
    });

    it("reuses old versions independently", () => {
      let deque = Deque.new<number>();
      const versions: Deque<number>[] = [];
      for (let i = 0; i < 50; i++) {
        versions.push(deque);
        deque = deque.pushBack(i);
      }
      // Push onto every old version; each must see only its own prefix.
      for (let i = 0; i < versions.length; i++) {
        const branched = versions[i].pushBack(-1).pushFront(-2);
        const expected = [-2, ...Array.from({ length: i }, (_, j) => j), -1];
        expect(branched.toArray()).to.deep.equal(expected);
        expect(versions[i].size).to.equal(i);
      }
    });
  });

  describe("fuzz", () => {
    let prng!: seedrandom.PRNG;

    beforeEach(() => {
      prng = seedrandom("42");
    });

    it("agrees with an array under random operations", () => {
      let deque = Deque.new<number>();
      let array: number[] = [];
      for (let i = 0; i < 2000; i++) {
        const op = Math.floor(prng() * 6);
        switch (op) {
          case 0:
          case 1:
            deque = deque.pushFront(i);
            array = [i, ...array];
            break;
          case 2:
          case 3:
            deque = deque.pushBack(i);
            array = [...array, i];
            break;
          case 4: {
            const view = deque.tryViewFront();
            if (array.length === 0) {
              expect(view).to.equal(undefined);
            } else {
              expect(view?.[0]).to.equal(array[0]);
              if (view !== undefined) deque = view[1];
              array = array.slice(1);
            }
            break;
          }
          case 5: {
            const view = deque.tryViewBack();
            if (array.length === 0) {
              expect(view).to.equal(undefined);
            } else {
              expect(view?.[1]).to.equal(array[array.length - 1]);
              if (view !== undefined) deque = view[0];
              array = array.slice(0, -1);
            }
            break;
          }
        }

        expect(deque.size).to.equal(array.length);
        if (i % 100 === 0) {
          expect(deque.toArray()).to.deep.equal(array);
          expect([...deque.reversed()]).to.deep.equal(array.slice().reverse());
          for (let j = 0; j < array.length; j++) {
            expect(deque.at(j)).to.equal(array[j]);
          }
        }
      }
      expect(deque.toArray()).to.deep.equal(array);
    });
  });

  describe("large inputs", function () {
    this.timeout(20000);
    const n = 100000;

    it("from() then drain from the front", () => {
      let deque = Deque.from(Array.from({ length: n }, (_, i) => i));
      expect(deque.size).to.equal(n);
      expect(deque.at(0)).to.equal(0);
      expect(deque.at(n - 1)).to.equal(n - 1);
      for (let i = 0; i < n; i++) {
        const view = deque.tryViewFront();
        expect(view?.[0]).to.equal(i);
        if (view !== undefined) deque = view[1];
      }
      expect(deque.isEmpty()).to.equal(true);
    });

    it("pushBack() loop then drain from the back", () => {
      let deque = Deque.new<number>();
      for (let i = 0; i < n; i++) deque = deque.pushBack(i);
      expect(deque.at(n / 2)).to.equal(n / 2);
      for (let i = n - 1; i >= 0; i--) {
        const view = deque.tryViewBack();
        expect(view?.[1]).to.equal(i);
        if (view !== undefined) deque = view[0];
      }
      expect(deque.isEmpty()).to.equal(true);
    });

    it("pushFront() loop", () => {
      let deque = Deque.new<number>();
      for (let i = 0; i < n; i++) deque = deque.pushFront(i);
      expect(deque.head()).to.equal(n - 1);
      expect(deque.last()).to.equal(0);
      expect(deque.at(1)).to.equal(n - 2);
      expect(deque.size).to.equal(n);
    });

    it("map() and concat()", () => {
      const deque = Deque.from(Array.from({ length: n }, (_, i) => i));
      const doubled = deque.map((x) => 2 * x);
      expect(doubled.at(n - 1)).to.equal(2 * (n - 1));
      const joined = deque.concat(doubled);
      expect(joined.size).to.equal(2 * n);
      expect(joined.at(n)).to.equal(0);
      expect(joined.last()).to.equal(2 * (n - 1));
    });
  });
});
