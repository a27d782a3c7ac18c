import test from "node:test";
import assert from "node:assert/strict";
import { BoundedQueue } from "../utils/boundedQueue";

test("never holds more than its capacity and evicts the oldest entry", () => {
  const queue = new BoundedQueue<number>(100);
  const evicted: Array<number | undefined> = [];
  for (let i = 0; i < 101; i += 1) {
    evicted.push(queue.push(i));
  }
  assert.equal(queue.size, 100);
  assert.equal(evicted[99], undefined);
  assert.equal(evicted[100], 0);
  const items = queue.toArray();
  assert.equal(items[0], 1);
  assert.equal(items[99], 100);
});

test("keeps insertion order below capacity", () => {
  const queue = new BoundedQueue<string>(3);
  queue.push("a");
  queue.push("b");
  assert.deepEqual(queue.toArray(), ["a", "b"]);
});

test("rejects a capacity that is not a positive integer", () => {
  assert.throws(() => new BoundedQueue<number>(0), RangeError);
  assert.throws(() => new BoundedQueue<number>(2.5), RangeError);
});
