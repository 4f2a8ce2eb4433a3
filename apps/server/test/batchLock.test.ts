import { test } from "node:test";
import assert from "node:assert/strict";
import { BatchInProgressError } from "../src/errors.js";
import { BatchLock } from "../src/services/batchLock.js";

test("BatchLock admits one holder at a time", () => {
  const lock = new BatchLock();
  lock.acquire("A");
  assert.throws(
    () => lock.acquire("B"),
    (error: unknown) => error instanceof BatchInProgressError && error.holder === "A" && error.message === "Batch A is still being processed"
  );
  lock.release("A");
  lock.acquire("B");
  assert.equal(lock.status().holder, "B");
});

test("BatchLock ignores release from a batch that does not hold it", () => {
  const lock = new BatchLock();
  lock.acquire("A");
  lock.release("B");
  assert.equal(lock.status().holder, "A");
});

test("a dirty lock survives release and only a finished reset frees it", () => {
  const lock = new BatchLock();
  lock.acquire("A");
  lock.markDirty("A");
  lock.release("A");
  assert.deepEqual(
    { holder: lock.status().holder, dirty: lock.status().dirty },
    { holder: "A", dirty: true }
  );
  assert.throws(
    () => lock.acquire("B"),
    (error: unknown) =>
      error instanceof BatchInProgressError && error.message === "Working area still holds batch A; run a reset before submitting"
  );

  assert.equal(lock.beginReset(), "A");
  lock.finishReset(true);
  assert.deepEqual(lock.status(), { holder: null, dirty: false, resetting: false, acquiredAt: null });
});

test("nothing acquires the lock while a reset is under way", () => {
  const lock = new BatchLock();
  assert.equal(lock.beginReset(), null);
  assert.equal(lock.status().resetting, true);
  assert.throws(
    () => lock.acquire("B"),
    (error: unknown) => error instanceof BatchInProgressError && error.hold === "resetting"
  );
  assert.throws(() => lock.beginReset(), BatchInProgressError);

  lock.finishReset(true);
  lock.acquire("B");
  assert.equal(lock.status().holder, "B");
});

test("a reset is refused while a batch is running", () => {
  const lock = new BatchLock();
  lock.acquire("A");
  assert.throws(
    () => lock.beginReset(),
    (error: unknown) => error instanceof BatchInProgressError && error.hold === "running" && error.holder === "A"
  );
  assert.equal(lock.status().resetting, false);
});

test("a failed reset keeps the dirty holder", () => {
  const lock = new BatchLock();
  lock.acquire("A");
  lock.markDirty("A");
  lock.beginReset();
  lock.finishReset(false);
  assert.deepEqual(
    { holder: lock.status().holder, dirty: lock.status().dirty, resetting: lock.status().resetting },
    { holder: "A", dirty: true, resetting: false }
  );
});
