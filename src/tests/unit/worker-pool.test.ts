import assert from "node:assert/strict";
import { test } from "node:test";
import { Semaphore, mapWithConcurrency } from "../../shared/utils/worker-pool";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

test("keeps input order with bounded concurrency", async () => {
  let active = 0;
  let maxActive = 0;
  const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
    active += 1;
    maxActive = Math.max(maxActive, active);
    await delay(ms);
    active -= 1;
    return `${index}:${ms}`;
  });

  assert.deepEqual(results, ["0:30", "1:5", "2:20", "3:1", "4:10"]);
  assert.equal(maxActive, 2);
});

test("returns an empty list for no items", async () => {
  assert.deepEqual(await mapWithConcurrency([], 4, async () => 1), []);
});

test("rejects when a worker fails", async () => {
  await assert.rejects(
    mapWithConcurrency([1, 2], 2, async (value) => {
      if (value === 2) {
        throw new Error("boom");
      }
      return value;
    }),
    /boom/,
  );
});

test("semaphore limits active tasks and releases after failures", async () => {
  const semaphore = new Semaphore(2);
  let maxActive = 0;
  const task = async (): Promise<void> => {
    maxActive = Math.max(maxActive, semaphore.getActiveCount());
    await delay(5);
  };

  await assert.rejects(
    semaphore.run(async () => {
      throw new Error("failed task");
    }),
    /failed task/,
  );
  await Promise.all([1, 2, 3, 4, 5].map(() => semaphore.run(task)));

  assert.equal(maxActive, 2);
  assert.equal(semaphore.getActiveCount(), 0);
});

test("semaphore rejects invalid permits", () => {
  assert.throws(() => new Semaphore(0), /Invalid semaphore permits: 0/);
});
