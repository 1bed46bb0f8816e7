import assert from "node:assert/strict";
import { test } from "node:test";
import { MatchCache, hashResume, jobKeyOf, matchCacheKey } from "../../matching/match-cache";
import { fakeMatch, makeJob } from "../helpers/match-factory";

test("hashes resumes with sha256", () => {
  assert.equal(hashResume("abc"), "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
});

test("keys jobs by id, else by title, company and content", () => {
  assert.equal(jobKeyOf(makeJob({ id: "7", title: "Driver", company: "ACME" })), "id:7");

  const regional = makeJob({ title: "Driver", company: "ACME", description: "Regional routes", requirements: ["Permis C"] });
  const key = jobKeyOf(regional);
  assert.match(key, /^job:driver\|acme\|[0-9a-f]{16}$/);
  assert.equal(jobKeyOf({ ...regional }), key);
  assert.notEqual(jobKeyOf({ ...regional, description: "Long haul routes" }), key);
  assert.notEqual(jobKeyOf({ ...regional, requirements: ["Permis CE"] }), key);
});

test("includes candidate preferences in the cache key", () => {
  const job = makeJob({ id: "42" });
  const base = matchCacheKey("resume", job, { location: "Lyon", salaryExpectation: 30000 });
  assert.equal(base, `${hashResume("resume")}:id:42:lyon|30000`);
  assert.equal(matchCacheKey("resume", job, { location: " lyon ", salaryExpectation: 30000 }), base);
  assert.notEqual(matchCacheKey("resume", job, { location: "Lyon", salaryExpectation: 35000 }), base);
});

test("evicts the least recently used entry", () => {
  const cache = new MatchCache(2);
  const job = makeJob({});
  cache.set("a", fakeMatch(job, 1));
  cache.set("b", fakeMatch(job, 2));
  assert.equal(cache.get("a")?.matchScore, 1);
  cache.set("c", fakeMatch(job, 3));

  assert.equal(cache.size(), 2);
  assert.equal(cache.get("b"), undefined);
  assert.equal(cache.get("c")?.matchScore, 3);
  assert.deepEqual(cache.stats(), { hits: 2, misses: 1, size: 2 });
});

test("stores nothing when disabled", () => {
  const cache = new MatchCache(0);
  cache.set("a", fakeMatch(makeJob({}), 1));
  assert.equal(cache.size(), 0);
  assert.equal(cache.get("a"), undefined);
});
