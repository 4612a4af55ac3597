import assert from "node:assert/strict";
import test from "node:test";

import { createPgMemoryStore, rankMemories } from "../src/lib/memory-store.js";
import { diceSimilarity } from "../src/lib/similarity.js";
import { createFakeDb } from "./helpers/fakes.js";

test("diceSimilarity compares character bigrams", () => {
  assert.equal(diceSimilarity("头痛发热", "头痛"), 0.5);
  assert.equal(diceSimilarity("头 痛", "头痛"), 1);
  assert.equal(diceSimilarity("a", "a"), 1);
  assert.equal(diceSimilarity("", "头痛"), 0);
});

test("rankMemories orders by similarity and keeps the top k", () => {
  const hits = rankMemories(
    "头痛发热",
    [
      { id: "low", user_id: "u1", content: "血糖", metadata: null },
      { id: "high", user_id: "u1", content: "头痛发热", metadata: { query_id: "q_1" } },
      { id: "mid", user_id: "u1", content: "头痛", metadata: ["not", "an", "object"] },
    ],
    2,
  );

  assert.deepEqual(
    hits.map((hit) => [hit.id, hit.score]),
    [
      ["high", 1],
      ["mid", 0.5],
    ],
  );
  assert.deepEqual(hits[0]?.metadata, { query_id: "q_1" });
  assert.deepEqual(hits[1]?.metadata, {});
});

test("store inserts a row with a generated id and json metadata", async () => {
  const { db, queries } = createFakeDb();
  const store = createPgMemoryStore(db);

  await store.store("u1", "Q: 头痛\nA: 多休息", { query_id: "q_1" });

  assert.equal(queries.length, 1);
  const [id, ...rest] = queries[0]?.values ?? [];
  assert.match(String(id), /^mem_[0-9a-f]{12}$/);
  assert.deepEqual(rest, ["u1", "Q: 头痛\nA: 多休息", '{"query_id":"q_1"}']);
});

test("search ranks the user's recent rows", async () => {
  const { db, queries } = createFakeDb(() => ({
    rows: [
      { id: "m1", user_id: "u1", content: "血糖", metadata: {} },
      { id: "m2", user_id: "u1", content: "头痛", metadata: {} },
    ],
  }));
  const store = createPgMemoryStore(db);

  const hits = await store.search("头痛", "u1", 1);

  assert.deepEqual(queries[0]?.values, ["u1", 200]);
  assert.deepEqual(
    hits.map((hit) => hit.id),
    ["m2"],
  );
});
