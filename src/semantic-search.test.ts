import { beforeEach, describe, expect, it } from "vitest";
import { SemanticSearch } from "./semantic-search";
import { FakeEmbedder } from "./testing/fakes";
import { JsonVectorStore } from "./vector-store";

describe("SemanticSearch", () => {
  let embedder: FakeEmbedder;
  let search: SemanticSearch;

  beforeEach(async () => {
    embedder = new FakeEmbedder();
    const store = new JsonVectorStore();
    const add = async (key: string, sourceFileName: string, text: string) =>
      store.upsert("logs", [{ key, sourceFileName, pageNumber: 1, text, vector: await embedder.embed(text) }]);
    await add("a_1", "a.json", "aaaa");
    await add("b_1", "b.json", "bbbb");
    await add("ab_1", "ab.json", "aabb");
    search = new SemanticSearch(embedder, store);
  });

  it("returns the closest chunks first with rounded scores", async () => {
    const hits = await search.search("aaa", 2);
    expect(hits).toEqual([
      { sourceId: "logs", key: "a_1", sourceFileName: "a.json", pageNumber: 1, text: "aaaa", score: 1 },
      { sourceId: "logs", key: "ab_1", sourceFileName: "ab.json", pageNumber: 1, text: "aabb", score: 0.7071 },
    ]);
    expect(embedder.calls.at(-1)).toBe("aaa");
  });

  it("clamps topK into 1..50", async () => {
    expect(await search.search("aaa", 0)).toHaveLength(1);
    expect(await search.search("aaa", 500)).toHaveLength(3);
  });

  it("filters by document", async () => {
    const hits = await search.search("aaa", 5, "b.json");
    expect(hits.map((h) => [h.key, h.score])).toEqual([["b_1", 0]]);
  });
});
