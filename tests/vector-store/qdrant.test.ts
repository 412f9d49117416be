import { describe, it, expect, vi, beforeEach } from "vitest";
import { QdrantVectorStore } from "../../src/vector-store/qdrant.js";
import { VectorStoreError } from "../../src/errors.js";

const mockClient = {
  getCollections: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  deleteCollection: vi.fn(),
  upsert: vi.fn(),
  search: vi.fn(),
  retrieve: vi.fn(),
  scroll: vi.fn(),
  delete: vi.fn(),
  count: vi.fn(),
};

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: vi.fn().mockImplementation(() => mockClient),
}));

const ID = "8f14e45f-ceea-4e67-9c9b-5e1d0a1b2c3d";

describe("QdrantVectorStore", () => {
  beforeEach(() => {
    for (const fn of Object.values(mockClient)) fn.mockReset();
    mockClient.getCollections.mockResolvedValue({ collections: [] });
    mockClient.createCollection.mockResolvedValue(true);
    mockClient.createPayloadIndex.mockResolvedValue({});
  });

  describe("open", () => {
    it("should create the collection with payload indexes", async () => {
      const store = new QdrantVectorStore({ collectionName: "notes", vectorDimension: 3 });
      await store.open();

      expect(mockClient.createCollection).toHaveBeenCalledWith("notes", {
        vectors: { size: 3, distance: "Cosine" },
      });
      expect(mockClient.createPayloadIndex.mock.calls.map((c) => c[1].field_name)).toEqual([
        "metadata.type",
        "metadata.source",
        "metadata.tags",
      ]);
    });

    it("should reuse an existing collection", async () => {
      mockClient.getCollections.mockResolvedValue({ collections: [{ name: "memkit_memories" }] });
      const store = new QdrantVectorStore();
      await store.open();
      await store.open();
      expect(mockClient.getCollections).toHaveBeenCalledTimes(1);
      expect(mockClient.createCollection).not.toHaveBeenCalled();
      expect(mockClient.createPayloadIndex).toHaveBeenCalledTimes(3);
    });

    it("should add missing payload indexes to an existing collection", async () => {
      mockClient.getCollections.mockResolvedValue({ collections: [{ name: "notes" }] });
      mockClient.createPayloadIndex
        .mockRejectedValueOnce(Object.assign(new Error("Conflict"), { status: 409 }))
        .mockResolvedValue({});

      await new QdrantVectorStore({ collectionName: "notes" }).open();

      expect(mockClient.createPayloadIndex).toHaveBeenCalledWith("notes", {
        field_name: "metadata.tags",
        field_schema: "keyword",
        wait: true,
      });
      expect(mockClient.createPayloadIndex).toHaveBeenCalledTimes(3);
    });

    it("should create the indexes on retry after an index failure", async () => {
      mockClient.createPayloadIndex.mockRejectedValueOnce(
        Object.assign(new Error("Service Unavailable"), { status: 503 }),
      );
      const store = new QdrantVectorStore();

      await expect(store.open()).rejects.toMatchObject({
        name: "VectorStoreError",
        message: "Qdrant createPayloadIndex failed: Service Unavailable",
        statusCode: 503,
      });

      mockClient.getCollections.mockResolvedValue({ collections: [{ name: "memkit_memories" }] });
      mockClient.createPayloadIndex.mockClear();
      await store.open();

      expect(mockClient.createCollection).toHaveBeenCalledTimes(1);
      expect(mockClient.createPayloadIndex.mock.calls.map((c) => c[1].field_name)).toEqual([
        "metadata.type",
        "metadata.source",
        "metadata.tags",
      ]);
    });

    it("should tolerate a concurrent create", async () => {
      mockClient.createCollection.mockRejectedValue(
        Object.assign(new Error("Conflict"), { status: 409 }),
      );
      await expect(new QdrantVectorStore().open()).resolves.toBeUndefined();
      expect(mockClient.createPayloadIndex).toHaveBeenCalledTimes(3);
    });

    it("should wrap other failures and allow a retry", async () => {
      mockClient.getCollections.mockRejectedValueOnce(
        Object.assign(new Error("Service Unavailable"), { status: 503 }),
      );
      const store = new QdrantVectorStore({ distance: "euclid" });

      const err = await store.open().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(VectorStoreError);
      expect(err).toMatchObject({
        message: "Qdrant getCollections failed: Service Unavailable",
        statusCode: 503,
      });

      await store.open();
      expect(mockClient.createCollection).toHaveBeenCalledWith("memkit_memories", {
        vectors: { size: 1536, distance: "Euclid" },
      });
    });
  });

  it("should upsert points and wait for the write", async () => {
    mockClient.upsert.mockResolvedValue({});
    const store = new QdrantVectorStore();
    await store.upsert([{ id: ID, vector: [0.1], payload: { text: "x" } }]);
    expect(mockClient.upsert).toHaveBeenCalledWith("memkit_memories", {
      wait: true,
      points: [{ id: ID, vector: [0.1], payload: { text: "x" } }],
    });
  });

  it("should search with an equality filter", async () => {
    mockClient.search.mockResolvedValue([
      { id: ID, score: 0.9, payload: { text: "x" }, vector: [1, 0] },
    ]);
    const store = new QdrantVectorStore();

    const hits = await store.search([1, 0], {
      limit: 3,
      filter: { "metadata.type": "fact" },
    });

    expect(mockClient.search).toHaveBeenCalledWith("memkit_memories", {
      vector: [1, 0],
      limit: 3,
      filter: { must: [{ key: "metadata.type", match: { value: "fact" } }] },
      with_payload: true,
      with_vector: true,
    });
    expect(hits).toEqual([{ id: ID, vector: [1, 0], payload: { text: "x" }, score: 0.9 }]);
  });

  it("should convert euclid distances to scores", async () => {
    mockClient.search.mockResolvedValue([{ id: ID, score: 3, payload: {}, vector: [1] }]);
    const store = new QdrantVectorStore({ distance: "euclid" });
    const [hit] = await store.search([1], { limit: 1 });
    expect(hit.score).toBe(0.25);
  });

  it("should reject points without a dense vector", async () => {
    mockClient.retrieve.mockResolvedValue([{ id: ID, payload: {}, vector: { named: [1] } }]);
    await expect(new QdrantVectorStore().retrieve([ID])).rejects.toThrow(
      `Qdrant point ${ID} has no single dense vector`,
    );
  });

  it("should scroll with the next page offset", async () => {
    mockClient.scroll.mockResolvedValue({
      points: [{ id: ID, payload: {}, vector: [1] }],
      next_page_offset: "next-id",
    });
    const page = await new QdrantVectorStore().scroll({ limit: 1 });
    expect(page).toEqual({
      points: [{ id: ID, vector: [1], payload: {} }],
      nextOffset: "next-id",
    });
  });

  it("should end scrolling without a next page offset", async () => {
    mockClient.scroll.mockResolvedValue({ points: [], next_page_offset: null });
    const page = await new QdrantVectorStore().scroll({ limit: 1, offset: "next-id" });
    expect(page.nextOffset).toBeNull();
  });

  it("should skip delete for no ids", async () => {
    await new QdrantVectorStore().delete([]);
    expect(mockClient.delete).not.toHaveBeenCalled();
  });

  it("should count exactly", async () => {
    mockClient.count.mockResolvedValue({ count: 7 });
    expect(await new QdrantVectorStore().count()).toBe(7);
    expect(mockClient.count).toHaveBeenCalledWith("memkit_memories", { exact: true });
  });

  it("should recreate the collection on clear", async () => {
    mockClient.deleteCollection.mockResolvedValue(true);
    const store = new QdrantVectorStore();
    await store.open();
    await store.clear();
    expect(mockClient.deleteCollection).toHaveBeenCalledWith("memkit_memories");
    expect(mockClient.createCollection).toHaveBeenCalledTimes(2);
  });
});
