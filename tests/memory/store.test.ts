import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { MemoryStore } from "../../src/memory/store.js";
import { LexicalMemory } from "../../src/memory/lexical.js";
import { SemanticMemory } from "../../src/memory/semantic.js";
import { InMemoryVectorStore } from "../../src/vector-store/memory.js";
import { ValidationError } from "../../src/errors.js";
import { ID_A, ID_B, createFakeEmbedder, createMockLogger } from "./helpers.js";

describe("MemoryStore", () => {
  let backend: LexicalMemory;
  let store: MemoryStore;

  beforeEach(() => {
    backend = new LexicalMemory({ logger: createMockLogger() });
    store = new MemoryStore(backend);
  });

  it("should expose the backend kind", () => {
    expect(store.kind).toBe("lexical");
  });

  describe("add", () => {
    it("should accept a single text", async () => {
      const [id] = await store.add("User prefers dark mode");
      const record = await store.get(id);
      expect(record?.text).toBe("User prefers dark mode");
      expect(record?.metadata.source).toBe("conversation");
    });

    it("should accept a batch of inputs", async () => {
      const ids = await store.add([
        "first memory",
        { id: ID_A, text: "second memory", metadata: { type: "fact" } },
      ]);
      expect(ids).toHaveLength(2);
      expect(ids[1]).toBe(ID_A);
      expect(await store.count()).toBe(2);
    });

    it("should return no ids for an empty batch", async () => {
      const add = vi.spyOn(backend, "add");
      expect(await store.add([])).toEqual([]);
      expect(add).not.toHaveBeenCalled();
    });

    it("should insert a pre-assigned id once", async () => {
      expect(await store.add({ id: ID_A, text: "once" })).toEqual([ID_A]);
      expect(await store.add({ id: ID_A, text: "twice" })).toEqual([]);
      expect(await store.count()).toBe(1);
    });

    it("should reject invalid input before touching the backend", async () => {
      const add = vi.spyOn(backend, "add");
      await expect(store.add(["valid", "  "])).rejects.toBeInstanceOf(ValidationError);
      expect(add).not.toHaveBeenCalled();
    });
  });

  describe("search", () => {
    beforeEach(async () => {
      await store.add([
        "coffee in the morning",
        "coffee after lunch",
        "coffee at night",
        "coffee with friends",
        "coffee alone",
        "coffee everywhere",
        "tea sometimes",
      ]);
    });

    it("should default to five results", async () => {
      expect(await store.search("coffee")).toHaveLength(5);
    });

    it("should honour topK", async () => {
      const results = await store.search("coffee", { topK: 2 });
      expect(results).toHaveLength(2);
      expect(results[0].score).toBeGreaterThanOrEqual(results[1].score);
    });

    it("should return nothing for a blank query", async () => {
      const search = vi.spyOn(backend, "search");
      expect(await store.search("   ")).toEqual([]);
      expect(search).not.toHaveBeenCalled();
    });

    it.each([0, -1, 1.5])("should reject topK %s", async (topK) => {
      await expect(store.search("coffee", { topK })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it("should pass filters through", async () => {
      await store.add({ id: ID_B, text: "coffee beans", metadata: { tags: ["shopping"] } });
      const results = await store.search("coffee", { filter: { tags: "shopping" } });
      expect(results.map((r) => r.id)).toEqual([ID_B]);
    });
  });

  describe("ids", () => {
    it("should reject malformed ids", async () => {
      await expect(store.get("memory-1")).rejects.toThrow("Invalid memory id: memory-1");
      await expect(store.update("memory-1", "x")).rejects.toBeInstanceOf(ValidationError);
      await expect(store.delete(["memory-1"])).rejects.toBeInstanceOf(ValidationError);
    });

    it("should return null for an absent id", async () => {
      expect(await store.get(ID_B)).toBeNull();
    });
  });

  describe("update", () => {
    it("should replace text and bump updatedAt", async () => {
      await store.add({
        id: ID_A,
        text: "old",
        metadata: { createdAt: "2024-01-01T00:00:00.000Z" },
      });
      expect(await store.update(ID_A, { text: "new", metadata: { type: "fact" } })).toBe(true);
      const record = await store.get(ID_A);
      expect(record?.text).toBe("new");
      expect(record?.metadata.type).toBe("fact");
      expect(record?.metadata.createdAt).toBe("2024-01-01T00:00:00.000Z");
      expect(Date.parse(record?.metadata.updatedAt ?? "")).toBeGreaterThan(
        Date.parse("2024-01-01T00:00:00.000Z"),
      );
    });

    it("should resolve false for an unknown id", async () => {
      expect(await store.update(ID_B, "new text")).toBe(false);
    });

    it("should keep updatedAt strictly increasing across rapid updates", async () => {
      await store.add({ id: ID_A, text: "v0" });
      const stamps: string[] = [];
      for (let i = 1; i <= 3; i++) {
        await store.update(ID_A, `v${i}`);
        stamps.push((await store.get(ID_A))?.metadata.updatedAt ?? "");
      }
      expect(Date.parse(stamps[1])).toBeGreaterThan(Date.parse(stamps[0]));
      expect(Date.parse(stamps[2])).toBeGreaterThan(Date.parse(stamps[1]));
    });
  });

  describe("delete", () => {
    it("should accept a single id", async () => {
      await store.add({ id: ID_A, text: "a" });
      await store.delete(ID_A);
      expect(await store.count()).toBe(0);
    });

    it("should empty the store on deleteAll", async () => {
      await store.add({ id: ID_A, text: "a" });
      await store.deleteAll();
      expect(await store.count()).toBe(0);
      expect(await store.get(ID_A)).toBeNull();
    });
  });

  it("should behave the same over the semantic backend", async () => {
    const semantic = new MemoryStore(
      new SemanticMemory({
        embedder: createFakeEmbedder().embedder,
        vectorStore: new InMemoryVectorStore(),
        logger: createMockLogger(),
      }),
    );
    await semantic.open();
    const [id] = await semantic.add("python tips");
    expect(semantic.kind).toBe("semantic");
    expect((await semantic.get(id))?.text).toBe("python tips");
    expect((await semantic.search("python", { topK: 1 }))[0].id).toBe(id);
    expect(await semantic.update(ID_B, "x")).toBe(false);
    await semantic.deleteAll();
    expect(await semantic.count()).toBe(0);
  });
});

describe.each([
  ["lexical", () => new LexicalMemory({ logger: createMockLogger() })],
  [
    "semantic",
    () =>
      new SemanticMemory({
        embedder: createFakeEmbedder().embedder,
        vectorStore: new InMemoryVectorStore(),
        logger: createMockLogger(),
      }),
  ],
])("extra metadata over the %s backend", (_kind, createBackend) => {
  let tmpDir: string;
  let store: MemoryStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "memkit-extra-"));
    store = new MemoryStore(createBackend());
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should reject an extra key that shadows a stored field", async () => {
    await expect(
      store.add({ id: ID_A, text: "x", metadata: { extra: { created_at: "2020-01-01" } } }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await store.count()).toBe(0);
  });

  it("should reject a value that is not JSON", async () => {
    await expect(
      store.add({ id: ID_A, text: "x", metadata: { extra: { seen: new Date(0) } } }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("should return nested JSON extra unchanged after a dump and load", async () => {
    const extra = { session: { id: "s1", turns: [1, 2] }, pinned: true, note: null };
    await store.add({ id: ID_A, text: "python tips", metadata: { extra } });
    expect((await store.get(ID_A))?.metadata.extra).toEqual(extra);

    await store.dump(tmpDir);
    await store.deleteAll();
    expect(await store.load(tmpDir)).toBe(1);
    expect((await store.get(ID_A))?.metadata.extra).toEqual(extra);
  });
});
