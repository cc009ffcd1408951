import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import {
  CONVERSATIONS_SET,
  conversationKey,
  escapeSearchQuery,
  messageKey,
  parseInfo,
  parseSearchReply,
  RedisConversationStore,
  SEARCHABLE_CONTENT_LIMIT,
} from "../core/backends/redis.js";
import { FakeRedis } from "./fake-redis.js";
import { daysAgo, makeConversation, withMessages, withMetadata } from "./helpers.js";

const DAY = 24 * 60 * 60;

describe("RedisConversationStore", () => {
  let redis: FakeRedis;
  let store: RedisConversationStore;

  beforeEach(async () => {
    redis = new FakeRedis();
    store = new RedisConversationStore({ client: redis });
    await store.initialize();
  });

  describe("initialize", () => {
    it("creates the search index when the module is loaded", () => {
      assert.equal(redis.indexCreated, true);
      assert.equal(store.hasSearchIndex, true);
    });

    it("accepts an index that already exists", async () => {
      const second = new RedisConversationStore({ client: redis });
      await second.initialize();
      assert.equal(second.hasSearchIndex, true);
    });

    it("runs without search when the module is missing", async () => {
      const bare = new FakeRedis();
      bare.searchModule = false;
      const plain = new RedisConversationStore({ client: bare });
      await plain.initialize();
      assert.equal(plain.hasSearchIndex, false);
      assert.equal(bare.indexCreated, false);
    });
  });

  describe("save", () => {
    it("writes the summary hash, message hashes and set membership", async () => {
      const conversation = withMessages(makeConversation(), ["hi", "hello"]);
      assert.equal(await store.save(conversation), true);

      const hash = redis.hashes.get(conversationKey("conv-1"));
      assert.ok(hash);
      assert.equal(hash.get("title"), "Test conversation");
      assert.equal(hash.get("message_count"), "2");
      assert.equal(hash.get("content"), "user: hi assistant: hello");
      assert.equal(hash.get("updated_ts"), String(Date.parse(conversation.updated_at)));
      assert.deepEqual(JSON.parse(hash.get("data") ?? "null"), conversation);

      assert.equal(redis.hashes.get(messageKey("conv-1", 1))?.get("role"), "assistant");
      assert.equal(redis.hashes.get(messageKey("conv-1", 0))?.get("metadata"), "{}");
      assert.deepEqual(await redis.smembers(CONVERSATIONS_SET), ["conv-1"]);
    });

    it("sets the key TTL on the conversation and its messages", async () => {
      await store.save(withMessages(makeConversation(), ["hi"]));
      assert.equal(redis.ttl(conversationKey("conv-1")), 30 * DAY);
      assert.equal(redis.ttl(messageKey("conv-1", 0)), 30 * DAY);
    });

    it("refreshes the TTL on every save", async () => {
      const conversation = makeConversation();
      await store.save(conversation);
      await redis.expire(conversationKey("conv-1"), 5);

      await store.save(conversation);
      assert.equal(redis.ttl(conversationKey("conv-1")), 30 * DAY);
    });

    it("removes message keys beyond a shorter snapshot", async () => {
      await store.save(withMessages(makeConversation(), ["one", "two", "three"]));
      await store.save(withMessages(makeConversation(), ["one"]));

      assert.equal(redis.hashes.has(messageKey("conv-1", 0)), true);
      assert.equal(redis.hashes.has(messageKey("conv-1", 1)), false);
      assert.equal(redis.hashes.has(messageKey("conv-1", 2)), false);

      assert.equal(await store.delete("conv-1"), true);
      assert.deepEqual([...redis.hashes.keys()], []);
    });

    it("uses the configured TTL", async () => {
      const shortLived = new RedisConversationStore({ client: redis, keyTtlDays: 2 });
      await shortLived.save(makeConversation({ id: "short" }));
      assert.equal(redis.ttl(conversationKey("short")), 2 * DAY);
    });

    it("caps the indexed content but keeps the full body", async () => {
      const long = "x".repeat(SEARCHABLE_CONTENT_LIMIT + 100);
      const conversation = withMessages(makeConversation(), [long]);
      await store.save(conversation);

      const hash = redis.hashes.get(conversationKey("conv-1"));
      assert.equal(hash?.get("content")?.length, SEARCHABLE_CONTENT_LIMIT);
      assert.equal((await store.load("conv-1"))?.messages[0].content, long);
    });
  });

  describe("load", () => {
    it("round-trips a conversation with its metadata", async () => {
      const conversation = withMetadata(withMessages(makeConversation(), ["question", "answer"]));
      await store.save(conversation);
      assert.deepEqual(await store.load("conv-1"), conversation);
    });

    it("returns null for an unknown id", async () => {
      assert.equal(await store.load("missing"), null);
    });

    it("returns null for a corrupt body", async () => {
      await redis.hset(conversationKey("bad"), { data: "{oops" });
      assert.equal(await store.load("bad"), null);
    });
  });

  describe("delete", () => {
    it("removes every key and the set member", async () => {
      await store.save(withMessages(makeConversation(), ["a", "b"]));

      assert.equal(await store.delete("conv-1"), true);
      assert.equal(redis.hashes.has(conversationKey("conv-1")), false);
      assert.equal(redis.hashes.has(messageKey("conv-1", 0)), false);
      assert.equal(redis.hashes.has(messageKey("conv-1", 1)), false);
      assert.deepEqual(await redis.smembers(CONVERSATIONS_SET), []);
    });

    it("returns false when nothing was stored", async () => {
      assert.equal(await store.delete("missing"), false);
    });
  });

  describe("list", () => {
    beforeEach(async () => {
      await store.save(makeConversation({ id: "a", updated_at: "2024-01-01T00:00:00.000Z" }));
      await store.save(makeConversation({ id: "b", updated_at: "2024-03-01T00:00:00.000Z" }));
      await store.save(makeConversation({ id: "c", updated_at: "2024-02-01T00:00:00.000Z" }));
    });

    it("sorts newest first and paginates", async () => {
      assert.deepEqual((await store.list()).map((s) => s.id), ["b", "c", "a"]);
      assert.deepEqual((await store.list(2, 1)).map((s) => s.id), ["c", "a"]);
    });

    it("drops ids whose hash has expired", async () => {
      redis.expireNow(conversationKey("c"));
      assert.deepEqual((await store.list()).map((s) => s.id), ["b", "a"]);
      assert.equal((await redis.smembers(CONVERSATIONS_SET)).includes("c"), false);
    });
  });

  describe("search", () => {
    beforeEach(async () => {
      await store.save(makeConversation({ id: "a", title: "Weather talk", updated_at: "2024-01-01T00:00:00.000Z" }));
      await store.save(
        withMessages(makeConversation({ id: "b", title: "Misc", updated_at: "2024-02-01T00:00:00.000Z" }), [
          "what's the weather like?",
        ])
      );
      await store.save(makeConversation({ id: "c", title: "Cooking", updated_at: "2024-03-01T00:00:00.000Z" }));
    });

    it("uses the index when it exists", async () => {
      const results = await store.search("weather");
      assert.deepEqual(results.map((s) => s.id), ["b", "a"]);
      assert.equal(results[0].message_count, 1);
    });

    it("escapes query punctuation", async () => {
      assert.deepEqual((await store.search("what's")).map((s) => s.id), ["b"]);
    });

    it("falls back to scanning when the index query fails", async () => {
      redis.failSearch = true;
      assert.deepEqual((await store.search("WEATHER")).map((s) => s.id), ["b", "a"]);
    });

    it("scans the full body when there is no index", async () => {
      const bare = new FakeRedis();
      bare.searchModule = false;
      const plain = new RedisConversationStore({ client: bare });
      await plain.initialize();

      const tail = "needle at the very end";
      await plain.save(
        withMessages(makeConversation({ id: "long" }), ["x".repeat(SEARCHABLE_CONTENT_LIMIT), tail])
      );
      assert.deepEqual((await plain.search("NEEDLE")).map((s) => s.id), ["long"]);
    });

    it("honors the limit", async () => {
      assert.equal((await store.search("weather", 1)).length, 1);
    });

    it("finds the same conversations with and without the index", async () => {
      const bare = new FakeRedis();
      bare.searchModule = false;
      const plain = new RedisConversationStore({ client: bare });
      await plain.initialize();

      const dividend = withMessages(
        makeConversation({ id: "div", title: "Dividend Basics", updated_at: "2024-04-01T00:00:00.000Z" }),
        ["explain dividend in stock market", "A dividend is a share of profits."]
      );
      for (const target of [store, plain]) await target.save(dividend);

      for (const query of ["dividend", "Dividend Basics", "stock market"]) {
        const indexed = (await store.search(query)).map((s) => s.id);
        const scanned = (await plain.search(query)).map((s) => s.id);
        assert.deepEqual(indexed, ["div"], query);
        assert.deepEqual(scanned, indexed, query);
      }
    });
  });

  describe("stats", () => {
    it("reports server details and the key TTL", async () => {
      await store.save(makeConversation());
      assert.deepEqual(await store.stats(), {
        backend: "redis",
        total_conversations: 1,
        search_available: true,
        redis_memory_used: "1.05M",
        redis_connected_clients: 3,
        redis_version: "7.2.4",
        key_ttl_days: 30,
      });
    });
  });

  describe("cleanup", () => {
    it("deletes conversations older than the window", async () => {
      await store.save(withMessages(makeConversation({ id: "old", updated_at: daysAgo(45) }), ["bye"]));
      await store.save(makeConversation({ id: "new", updated_at: daysAgo(1) }));

      assert.equal(await store.cleanup(30), 1);
      assert.equal(redis.hashes.has(conversationKey("old")), false);
      assert.equal(redis.hashes.has(messageKey("old", 0)), false);
      assert.deepEqual(await redis.smembers(CONVERSATIONS_SET), ["new"]);
      assert.equal(await store.cleanup(30), 0);
    });
  });

  describe("when the server is down", () => {
    it("returns failure values instead of throwing", async () => {
      await store.save(makeConversation());
      redis.down = true;

      assert.equal(await store.save(makeConversation({ id: "other" })), false);
      assert.equal(await store.load("conv-1"), null);
      assert.equal(await store.delete("conv-1"), false);
      assert.deepEqual(await store.list(), []);
      assert.deepEqual(await store.search("test"), []);
      assert.deepEqual(await store.stats(), {});
      assert.equal(await store.cleanup(1), 0);
      assert.equal(await store.isConnected(), false);
    });
  });

  it("close quits the client", async () => {
    await store.close();
    assert.equal(redis.quitCalled, true);
  });
});

describe("redis helpers", () => {
  it("parseInfo reads key:value lines", () => {
    assert.deepEqual(parseInfo("# Server\r\nredis_version:7.2.4\r\nuptime_in_days:3\r\n"), {
      redis_version: "7.2.4",
      uptime_in_days: "3",
    });
  });

  it("escapeSearchQuery escapes query operators", () => {
    assert.equal(escapeSearchQuery("  what's up-to-date? "), "what\\'s up\\-to\\-date?");
  });

  it("parseSearchReply skips entries missing required fields", () => {
    const reply = [
      2,
      "conversation:a",
      ["id", "a", "title", "A", "created_at", "2024-01-01", "updated_at", "2024-01-02", "message_count", "4"],
      "conversation:b",
      ["title", "B"],
    ];
    assert.deepEqual(parseSearchReply(reply), [
      { id: "a", title: "A", message_count: 4, created_at: "2024-01-01", updated_at: "2024-01-02" },
    ]);
  });

  it("parseSearchReply rejects a non-array reply", () => {
    assert.throws(() => parseSearchReply("OK"), /Unexpected FT.SEARCH reply/);
  });
});
