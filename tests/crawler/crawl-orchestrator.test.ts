/**
 * @fileoverview Tests for the depth-limited crawl against a scripted API and
 * an in-memory graph store.
 */

import { describe, it, expect } from "vitest";
import { CrawlOrchestrator, type CrawlLimits } from "../../src/crawler/crawl-orchestrator.js";
import { SubscriptionCollector } from "../../src/crawler/subscription-collector.js";
import { CrawlAbortedError } from "../../src/utils/errors.js";
import { FakeVk, profile } from "../helpers/fake-vk.js";
import { MemoryGraphStore } from "../helpers/memory-graph-store.js";

function setup(vk: FakeVk, limits: Partial<CrawlLimits> = {}, store = new MemoryGraphStore()) {
  const orchestrator = new CrawlOrchestrator({
    api: vk,
    store,
    subscriptions: new SubscriptionCollector(vk),
    limits: { depthLimit: 3, friendsLimit: 100, subscriptionsLimit: 300, ...limits },
    now: () => 1000,
  });
  return { orchestrator, store };
}

/** Root user 1 subscribed to open groups 1..count. */
function subscribedRoot(count: number): FakeVk {
  const vk = new FakeVk().addUser(1);
  vk.subscriptions.set(
    1,
    Array.from({ length: count }, (_, i) => ({ id: i + 1, is_closed: 0 })),
  );
  for (let id = 1; id <= count; id++) {
    vk.groups.set(id, { id, name: `Group ${id}`, members_count: id });
  }
  return vk;
}

function friendsFetchedFor(vk: FakeVk): unknown[] {
  return vk.callsTo("getFriends").map((call) => call.args[0]);
}

describe("CrawlOrchestrator", () => {
  it("expands only the root at depth 1 but still links its friends", async () => {
    const vk = new FakeVk().addUser(2).addUser(3).addUser(1, [2, 3]);
    const { orchestrator, store } = setup(vk, { depthLimit: 1 });

    const summary = await orchestrator.crawl(1);

    expect(friendsFetchedFor(vk)).toEqual([1]);
    expect(vk.callsTo("getProfile")).toHaveLength(1);
    expect([...store.friendEdges]).toEqual(["1->2", "1->3"]);
    expect([...store.users.keys()].sort()).toEqual([1, 2, 3]);
    expect(summary).toEqual({
      rootId: 1,
      usersCrawled: 1,
      usersFailed: 0,
      friendEdges: 2,
      subscriptionEdges: 0,
      groupsResolved: 0,
      storeFailures: 0,
      maxDepthReached: 1,
      visited: 1,
      durationMs: 0,
    });
  });

  it("creates edges only to friends that are not private", async () => {
    const vk = new FakeVk();
    vk.profiles.set(1, profile(1));
    vk.friends.set(1, [profile(2), profile(3, { is_closed: true, can_access_closed: false }), profile(4)]);
    const { orchestrator, store } = setup(vk, { depthLimit: 1 });

    await orchestrator.crawl(1);

    expect([...store.friendEdges]).toEqual(["1->2", "1->4"]);
    expect(store.users.has(3)).toBe(false);
    expect(store.users.get(1)?.friends_count).toBe(3);
  });

  it("stores the crawled user with its counts and normalized fields", async () => {
    const vk = new FakeVk().addUser(2);
    vk.addUser(1, [2], { first_name: "Ann", last_name: "Lee", sex: 1, city: { title: "Omsk" } });
    vk.subscriptions.set(1, [{ id: 10, is_closed: 0 }, { id: 11, is_closed: 1 }]);
    vk.groups.set(10, { id: 10, name: "Chess", members_count: 900 });
    const { orchestrator, store } = setup(vk, { depthLimit: 1 });

    const summary = await orchestrator.crawl(1);

    expect(store.users.get(1)).toEqual({
      id: 1,
      screen_name: "id1",
      name: "Ann Lee",
      sex: 1,
      home_town: "Omsk",
      friends_count: 1,
      subscriptions_count: 2,
    });
    expect(store.groups.get(10)).toEqual({ id: 10, name: "Chess", members_count: 900 });
    expect([...store.subscriptionEdges]).toEqual(["1->10"]);
    expect(summary.subscriptionEdges).toBe(1);
    expect(summary.groupsResolved).toBe(1);
  });

  it("visits each user once in a friendship cycle", async () => {
    const vk = new FakeVk();
    vk.profiles.set(1, profile(1));
    vk.profiles.set(2, profile(2));
    vk.friends.set(1, [profile(2)]);
    vk.friends.set(2, [profile(1)]);
    const { orchestrator, store } = setup(vk, { depthLimit: 5 });

    const summary = await orchestrator.crawl(1);

    expect(friendsFetchedFor(vk)).toEqual([1, 2]);
    expect([...store.friendEdges].sort()).toEqual(["1->2", "2->1"]);
    expect(store.users.get(1)?.friends_count).toBe(1);
    expect(summary.visited).toBe(2);
  });

  it("never expands past the depth limit", async () => {
    const vk = new FakeVk().addUser(4).addUser(3, [4]).addUser(2, [3]).addUser(1, [2]);
    const { orchestrator, store } = setup(vk, { depthLimit: 3 });

    const summary = await orchestrator.crawl(1);

    expect(friendsFetchedFor(vk)).toEqual([1, 2, 3]);
    expect(store.users.has(4)).toBe(true);
    expect(store.friendEdges.has("3->4")).toBe(true);
    expect(summary.maxDepthReached).toBe(3);
  });

  it("walks friends depth-first in API order", async () => {
    const vk = new FakeVk().addUser(4).addUser(5).addUser(2, [4]).addUser(3, [5]).addUser(1, [2, 3]);
    const { orchestrator } = setup(vk, { depthLimit: 3 });

    await orchestrator.crawl(1);

    expect(friendsFetchedFor(vk)).toEqual([1, 2, 4, 3, 5]);
  });

  it("produces the same graph when run twice", async () => {
    const vk = new FakeVk().addUser(3).addUser(2, [1, 3]).addUser(1, [2]);
    vk.subscriptions.set(2, [{ id: 10 }]);
    vk.groups.set(10, { id: 10, name: "Chess", members_count: 5 });
    const store = new MemoryGraphStore();

    await setup(vk, {}, store).orchestrator.crawl(1);
    const first = {
      users: new Map(store.users),
      groups: new Map(store.groups),
      friends: new Set(store.friendEdges),
      subscriptions: new Set(store.subscriptionEdges),
    };
    await setup(vk, {}, store).orchestrator.crawl(1);

    expect(store.users).toEqual(first.users);
    expect(store.groups).toEqual(first.groups);
    expect(store.friendEdges).toEqual(first.friends);
    expect(store.subscriptionEdges).toEqual(first.subscriptions);
  });

  it("accepts a screen name for the root", async () => {
    const vk = new FakeVk().addUser(1);
    vk.profiles.set("ann_lee", profile(1));
    const { orchestrator } = setup(vk);

    const summary = await orchestrator.crawl("ann_lee");

    expect(summary.rootId).toBe(1);
    expect(vk.callsTo("getProfile")).toHaveLength(1);
  });

  it("aborts when the root profile is missing", async () => {
    const { orchestrator, store } = setup(new FakeVk());

    await expect(orchestrator.crawl(99)).rejects.toBeInstanceOf(CrawlAbortedError);
    expect(store.users.size).toBe(0);
  });

  it("aborts when the root profile is private", async () => {
    const vk = new FakeVk();
    vk.profiles.set(5, "private");
    const { orchestrator } = setup(vk);

    await expect(orchestrator.crawl(5)).rejects.toThrow("Root user 5 unavailable: profile is private");
  });

  it("aborts when the root profile fetch fails", async () => {
    const vk = new FakeVk();
    vk.profiles.set(5, "fail");
    const { orchestrator } = setup(vk);

    await expect(orchestrator.crawl(5)).rejects.toThrow(
      "Root user 5 unavailable: [API_FATAL] users.get failed after 3 attempts: HTTP 500 Internal Server Error",
    );
  });

  it("skips a friend whose profile cannot be fetched", async () => {
    const vk = new FakeVk().addUser(2).addUser(3).addUser(1, [2, 3]);
    vk.profiles.set(2, "fail");
    const { orchestrator, store } = setup(vk);

    const summary = await orchestrator.crawl(1);

    expect(friendsFetchedFor(vk)).toEqual([1, 3]);
    expect(summary.usersFailed).toBe(1);
    expect(store.friendEdges.has("1->2")).toBe(true);
  });

  it("continues with zero friends when the friends fetch fails", async () => {
    const vk = new FakeVk().addUser(3).addUser(2).addUser(1, [2, 3]);
    vk.friends.set(2, "fail");
    const { orchestrator, store } = setup(vk);

    await orchestrator.crawl(1);

    expect(store.users.get(2)?.friends_count).toBe(0);
    expect(friendsFetchedFor(vk)).toEqual([1, 2, 3]);
  });

  it("records no groups and a count of 0 when a later subscription page fails", async () => {
    const vk = subscribedRoot(650);
    vk.failingSubscriptionOffsets.add(200);
    const { orchestrator, store } = setup(vk, { depthLimit: 1 });

    const summary = await orchestrator.crawl(1);

    expect(store.users.get(1)?.subscriptions_count).toBe(0);
    expect(store.groups.size).toBe(0);
    expect(store.subscriptionEdges.size).toBe(0);
    expect(summary.subscriptionEdges).toBe(0);
    expect(summary.groupsResolved).toBe(0);
  });

  it("records no groups and a count of 0 when a group lookup fails", async () => {
    const vk = subscribedRoot(300);
    vk.failingGroupIds.set(1, "fail");
    const { orchestrator, store } = setup(vk, { depthLimit: 1 });

    const summary = await orchestrator.crawl(1);

    expect(store.users.get(1)?.subscriptions_count).toBe(0);
    expect(store.subscriptionEdges.size).toBe(0);
    expect(summary.groupsResolved).toBe(0);
  });

  it("counts store failures without stopping", async () => {
    const vk = new FakeVk().addUser(2).addUser(1, [2]);
    const store = new MemoryGraphStore();
    store.failing.add("upsertFriendEdge");
    const { orchestrator } = setup(vk, { depthLimit: 2 }, store);

    const summary = await orchestrator.crawl(1);

    expect(summary.friendEdges).toBe(0);
    expect(summary.storeFailures).toBe(1);
    expect(summary.usersCrawled).toBe(2);
  });
});
