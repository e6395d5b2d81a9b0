import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import { createMemoryVoteStore, type MemoryVoteStore } from "../api/modules/memory-vote-store"
import { countAdminVotes, decideAdminVote, listVoters, setAdminVote } from "./approval-engine"
import type { PendingPost } from "./types"

const key = { chatId: -1001, messageId: 42 }

function makePending(votes: Array<[number, boolean]> = []): PendingPost {
	return { key, userId: 7, adminVotes: new Map(votes), version: 0 }
}

function vote(store: MemoryVoteStore, adminId: number, approve: boolean, quorum = 2) {
	return setAdminVote(store, { key, adminId, approve, quorum, maxAttempts: 3 })
}

describe("decideAdminVote", () => {
	test("a repeated vote in the same direction changes nothing", () => {
		const mutation = decideAdminVote(makePending([[1, true]]), 1, true, 2)

		expect(mutation).toEqual({ type: "none", value: { status: "unchanged", count: 1 } })
	})

	test("a flipped vote overwrites the previous entry", () => {
		const mutation = decideAdminVote(makePending([[1, false]]), 1, true, 3)

		expect(mutation.type).toBe("update")
		if (mutation.type !== "update") return
		expect(mutation.post.adminVotes).toEqual(new Map([[1, true]]))
		expect(mutation.post.version).toBe(1)
		expect(mutation.value).toMatchObject({ status: "counted", count: 1, counts: { approvals: 1, rejections: 0 } })
	})

	test("reaching the quorum on approve publishes", () => {
		const mutation = decideAdminVote(makePending([[1, true]]), 2, true, 2)

		expect(mutation.type).toBe("publish")
		if (mutation.type !== "publish") return
		expect(mutation.published).toEqual({ key: null, origin: key, userId: 7, votes: new Map(), version: 0 })
	})

	test("reaching the quorum on reject only deletes", () => {
		const mutation = decideAdminVote(makePending([[1, false]]), 2, false, 2)

		expect(mutation.type).toBe("reject")
		expect(mutation.value).toMatchObject({ status: "rejected", count: 2 })
	})
})

describe("countAdminVotes", () => {
	test("counts each direction separately", () => {
		const votes = new Map([
			[1, true],
			[2, false],
			[3, true],
		])

		expect(countAdminVotes(votes)).toEqual({ approvals: 2, rejections: 1 })
		expect(listVoters(votes, true)).toEqual([1, 3])
		expect(listVoters(votes, false)).toEqual([2])
	})
})

describe("setAdminVote", () => {
	let store: MemoryVoteStore

	beforeEach(async () => {
		vi.spyOn(console, "warn").mockImplementation(() => undefined)
		store = createMemoryVoteStore()
		await store.createPendingPost(makePending())
	})

	afterEach(() => {
		vi.restoreAllMocks()
	})

	test("a double tap reports no change and keeps the count", async () => {
		const first = await vote(store, 1, true)
		const second = await vote(store, 1, true)

		expect(first).toMatchObject({ status: "counted", count: 1 })
		expect(second).toEqual({ status: "unchanged", count: 1 })
		expect((await store.getPendingPost(key))?.adminVotes).toEqual(new Map([[1, true]]))
	})

	test("an admin who flips from reject to approve is only counted once", async () => {
		await vote(store, 1, false, 3)
		const flipped = await vote(store, 1, true, 3)

		expect(flipped).toMatchObject({ status: "counted", count: 1, counts: { approvals: 1, rejections: 0 } })
	})

	test("the second approval publishes and later votes find nothing", async () => {
		expect(await vote(store, 1, true)).toMatchObject({ status: "counted", count: 1 })
		expect(await vote(store, 2, true)).toMatchObject({ status: "published", count: 2 })

		expect(await store.getPendingPost(key)).toBeNull()
		expect(store.listPublishedPosts()).toEqual([{ key: null, origin: key, userId: 7, votes: new Map(), version: 0 }])
		expect(await vote(store, 3, true)).toEqual({ status: "not_found" })
		expect(await vote(store, 3, false)).toEqual({ status: "not_found" })
	})

	test("the second rejection deletes the post without publishing it", async () => {
		await vote(store, 1, false)
		const result = await vote(store, 2, false)

		expect(result).toMatchObject({ status: "rejected", count: 2 })
		expect(await store.getPendingPost(key)).toBeNull()
		expect(store.listPublishedPosts()).toEqual([])
	})

	test("two simultaneous approvals publish exactly once", async () => {
		const results = await Promise.all([vote(store, 1, true), vote(store, 2, true)])

		expect(results.map(result => result.status).sort()).toEqual(["counted", "published"])
		expect(store.listPublishedPosts()).toHaveLength(1)
		expect(await vote(store, 3, true)).toEqual({ status: "not_found" })
	})

	test("a quorum of one publishes on the first approval", async () => {
		const result = await vote(store, 1, true, 1)

		expect(result).toMatchObject({ status: "published", count: 1 })
	})

	test("a conflict on every attempt ends as a silent no-op", async () => {
		const transactPendingPost = vi.fn(async () => ({ status: "conflict" as const }))
		const conflicted = { ...store, transactPendingPost }

		const result = await setAdminVote(conflicted, { key, adminId: 1, approve: true, quorum: 2, maxAttempts: 3 })

		expect(result).toEqual({ status: "not_found" })
		expect(transactPendingPost).toHaveBeenCalledTimes(3)
	})
})
