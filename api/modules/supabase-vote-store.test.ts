import type { SupabaseClient } from "@supabase/supabase-js"
import { describe, expect, test, vi } from "vitest"

import { createSupabaseVoteStore, parseVoteMap, serializeVoteMap } from "./supabase-vote-store"

type QueryResult = { data: unknown; error: { code?: string; message: string } | null }

type FakeQuery = {
	select(columns?: string): FakeQuery
	insert(payload: unknown): FakeQuery
	update(payload: unknown): FakeQuery
	delete(): FakeQuery
	eq(column: string, value: unknown): FakeQuery
	is(column: string, value: unknown): FakeQuery
	maybeSingle(): Promise<QueryResult>
	then<T>(resolve: (result: QueryResult) => T): Promise<T>
}

function fakeQuery(result: QueryResult): FakeQuery {
	const query: FakeQuery = {
		select: () => query,
		insert: vi.fn(() => query),
		update: vi.fn(() => query),
		delete: () => query,
		eq: vi.fn(() => query),
		is: () => query,
		maybeSingle: async () => result,
		then: resolve => Promise.resolve(result).then(resolve),
	}
	return query
}

function fakeClient(...queries: FakeQuery[]) {
	const from = vi.fn()
	for (const query of queries) {
		from.mockReturnValueOnce(query)
	}
	return { from, rpc: vi.fn() }
}

const tables = { reportsTable: "reports" }
const key = { chatId: -1001, messageId: 42 }
const pendingRow = { group_id: -1001, g_message_id: 42, user_id: 7, admin_votes: { "1": true }, version: 3 }

describe("vote map columns", () => {
	test("drops entries that are not user ids or have the wrong value type", () => {
		const votes = parseVoteMap({ "1": true, "2": "yes", abc: false, "-4": true, "5": false }, (value): value is boolean =>
			typeof value === "boolean",
		)

		expect(votes).toEqual(
			new Map([
				[1, true],
				[5, false],
			]),
		)
	})

	test("writes user ids as object keys", () => {
		expect(serializeVoteMap(new Map([[10, "1"]]))).toEqual({ "10": "1" })
	})
})

describe("createSupabaseVoteStore", () => {
	test("an update that matches no row because the version moved is a conflict", async () => {
		const read = fakeQuery({ data: pendingRow, error: null })
		const write = fakeQuery({ data: [], error: null })
		const client = fakeClient(read, write)
		const store = createSupabaseVoteStore(client as unknown as SupabaseClient, tables)

		const result = await store.transactPendingPost(key, post => ({
			type: "update",
			post: { ...post, adminVotes: new Map([...post.adminVotes, [2, true]]), version: post.version + 1 },
			value: "counted",
		}))

		expect(result).toEqual({ status: "conflict" })
		expect(write.update).toHaveBeenCalledWith({ admin_votes: { "1": true, "2": true }, version: 4 })
		expect(write.eq).toHaveBeenCalledWith("version", 3)
	})

	test("promotion goes through the database function with the version that was read", async () => {
		const client = fakeClient(fakeQuery({ data: pendingRow, error: null }))
		client.rpc.mockResolvedValueOnce({ data: true, error: null })
		const store = createSupabaseVoteStore(client as unknown as SupabaseClient, tables)

		const result = await store.transactPendingPost(key, post => ({
			type: "publish",
			published: { key: null, origin: post.key, userId: post.userId, votes: new Map(), version: 0 },
			value: "published",
		}))

		expect(result).toEqual({ status: "committed", value: "published" })
		expect(client.from).toHaveBeenCalledWith("pending_posts")
		expect(client.rpc).toHaveBeenCalledWith("promote_pending_post", {
			p_group_id: -1001,
			p_message_id: 42,
			p_expected_version: 3,
		})
	})

	test("a missing row is not found", async () => {
		const client = fakeClient(fakeQuery({ data: null, error: null }))
		const store = createSupabaseVoteStore(client as unknown as SupabaseClient, tables)

		const mutate = vi.fn()
		expect(await store.transactPendingPost(key, mutate)).toEqual({ status: "not_found" })
		expect(mutate).not.toHaveBeenCalled()
	})

	test("a duplicate report is refused by the primary key", async () => {
		const client = fakeClient(fakeQuery({ data: null, error: { code: "23505", message: "duplicate key value" } }))
		const store = createSupabaseVoteStore(client as unknown as SupabaseClient, tables)

		const created = await store.createReport({
			reporterId: 10,
			post: { chatId: -1002, messageId: 5 },
			createdAt: "2026-01-01T00:00:00.000Z",
		})

		expect(created).toBe(false)
	})

	test("other database errors are thrown", async () => {
		const client = fakeClient(fakeQuery({ data: null, error: { message: "connection refused" } }))
		const store = createSupabaseVoteStore(client as unknown as SupabaseClient, tables)

		await expect(store.getPendingPost(key)).rejects.toThrow("supabase_load_pending_error: connection refused")
	})
})
