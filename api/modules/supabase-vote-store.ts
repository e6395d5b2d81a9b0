import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js"

import type { PendingPost, PostKey, PublishedPost, ReportRecord } from "../../lib/types"
import { parseUserId } from "../../lib/utils"
import type { PendingMutation, PublishedMutation, TransactResult, VoteStore } from "../../lib/vote-store"

type VoteStoreTables = {
	reportsTable: string
}

// Fixed because promote_pending_post names them too.
const PENDING_POSTS_TABLE = "pending_posts"
const PUBLISHED_POSTS_TABLE = "published_posts"

const UNIQUE_VIOLATION = "23505"

function storeError(event: string, error: PostgrestError): Error {
	return new Error(`${event}: ${error.message}`)
}

export function parseVoteMap<T extends boolean | string>(
	raw: unknown,
	isValue: (value: unknown) => value is T,
): Map<number, T> {
	const votes = new Map<number, T>()
	if (typeof raw !== "object" || raw === null) {
		return votes
	}
	for (const [key, value] of Object.entries(raw)) {
		const userId = parseUserId(key)
		if (userId !== null && isValue(value)) {
			votes.set(userId, value)
		}
	}
	return votes
}

export function serializeVoteMap<T>(votes: ReadonlyMap<number, T>): Record<string, T> {
	return Object.fromEntries([...votes].map(([userId, value]) => [String(userId), value]))
}

function isBoolean(value: unknown): value is boolean {
	return typeof value === "boolean"
}

function isString(value: unknown): value is string {
	return typeof value === "string"
}

/**
 * Postgres tables behind Supabase. Writes are guarded by the row `version`, promotion goes through the
 * `promote_pending_post` function so the delete and the insert share one transaction.
 */
export function createSupabaseVoteStore(client: SupabaseClient, tables: VoteStoreTables): VoteStore {
	async function getPendingPost(key: PostKey): Promise<PendingPost | null> {
		const { data, error } = await client
			.from(PENDING_POSTS_TABLE)
			.select("group_id, g_message_id, user_id, admin_votes, version")
			.eq("group_id", key.chatId)
			.eq("g_message_id", key.messageId)
			.maybeSingle()

		if (error) {
			throw storeError("supabase_load_pending_error", error)
		}
		if (!data) {
			return null
		}

		return {
			key: { chatId: Number(data.group_id), messageId: Number(data.g_message_id) },
			userId: Number(data.user_id),
			adminVotes: parseVoteMap(data.admin_votes, isBoolean),
			version: Number(data.version ?? 0),
		}
	}

	async function createPendingPost(post: PendingPost): Promise<void> {
		const { error } = await client.from(PENDING_POSTS_TABLE).insert({
			group_id: post.key.chatId,
			g_message_id: post.key.messageId,
			user_id: post.userId,
			admin_votes: serializeVoteMap(post.adminVotes),
			version: post.version,
			created_at: new Date().toISOString(),
		})
		if (error) {
			throw storeError("supabase_insert_pending_error", error)
		}
	}

	async function commitPending(post: PendingPost, mutation: Exclude<PendingMutation<unknown>, { type: "none" }>) {
		if (mutation.type === "publish") {
			const { data, error } = await client.rpc("promote_pending_post", {
				p_group_id: post.key.chatId,
				p_message_id: post.key.messageId,
				p_expected_version: post.version,
			})
			if (error) {
				throw storeError("supabase_promote_pending_error", error)
			}
			return Boolean(data)
		}

		if (mutation.type === "reject") {
			const { data, error } = await client
				.from(PENDING_POSTS_TABLE)
				.delete()
				.eq("group_id", post.key.chatId)
				.eq("g_message_id", post.key.messageId)
				.eq("version", post.version)
				.select("g_message_id")
			if (error) {
				throw storeError("supabase_delete_pending_error", error)
			}
			return (data ?? []).length > 0
		}

		const { data, error } = await client
			.from(PENDING_POSTS_TABLE)
			.update({
				admin_votes: serializeVoteMap(mutation.post.adminVotes),
				version: mutation.post.version,
			})
			.eq("group_id", post.key.chatId)
			.eq("g_message_id", post.key.messageId)
			.eq("version", post.version)
			.select("version")
		if (error) {
			throw storeError("supabase_update_pending_error", error)
		}
		return (data ?? []).length > 0
	}

	async function transactPendingPost<T>(
		key: PostKey,
		mutate: (post: PendingPost) => PendingMutation<T>,
	): Promise<TransactResult<T>> {
		const current = await getPendingPost(key)
		if (!current) {
			return { status: "not_found" }
		}

		const mutation = mutate(current)
		if (mutation.type === "none") {
			return { status: "committed", value: mutation.value }
		}

		const committed = await commitPending(current, mutation)
		return committed ? { status: "committed", value: mutation.value } : { status: "conflict" }
	}

	async function getPublishedPost(key: PostKey): Promise<PublishedPost | null> {
		const { data, error } = await client
			.from(PUBLISHED_POSTS_TABLE)
			.select("channel_id, c_message_id, origin_group_id, origin_message_id, user_id, votes, version")
			.eq("channel_id", key.chatId)
			.eq("c_message_id", key.messageId)
			.maybeSingle()

		if (error) {
			throw storeError("supabase_load_published_error", error)
		}
		if (!data) {
			return null
		}

		return {
			key: { chatId: Number(data.channel_id), messageId: Number(data.c_message_id) },
			origin: { chatId: Number(data.origin_group_id), messageId: Number(data.origin_message_id) },
			userId: Number(data.user_id),
			votes: parseVoteMap(data.votes, isString),
			version: Number(data.version ?? 0),
		}
	}

	async function transactPublishedPost<T>(
		key: PostKey,
		mutate: (post: PublishedPost) => PublishedMutation<T>,
	): Promise<TransactResult<T>> {
		const current = await getPublishedPost(key)
		if (!current) {
			return { status: "not_found" }
		}

		const mutation = mutate(current)
		if (mutation.type === "none") {
			return { status: "committed", value: mutation.value }
		}

		const { data, error } = await client
			.from(PUBLISHED_POSTS_TABLE)
			.update({ votes: serializeVoteMap(mutation.post.votes), version: mutation.post.version })
			.eq("channel_id", key.chatId)
			.eq("c_message_id", key.messageId)
			.eq("version", current.version)
			.select("version")
		if (error) {
			throw storeError("supabase_update_votes_error", error)
		}
		return (data ?? []).length > 0 ? { status: "committed", value: mutation.value } : { status: "conflict" }
	}

	async function bindPublishedPost(origin: PostKey, key: PostKey): Promise<boolean> {
		const { data, error } = await client
			.from(PUBLISHED_POSTS_TABLE)
			.update({ channel_id: key.chatId, c_message_id: key.messageId, published_at: new Date().toISOString() })
			.eq("origin_group_id", origin.chatId)
			.eq("origin_message_id", origin.messageId)
			.is("c_message_id", null)
			.select("c_message_id")
		if (error) {
			throw storeError("supabase_bind_published_error", error)
		}
		return (data ?? []).length > 0
	}

	async function getReport(reporterId: number, post: PostKey): Promise<ReportRecord | null> {
		const { data, error } = await client
			.from(tables.reportsTable)
			.select("user_id, channel_id, c_message_id, created_at")
			.eq("user_id", reporterId)
			.eq("channel_id", post.chatId)
			.eq("c_message_id", post.messageId)
			.maybeSingle()

		if (error) {
			throw storeError("supabase_load_report_error", error)
		}
		if (!data) {
			return null
		}

		return {
			reporterId: Number(data.user_id),
			post: { chatId: Number(data.channel_id), messageId: Number(data.c_message_id) },
			createdAt: String(data.created_at),
		}
	}

	async function createReport(report: ReportRecord): Promise<boolean> {
		const { error } = await client.from(tables.reportsTable).insert({
			user_id: report.reporterId,
			channel_id: report.post.chatId,
			c_message_id: report.post.messageId,
			created_at: report.createdAt,
		})
		if (error?.code === UNIQUE_VIOLATION) {
			return false
		}
		if (error) {
			throw storeError("supabase_insert_report_error", error)
		}
		return true
	}

	return {
		getPendingPost,
		createPendingPost,
		transactPendingPost,
		getPublishedPost,
		transactPublishedPost,
		bindPublishedPost,
		getReport,
		createReport,
	}
}
