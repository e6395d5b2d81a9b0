import type { PendingPost, PostKey, PublishedPost, ReportRecord } from "../../lib/types"
import { makePostKey, samePostKey } from "../../lib/utils"
import type { PendingMutation, PublishedMutation, TransactResult, VoteStore } from "../../lib/vote-store"

type MemoryVoteStoreOptions = {
	// Awaited between the read and the commit of every transaction.
	beforeCommit?: (key: PostKey) => Promise<void>
}

export type MemoryVoteStore = VoteStore & {
	listPublishedPosts(): PublishedPost[]
}

function clonePending(post: PendingPost): PendingPost {
	return { ...post, key: { ...post.key }, adminVotes: new Map(post.adminVotes) }
}

function clonePublished(post: PublishedPost): PublishedPost {
	return {
		...post,
		key: post.key ? { ...post.key } : null,
		origin: { ...post.origin },
		votes: new Map(post.votes),
	}
}

/**
 * Map backed store. Every commit compares the version it read with the current one, the same check the
 * Supabase store makes, so interleaved transactions behave as they would against Postgres.
 */
export function createMemoryVoteStore(options: MemoryVoteStoreOptions = {}): MemoryVoteStore {
	const pendingPosts = new Map<string, PendingPost>()
	const publishedPosts: PublishedPost[] = []
	const reports = new Map<string, ReportRecord>()

	function findPublished(key: PostKey): PublishedPost | undefined {
		return publishedPosts.find(post => post.key !== null && samePostKey(post.key, key))
	}

	function reportKey(reporterId: number, post: PostKey): string {
		return `${reporterId}:${makePostKey(post)}`
	}

	async function getPendingPost(key: PostKey): Promise<PendingPost | null> {
		const post = pendingPosts.get(makePostKey(key))
		return post ? clonePending(post) : null
	}

	async function createPendingPost(post: PendingPost): Promise<void> {
		pendingPosts.set(makePostKey(post.key), clonePending(post))
	}

	async function transactPendingPost<T>(
		key: PostKey,
		mutate: (post: PendingPost) => PendingMutation<T>,
	): Promise<TransactResult<T>> {
		const id = makePostKey(key)
		const current = pendingPosts.get(id)
		if (!current) {
			return { status: "not_found" }
		}

		const mutation = mutate(clonePending(current))
		if (mutation.type === "none") {
			return { status: "committed", value: mutation.value }
		}

		await options.beforeCommit?.(key)
		const latest = pendingPosts.get(id)
		if (!latest || latest.version !== current.version) {
			return { status: "conflict" }
		}

		if (mutation.type === "update") {
			pendingPosts.set(id, clonePending(mutation.post))
		} else {
			pendingPosts.delete(id)
			if (mutation.type === "publish") {
				publishedPosts.push(clonePublished(mutation.published))
			}
		}
		return { status: "committed", value: mutation.value }
	}

	async function getPublishedPost(key: PostKey): Promise<PublishedPost | null> {
		const post = findPublished(key)
		return post ? clonePublished(post) : null
	}

	async function transactPublishedPost<T>(
		key: PostKey,
		mutate: (post: PublishedPost) => PublishedMutation<T>,
	): Promise<TransactResult<T>> {
		const current = findPublished(key)
		if (!current) {
			return { status: "not_found" }
		}

		const mutation = mutate(clonePublished(current))
		if (mutation.type === "none") {
			return { status: "committed", value: mutation.value }
		}

		await options.beforeCommit?.(key)
		const index = publishedPosts.findIndex(post => post.key !== null && samePostKey(post.key, key))
		const latest = publishedPosts[index]
		if (index === -1 || latest === undefined || latest.version !== current.version) {
			return { status: "conflict" }
		}
		publishedPosts[index] = clonePublished(mutation.post)
		return { status: "committed", value: mutation.value }
	}

	async function bindPublishedPost(origin: PostKey, key: PostKey): Promise<boolean> {
		const post = publishedPosts.find(candidate => samePostKey(candidate.origin, origin))
		if (!post || post.key !== null) {
			return false
		}
		post.key = { ...key }
		return true
	}

	async function getReport(reporterId: number, post: PostKey): Promise<ReportRecord | null> {
		const report = reports.get(reportKey(reporterId, post))
		return report ? { ...report, post: { ...report.post } } : null
	}

	async function createReport(report: ReportRecord): Promise<boolean> {
		const id = reportKey(report.reporterId, report.post)
		if (reports.has(id)) {
			return false
		}
		reports.set(id, { ...report, post: { ...report.post } })
		return true
	}

	function listPublishedPosts(): PublishedPost[] {
		return publishedPosts.map(clonePublished)
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
		listPublishedPosts,
	}
}
