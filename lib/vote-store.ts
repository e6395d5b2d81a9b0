import type { PendingPost, PostKey, PublishedPost, ReportRecord } from "./types"

/**
 * What a pending post transaction wants to commit. `publish` deletes the pending record and creates
 * the published one in the same write; `reject` only deletes.
 */
export type PendingMutation<T> =
	| { type: "none"; value: T }
	| { type: "update"; post: PendingPost; value: T }
	| { type: "reject"; value: T }
	| { type: "publish"; published: PublishedPost; value: T }

export type PublishedMutation<T> = { type: "none"; value: T } | { type: "update"; post: PublishedPost; value: T }

export type TransactResult<T> = { status: "committed"; value: T } | { status: "not_found" } | { status: "conflict" }

/**
 * Persistence for the review workflow. `transact*` reads the record, runs `mutate` on it and commits
 * only if nobody else committed in between; otherwise it reports a conflict and the caller retries.
 */
export type VoteStore = {
	getPendingPost(key: PostKey): Promise<PendingPost | null>
	createPendingPost(post: PendingPost): Promise<void>
	transactPendingPost<T>(key: PostKey, mutate: (post: PendingPost) => PendingMutation<T>): Promise<TransactResult<T>>
	getPublishedPost(key: PostKey): Promise<PublishedPost | null>
	transactPublishedPost<T>(
		key: PostKey,
		mutate: (post: PublishedPost) => PublishedMutation<T>,
	): Promise<TransactResult<T>>
	/** Attaches the channel message to a post published from `origin`. False if already bound or missing. */
	bindPublishedPost(origin: PostKey, key: PostKey): Promise<boolean>
	getReport(reporterId: number, post: PostKey): Promise<ReportRecord | null>
	/** Returns false when a report with the same identity already exists. */
	createReport(report: ReportRecord): Promise<boolean>
}
