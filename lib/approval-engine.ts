import { runWithRetries } from "./transaction"
import type { PendingPost, PostKey, PublishedPost, VoteCounts } from "./types"
import type { PendingMutation, VoteStore } from "./vote-store"

export type AdminVoteResult =
	| { status: "not_found" }
	| { status: "unchanged"; count: number }
	| { status: "counted"; count: number; counts: VoteCounts; post: PendingPost }
	| { status: "published"; count: number; post: PendingPost; published: PublishedPost }
	| { status: "rejected"; count: number; post: PendingPost }

export type AdminVoteInput = {
	key: PostKey
	adminId: number
	approve: boolean
	quorum: number
	maxAttempts: number
}

export function countAdminVotes(adminVotes: ReadonlyMap<number, boolean>): VoteCounts {
	let approvals = 0
	let rejections = 0
	for (const vote of adminVotes.values()) {
		if (vote) approvals += 1
		else rejections += 1
	}
	return { approvals, rejections }
}

export function listVoters(adminVotes: ReadonlyMap<number, boolean>, approve: boolean): number[] {
	return [...adminVotes].filter(([, vote]) => vote === approve).map(([adminId]) => adminId)
}

export function decideAdminVote(
	post: PendingPost,
	adminId: number,
	approve: boolean,
	quorum: number,
): PendingMutation<Exclude<AdminVoteResult, { status: "not_found" }>> {
	const previous = post.adminVotes.get(adminId)
	if (previous === approve) {
		const counts = countAdminVotes(post.adminVotes)
		return { type: "none", value: { status: "unchanged", count: approve ? counts.approvals : counts.rejections } }
	}

	const adminVotes = new Map(post.adminVotes)
	adminVotes.set(adminId, approve)
	const counts = countAdminVotes(adminVotes)
	const count = approve ? counts.approvals : counts.rejections
	const next: PendingPost = { ...post, adminVotes, version: post.version + 1 }

	if (count < quorum) {
		return { type: "update", post: next, value: { status: "counted", count, counts, post: next } }
	}

	if (!approve) {
		return { type: "reject", value: { status: "rejected", count, post: next } }
	}

	const published: PublishedPost = {
		key: null,
		origin: post.key,
		userId: post.userId,
		votes: new Map(),
		version: 0,
	}
	return { type: "publish", published, value: { status: "published", count, post: next, published } }
}

export async function setAdminVote(store: VoteStore, input: AdminVoteInput): Promise<AdminVoteResult> {
	const outcome = await runWithRetries(input.maxAttempts, () =>
		store.transactPendingPost(input.key, post => decideAdminVote(post, input.adminId, input.approve, input.quorum)),
	)
	if (outcome.status === "not_found") {
		return { status: "not_found" }
	}
	return outcome.value
}
