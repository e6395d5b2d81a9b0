import { runWithRetries } from "./transaction"
import type { CategoryCount, PostKey, PublishedPost, ReactionCategory } from "./types"
import type { PublishedMutation, VoteStore } from "./vote-store"

export type UserVoteResult =
	| { status: "not_found" }
	| { status: "invalid_category"; category: string }
	| { status: "committed"; wasAdded: boolean; counts: CategoryCount[] }

export type UserVoteInput = {
	key: PostKey
	voterId: number
	category: string
	categories: readonly ReactionCategory[]
	maxAttempts: number
}

export function countReactions(
	votes: ReadonlyMap<number, string>,
	categories: readonly ReactionCategory[],
): CategoryCount[] {
	return categories.map(category => {
		let count = 0
		for (const vote of votes.values()) {
			if (vote === category.id) count += 1
		}
		return { ...category, count }
	})
}

export function toggleReaction(
	post: PublishedPost,
	voterId: number,
	category: string,
): PublishedMutation<{ wasAdded: boolean; post: PublishedPost }> {
	const votes = new Map(post.votes)
	const wasAdded = votes.get(voterId) !== category
	if (wasAdded) {
		votes.set(voterId, category)
	} else {
		votes.delete(voterId)
	}
	const next: PublishedPost = { ...post, votes, version: post.version + 1 }
	return { type: "update", post: next, value: { wasAdded, post: next } }
}

export async function setUserVote(store: VoteStore, input: UserVoteInput): Promise<UserVoteResult> {
	if (!input.categories.some(category => category.id === input.category)) {
		return { status: "invalid_category", category: input.category }
	}

	const outcome = await runWithRetries(input.maxAttempts, () =>
		store.transactPublishedPost(input.key, post => toggleReaction(post, input.voterId, input.category)),
	)
	if (outcome.status === "not_found") {
		return { status: "not_found" }
	}

	return {
		status: "committed",
		wasAdded: outcome.value.wasAdded,
		counts: countReactions(outcome.value.post.votes, input.categories),
	}
}
