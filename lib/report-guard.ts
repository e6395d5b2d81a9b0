import type { PostKey } from "./types"
import type { VoteStore } from "./vote-store"

/** Files a report once per (reporter, post). Resolves to true when the reporter already reported it. */
export async function fileReport(store: VoteStore, input: { reporterId: number; post: PostKey }): Promise<boolean> {
	const existing = await store.getReport(input.reporterId, input.post)
	if (existing) {
		return true
	}

	const created = await store.createReport({
		reporterId: input.reporterId,
		post: input.post,
		createdAt: new Date().toISOString(),
	})
	return !created
}
