export type PostKey = {
	chatId: number
	messageId: number
}

export type PendingPost = {
	key: PostKey
	userId: number
	adminVotes: Map<number, boolean>
	version: number
}

export type PublishedPost = {
	key: PostKey | null
	origin: PostKey
	userId: number
	votes: Map<number, string>
	version: number
}

export type ReportRecord = {
	reporterId: number
	post: PostKey
	createdAt: string
}

export type ReactionCategory = {
	id: string
	label: string
}

export type UserPreference = {
	userId: number
	credited: boolean
	username: string | null
}

export type VoteCounts = {
	approvals: number
	rejections: number
}

export type CategoryCount = ReactionCategory & {
	count: number
}
