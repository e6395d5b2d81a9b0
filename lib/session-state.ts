import type { PostKey } from "./types"

export type ConversationState = "end" | "reporting_spot"

export type Conversation = {
	state: ConversationState
	reportedPost: PostKey | null
}

export type SessionState = {
	conversations: Map<number, Conversation>
}

export function createSessionState(): SessionState {
	return {
		conversations: new Map<number, Conversation>(),
	}
}

export function applyConversationState(
	session: SessionState,
	userId: number,
	state: ConversationState,
	reportedPost: PostKey | null = null,
): void {
	if (state === "end") {
		session.conversations.delete(userId)
		return
	}
	session.conversations.set(userId, { state, reportedPost })
}
