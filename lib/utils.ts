import type { PostKey } from "./types"

export function makePostKey(key: PostKey): string {
	return `${key.chatId}:${key.messageId}`
}

export function samePostKey(left: PostKey, right: PostKey): boolean {
	return left.chatId === right.chatId && left.messageId === right.messageId
}

export function getParticipantName(user: { first_name?: string; last_name?: string; username?: string } | undefined): string {
	if (!user) {
		return "Member"
	}
	if (user.username) {
		return `@${user.username}`
	}
	const fullName = [user.first_name, user.last_name].filter(Boolean).join(" ").trim()
	if (fullName) {
		return fullName
	}
	return "Member"
}

export function escapeHtml(value: string): string {
	return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;")
}

export function parseUserId(value: string): number | null {
	const userId = Number(value)
	return Number.isInteger(userId) && userId > 0 ? userId : null
}
