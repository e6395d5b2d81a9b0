import { logWarning } from "../../lib/logger"

export type Notifier = {
	notify(userId: number, text: string): Promise<boolean>
}

// Users who blocked the bot or never started it cannot be reached; that never undoes the vote.
export function createNotifier(api: { sendMessage(chatId: number, text: string): Promise<unknown> }): Notifier {
	return {
		async notify(userId, text) {
			try {
				await api.sendMessage(userId, text)
				return true
			} catch (error) {
				logWarning("notify_user_unreachable", {
					userId,
					error: error instanceof Error ? error.message : String(error),
				})
				return false
			}
		},
	}
}
