import type { Bot, Context } from "grammy"

import { logError, logEvent } from "../../lib/logger"
import { applyConversationState, type SessionState } from "../../lib/session-state"
import type { PostKey } from "../../lib/types"
import { escapeHtml, getParticipantName } from "../../lib/utils"
import { renderConfirmKeyboard } from "./keyboard"

type MessageHandlerDeps = {
	adminGroupId: number
	session: SessionState
}

export function makeChannelPostLink(post: PostKey): string {
	return `https://t.me/c/${String(post.chatId).replace(/^-100/, "")}/${post.messageId}`
}

export function formatReportNotice(input: { post: PostKey; reporterName: string; reason: string }): string {
	return [
		"🚩 New report",
		`Post: ${makeChannelPostLink(input.post)}`,
		`From: ${escapeHtml(input.reporterName)}`,
		`Reason: ${escapeHtml(input.reason)}`,
	].join("\n")
}

export function registerMessageHandler(bot: Bot<Context>, deps: MessageHandlerDeps): void {
	bot.on("message", async ctx => {
		if (ctx.chat.type !== "private") {
			return
		}

		const message = ctx.message
		const userId = ctx.from?.id
		if (userId === undefined || message.text?.startsWith("/")) {
			return
		}

		const conversation = deps.session.conversations.get(userId)
		if (conversation?.state === "reporting_spot" && conversation.reportedPost) {
			if (!message.text) {
				await ctx.reply("Write the reason as text, or type /cancel")
				return
			}

			try {
				await ctx.api.sendMessage(
					deps.adminGroupId,
					formatReportNotice({
						post: conversation.reportedPost,
						reporterName: getParticipantName(ctx.from),
						reason: message.text,
					}),
					{ parse_mode: "HTML" },
				)
			} catch (error) {
				logError("send_report_to_admins_error", error, { userId })
				await ctx.reply("The report could not be delivered, try again later or type /cancel")
				return
			}

			applyConversationState(deps.session, userId, "end")
			await ctx.reply("Thanks, the admins will look at your report")
			logEvent("report_accepted", { userId, ...conversation.reportedPost })
			return
		}

		await ctx.reply("Do you want to submit this post?", {
			reply_markup: renderConfirmKeyboard(),
			reply_parameters: { message_id: message.message_id },
		})
	})
}
