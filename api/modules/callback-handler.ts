import type { Api, Bot, Context, InlineKeyboard } from "grammy"
import type { MaybeInaccessibleMessage, Message } from "grammy/types"

import { decodeCallbackToken, type CallbackCommand } from "../../lib/callback-token"
import { logError } from "../../lib/logger"
import { applyConversationState, type ConversationState, type SessionState } from "../../lib/session-state"
import type { PostKey } from "../../lib/types"

export type CallbackInfo = {
	api: Api
	chatId: number
	messageId: number
	senderId: number
	senderUsername: string | null
	message: Message | undefined
	answer: (text?: string) => Promise<void>
}

/**
 * What a command wants to change on the message that carried the button. `keyboard: null` removes the
 * buttons; leaving both fields out keeps the message as it is.
 */
export type CallbackResult = {
	text?: string
	keyboard?: InlineKeyboard | null
	nextState?: ConversationState
	reportedPost?: PostKey
}

export type CallbackHandler = (info: CallbackInfo, argument: string | null) => Promise<CallbackResult>

export type CallbackRegistry = Record<CallbackCommand, CallbackHandler>

export async function applyCallbackResult(
	api: Pick<Api, "editMessageText" | "editMessageReplyMarkup">,
	target: PostKey,
	result: CallbackResult,
): Promise<void> {
	const replyMarkup = result.keyboard ?? undefined
	try {
		if (result.text) {
			await api.editMessageText(target.chatId, target.messageId, result.text, { reply_markup: replyMarkup })
		} else if (result.keyboard !== undefined) {
			await api.editMessageReplyMarkup(target.chatId, target.messageId, { reply_markup: replyMarkup })
		}
	} catch (error) {
		logError("edit_callback_message_error", error, { chatId: target.chatId, messageId: target.messageId })
	}
}

export async function routeCallback(
	data: string,
	info: CallbackInfo,
	registry: CallbackRegistry,
): Promise<CallbackResult | null> {
	const decoded = decodeCallbackToken(data)
	if (decoded.status === "unknown_command") {
		logError("unknown_callback_command", decoded.command, { data, chatId: info.chatId, senderId: info.senderId })
		return null
	}

	const result = await registry[decoded.command](info, decoded.argument)
	await applyCallbackResult(info.api, { chatId: info.chatId, messageId: info.messageId }, result)
	return result
}

// Messages older than 48 hours reach callbacks as stubs with date 0.
function isAccessibleMessage(message: MaybeInaccessibleMessage): message is Message {
	return message.date !== 0
}

type CallbackHandlerDeps = {
	registry: CallbackRegistry
	session: SessionState
}

export function registerCallbackHandler(bot: Bot<Context>, deps: CallbackHandlerDeps): void {
	bot.on("callback_query:data", async ctx => {
		const message = ctx.callbackQuery.message
		if (!message) {
			await ctx.answerCallbackQuery()
			return
		}

		let answered = false
		const info: CallbackInfo = {
			api: ctx.api,
			chatId: message.chat.id,
			messageId: message.message_id,
			senderId: ctx.callbackQuery.from.id,
			senderUsername: ctx.callbackQuery.from.username ?? null,
			message: isAccessibleMessage(message) ? message : undefined,
			answer: async text => {
				if (answered) return
				answered = true
				await ctx.answerCallbackQuery(text === undefined ? undefined : { text })
			},
		}

		try {
			const result = await routeCallback(ctx.callbackQuery.data, info, deps.registry)
			if (result?.nextState) {
				applyConversationState(deps.session, info.senderId, result.nextState, result.reportedPost ?? null)
			}
		} catch (error) {
			logError("callback_handler_error", error, { data: ctx.callbackQuery.data, senderId: info.senderId })
		}

		try {
			await info.answer()
		} catch (error) {
			logError("answer_callback_error", error)
		}
	})
}
