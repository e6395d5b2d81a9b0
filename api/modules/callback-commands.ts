import { listVoters, setAdminVote } from "../../lib/approval-engine"
import { logError, logEvent } from "../../lib/logger"
import { countReactions, setUserVote } from "../../lib/reaction-tally"
import { fileReport } from "../../lib/report-guard"
import type { PendingPost, ReactionCategory } from "../../lib/types"
import { escapeHtml, getParticipantName } from "../../lib/utils"
import type { VoteStore } from "../../lib/vote-store"
import type { CallbackHandler, CallbackInfo, CallbackRegistry, CallbackResult } from "./callback-handler"
import { renderApprovalKeyboard, renderReactionKeyboard } from "./keyboard"
import type { Notifier } from "./notifier"
import { updateCreditPreference, type UserRepository } from "./user-repository"

export type ReviewSettings = {
	adminGroupId: number
	channelId: number
	quorum: number
	reactionCategories: ReactionCategory[]
	transactionAttempts: number
}

type CallbackCommandDeps = {
	store: VoteStore
	users: UserRepository
	notifier: Notifier
	settings: ReviewSettings
}

export function createCallbackRegistry(deps: CallbackCommandDeps): CallbackRegistry {
	const { store, users, notifier, settings } = deps

	// Resolves to false when nothing reached the channel.
	async function publishPost(info: CallbackInfo, pending: PendingPost): Promise<boolean> {
		const preference = await users.getPreference(pending.userId)
		const signature = preference?.credited && preference.username ? `\n\nby: @${preference.username}` : ""
		const reply_markup = renderReactionKeyboard(countReactions(new Map(), settings.reactionCategories))
		const text = info.message?.text

		let channelMessageId: number
		try {
			if (text !== undefined) {
				const sent = await info.api.sendMessage(settings.channelId, `${text}${signature}`, { reply_markup })
				channelMessageId = sent.message_id
			} else {
				const caption = info.message?.caption ?? ""
				const copied = await info.api.copyMessage(settings.channelId, info.chatId, info.messageId, {
					reply_markup,
					...(signature ? { caption: `${caption}${signature}` } : {}),
				})
				channelMessageId = copied.message_id
			}
		} catch (error) {
			logError("publish_post_error", error, { chatId: info.chatId, messageId: info.messageId })
			return false
		}

		const channelKey = { chatId: settings.channelId, messageId: channelMessageId }
		try {
			const bound = await store.bindPublishedPost(pending.key, channelKey)
			if (!bound) {
				logError("bind_published_post_error", "published record missing or already bound", {
					chatId: info.chatId,
					messageId: info.messageId,
					channelMessageId,
				})
			}
		} catch (error) {
			logError("bind_published_post_error", error, {
				chatId: info.chatId,
				messageId: info.messageId,
				channelMessageId,
			})
		}
		logEvent("post_published", {
			chatId: info.chatId,
			messageId: info.messageId,
			channelMessageId,
			userId: pending.userId,
		})
		return true
	}

	async function showAdminVotes(info: CallbackInfo, pending: PendingPost, approve: boolean): Promise<void> {
		const names: string[] = []
		for (const adminId of listVoters(pending.adminVotes, approve)) {
			try {
				const member = await info.api.getChatMember(settings.adminGroupId, adminId)
				names.push(escapeHtml(getParticipantName(member.user)))
			} catch (error) {
				logError("load_admin_member_error", error, { adminId })
				names.push(String(adminId))
			}
		}

		const heading = approve ? "Approved by:" : "Rejected by:"
		try {
			await info.api.sendMessage(settings.adminGroupId, [heading, ...names].join("\n"), {
				parse_mode: "HTML",
				reply_parameters: { message_id: info.messageId },
			})
		} catch (error) {
			logError("show_admin_votes_error", error, { messageId: info.messageId })
		}
	}

	function makeAdminVoteHandler(approve: boolean): CallbackHandler {
		return async info => {
			if (info.chatId !== settings.adminGroupId) {
				return {}
			}
			await info.answer()

			const result = await setAdminVote(store, {
				key: { chatId: info.chatId, messageId: info.messageId },
				adminId: info.senderId,
				approve,
				quorum: settings.quorum,
				maxAttempts: settings.transactionAttempts,
			})

			switch (result.status) {
				case "not_found":
				case "unchanged":
					return {}
				case "counted":
					return { keyboard: renderApprovalKeyboard(result.counts) }
				case "published":
					if (await publishPost(info, result.post)) {
						await notifier.notify(result.post.userId, "Your latest post has been published in the channel")
					}
					await showAdminVotes(info, result.post, true)
					return { keyboard: null }
				case "rejected":
					await notifier.notify(
						result.post.userId,
						"Your latest post has been rejected\nYou can check the rules with /rules",
					)
					await showAdminVotes(info, result.post, false)
					logEvent("post_rejected", { chatId: info.chatId, messageId: info.messageId, userId: result.post.userId })
					return { keyboard: null }
			}
		}
	}

	async function confirm(info: CallbackInfo, argument: string | null): Promise<CallbackResult> {
		if (argument === "no") {
			return { text: "Alright, see you next time 🙃", nextState: "end" }
		}
		if (argument !== "yes") {
			logError("confirm_callback_invalid_argument", argument)
			return { nextState: "end" }
		}

		const submission = info.message?.reply_to_message
		if (!submission) {
			return { text: "Something went wrong\nSend the post again", nextState: "end" }
		}

		try {
			const copied = await info.api.copyMessage(settings.adminGroupId, info.chatId, submission.message_id, {
				reply_markup: renderApprovalKeyboard({ approvals: 0, rejections: 0 }),
			})
			await store.createPendingPost({
				key: { chatId: settings.adminGroupId, messageId: copied.message_id },
				userId: info.senderId,
				adminVotes: new Map(),
				version: 0,
			})
			logEvent("post_submitted", { userId: info.senderId, adminMessageId: copied.message_id })
		} catch (error) {
			logError("submit_post_error", error, { userId: info.senderId })
			return {
				text: "Something went wrong\nMake sure the post type is one of the allowed ones",
				nextState: "end",
			}
		}

		return { text: "Your post is being reviewed\nOnce published you will find it in the channel", nextState: "end" }
	}

	async function settingsCallback(info: CallbackInfo, argument: string | null): Promise<CallbackResult> {
		if (argument === "anonimo") {
			const already = await updateCreditPreference(users, {
				userId: info.senderId,
				credited: false,
				username: info.senderUsername,
			})
			return { text: already ? "You are already anonymous" : "Preference updated\nYour posts will now be anonymous" }
		}

		if (argument === "credit") {
			const already = await updateCreditPreference(users, {
				userId: info.senderId,
				credited: true,
				username: info.senderUsername,
			})
			const status = already ? "You are already credited in your posts\n" : "Preference updated\n"
			const detail = info.senderUsername
				? `Your posts will be credited to @${info.senderUsername}`
				: "WARNING:\nYour account has no username\nAdd one or you will not be credited"
			return { text: `${status}${detail}` }
		}

		logError("settings_callback_invalid_argument", argument)
		return {}
	}

	async function vote(info: CallbackInfo, argument: string | null): Promise<CallbackResult> {
		const result = await setUserVote(store, {
			key: { chatId: info.chatId, messageId: info.messageId },
			voterId: info.senderId,
			category: argument ?? "",
			categories: settings.reactionCategories,
			maxAttempts: settings.transactionAttempts,
		})

		if (result.status === "invalid_category") {
			logError("invalid_reaction_category", result.category, { chatId: info.chatId, messageId: info.messageId })
			return {}
		}
		if (result.status === "not_found") {
			return {}
		}

		const label = settings.reactionCategories.find(category => category.id === argument)?.label ?? ""
		await info.answer(result.wasAdded ? `You added a ${label}` : `You removed the ${label}`)
		logEvent("reaction_toggled", {
			chatId: info.chatId,
			messageId: info.messageId,
			voterId: info.senderId,
			category: argument,
			wasAdded: result.wasAdded,
		})
		return { keyboard: renderReactionKeyboard(result.counts) }
	}

	async function reportSpot(info: CallbackInfo): Promise<CallbackResult> {
		if (info.chatId !== settings.channelId) {
			return {}
		}
		const post = { chatId: info.chatId, messageId: info.messageId }
		const alreadyReported = await fileReport(store, { reporterId: info.senderId, post })
		if (alreadyReported) {
			await info.answer("You have already reported this post.")
			return { nextState: "end" }
		}

		await info.answer("Report it privately through the bot.")
		logEvent("report_filed", { reporterId: info.senderId, ...post })
		try {
			await info.api.forwardMessage(info.senderId, info.chatId, info.messageId)
		} catch (error) {
			logError("forward_reported_post_error", error, { reporterId: info.senderId })
		}
		await notifier.notify(info.senderId, "Write the reason for the report, or type /cancel")
		return { nextState: "reporting_spot", reportedPost: post }
	}

	return {
		confirm,
		settings: settingsCallback,
		approve_yes: makeAdminVoteHandler(true),
		approve_no: makeAdminVoteHandler(false),
		vote,
		report_spot: reportSpot,
	}
}
