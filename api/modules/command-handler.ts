import type { Bot, Context } from "grammy"

import { applyConversationState, type SessionState } from "../../lib/session-state"
import { renderSettingsKeyboard } from "./keyboard"

type CommandHandlerDeps = {
	session: SessionState
}

export function registerCommandHandler(bot: Bot<Context>, deps: CommandHandlerDeps): void {
	bot.command("start", async ctx => {
		await ctx.reply("Send me the post you want to publish and the admins will review it")
	})

	bot.command("settings", async ctx => {
		await ctx.reply("How do you want your posts to be signed?", { reply_markup: renderSettingsKeyboard() })
	})

	bot.command("rules", async ctx => {
		await ctx.reply("Posts must respect the other members. Spam, insults and personal data are rejected.")
	})

	bot.command("cancel", async ctx => {
		if (!ctx.from) {
			return
		}
		applyConversationState(deps.session, ctx.from.id, "end")
		await ctx.reply("Operation cancelled")
	})
}
