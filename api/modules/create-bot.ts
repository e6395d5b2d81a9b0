import { createClient } from "@supabase/supabase-js"
import { Bot } from "grammy"

import type { BotConfig } from "../../lib/config"
import { logError, logEvent } from "../../lib/logger"
import { createSessionState } from "../../lib/session-state"
import type { VoteStore } from "../../lib/vote-store"
import { createCallbackRegistry } from "./callback-commands"
import { registerCallbackHandler } from "./callback-handler"
import { registerCommandHandler } from "./command-handler"
import { createMemoryVoteStore } from "./memory-vote-store"
import { registerMessageHandler } from "./message-handler"
import { createNotifier } from "./notifier"
import { createSupabaseVoteStore } from "./supabase-vote-store"
import { createMemoryUserRepository, createSupabaseUserRepository, type UserRepository } from "./user-repository"

function createStorage(config: BotConfig): { store: VoteStore; users: UserRepository } {
	if (!config.supabase) {
		logEvent("storage_in_memory", { reason: "SUPABASE_URL not set" })
		return { store: createMemoryVoteStore(), users: createMemoryUserRepository() }
	}

	const client = createClient(config.supabase.url, config.supabase.key, { auth: { persistSession: false } })
	return {
		store: createSupabaseVoteStore(client, config.supabase),
		users: createSupabaseUserRepository(client, config.supabase.usersTable),
	}
}

export function createBot(config: BotConfig): Bot {
	const bot = new Bot(config.botToken)
	const session = createSessionState()
	const { store, users } = createStorage(config)

	const registry = createCallbackRegistry({
		store,
		users,
		notifier: createNotifier(bot.api),
		settings: {
			adminGroupId: config.adminGroupId,
			channelId: config.channelId,
			quorum: config.quorum,
			reactionCategories: config.reactionCategories,
			transactionAttempts: config.transactionAttempts,
		},
	})

	registerCommandHandler(bot, { session })
	registerCallbackHandler(bot, { registry, session })
	registerMessageHandler(bot, { adminGroupId: config.adminGroupId, session })

	bot.catch(error => {
		logError("bot_update_error", error.error, { updateId: error.ctx.update.update_id })
	})

	return bot
}
