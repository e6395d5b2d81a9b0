import { config } from "dotenv"
import { existsSync } from "fs"
import { resolve } from "path"

import type { ReactionCategory } from "./types"

const DEFAULT_REACTION_CATEGORIES = "1=👍,0=👎"

export type SupabaseSettings = {
	url: string
	key: string
	reportsTable: string
	usersTable: string
}

export type BotConfig = {
	botToken: string
	adminGroupId: number
	channelId: number
	supabase: SupabaseSettings | null
	quorum: number
	reactionCategories: ReactionCategory[]
	transactionAttempts: number
}

function readEnvFile(): Record<string, string> {
	const values: Record<string, string> = {}
	const envPaths = [resolve(process.cwd(), ".env"), resolve(process.cwd(), "../.env")]
	for (const envPath of envPaths) {
		if (existsSync(envPath)) {
			config({ path: envPath, processEnv: values })
			break
		}
	}
	return values
}

// Variables already set in the environment win over the .env file.
export function loadConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
	const env: NodeJS.ProcessEnv = { ...readEnvFile(), ...source }

	const botToken = env.TOKEN
	const adminGroupId = Number(env.ADMIN_GROUP_ID)
	const channelId = Number(env.CHANNEL_ID)
	const supabaseUrl = env.SUPABASE_URL ?? env.URL
	const supabaseKey = env.SUPABASE_KEY ?? env.API
	const quorum = Number(env.VOTE_QUORUM ?? "2")
	const transactionAttempts = Number(env.TRANSACTION_ATTEMPTS ?? "3")
	const reactionCategories = parseReactionCategories(env.REACTION_CATEGORIES ?? DEFAULT_REACTION_CATEGORIES)

	if (!botToken) {
		throw new Error("TOKEN not found. Add TOKEN to .env and restart the bot.")
	}

	if (!Number.isInteger(adminGroupId) || adminGroupId === 0) {
		throw new Error("ADMIN_GROUP_ID is missing or invalid. Add the admin group chat id to .env.")
	}

	if (!Number.isInteger(channelId) || channelId === 0) {
		throw new Error("CHANNEL_ID is missing or invalid. Add the publication channel id to .env.")
	}

	if (Boolean(supabaseUrl) !== Boolean(supabaseKey)) {
		throw new Error("SUPABASE_URL and SUPABASE_KEY (or URL/API) must be set together.")
	}

	if (!Number.isInteger(quorum) || quorum < 1) {
		throw new Error("VOTE_QUORUM must be an integer >= 1")
	}

	if (!Number.isInteger(transactionAttempts) || transactionAttempts < 1) {
		throw new Error("TRANSACTION_ATTEMPTS must be an integer >= 1")
	}

	if (reactionCategories.length === 0) {
		throw new Error("REACTION_CATEGORIES must list at least one id=label pair")
	}

	const supabase =
		supabaseUrl && supabaseKey
			? {
					url: supabaseUrl,
					key: supabaseKey,
					reportsTable: env.REPORTS_TABLE ?? "reports",
					usersTable: env.USERS_TABLE ?? "credited_users",
				}
			: null

	return {
		botToken,
		adminGroupId,
		channelId,
		supabase,
		quorum,
		reactionCategories,
		transactionAttempts,
	}
}

export function parseReactionCategories(raw: string): ReactionCategory[] {
	const categories: ReactionCategory[] = []
	for (const pair of raw.split(",")) {
		const [id, label] = pair.split("=").map(value => value.trim())
		if (!id || !label) {
			throw new Error(`REACTION_CATEGORIES entry "${pair}" must look like id=label`)
		}
		if (categories.some(category => category.id === id)) {
			throw new Error(`REACTION_CATEGORIES repeats the id "${id}"`)
		}
		categories.push({ id, label })
	}
	return categories
}
