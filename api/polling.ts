import { loadConfig } from "../lib/config"
import { logError, logEvent } from "../lib/logger"
import { createBot } from "./modules/create-bot"

const config = loadConfig()
const bot = createBot(config)

process.once("SIGINT", () => bot.stop())
process.once("SIGTERM", () => bot.stop())

bot
	.start({
		allowed_updates: ["message", "callback_query"],
		onStart: info => logEvent("bot_started", { username: info.username, quorum: config.quorum }),
	})
	.catch(error => {
		logError("bot_start_error", error)
		process.exitCode = 1
	})
