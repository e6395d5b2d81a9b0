import { webhookCallback } from "grammy"

import { loadConfig } from "../lib/config"
import { createBot } from "./modules/create-bot"

const bot = createBot(loadConfig())

export default webhookCallback(bot, "https")
