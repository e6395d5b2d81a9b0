export const CALLBACK_PREFIX = "meme_"

export const CALLBACK_COMMANDS = ["confirm", "settings", "approve_yes", "approve_no", "vote", "report_spot"] as const

export type CallbackCommand = (typeof CALLBACK_COMMANDS)[number]

export type DecodedToken =
	| { status: "ok"; command: CallbackCommand; argument: string | null }
	| { status: "unknown_command"; command: string }

const LEGACY_TOKENS = new Map<string, string>([
	["meme_vote_yes", "meme_vote,1"],
	["meme_vote_no", "meme_vote,0"],
])

// Buttons sent before the comma format still carry these spellings.
export function rewriteLegacyToken(data: string): string {
	return LEGACY_TOKENS.get(data) ?? data
}

export function isCallbackCommand(value: string): value is CallbackCommand {
	return CALLBACK_COMMANDS.some(command => command === value)
}

export function makeCallbackToken(command: CallbackCommand, argument?: string | number): string {
	return argument === undefined ? `${CALLBACK_PREFIX}${command}` : `${CALLBACK_PREFIX}${command},${argument}`
}

export function decodeCallbackToken(data: string): DecodedToken {
	const token = rewriteLegacyToken(data)
	const separator = token.indexOf(",")
	const head = separator === -1 ? token : token.slice(0, separator)
	const argument = separator === -1 ? null : token.slice(separator + 1)

	if (!head.startsWith(CALLBACK_PREFIX)) {
		return { status: "unknown_command", command: head }
	}
	const command = head.slice(CALLBACK_PREFIX.length)
	if (!isCallbackCommand(command)) {
		return { status: "unknown_command", command }
	}
	return { status: "ok", command, argument }
}
