import { InlineKeyboard } from "grammy"

import { makeCallbackToken } from "../../lib/callback-token"
import type { CategoryCount, VoteCounts } from "../../lib/types"

export function renderApprovalKeyboard(counts: VoteCounts): InlineKeyboard {
	return new InlineKeyboard()
		.text(`🟢 ${counts.approvals}`, makeCallbackToken("approve_yes"))
		.text(`🔴 ${counts.rejections}`, makeCallbackToken("approve_no"))
}

export function renderReactionKeyboard(counts: readonly CategoryCount[]): InlineKeyboard {
	const keyboard = new InlineKeyboard()
	for (const category of counts) {
		const label = category.count > 0 ? `${category.label} ${category.count}` : category.label
		keyboard.text(label, makeCallbackToken("vote", category.id))
	}
	return keyboard.row().text("🚩 Report", makeCallbackToken("report_spot"))
}

export function renderConfirmKeyboard(): InlineKeyboard {
	return new InlineKeyboard()
		.text("Yes", makeCallbackToken("confirm", "yes"))
		.text("No", makeCallbackToken("confirm", "no"))
}

export function renderSettingsKeyboard(): InlineKeyboard {
	return new InlineKeyboard()
		.text("Anonymous", makeCallbackToken("settings", "anonimo"))
		.text("Credited", makeCallbackToken("settings", "credit"))
}
