import { describe, expect, test } from "vitest"

import { renderApprovalKeyboard, renderConfirmKeyboard, renderReactionKeyboard } from "./keyboard"

type Keyboard = { inline_keyboard: Array<Array<{ text: string }>> }

function callbackData(keyboard: Keyboard) {
	return keyboard.inline_keyboard.map(row => row.map(button => ("callback_data" in button ? button.callback_data : null)))
}

describe("renderApprovalKeyboard", () => {
	test("shows both tallies on buttons that vote", () => {
		const keyboard = renderApprovalKeyboard({ approvals: 2, rejections: 1 })

		expect(keyboard.inline_keyboard.map(row => row.map(button => button.text))).toEqual([["🟢 2", "🔴 1"]])
		expect(callbackData(keyboard)).toEqual([["meme_approve_yes", "meme_approve_no"]])
	})
})

describe("renderReactionKeyboard", () => {
	test("one button per category in order, then the report button", () => {
		const keyboard = renderReactionKeyboard([
			{ id: "1", label: "👍", count: 3 },
			{ id: "0", label: "👎", count: 0 },
		])

		expect(keyboard.inline_keyboard.map(row => row.map(button => button.text))).toEqual([["👍 3", "👎"], ["🚩 Report"]])
		expect(callbackData(keyboard)).toEqual([["meme_vote,1", "meme_vote,0"], ["meme_report_spot"]])
	})
})

describe("renderConfirmKeyboard", () => {
	test("answers yes or no", () => {
		expect(callbackData(renderConfirmKeyboard())).toEqual([["meme_confirm,yes", "meme_confirm,no"]])
	})
})
