import { afterEach, describe, expect, test, vi } from "vitest"

import { createNotifier } from "./notifier"

describe("createNotifier", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	test("reports a delivered message", async () => {
		const sendMessage = vi.fn(async () => ({ message_id: 1 }))
		const notifier = createNotifier({ sendMessage })

		expect(await notifier.notify(7, "hi")).toBe(true)
		expect(sendMessage).toHaveBeenCalledWith(7, "hi")
	})

	test("an unreachable user is logged as a warning, not thrown", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
		const sendMessage = vi.fn(async () => {
			throw new Error("Forbidden: bot was blocked by the user")
		})
		const notifier = createNotifier({ sendMessage })

		expect(await notifier.notify(7, "hi")).toBe(false)
		expect(warn).toHaveBeenCalledTimes(1)
		expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toMatchObject({
			event: "notify_user_unreachable",
			userId: 7,
			error: "Forbidden: bot was blocked by the user",
		})
	})
})
