import { logWarning } from "./logger"
import type { TransactResult } from "./vote-store"

export type RetryOutcome<T> = { status: "committed"; value: T } | { status: "not_found" }

// A conflict that survives every attempt is reported like a missing record: some other
// transaction moved the post on and the caller has nothing left to do.
export async function runWithRetries<T>(
	maxAttempts: number,
	attempt: () => Promise<TransactResult<T>>,
): Promise<RetryOutcome<T>> {
	for (let tries = 1; tries <= maxAttempts; tries += 1) {
		const result = await attempt()
		if (result.status !== "conflict") {
			return result
		}
		logWarning("store_transaction_conflict", { attempt: tries, maxAttempts })
	}
	return { status: "not_found" }
}
