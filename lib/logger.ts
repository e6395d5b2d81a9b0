type LogPayload = Record<string, unknown>

function formatLine(event: string, payload: LogPayload): string {
	return JSON.stringify({
		event,
		timestamp: new Date().toISOString(),
		...payload,
	})
}

export function logEvent(event: string, payload: LogPayload = {}): void {
	console.log(formatLine(event, payload))
}

export function logWarning(event: string, payload: LogPayload = {}): void {
	console.warn(formatLine(event, payload))
}

export function logError(event: string, error: unknown, payload: LogPayload = {}): void {
	const message = error instanceof Error ? error.message : String(error)
	console.error(formatLine(event, { ...payload, error: message }))
}
