import type { SupabaseClient } from "@supabase/supabase-js"

import { logError } from "../../lib/logger"
import type { UserPreference } from "../../lib/types"

export type UserRepository = {
	getPreference(userId: number): Promise<UserPreference | null>
	savePreference(preference: UserPreference): Promise<void>
}

export function createSupabaseUserRepository(client: SupabaseClient, table: string): UserRepository {
	async function getPreference(userId: number): Promise<UserPreference | null> {
		const { data, error } = await client
			.from(table)
			.select("user_id, credited, username")
			.eq("user_id", userId)
			.maybeSingle()

		if (error) {
			logError("supabase_load_user_error", error.message, { userId })
			return null
		}
		if (!data) {
			return null
		}

		return {
			userId: Number(data.user_id),
			credited: Boolean(data.credited),
			username: data.username ? String(data.username) : null,
		}
	}

	async function savePreference(preference: UserPreference): Promise<void> {
		const { error } = await client.from(table).upsert(
			{
				user_id: preference.userId,
				credited: preference.credited,
				username: preference.username,
				updated_at: new Date().toISOString(),
			},
			{
				onConflict: "user_id",
				ignoreDuplicates: false,
			},
		)
		if (error) {
			logError("supabase_upsert_user_error", error.message, { userId: preference.userId })
		}
	}

	return {
		getPreference,
		savePreference,
	}
}

export function createMemoryUserRepository(): UserRepository {
	const preferences = new Map<number, UserPreference>()

	return {
		async getPreference(userId) {
			const preference = preferences.get(userId)
			return preference ? { ...preference } : null
		},
		async savePreference(preference) {
			preferences.set(preference.userId, { ...preference })
		},
	}
}

/** Stores the credit choice. Resolves to true when the user already had it. */
export async function updateCreditPreference(
	repository: UserRepository,
	input: { userId: number; credited: boolean; username: string | null },
): Promise<boolean> {
	const current = await repository.getPreference(input.userId)
	const alreadySet = (current?.credited ?? false) === input.credited
	if (alreadySet && current?.username === input.username) {
		return true
	}
	await repository.savePreference({ userId: input.userId, credited: input.credited, username: input.username })
	return alreadySet
}
