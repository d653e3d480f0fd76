/**
 * Shared table of blocked identifiers.
 *
 * Holds at most one entry per (identifier, origin). Manual and automatic
 * blocks live side by side, so the expiry of a rate-limit block never
 * lifts a manual one. Expired entries are dropped lazily on lookup and by
 * sweep().
 */

import type { BlockEntry, BlockOrigin } from "./types.js";

export class BlockTable {
	private readonly entries = new Map<string, Map<BlockOrigin, BlockEntry>>();

	/**
	 * Block an identifier. An active entry of the same origin is extended
	 * (its createdAt is kept, its expiry only moves forward) instead of
	 * being duplicated.
	 */
	put(
		identifier: string,
		origin: BlockOrigin,
		reason: string,
		durationMs: number,
		now = Date.now(),
	): BlockEntry {
		let byOrigin = this.entries.get(identifier);
		if (!byOrigin) {
			byOrigin = new Map();
			this.entries.set(identifier, byOrigin);
		}

		const requestedExpiry = now + durationMs;
		const existing = byOrigin.get(origin);
		const entry: BlockEntry =
			existing && existing.expiresAt > now
				? Object.freeze({
						...existing,
						reason,
						expiresAt: Math.max(existing.expiresAt, requestedExpiry),
					})
				: Object.freeze({ identifier, reason, createdAt: now, expiresAt: requestedExpiry, origin });

		byOrigin.set(origin, entry);
		return entry;
	}

	/**
	 * Active entries for an identifier, dropping any that have expired.
	 */
	active(identifier: string, now = Date.now()): BlockEntry[] {
		const byOrigin = this.entries.get(identifier);
		if (!byOrigin) return [];

		const live: BlockEntry[] = [];
		for (const [origin, entry] of byOrigin) {
			if (entry.expiresAt > now) {
				live.push(entry);
			} else {
				byOrigin.delete(origin);
			}
		}
		if (byOrigin.size === 0) {
			this.entries.delete(identifier);
		}
		return live;
	}

	isBlocked(identifier: string, now = Date.now()): boolean {
		return this.active(identifier, now).length > 0;
	}

	/**
	 * The active entry that expires last.
	 */
	latest(identifier: string, now = Date.now()): BlockEntry | undefined {
		let latest: BlockEntry | undefined;
		for (const entry of this.active(identifier, now)) {
			if (!latest || entry.expiresAt > latest.expiresAt) {
				latest = entry;
			}
		}
		return latest;
	}

	/**
	 * Remove entries for an identifier: one origin, or all of them.
	 * Returns the number of entries removed.
	 */
	remove(identifier: string, origin?: BlockOrigin): number {
		const byOrigin = this.entries.get(identifier);
		if (!byOrigin) return 0;

		if (origin === undefined) {
			this.entries.delete(identifier);
			return byOrigin.size;
		}

		const removed = byOrigin.delete(origin) ? 1 : 0;
		if (byOrigin.size === 0) {
			this.entries.delete(identifier);
		}
		return removed;
	}

	/**
	 * Identifiers with at least one active entry.
	 */
	blockedIdentifiers(now = Date.now()): string[] {
		const blocked: string[] = [];
		for (const identifier of [...this.entries.keys()]) {
			if (this.isBlocked(identifier, now)) {
				blocked.push(identifier);
			}
		}
		return blocked.sort();
	}

	/**
	 * Drop every expired entry. Returns the number removed.
	 */
	sweep(now = Date.now()): number {
		let removed = 0;
		for (const [identifier, byOrigin] of [...this.entries]) {
			const before = byOrigin.size;
			removed += before - this.active(identifier, now).length;
		}
		return removed;
	}
}
