/**
 * Domain allowlist and identifier blocklist.
 *
 * Manual blocks share the BlockTable with the rate limiter's automatic
 * blocks; see block-table.ts for the extend-not-duplicate rule.
 */

import { DEFAULT_POLICY } from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import { BlockTable } from "./block-table.js";
import type { BlockEntry } from "./types.js";

const logger = getChildLogger({ module: "access-control" });

export type AccessControllerOptions = {
	allowedDomains?: readonly string[];
	/** Duration used when a manual block is requested with an unusable duration */
	defaultBlockMs?: number;
	blockTable?: BlockTable;
};

/**
 * Case-fold a domain and drop surrounding whitespace and a trailing root dot.
 */
export function normalizeDomain(domain: string): string {
	return domain.trim().toLowerCase().replace(/\.$/, "");
}

export class AccessController {
	private domains: ReadonlySet<string>;
	private readonly defaultBlockMs: number;
	readonly blocks: BlockTable;

	constructor(options: AccessControllerOptions = {}) {
		this.domains = new Set(
			(options.allowedDomains ?? DEFAULT_POLICY.allowedDomains)
				.map(normalizeDomain)
				.filter((d) => d.length > 0),
		);
		this.defaultBlockMs = options.defaultBlockMs ?? DEFAULT_POLICY.manualBlockMs;
		this.blocks = options.blockTable ?? new BlockTable();
	}

	isDomainAllowed(domain: string): boolean {
		return this.domains.has(normalizeDomain(domain));
	}

	/**
	 * Returns false when the domain was already allowed or is empty.
	 */
	addDomain(domain: string): boolean {
		const normalized = normalizeDomain(domain);
		if (!normalized || this.domains.has(normalized)) return false;
		this.domains = new Set([...this.domains, normalized]);
		logger.info({ domain: normalized }, "domain added to allowlist");
		return true;
	}

	removeDomain(domain: string): boolean {
		const normalized = normalizeDomain(domain);
		if (!this.domains.has(normalized)) return false;
		const next = new Set(this.domains);
		next.delete(normalized);
		this.domains = next;
		logger.warn({ domain: normalized }, "domain removed from allowlist");
		return true;
	}

	listDomains(): string[] {
		return [...this.domains].sort();
	}

	/**
	 * Manually block an identifier. Blocking an identifier that already has
	 * an active manual block extends that block.
	 */
	block(identifier: string, reason: string, durationMs?: number, now = Date.now()): BlockEntry {
		let duration = durationMs ?? this.defaultBlockMs;
		if (!Number.isFinite(duration) || duration <= 0) {
			logger.warn(
				{ identifier, durationMs, fallbackMs: this.defaultBlockMs },
				"invalid block duration, using default",
			);
			duration = this.defaultBlockMs;
		}

		const entry = this.blocks.put(identifier, "manual", reason, duration, now);
		logger.warn(
			{ identifier, reason, expiresAt: new Date(entry.expiresAt).toISOString() },
			"identifier blocked",
		);
		return entry;
	}

	isBlocked(identifier: string, now = Date.now()): boolean {
		return this.blocks.isBlocked(identifier, now);
	}

	/**
	 * Active block that expires last, if any.
	 */
	getBlock(identifier: string, now = Date.now()): BlockEntry | undefined {
		return this.blocks.latest(identifier, now);
	}

	/**
	 * Remove every block for an identifier, manual and automatic.
	 */
	unblock(identifier: string): boolean {
		const removed = this.blocks.remove(identifier);
		if (removed > 0) {
			logger.warn({ identifier }, "identifier unblocked");
		}
		return removed > 0;
	}

	listBlocked(now = Date.now()): string[] {
		return this.blocks.blockedIdentifiers(now);
	}
}
