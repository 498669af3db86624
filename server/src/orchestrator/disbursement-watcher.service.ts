import {
	Inject,
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { OnEvent } from "@nestjs/event-emitter";
import { StorageAdapter, hexToBytes } from "@fundchain/ledger";
import type { EnvironmentVariables } from "../config/environment";
import { describeError } from "../common/errors";
import { LedgerEvent, MILESTONE_RELEASED_ID } from "../common/ledger.event";
import { LEDGER_STORAGE } from "../ledger/ledger.constants";
import { ContractClientService } from "./contract-client.service";

const MILESTONE_KEY_PREFIX = "Milestone:";

type WatchEntry = {
	milestoneId: string; // hex
	nextCheckAt: number;
	errorBackoffMs: number;
};

/**
 * Finishes milestone payouts that were approved but never paid, for instance
 * because the process stopped between the two steps or the escrow was short.
 *
 * Released milestones enter the watch set from the ledger event and, at
 * startup, from the stored milestones. An entry leaves only once the escrow
 * has recorded its payout.
 */
@Injectable()
export class DisbursementWatcher implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(DisbursementWatcher.name);

	private readonly watchMap = new Map<string, WatchEntry>(); // key by milestone id
	private timer: NodeJS.Timeout | null = null;
	private ticking = false;

	private readonly tickMs: number;
	private readonly enabled: boolean;
	private readonly batchSize = 32;
	private readonly maxBackoffMs = 60_000;

	constructor(
		private readonly client: ContractClientService,
		@Inject(LEDGER_STORAGE) private readonly storage: StorageAdapter,
		configService: ConfigService<EnvironmentVariables, true>,
	) {
		this.tickMs = configService.get("RECONCILE_INTERVAL_MS", { infer: true });
		// without nonces the escrow keeps no record of a payout
		this.enabled =
			configService.get("ATTESTATION_SCHEME", { infer: true }) === "schnorr";
	}

	async onModuleInit(): Promise<void> {
		if (!this.enabled) {
			this.logger.warn(
				"Payouts are not tracked under length-only attestations; disbursement watcher disabled",
			);
			return;
		}
		await this.recoverPending();
		this.logger.log("Starting DisbursementWatcher loop");
		this.timer = setInterval(() => {
			this.tick().catch((err: unknown) => {
				this.logger.error(`Disbursement tick failed: ${describeError(err)}`);
			});
		}, this.tickMs);
	}

	onModuleDestroy(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
			this.logger.log("Stopped DisbursementWatcher loop");
		}
	}

	@OnEvent(MILESTONE_RELEASED_ID)
	onMilestoneReleased(evt: LedgerEvent): void {
		const milestoneId = evt.data.milestoneId;
		if (!this.enabled || typeof milestoneId !== "string") return;
		// give the caller that released it time to pay out itself
		this.watch(milestoneId, Date.now() + this.tickMs);
	}

	/**
	 * Milestone ids (hex) currently awaiting payout.
	 */
	pending(): string[] {
		return Array.from(this.watchMap.keys());
	}

	/**
	 * Run one reconciliation pass over the entries that are due.
	 */
	async tick(): Promise<void> {
		if (this.ticking) return;
		this.ticking = true;
		try {
			const now = Date.now();
			const due: WatchEntry[] = [];
			for (const entry of this.watchMap.values()) {
				if (entry.nextCheckAt <= now) {
					due.push(entry);
					if (due.length >= this.batchSize) break;
				}
			}
			// ledger invocations run one at a time anyway
			for (const entry of due) {
				await this.checkOne(entry);
			}
		} finally {
			this.ticking = false;
		}
	}

	private watch(milestoneId: string, nextCheckAt: number): void {
		if (this.watchMap.has(milestoneId)) return;
		this.watchMap.set(milestoneId, {
			milestoneId,
			nextCheckAt,
			errorBackoffMs: this.tickMs,
		});
		this.logger.debug(`Watching milestone ${milestoneId} for payout`);
	}

	private async recoverPending(): Promise<void> {
		const entries = await this.storage.list({
			contract: this.client.getContractAddress("milestone_manager"),
			tier: "persistent",
			keyPrefix: MILESTONE_KEY_PREFIX,
		});
		const now = Date.now();
		for (const entry of entries) {
			const milestoneId = entry.key.slice(MILESTONE_KEY_PREFIX.length);
			if (await this.client.isAwaitingPayout(hexToBytes(milestoneId))) {
				this.watch(milestoneId, now);
			}
		}
		if (this.watchMap.size > 0) {
			this.logger.log(`Recovered ${this.watchMap.size} pending disbursements`);
		}
	}

	private async checkOne(entry: WatchEntry): Promise<void> {
		try {
			const result = await this.client.disburseMilestone(
				hexToBytes(entry.milestoneId),
			);
			this.watchMap.delete(entry.milestoneId);
			this.logger.log(
				`Milestone ${entry.milestoneId} settled (payout ${result.payout})`,
			);
		} catch (err) {
			// Backoff on error, with cap
			entry.errorBackoffMs = Math.min(entry.errorBackoffMs * 2, this.maxBackoffMs);
			entry.nextCheckAt = Date.now() + entry.errorBackoffMs;
			this.logger.warn(
				`Payout of milestone ${entry.milestoneId} failed, retrying in ${entry.errorBackoffMs}ms: ${describeError(err)}`,
			);
		}
	}
}
