import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	Attestor,
	ContractClient,
	DeployedContracts,
	DisbursementResult,
	MilestoneRef,
	milestoneIdToString,
} from "@fundchain/ledger";
import type { EnvironmentVariables } from "../config/environment";
import { MILESTONE_DISBURSED_ID, MilestoneDisbursed } from "../common/ledger.event";
import { ATTESTOR, LEDGER_CONTRACTS } from "../ledger/ledger.constants";

/**
 * ContractClient bound to the deployed contracts and the configured admin and
 * attestation key.
 */
@Injectable()
export class ContractClientService extends ContractClient {
	constructor(
		@Inject(LEDGER_CONTRACTS) contracts: DeployedContracts,
		@Inject(ATTESTOR) attestor: Attestor,
		configService: ConfigService<EnvironmentVariables, true>,
		private readonly events: EventEmitter2,
	) {
		super(contracts, {
			attestor,
			admin: configService.get("ADMIN_ADDRESS", { infer: true }),
			logger: new Logger(ContractClientService.name),
		});
	}

	async disburseMilestone(ref: MilestoneRef): Promise<DisbursementResult> {
		const result = await super.disburseMilestone(ref);
		if (result.approval === "performed" || result.payout === "performed") {
			const event: MilestoneDisbursed = {
				eventId: nanoid(),
				milestoneId: milestoneIdToString(result.milestoneId),
				approval: result.approval,
				payout: result.payout,
				disbursedAt: new Date().toISOString(),
			};
			this.events.emit(MILESTONE_DISBURSED_ID, event);
		}
		return result;
	}
}
