import { Module } from "@nestjs/common";
import { LedgerModule } from "../ledger/ledger.module";
import { ContractClientService } from "./contract-client.service";
import { DisbursementWatcher } from "./disbursement-watcher.service";

@Module({
	imports: [LedgerModule],
	providers: [ContractClientService, DisbursementWatcher],
	exports: [ContractClientService, DisbursementWatcher],
})
export class OrchestratorModule {}
