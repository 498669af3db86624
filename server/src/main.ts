import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { describeError } from "./common/errors";
import { ContractClientService } from "./orchestrator/contract-client.service";

dotenv.config();

async function bootstrap() {
	// no HTTP listener: the ledger is driven in-process
	const app = await NestFactory.createApplicationContext(AppModule);
	app.enableShutdownHooks();

	const contracts = app.get(ContractClientService).getContracts();
	Logger.log(
		`Ledger host running (escrow ${contracts.funding_escrow}, milestones ${contracts.milestone_manager})`,
		"Bootstrap",
	);
}

bootstrap().catch((err: unknown) => {
	Logger.error(`Failed to start: ${describeError(err)}`, "Bootstrap");
	process.exitCode = 1;
});
