import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { EnvironmentVariables, validate } from "./config/environment";
import { LedgerModule } from "./ledger/ledger.module";
import { OrchestratorModule } from "./orchestrator/orchestrator.module";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true, validate }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (cfg: ConfigService<EnvironmentVariables, true>) => ({
				type: "better-sqlite3",
				database:
					cfg.get("NODE_ENV", { infer: true }) === "test"
						? ":memory:"
						: cfg.get("SQLITE_DB_PATH", { infer: true }),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		LedgerModule,
		OrchestratorModule,
	],
})
export class AppModule {}
