import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { TypeOrmModule, getRepositoryToken } from "@nestjs/typeorm";
import type { Repository } from "typeorm";
import {
	AttestationVerifier,
	LedgerHost,
	SchnorrAttestor,
	createAttestationVerifier,
	deployContracts,
	hexToBytes,
} from "@fundchain/ledger";
import type { EnvironmentVariables } from "../config/environment";
import { ContractStateEntry } from "./contract-state.entity";
import { TypeOrmStorageAdapter } from "./typeorm-storage-adapter";
import { LedgerEventsBridge } from "./ledger-events.service";
import {
	ATTESTATION_VERIFIER,
	ATTESTOR,
	CONTRACT_ADDRESSES,
	LEDGER_CONTRACTS,
	LEDGER_HOST,
	LEDGER_STORAGE,
} from "./ledger.constants";

type Config = ConfigService<EnvironmentVariables, true>;

@Module({
	imports: [TypeOrmModule.forFeature([ContractStateEntry])],
	providers: [
		{
			provide: LEDGER_STORAGE,
			inject: [getRepositoryToken(ContractStateEntry)],
			useFactory: (repository: Repository<ContractStateEntry>) =>
				new TypeOrmStorageAdapter(repository),
		},
		{
			provide: LEDGER_HOST,
			inject: [LEDGER_STORAGE],
			useFactory: (storage: TypeOrmStorageAdapter) =>
				new LedgerHost({ storage, logger: new Logger(LedgerHost.name) }),
		},
		{
			provide: ATTESTATION_VERIFIER,
			inject: [ConfigService],
			useFactory: (cfg: Config) => {
				const scheme = cfg.get("ATTESTATION_SCHEME", { infer: true });
				Logger.log(`ATTESTATION_SCHEME=${scheme}`);
				return createAttestationVerifier(scheme);
			},
		},
		{
			provide: ATTESTOR,
			inject: [ConfigService],
			useFactory: (cfg: Config) =>
				new SchnorrAttestor(
					hexToBytes(cfg.get("ATTESTATION_SECRET_KEY", { infer: true })),
				),
		},
		{
			provide: LEDGER_CONTRACTS,
			inject: [LEDGER_HOST, ATTESTOR, ATTESTATION_VERIFIER, ConfigService],
			useFactory: (
				host: LedgerHost,
				attestor: SchnorrAttestor,
				verifier: AttestationVerifier,
				cfg: Config,
			) =>
				deployContracts(host, {
					admin: cfg.get("ADMIN_ADDRESS", { infer: true }),
					tokenAdmin: cfg.get("TOKEN_ADMIN_ADDRESS", { infer: true }),
					tokenSymbol: cfg.get("TOKEN_SYMBOL", { infer: true }),
					attestationKey: attestor.publicKey(),
					addresses: CONTRACT_ADDRESSES,
					verifier,
					logger: new Logger("LedgerContracts"),
				}),
		},
		LedgerEventsBridge,
	],
	exports: [
		LEDGER_STORAGE,
		LEDGER_HOST,
		LEDGER_CONTRACTS,
		ATTESTATION_VERIFIER,
		ATTESTOR,
	],
})
export class LedgerModule {}
