import { plainToInstance, Type } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Min,
	validateSync,
} from "class-validator";
import { ATTESTATION_SCHEMES, type AttestationScheme } from "@fundchain/ledger";

export const NODE_ENVIRONMENTS = ["development", "production", "test"] as const;
export type NodeEnvironment = (typeof NODE_ENVIRONMENTS)[number];

export class EnvironmentVariables {
	@IsIn(NODE_ENVIRONMENTS)
	NODE_ENV: NodeEnvironment = "development";

	@IsString()
	@IsNotEmpty()
	SQLITE_DB_PATH = "ledger.sqlite";

	// x-only Schnorr secret, 32 bytes hex
	@Matches(/^[0-9a-fA-F]{64}$/, {
		message: "ATTESTATION_SECRET_KEY must be 32 bytes of hex",
	})
	ATTESTATION_SECRET_KEY!: string;

	@IsString()
	@IsNotEmpty()
	ADMIN_ADDRESS!: string;

	@IsOptional()
	@IsString()
	@IsNotEmpty()
	TOKEN_ADMIN_ADDRESS?: string;

	@IsString()
	@IsNotEmpty()
	TOKEN_SYMBOL = "XLM";

	@IsIn(ATTESTATION_SCHEMES)
	ATTESTATION_SCHEME: AttestationScheme = "schnorr";

	@Type(() => Number)
	@IsInt()
	@Min(100)
	RECONCILE_INTERVAL_MS = 5000;
}

/**
 * `validate` hook for `ConfigModule.forRoot`. Unset variables keep the
 * defaults above; anything invalid stops the application from starting.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
	const validated = plainToInstance(EnvironmentVariables, config);
	const errors = validateSync(validated, { skipMissingProperties: false });
	if (errors.length > 0) {
		const details = errors
			.flatMap((e) => Object.values(e.constraints ?? {}))
			.join("; ");
		throw new Error(`Invalid environment: ${details}`);
	}
	return validated;
}
