import { validate } from "./environment";

describe("validate", () => {
	const required = {
		ATTESTATION_SECRET_KEY: "07".repeat(32),
		ADMIN_ADDRESS: "GADMIN",
	};

	it("should fill in defaults for unset variables", () => {
		const env = validate(required);

		expect(env.NODE_ENV).toBe("development");
		expect(env.SQLITE_DB_PATH).toBe("ledger.sqlite");
		expect(env.TOKEN_SYMBOL).toBe("XLM");
		expect(env.TOKEN_ADMIN_ADDRESS).toBeUndefined();
		expect(env.ATTESTATION_SCHEME).toBe("schnorr");
		expect(env.RECONCILE_INTERVAL_MS).toBe(5000);
	});

	it("should convert numeric variables", () => {
		const env = validate({ ...required, RECONCILE_INTERVAL_MS: "250" });
		expect(env.RECONCILE_INTERVAL_MS).toBe(250);
	});

	it("should reject a malformed secret key", () => {
		expect(() => validate({ ...required, ATTESTATION_SECRET_KEY: "abc" })).toThrow(
			"Invalid environment: ATTESTATION_SECRET_KEY must be 32 bytes of hex",
		);
	});

	it("should require the admin address", () => {
		expect(() => validate({ ATTESTATION_SECRET_KEY: required.ATTESTATION_SECRET_KEY })).toThrow(
			/ADMIN_ADDRESS should not be empty/,
		);
	});

	it("should reject unknown attestation schemes", () => {
		expect(() => validate({ ...required, ATTESTATION_SCHEME: "ecdsa" })).toThrow(
			/ATTESTATION_SCHEME must be one of the following values/,
		);
	});

	it("should reject intervals below 100ms", () => {
		expect(() => validate({ ...required, RECONCILE_INTERVAL_MS: "50" })).toThrow(
			"Invalid environment: RECONCILE_INTERVAL_MS must not be less than 100",
		);
	});
});
