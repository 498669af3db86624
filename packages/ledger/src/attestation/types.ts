/**
 * Attestation types
 *
 * An attestation authorizes one release-type action. On the wire it is a
 * 64-byte BIP-340 signature followed by an 8-byte big-endian nonce.
 */

import type { Address, Bytes32, XOnlyPubKey } from "../core/types.js";

export const SIGNATURE_LENGTH = 64;
export const NONCE_LENGTH = 8;
export const ATTESTATION_LENGTH = SIGNATURE_LENGTH + NONCE_LENGTH;

export type AttestationAction =
	| "claim"
	| "release"
	| "release-milestone"
	| "rotate-key";

/**
 * `schnorr` verifies signatures and tracks nonces; `length-only` accepts any
 * value of at least 64 bytes and exists for local development only.
 */
export const ATTESTATION_SCHEMES = ["schnorr", "length-only"] as const;
export type AttestationScheme = (typeof ATTESTATION_SCHEMES)[number];

/**
 * Everything an attestation signs over.
 */
export interface AttestationPayload {
	/** Contract that will check the attestation */
	contract: Address;
	action: AttestationAction;
	projectId: Bytes32;
	/** Milestone for milestone actions */
	milestoneId?: Bytes32;
	/** Recipient address or replacement key, depending on action */
	subject?: Uint8Array;
	/** Amount in stroops, 0 when the action moves nothing */
	amount: bigint;
	/** Replay-protection nonce */
	nonce: bigint;
}

/**
 * Outcome of a successful verification.
 */
export interface VerifiedAttestation {
	/** Nonce to mark as consumed, null when the scheme does not track nonces */
	nonce: bigint | null;
}

export interface AttestationVerifier {
	readonly scheme: AttestationScheme;
	/**
	 * @throws ContractError INVALID_ATTESTATION when the attestation does not verify
	 */
	verify(
		attestation: Uint8Array,
		payload: Omit<AttestationPayload, "nonce">,
		pubkey: XOnlyPubKey,
	): Promise<VerifiedAttestation>;
}
