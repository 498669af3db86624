import { sha256 } from "@noble/hashes/sha256";
import { ContractError } from "../contracts/types.js";
import {
	bytesToU64,
	concatBytes,
	i128ToBytes,
	lengthPrefixed,
	stringToBytes,
	u64ToBytes,
} from "../utils/encoding.js";
import {
	ATTESTATION_LENGTH,
	AttestationPayload,
	SIGNATURE_LENGTH,
} from "./types.js";

const DOMAIN_TAG = stringToBytes("fundchain:attestation:v1");
const NO_MILESTONE = new Uint8Array(32);

/**
 * SHA-256 digest of the canonical encoding of a payload. This is the message
 * the attestation authority signs.
 */
export function attestationMessage(payload: AttestationPayload): Uint8Array {
	return sha256(
		concatBytes(
			DOMAIN_TAG,
			lengthPrefixed(stringToBytes(payload.contract)),
			lengthPrefixed(stringToBytes(payload.action)),
			lengthPrefixed(payload.projectId),
			lengthPrefixed(payload.milestoneId ?? NO_MILESTONE),
			lengthPrefixed(payload.subject ?? new Uint8Array(0)),
			i128ToBytes(payload.amount),
			u64ToBytes(payload.nonce),
		),
	);
}

export function encodeAttestation(signature: Uint8Array, nonce: bigint): Uint8Array {
	if (signature.length !== SIGNATURE_LENGTH) {
		throw new ContractError(
			`Signature must be ${SIGNATURE_LENGTH} bytes`,
			"INVALID_ARGUMENT",
		);
	}
	return concatBytes(signature, u64ToBytes(nonce));
}

export function decodeAttestation(attestation: Uint8Array): {
	signature: Uint8Array;
	nonce: bigint;
} {
	if (attestation.length !== ATTESTATION_LENGTH) {
		throw new ContractError(
			`Attestation must be ${ATTESTATION_LENGTH} bytes`,
			"INVALID_ATTESTATION",
			{ length: attestation.length },
		);
	}
	return {
		signature: attestation.slice(0, SIGNATURE_LENGTH),
		nonce: bytesToU64(attestation.slice(SIGNATURE_LENGTH)),
	};
}
