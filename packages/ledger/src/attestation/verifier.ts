import { schnorr } from "@noble/secp256k1";
import type { XOnlyPubKey } from "../core/types.js";
import { ContractError } from "../contracts/types.js";
import { attestationMessage, decodeAttestation } from "./message.js";
import {
	AttestationPayload,
	AttestationScheme,
	AttestationVerifier,
	VerifiedAttestation,
} from "./types.js";

/**
 * BIP-340 Schnorr verification over the canonical, nonce-bound message.
 */
export class SchnorrAttestationVerifier implements AttestationVerifier {
	readonly scheme = "schnorr";

	async verify(
		attestation: Uint8Array,
		payload: Omit<AttestationPayload, "nonce">,
		pubkey: XOnlyPubKey,
	): Promise<VerifiedAttestation> {
		const { signature, nonce } = decodeAttestation(attestation);
		const message = attestationMessage({ ...payload, nonce });
		let ok = false;
		try {
			ok = await schnorr.verify(signature, message, pubkey);
		} catch (cause) {
			throw new ContractError("Invalid attestation input", "INVALID_ATTESTATION", {
				cause,
			});
		}
		if (!ok) {
			throw new ContractError("Invalid attestation signature", "INVALID_ATTESTATION", {
				action: payload.action,
			});
		}
		return { nonce };
	}
}

/**
 * Length check only. Any value of 64 bytes or more passes and nonces are not
 * tracked, so this gives no protection at all; development hosts only.
 */
export class LengthOnlyAttestationVerifier implements AttestationVerifier {
	readonly scheme = "length-only";

	async verify(): Promise<VerifiedAttestation> {
		return { nonce: null };
	}
}

export function createAttestationVerifier(
	scheme: AttestationScheme,
): AttestationVerifier {
	switch (scheme) {
		case "schnorr":
			return new SchnorrAttestationVerifier();
		case "length-only":
			return new LengthOnlyAttestationVerifier();
	}
}
