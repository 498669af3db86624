import type { XOnlyPubKey } from "../core/types.js";
import { ContractError } from "../contracts/types.js";
import type { InvocationEnv } from "../runtime/invocation.js";
import { AttestationPayload, AttestationVerifier, SIGNATURE_LENGTH } from "./types.js";

export function nonceKey(nonce: bigint): string {
	return `Nonce:${nonce.toString()}`;
}

/**
 * Check an attestation inside a running invocation and mark its nonce used.
 *
 * Order: minimum length, then signature, then replay. The nonce marker is
 * staged with the rest of the invocation, so a later failure releases it.
 */
export async function consumeAttestation(
	env: InvocationEnv,
	verifier: AttestationVerifier,
	attestation: Uint8Array,
	payload: Omit<AttestationPayload, "nonce">,
	pubkey: XOnlyPubKey,
): Promise<void> {
	if (attestation.length < SIGNATURE_LENGTH) {
		throw new ContractError("Invalid attestation", "INVALID_ATTESTATION", {
			length: attestation.length,
		});
	}

	const { nonce } = await verifier.verify(attestation, payload, pubkey);
	if (nonce === null) return;

	const key = nonceKey(nonce);
	if (await env.persistent().has(key)) {
		throw new ContractError("Attestation nonce already used", "INVALID_ATTESTATION", {
			nonce: nonce.toString(),
		});
	}
	env.persistent().set(key, env.ledger.timestamp);
}
