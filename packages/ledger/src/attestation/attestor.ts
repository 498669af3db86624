import { randomBytes } from "@noble/hashes/utils";
import { sha256 } from "@noble/hashes/sha256";
import { schnorr } from "@noble/secp256k1";
import type { Bytes32, XOnlyPubKey } from "../core/types.js";
import { bytesToU64, concatBytes, stringToBytes } from "../utils/encoding.js";
import { attestationMessage, encodeAttestation } from "./message.js";
import type { AttestationPayload } from "./types.js";

/**
 * Signing side of attestations, held by the release authority.
 *
 * @example
 * ```typescript
 * const attestor = new SchnorrAttestor(secretKey);
 * const attestation = await attestor.attest({
 *   contract: escrow.address,
 *   action: "claim",
 *   projectId,
 *   amount: 200n,
 *   nonce: randomNonce(),
 * });
 * await escrow.claim(projectId, 200n, attestation);
 * ```
 */
export class SchnorrAttestor {
	private readonly pubkey: XOnlyPubKey;

	constructor(private readonly secretKey: Uint8Array) {
		this.pubkey = schnorr.getPublicKey(secretKey);
	}

	publicKey(): XOnlyPubKey {
		return this.pubkey;
	}

	async attest(payload: AttestationPayload): Promise<Uint8Array> {
		const signature = await schnorr.sign(attestationMessage(payload), this.secretKey);
		return encodeAttestation(signature, payload.nonce);
	}
}

/**
 * Fresh random u64 nonce.
 */
export function randomNonce(): bigint {
	return bytesToU64(randomBytes(8));
}

/**
 * Nonce tied to one milestone payout. Retrying a payout reuses it, so the
 * escrow's replay check stops a second transfer for the same milestone.
 */
export function milestonePayoutNonce(milestoneId: Bytes32): bigint {
	const digest = sha256(concatBytes(stringToBytes("fundchain:payout"), milestoneId));
	return bytesToU64(digest.slice(0, 8));
}
