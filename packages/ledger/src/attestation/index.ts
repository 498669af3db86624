/**
 * Attestation module - Canonical messages, verification and signing
 */

export type {
	AttestationAction,
	AttestationScheme,
	AttestationPayload,
	AttestationVerifier,
	VerifiedAttestation,
} from "./types.js";

export {
	ATTESTATION_LENGTH,
	ATTESTATION_SCHEMES,
	NONCE_LENGTH,
	SIGNATURE_LENGTH,
} from "./types.js";
export { attestationMessage, encodeAttestation, decodeAttestation } from "./message.js";
export {
	SchnorrAttestationVerifier,
	LengthOnlyAttestationVerifier,
	createAttestationVerifier,
} from "./verifier.js";
export { consumeAttestation, nonceKey } from "./guard.js";
export { SchnorrAttestor, randomNonce, milestonePayoutNonce } from "./attestor.js";
