/**
 * Registry Module Types
 */

import type { Address, Bytes32 } from "../../core/types.js";
import {
	StorageRecord,
	StorageValue,
	asRecord,
	readBytes,
	readNumber,
	readString,
} from "../../storage/codec.js";

/**
 * A registered project. Only `metadataUri` changes after registration.
 */
export interface Project {
	projectId: Bytes32;
	owner: Address;
	/** Off-chain metadata pointer */
	metadataUri: string;
	/** Ledger unix seconds at registration */
	registeredAt: number;
}

export function projectToRecord(project: Project): StorageRecord {
	return {
		projectId: project.projectId,
		owner: project.owner,
		metadataUri: project.metadataUri,
		registeredAt: project.registeredAt,
	};
}

export function projectFromRecord(value: StorageValue): Project {
	const record = asRecord(value, "project");
	return {
		projectId: readBytes(record, "projectId"),
		owner: readString(record, "owner"),
		metadataUri: readString(record, "metadataUri"),
		registeredAt: readNumber(record, "registeredAt"),
	};
}
