/**
 * Project Registry Contract
 *
 * Owns project identity and the metadata pointer. Nothing else on the ledger
 * depends on it; off-chain orchestration reads it.
 */

import {
	Address,
	Bytes32,
	assertAddress,
	assertBytes32,
	idToHex,
} from "../../core/types.js";
import { ContractError } from "../../contracts/types.js";
import { Contract } from "../../runtime/contract.js";
import type { InvocationEnv } from "../../runtime/invocation.js";
import type { CallOptions } from "../../runtime/types.js";
import { Project, projectFromRecord, projectToRecord } from "./types.js";

const PROJECT_COUNT_KEY = "ProjectCount";

function projectKey(projectId: Bytes32): string {
	return `Project:${idToHex(projectId)}`;
}

export class ProjectRegistry extends Contract {
	/**
	 * Register a project under `owner`. Each projectId can be registered once.
	 */
	async register(
		owner: Address,
		projectId: Bytes32,
		metadataUri: string,
		options?: CallOptions,
	): Promise<Project> {
		return this.invoke("register", options, async (env) => {
			assertAddress(owner, "owner");
			assertBytes32(projectId, "projectId");
			env.requireAuth(owner);

			if (await env.persistent().has(projectKey(projectId))) {
				throw new ContractError("Project already registered", "ALREADY_REGISTERED", {
					projectId: idToHex(projectId),
				});
			}

			const project: Project = {
				projectId,
				owner,
				metadataUri,
				registeredAt: env.ledger.timestamp,
			};
			env.persistent().set(projectKey(projectId), projectToRecord(project));
			env.instance().set(PROJECT_COUNT_KEY, (await readCount(env)) + 1);

			env.publish("project_registered", {
				projectId: idToHex(projectId),
				owner,
				metadataUri,
			});
			return project;
		});
	}

	/**
	 * Replace the metadata pointer. Needs the stored owner's authorization.
	 */
	async updateMetadata(
		projectId: Bytes32,
		newUri: string,
		options?: CallOptions,
	): Promise<Project> {
		return this.invoke("update_metadata", options, async (env) => {
			assertBytes32(projectId, "projectId");
			const stored = await env.persistent().get(projectKey(projectId));
			if (stored === null) {
				throw new ContractError("Project not found", "NOT_FOUND", {
					projectId: idToHex(projectId),
				});
			}
			const project = projectFromRecord(stored);
			env.requireAuth(project.owner);

			const updated: Project = { ...project, metadataUri: newUri };
			env.persistent().set(projectKey(projectId), projectToRecord(updated));
			env.publish("project_metadata_updated", {
				projectId: idToHex(projectId),
				metadataUri: newUri,
			});
			return updated;
		});
	}

	getProject(projectId: Bytes32): Promise<Project | null> {
		return this.query("get_project", async (env) => {
			assertBytes32(projectId, "projectId");
			const stored = await env.persistent().get(projectKey(projectId));
			return stored === null ? null : projectFromRecord(stored);
		});
	}

	getProjectCount(): Promise<number> {
		return this.query("get_project_count", readCount);
	}
}

async function readCount(env: InvocationEnv): Promise<number> {
	const stored = await env.instance().get(PROJECT_COUNT_KEY);
	return typeof stored === "number" ? stored : 0;
}
