/**
 * Registry Module
 *
 * Project identity and metadata pointers.
 */

export type { Project } from "./types.js";
export { projectToRecord, projectFromRecord } from "./types.js";
export { ProjectRegistry } from "./registry-contract.js";
