//shared/types/job.types.ts

import { SceneDescription } from "./scene.types.js";



// ============================================================================
// SCENE JOB
// ============================================================================

export const SCENE_JOB_STATUSES = [
    "pending",
    "generating",
    "completed",
    "failed",
] as const;
export type SceneJobStatus = (typeof SCENE_JOB_STATUSES)[ number ];

export const TERMINAL_SCENE_STATUSES: readonly SceneJobStatus[] = [ "completed", "failed" ];

export const SEED_SOURCES = [ "continuity", "static", "none" ] as const;
export type SeedSource = (typeof SEED_SOURCES)[ number ];

export interface SceneJob {
    readonly scenario: string;
    readonly status: SceneJobStatus;
    readonly progress: number;
    readonly durationSeconds: number;
    readonly generatedDurationSeconds?: number;
    readonly durationAdjusted: boolean;
    readonly resultUri?: string;
    readonly error?: string;
    readonly audioUri?: string;
    readonly audioError?: string;
    readonly seedSource?: SeedSource;
    readonly attempts: number;
}

/**
 * Fields a generation task may write. Status changes are validated by the registry.
 */
export type SceneJobUpdate = Partial<Omit<SceneJob, "scenario" | "durationSeconds">>;

// ============================================================================
// GENERATION JOB
// ============================================================================

export const OVERALL_STATUSES = [
    "generating",
    "completed",
    "failed",
    "partial",
] as const;
export type OverallStatus = (typeof OVERALL_STATUSES)[ number ];

export const ASSEMBLY_STATUSES = [
    "pending",
    "running",
    "completed",
    "failed",
    "skipped",
] as const;
export type AssemblyStatus = (typeof ASSEMBLY_STATUSES)[ number ];

export const ASSEMBLY_MODES = [ "single", "crossfade", "lossless" ] as const;
export type AssemblyMode = (typeof ASSEMBLY_MODES)[ number ];

export interface AssemblyRecord {
    readonly status: AssemblyStatus;
    readonly finalVideoPath?: string;
    readonly durationSeconds?: number;
    readonly mode?: AssemblyMode;
    readonly error?: string;
}

export interface GenerationJob {
    readonly jobId: string;
    readonly ownerReference: string;
    readonly createdAt: Date;
    /** Insertion order is the scene order used by every downstream step. */
    readonly scenes: ReadonlyMap<string, SceneJob>;
    readonly descriptions: ReadonlyMap<string, SceneDescription>;
    readonly assembly: AssemblyRecord;
    /** Product image or logo that generated static images are derived from. */
    readonly referenceImagePath?: string;
}

export interface JobStatus {
    jobId: string;
    ownerReference: string;
    createdAt: string;
    overallStatus: OverallStatus;
    scenes: SceneJob[];
    assembly: AssemblyRecord;
}

/** Outcome of regenerating one scene on demand. */
export interface SceneResult {
    jobId: string;
    scenario: string;
    status: "completed" | "failed";
    resultUri?: string;
    error?: string;
    scene: SceneJob;
}

export function isTerminal(status: SceneJobStatus): boolean {
    return TERMINAL_SCENE_STATUSES.includes(status);
}

/**
 * Aggregate phase of a job. Always computed from the scene statuses, never stored.
 */
export function deriveOverallStatus(statuses: readonly SceneJobStatus[]): OverallStatus {
    if (statuses.length > 0 && statuses.every(s => s === "completed")) return "completed";
    if (statuses.length > 0 && statuses.every(s => s === "failed")) return "failed";
    if (statuses.some(s => s === "generating")) return "generating";
    return "partial";
}

// ============================================================================
// JOB EVENTS
// ============================================================================

export type JobEvent =
    | { type: "JOB_CREATED"; jobId: string; scenarios: string[]; }
    | { type: "SCENE_UPDATED"; jobId: string; scene: SceneJob; }
    | { type: "ASSEMBLY_UPDATED"; jobId: string; assembly: AssemblyRecord; };
