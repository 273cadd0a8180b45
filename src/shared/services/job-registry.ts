import { v7 as uuidv7 } from "uuid";
import {
    AssemblyRecord,
    GenerationJob,
    JobEvent,
    JobStatus,
    SceneDescription,
    SceneJob,
    SceneJobStatus,
    SceneJobUpdate,
    deriveOverallStatus,
} from "../types/index.js";
import { NotFoundError } from "../utils/errors.js";
import { logger } from "../logger.js";



const ALLOWED_TRANSITIONS: Record<SceneJobStatus, readonly SceneJobStatus[]> = {
    pending: [ "pending", "generating", "completed", "failed" ],
    generating: [ "generating", "completed", "failed" ],
    completed: [ "completed" ],
    failed: [ "failed" ],
};

export class IllegalTransitionError extends Error {
    constructor(scenario: string, from: SceneJobStatus, to: SceneJobStatus) {
        super(`Scene '${scenario}' cannot move from ${from} to ${to}`);
        this.name = "IllegalTransitionError";
    }
}

/**
 * Produces the next immutable snapshot of a scene job. Status only moves forward,
 * progress never decreases, and the result or error is kept only in the status it belongs to.
 */
export function applySceneUpdate(current: SceneJob, update: SceneJobUpdate, options: { replaceResult?: boolean; } = {}): SceneJob {
    const status = update.status ?? current.status;
    if (!options.replaceResult && !ALLOWED_TRANSITIONS[ current.status ].includes(status)) {
        throw new IllegalTransitionError(current.scenario, current.status, status);
    }

    const requested = Math.round(update.progress ?? current.progress);
    const base = options.replaceResult ? requested : Math.max(current.progress, requested);
    const progress = status === "completed" ? 100 : Math.min(100, Math.max(0, base));

    const next: SceneJob = { ...current, ...update, status, progress };
    const { resultUri, error, ...rest } = next;
    return {
        ...rest,
        ...(status === "completed" && resultUri !== undefined ? { resultUri } : {}),
        ...(status === "failed" ? { error: error ?? "Scene generation failed" } : {}),
    };
}

class JobEntry {
    readonly scenes = new Map<string, SceneJob>();
    readonly descriptions = new Map<string, SceneDescription>();
    readonly staticImages = new Map<string, string>();
    assembly: AssemblyRecord = { status: "pending" };

    constructor(
        readonly jobId: string,
        readonly ownerReference: string,
        readonly createdAt: Date,
        readonly referenceImagePath?: string,
    ) { }
}

/**
 * In-memory store of generation jobs. Every scene write replaces the scene's snapshot
 * in a single assignment so readers never see a half-applied update. Entries are
 * independent of each other; there is no registry-wide lock.
 */
export class JobRegistry {
    private jobs = new Map<string, JobEntry>();

    constructor(private publishJobEvent?: (event: JobEvent) => void) { }

    create(ownerReference: string, descriptions: readonly SceneDescription[], referenceImagePath?: string): GenerationJob {
        const entry = new JobEntry(uuidv7(), ownerReference, new Date(), referenceImagePath);
        for (const description of descriptions) {
            entry.descriptions.set(description.scenario, description);
            entry.scenes.set(description.scenario, {
                scenario: description.scenario,
                status: "pending",
                progress: 0,
                durationSeconds: description.durationSeconds,
                durationAdjusted: false,
                attempts: 0,
            });
        }
        this.jobs.set(entry.jobId, entry);
        this.emit({ type: "JOB_CREATED", jobId: entry.jobId, scenarios: [ ...entry.scenes.keys() ] });
        return this.toGenerationJob(entry);
    }

    has(jobId: string): boolean {
        return this.jobs.has(jobId);
    }

    get(jobId: string): GenerationJob {
        return this.toGenerationJob(this.entry(jobId));
    }

    getScene(jobId: string, scenario: string): SceneJob {
        const scene = this.entry(jobId).scenes.get(scenario);
        if (!scene) {
            throw new NotFoundError(`Scenario '${scenario}' not found in job ${jobId}`, { jobId, scenario });
        }
        return scene;
    }

    getDescription(jobId: string, scenario: string): SceneDescription {
        const description = this.entry(jobId).descriptions.get(scenario);
        if (!description) {
            throw new NotFoundError(`Scenario '${scenario}' not found in job ${jobId}`, { jobId, scenario });
        }
        return description;
    }

    updateScene(jobId: string, scenario: string, update: SceneJobUpdate): SceneJob {
        return this.writeScene(jobId, scenario, update, false);
    }

    /**
     * Replaces a scene's outcome regardless of its current status. Used only for
     * explicit regeneration requested by the caller.
     */
    replaceSceneResult(jobId: string, scenario: string, update: SceneJobUpdate): SceneJob {
        return this.writeScene(jobId, scenario, update, true);
    }

    setStaticImage(jobId: string, scenario: string, handle: string): void {
        this.getScene(jobId, scenario);
        this.entry(jobId).staticImages.set(scenario, handle);
    }

    getStaticImage(jobId: string, scenario: string): string | undefined {
        return this.entry(jobId).staticImages.get(scenario);
    }

    setAssembly(jobId: string, assembly: AssemblyRecord): void {
        const entry = this.entry(jobId);
        entry.assembly = { ...assembly };
        this.emit({ type: "ASSEMBLY_UPDATED", jobId, assembly: entry.assembly });
    }

    snapshot(jobId: string): JobStatus {
        const entry = this.entry(jobId);
        const scenes = [ ...entry.scenes.values() ];
        return {
            jobId: entry.jobId,
            ownerReference: entry.ownerReference,
            createdAt: entry.createdAt.toISOString(),
            overallStatus: deriveOverallStatus(scenes.map(s => s.status)),
            scenes: scenes.map(s => ({ ...s })),
            assembly: { ...entry.assembly },
        };
    }

    private writeScene(jobId: string, scenario: string, update: SceneJobUpdate, replaceResult: boolean): SceneJob {
        const entry = this.entry(jobId);
        const current = this.getScene(jobId, scenario);
        const next = applySceneUpdate(current, update, { replaceResult });
        entry.scenes.set(scenario, next);
        if (next.status !== current.status) {
            logger.debug({ jobId, scenario, from: current.status, to: next.status }, "Scene status changed");
        }
        this.emit({ type: "SCENE_UPDATED", jobId, scene: next });
        return next;
    }

    private entry(jobId: string): JobEntry {
        const entry = this.jobs.get(jobId);
        if (!entry) {
            throw new NotFoundError(`Job ${jobId} not found`, { jobId });
        }
        return entry;
    }

    private toGenerationJob(entry: JobEntry): GenerationJob {
        return {
            jobId: entry.jobId,
            ownerReference: entry.ownerReference,
            createdAt: entry.createdAt,
            scenes: new Map(entry.scenes),
            descriptions: new Map(entry.descriptions),
            assembly: entry.assembly,
            ...(entry.referenceImagePath ? { referenceImagePath: entry.referenceImagePath } : {}),
        };
    }

    private emit(event: JobEvent): void {
        if (!this.publishJobEvent) return;
        try {
            this.publishJobEvent(event);
        } catch (error) {
            logger.warn({ error, eventType: event.type }, "Job event listener threw");
        }
    }
}
