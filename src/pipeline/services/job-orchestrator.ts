import fs from "fs";
import path from "path";
import { v7 as uuidv7 } from "uuid";
import { AppConfig } from "../../shared/config.js";
import { createJobLogger, logger, withLogContext } from "../../shared/logger.js";
import { JobRegistry } from "../../shared/services/job-registry.js";
import { TaskPool } from "../../shared/services/task-pool.js";
import { waitForTask } from "../../shared/services/task-poller.js";
import {
    AssemblyRecord,
    GenerationClient,
    JobStatus,
    MediaTranscoder,
    SceneDescription,
    SceneResult,
    isTerminal,
} from "../../shared/types/index.js";
import { InvalidInputError, extractErrorDetails, extractErrorMessage } from "../../shared/utils/errors.js";
import { ResolvedDuration, resolveVideoDuration } from "../../shared/utils/utils.js";
import { AssemblyEngine, AssemblyInput } from "../agents/assembly-engine.js";
import { ParallelFanOutGenerator } from "../agents/fan-out-generator.js";
import { ChainScene, FrameChainedVideoGenerator } from "../agents/frame-chain-generator.js";
import { PromptBuilder, defaultPromptBuilder } from "../agents/prompt-builder.js";
import { selectInitialSeed } from "../agents/seed-policy.js";
import { LockManager } from "./lock-manager.js";



export interface JobOrchestratorDeps {
    client: GenerationClient;
    transcoder: MediaTranscoder;
    config: AppConfig;
    registry?: JobRegistry;
    promptBuilder?: PromptBuilder;
}

export interface SubmitOptions {
    /**
     * Product image or logo. Uploaded once per job and passed to every generated
     * static image as its image-to-image reference.
     */
    referenceImagePath?: string;
}

/**
 * Top-level coordinator. `submit` registers a job and hands its pipeline to a detached
 * task pool; callers follow progress through `getStatus`. Generation errors are recorded
 * on the scene they belong to and never escape the background pipeline.
 */
export class JobOrchestrator {
    readonly registry: JobRegistry;

    private client: GenerationClient;
    private config: AppConfig;
    private prompts: PromptBuilder;
    private chain: FrameChainedVideoGenerator;
    private fanOut: ParallelFanOutGenerator;
    private transcoder: MediaTranscoder;
    private jobPool: TaskPool;
    private locks = new LockManager();
    private running = new Map<string, Promise<void>>();
    private regenerations = new Map<string, number>();
    private accepting = true;

    constructor(deps: JobOrchestratorDeps) {
        this.client = deps.client;
        this.transcoder = deps.transcoder;
        this.config = deps.config;
        this.registry = deps.registry ?? new JobRegistry();
        this.prompts = deps.promptBuilder ?? defaultPromptBuilder;
        this.fanOut = new ParallelFanOutGenerator(this.config.pipeline.fanOutConcurrency);
        this.jobPool = new TaskPool(this.config.pipeline.maxConcurrentJobs);

        const { generation, pipeline } = this.config;
        this.chain = new FrameChainedVideoGenerator(this.client, this.transcoder, {
            frameContinuity: pipeline.frameContinuity,
            pollIntervalMs: generation.pollIntervalMs,
            pollTimeoutMs: generation.pollTimeoutMs,
            settleDelayMs: pipeline.seedSettleDelayMs,
            seedPolicy: {
                maxSameSeedRetries: pipeline.maxSameSeedRetries,
                baseDelayMs: pipeline.seedRetryBaseDelayMs,
            },
        });
    }

    /**
     * Validates the scenes, registers a job with every scene `pending` and schedules
     * its generation. Returns the job id without waiting for any generation work.
     */
    submit(descriptions: readonly SceneDescription[], ownerReference: string = "anonymous", options: SubmitOptions = {}): string {
        if (!this.accepting) {
            throw new InvalidInputError("Orchestrator is shutting down and no longer accepts jobs");
        }
        const scenes = this.validate(descriptions);
        const { referenceImagePath } = options;
        if (referenceImagePath !== undefined && !fs.existsSync(referenceImagePath)) {
            throw new InvalidInputError(`Reference image not found: ${referenceImagePath}`, { referenceImagePath });
        }
        const job = this.registry.create(ownerReference, scenes, referenceImagePath);
        const context = { jobId: job.jobId, ownerReference, correlationId: uuidv7() };
        const jobLogger = createJobLogger(context);

        jobLogger.info({ scenarios: scenes.map(s => s.scenario), referenceImagePath }, "Generation job submitted");

        const pipeline = this.jobPool
            .run(() => withLogContext(context, () => this.runPipeline(job.jobId)))
            .catch((error: unknown) => {
                jobLogger.error({ error: extractErrorDetails(error) }, "Generation pipeline crashed");
                this.failUnfinishedScenes(job.jobId, `Pipeline error: ${extractErrorMessage(error)}`);
                this.registry.setAssembly(job.jobId, { status: "failed", error: extractErrorMessage(error) });
            })
            .finally(() => {
                this.running.delete(job.jobId);
            });
        this.running.set(job.jobId, pipeline);

        return job.jobId;
    }

    getStatus(jobId: string): JobStatus {
        return this.registry.snapshot(jobId);
    }

    /**
     * Re-generates one scene from its stored description, seeded only by its own static
     * image. The scene's result is replaced on success and the final video is rebuilt
     * once the job's pipeline has finished; on failure the previous state is kept and
     * the failure is returned. A scene the pipeline has not finished yet is rejected
     * once any in-flight work on it settles.
     */
    async regenerateSingle(jobId: string, scenario: string): Promise<SceneResult> {
        const description = this.registry.getDescription(jobId, scenario);
        const ownerReference = this.registry.get(jobId).ownerReference;
        const context = { jobId, ownerReference, scenario, correlationId: uuidv7() };

        const result = await withLogContext(context, () => this.regenerateScene(jobId, description));
        if (result.status === "completed") {
            await this.running.get(jobId);
            await withLogContext(context, () => this.assembleLocked(jobId));
        }
        return result;
    }

    /**
     * Rebuilds the final video from the scenes that are currently completed, in scene
     * order, with their audio. Rejected while the job's pipeline is still running.
     */
    async reassemble(jobId: string): Promise<AssemblyRecord> {
        const { ownerReference } = this.registry.get(jobId);
        if (this.running.has(jobId)) {
            throw new InvalidInputError(`Job ${jobId} is still generating; it can be re-assembled once it has finished`, { jobId });
        }
        const context = { jobId, ownerReference, correlationId: uuidv7() };
        await withLogContext(context, () => this.assembleLocked(jobId));
        return this.getStatus(jobId).assembly;
    }

    /** Resolves once the job's background pipeline has finished. */
    async waitForJob(jobId: string): Promise<JobStatus> {
        this.registry.get(jobId);
        await this.running.get(jobId);
        return this.getStatus(jobId);
    }

    async shutdown(): Promise<void> {
        this.accepting = false;
        logger.info({ inFlight: this.running.size, ...this.jobPool.getMetrics() }, "Shutting down orchestrator; waiting for in-flight jobs");
        await Promise.allSettled([ ...this.running.values() ]);
    }

    private regenerateScene(jobId: string, description: SceneDescription): Promise<SceneResult> {
        const { scenario } = description;
        return this.locks.withLock(this.sceneKey(jobId, scenario), async (): Promise<SceneResult> => {
            const current = this.registry.getScene(jobId, scenario);
            if (!isTerminal(current.status)) {
                throw new InvalidInputError(`Scene '${scenario}' is still ${current.status}; it can be regenerated once it has finished`, { jobId, scenario });
            }

            const version = (this.regenerations.get(this.sceneKey(jobId, scenario)) ?? 0) + 1;
            this.regenerations.set(this.sceneKey(jobId, scenario), version);

            const { duration, adjusted } = this.resolveDuration(description);
            const staticImage = this.registry.getStaticImage(jobId, scenario);
            logger.info({ version, staticImage: Boolean(staticImage) }, "Regenerating scene");

            const outcome = await this.chain.generateScene(
                this.toChainScene(jobId, description, { duration, adjusted }, `${scenario}_v${version + 1}.mp4`),
                selectInitialSeed(undefined, staticImage),
            );

            const previous = this.registry.getScene(jobId, scenario);
            if (outcome.status === "completed" && outcome.videoPath) {
                const scene = this.registry.replaceSceneResult(jobId, scenario, {
                    status: "completed",
                    progress: 100,
                    resultUri: outcome.videoPath,
                    generatedDurationSeconds: duration,
                    durationAdjusted: adjusted,
                    seedSource: outcome.seedSource,
                    attempts: previous.attempts + outcome.attempts,
                });
                return { jobId, scenario, status: "completed", resultUri: outcome.videoPath, scene };
            }

            logger.warn({ error: outcome.error }, "Regeneration failed; keeping previous result");
            return { jobId, scenario, status: "failed", error: outcome.error ?? "Scene regeneration failed", scene: previous };
        });
    }

    private validate(descriptions: readonly SceneDescription[]): SceneDescription[] {
        if (!Array.isArray(descriptions) || descriptions.length === 0) {
            throw new InvalidInputError("At least one scene description is required");
        }

        const scenes = descriptions.map((description, index) => {
            const parsed = SceneDescription.safeParse(description);
            if (!parsed.success) {
                throw new InvalidInputError(`Invalid scene description at index ${index}`, {
                    index,
                    issues: parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
                });
            }
            return parsed.data;
        });

        const seen = new Set<string>();
        for (const scene of scenes) {
            if (seen.has(scene.scenario)) {
                throw new InvalidInputError(`Duplicate scenario '${scene.scenario}'`, { scenario: scene.scenario });
            }
            seen.add(scene.scenario);
        }
        return scenes;
    }

    private async runPipeline(jobId: string): Promise<void> {
        const job = this.registry.get(jobId);
        const descriptions = [ ...job.descriptions.values() ];
        const workDir = this.workDir(jobId);
        await fs.promises.mkdir(workDir, { recursive: true });

        const durations = new Map<string, ResolvedDuration>();
        for (const description of descriptions) {
            const resolved = this.resolveDuration(description);
            durations.set(description.scenario, resolved);
            if (resolved.adjusted) {
                logger.info({ scenario: description.scenario, requested: description.durationSeconds, generated: resolved.duration }, "Duration rounded up to an accepted value");
            }
            this.registry.updateScene(jobId, description.scenario, {
                generatedDurationSeconds: resolved.duration,
                durationAdjusted: resolved.adjusted,
            });
        }

        const staticImages = await this.generateStaticImages(jobId, descriptions, workDir);
        const { minStaticImages } = this.config.pipeline;
        if (staticImages < minStaticImages) {
            const message = `Only ${staticImages} of the required ${minStaticImages} static images were produced`;
            logger.error({ staticImages, minStaticImages }, message);
            this.failUnfinishedScenes(jobId, message);
            this.registry.setAssembly(jobId, { status: "skipped", error: message });
            return;
        }

        const audioTask = this.generateAudio(jobId, descriptions, durations, workDir);
        await this.chain.generateChain(
            descriptions.map(description => this.toChainScene(jobId, description, durations.get(description.scenario) ?? this.resolveDuration(description))),
            {
                report: (scenario, update) => this.registry.updateScene(jobId, scenario, update),
                guard: (scenario, fn) => this.locks.withLock(this.sceneKey(jobId, scenario), fn),
            },
        );
        await audioTask;

        await this.assembleLocked(jobId);

        const status = this.getStatus(jobId);
        logger.info({ overallStatus: status.overallStatus, assembly: status.assembly.status }, "Generation job finished");
    }

    /**
     * Produces a static image per scene that asks for one and registers it as a
     * reference. Returns how many registered handles were obtained.
     */
    private async generateStaticImages(jobId: string, descriptions: SceneDescription[], workDir: string): Promise<number> {
        const wanted = descriptions.filter(d => d.imagePath || d.imagePrompt);
        if (wanted.length === 0) return 0;
        const referenceHandle = await this.registerJobReference(jobId, wanted);

        const outcomes = await this.fanOut.generate(
            wanted.map(description => ({
                key: description.scenario,
                run: async () => {
                    if (description.imagePath) return description.imagePath;
                    const taskId = await this.client.submitImage(this.prompts.buildImagePrompt(description), referenceHandle);
                    const uri = await waitForTask(this.client, taskId, {
                        intervalMs: this.config.generation.pollIntervalMs,
                        timeoutMs: this.config.generation.pollTimeoutMs,
                        label: `image generation for ${description.scenario}`,
                    });
                    const imagePath = path.join(workDir, `${description.scenario}_static${extensionOf(uri, ".png")}`);
                    await this.client.download(uri, imagePath);
                    return imagePath;
                },
            })),
            {
                register: (imagePath) => this.client.uploadReference(imagePath),
                onSettled: (outcome) => {
                    if (outcome.status === "succeeded" && outcome.handle) {
                        this.registry.setStaticImage(jobId, outcome.key, outcome.handle);
                    }
                },
            },
        );

        return outcomes.filter(o => o.status === "succeeded" && o.handle).length;
    }

    /**
     * Uploads the job's reference image once so generated static images are
     * image-to-image from it. Without one, or when the upload fails, they are text-to-image.
     */
    private async registerJobReference(jobId: string, wanted: SceneDescription[]): Promise<string | undefined> {
        const { referenceImagePath } = this.registry.get(jobId);
        if (!referenceImagePath || wanted.every(d => d.imagePath)) return undefined;
        try {
            const handle = await this.client.uploadReference(referenceImagePath);
            logger.info({ referenceImagePath, handle }, "Job reference image registered");
            return handle;
        } catch (error) {
            logger.warn({ referenceImagePath, error: extractErrorMessage(error) }, "Job reference image could not be registered; generating static images from text");
            return undefined;
        }
    }

    private async generateAudio(
        jobId: string,
        descriptions: SceneDescription[],
        durations: Map<string, ResolvedDuration>,
        workDir: string,
    ): Promise<void> {
        const { maxAudioDurationSeconds } = this.config.pipeline;
        await this.fanOut.generate(
            descriptions.map(description => ({
                key: description.scenario,
                run: async () => {
                    const length = Math.min(durations.get(description.scenario)?.duration ?? description.durationSeconds, maxAudioDurationSeconds);
                    const taskId = await this.client.submitAudio(this.prompts.buildAudioPrompt(description), length);
                    const uri = await waitForTask(this.client, taskId, {
                        intervalMs: this.config.generation.pollIntervalMs,
                        timeoutMs: this.config.generation.pollTimeoutMs,
                        label: `audio generation for ${description.scenario}`,
                    });
                    const audioPath = path.join(workDir, `${description.scenario}_audio${extensionOf(uri, ".wav")}`);
                    await this.client.download(uri, audioPath);
                    return audioPath;
                },
            })),
            {
                onSettled: (outcome) => {
                    this.registry.updateScene(jobId, outcome.key, outcome.status === "succeeded"
                        ? { audioUri: outcome.result }
                        : { audioError: outcome.error });
                },
            },
        );
    }

    private assembleLocked(jobId: string): Promise<void> {
        return this.locks.withLock(`${jobId}:assembly`, () => this.assemble(jobId));
    }

    /** Step B onwards, from whatever the registry holds for the job right now. */
    private async assemble(jobId: string): Promise<void> {
        const workDir = this.workDir(jobId);
        const inputs: AssemblyInput[] = this.registry.snapshot(jobId).scenes.flatMap(scene => scene.status === "completed" && scene.resultUri
            ? [ { scenario: scene.scenario, videoPath: scene.resultUri, audioPath: scene.audioUri } ]
            : []);

        if (inputs.length === 0) {
            logger.warn("No scene completed; skipping assembly");
            this.registry.setAssembly(jobId, { status: "skipped", error: "No scene completed" });
            return;
        }

        this.registry.setAssembly(jobId, { status: "running" });
        try {
            const engine = new AssemblyEngine(this.transcoder, { workDir, transitionSeconds: this.config.media.transitionSeconds });
            const result = await engine.assemble(inputs, path.join(workDir, "final_video.mp4"));
            this.registry.setAssembly(jobId, {
                status: "completed",
                finalVideoPath: result.finalVideoPath,
                durationSeconds: result.durationSeconds,
                mode: result.mode,
            });
        } catch (error) {
            logger.error({ error: extractErrorDetails(error) }, "Final assembly failed");
            this.registry.setAssembly(jobId, { status: "failed", error: extractErrorMessage(error) });
        }
    }

    private failUnfinishedScenes(jobId: string, message: string): void {
        if (!this.registry.has(jobId)) return;
        for (const scene of this.registry.snapshot(jobId).scenes) {
            if (!isTerminal(scene.status)) {
                this.registry.updateScene(jobId, scene.scenario, { status: "failed", error: message });
            }
        }
    }

    private toChainScene(jobId: string, description: SceneDescription, resolved: ResolvedDuration, clipName: string = `${description.scenario}.mp4`): ChainScene {
        return {
            scenario: description.scenario,
            prompt: this.prompts.buildVideoPrompt(description),
            durationSeconds: resolved.duration,
            staticImage: this.registry.getStaticImage(jobId, description.scenario),
            clipPath: path.join(this.workDir(jobId), clipName),
        };
    }

    private resolveDuration(description: SceneDescription): ResolvedDuration {
        return resolveVideoDuration(description.durationSeconds, this.config.pipeline.acceptedVideoDurations);
    }

    private workDir(jobId: string): string {
        return path.join(this.config.media.outputDir, jobId);
    }

    private sceneKey(jobId: string, scenario: string): string {
        return `${jobId}:${scenario}`;
    }
}

function extensionOf(uri: string, fallback: string): string {
    try {
        const ext = path.extname(new URL(uri).pathname);
        return ext || fallback;
    } catch {
        return path.extname(uri) || fallback;
    }
}
