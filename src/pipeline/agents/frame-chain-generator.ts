import path from "path";
import { GenerationClient, MediaTranscoder, SceneJobUpdate, SeedSource } from "../../shared/types/index.js";
import { waitForTask } from "../../shared/services/task-poller.js";
import { extractErrorMessage } from "../../shared/utils/errors.js";
import { sleep } from "../../shared/utils/utils.js";
import { logger, withScenario } from "../../shared/logger.js";
import {
    DEFAULT_SEED_POLICY,
    SeedAttemptState,
    SeedChoice,
    SeedPolicyOptions,
    applySeedAction,
    initialAttemptState,
    nextSeedAction,
    selectInitialSeed,
} from "./seed-policy.js";



export interface ChainScene {
    scenario: string;
    prompt: string;
    /** Duration already resolved against what the video model accepts. */
    durationSeconds: number;
    staticImage?: string;
    /** Where the downloaded clip is written; the continuity frame goes beside it. */
    clipPath: string;
}

export interface ClipOutcome {
    scenario: string;
    status: "completed" | "failed";
    videoPath?: string;
    error?: string;
    seedSource: SeedSource;
    attempts: number;
}

/** Receives scene job updates as generation advances. */
export type SceneReporter = (scenario: string, update: SceneJobUpdate) => void;

/** Serialises work on one scene with any other writer of that scene. */
export type SceneGuard = <T>(scenario: string, fn: () => Promise<T>) => Promise<T>;

export interface ChainRunOptions {
    report?: SceneReporter;
    guard?: SceneGuard;
}

export interface FrameChainOptions {
    frameContinuity: boolean;
    pollIntervalMs: number;
    pollTimeoutMs: number;
    /** Pause after registering a continuity frame, before it is used as a seed. */
    settleDelayMs: number;
    seedPolicy?: SeedPolicyOptions;
}

export const PROGRESS = {
    dispatched: 10,
    submitted: 30,
    generated: 70,
    downloaded: 80,
} as const;

const noopReporter: SceneReporter = () => { };
const unguarded: SceneGuard = (_scenario, fn) => fn();

/**
 * Generates scene clips strictly in order. When continuity is on, each clip is seeded
 * with the last frame of the clip before it; a scene only starts once the previous one
 * is terminal. Seed transfer failures follow the seed policy, and a failed scene hands
 * the next one no continuity token.
 */
export class FrameChainedVideoGenerator {

    constructor(
        private client: GenerationClient,
        private transcoder: MediaTranscoder,
        private options: FrameChainOptions,
    ) { }

    async generateChain(scenes: readonly ChainScene[], options: ChainRunOptions = {}): Promise<ClipOutcome[]> {
        const { report = noopReporter, guard = unguarded } = options;
        const outcomes: ClipOutcome[] = [];
        let continuityToken: string | undefined;

        for (const [ index, scene ] of scenes.entries()) {
            const seed = selectInitialSeed(this.options.frameContinuity ? continuityToken : undefined, scene.staticImage);
            const outcome = await guard(scene.scenario, () =>
                withScenario(scene.scenario, () => this.generateScene(scene, seed, report)));
            outcomes.push(outcome);

            continuityToken = undefined;
            const isLast = index === scenes.length - 1;
            if (outcome.status === "completed" && outcome.videoPath && this.options.frameContinuity && !isLast) {
                continuityToken = await this.registerContinuityFrame(scene, outcome.videoPath);
            }
        }

        return outcomes;
    }

    /**
     * Runs one scene to a terminal outcome, retrying under the seed policy.
     * Never throws for generation failures; they are reported on the outcome.
     */
    async generateScene(scene: ChainScene, initialSeed: SeedChoice, report: SceneReporter = noopReporter): Promise<ClipOutcome> {
        let state: SeedAttemptState = initialAttemptState(initialSeed);

        while (true) {
            report(scene.scenario, {
                status: "generating",
                progress: PROGRESS.dispatched,
                seedSource: state.seed.source,
                attempts: state.attempts,
            });

            try {
                const videoPath = await this.attempt(scene, state.seed, report);
                report(scene.scenario, {
                    status: "completed",
                    resultUri: videoPath,
                    seedSource: state.seed.source,
                    attempts: state.attempts,
                });
                logger.info({ scenario: scene.scenario, videoPath, seedSource: state.seed.source, attempts: state.attempts }, "Scene video completed");
                return { scenario: scene.scenario, status: "completed", videoPath, seedSource: state.seed.source, attempts: state.attempts };
            } catch (error) {
                const action = nextSeedAction(state, error, scene.staticImage, this.options.seedPolicy ?? DEFAULT_SEED_POLICY);
                const message = extractErrorMessage(error);

                if (action.type === "fail") {
                    logger.error({ scenario: scene.scenario, error: message, reason: action.reason, attempts: state.attempts }, "Scene video failed");
                    report(scene.scenario, { status: "failed", error: message, seedSource: state.seed.source, attempts: state.attempts });
                    return { scenario: scene.scenario, status: "failed", error: message, seedSource: state.seed.source, attempts: state.attempts };
                }

                logger.warn({
                    scenario: scene.scenario,
                    error: message,
                    reason: action.reason,
                    nextSeed: action.seed.source,
                    delayMs: action.delayMs,
                }, "Seed transfer failed. Retrying...");
                if (action.delayMs > 0) await sleep(action.delayMs);
                state = applySeedAction(state, action);
            }
        }
    }

    private async attempt(scene: ChainScene, seed: SeedChoice, report: SceneReporter): Promise<string> {
        const taskId = await this.client.submitVideo(scene.prompt, scene.durationSeconds, seed.handle);
        report(scene.scenario, { progress: PROGRESS.submitted });

        const resultUri = await waitForTask(this.client, taskId, {
            intervalMs: this.options.pollIntervalMs,
            timeoutMs: this.options.pollTimeoutMs,
            label: `video generation for ${scene.scenario}`,
            onProgress: (poll) => {
                if (poll.progress === undefined) return;
                const span = PROGRESS.generated - PROGRESS.submitted;
                report(scene.scenario, { progress: PROGRESS.submitted + Math.floor(span * poll.progress / 100) });
            },
        });
        report(scene.scenario, { progress: PROGRESS.generated });

        const videoPath = scene.clipPath;
        await this.client.download(resultUri, videoPath);
        report(scene.scenario, { progress: PROGRESS.downloaded });
        return videoPath;
    }

    /**
     * Extracts and registers the clip's last frame. A failure here only costs the next
     * scene its continuity seed.
     */
    private async registerContinuityFrame(scene: ChainScene, videoPath: string): Promise<string | undefined> {
        const { scenario } = scene;
        try {
            const framePath = path.join(path.dirname(scene.clipPath), `${scenario}_last_frame.png`);
            await this.transcoder.extractLastFrame(videoPath, framePath);
            const token = await this.client.uploadReference(framePath);
            logger.info({ scenario, framePath }, `Continuity frame registered. Waiting ${this.options.settleDelayMs / 1000}s before use`);
            if (this.options.settleDelayMs > 0) await sleep(this.options.settleDelayMs);
            return token;
        } catch (error) {
            logger.warn({ scenario, error: extractErrorMessage(error) }, "Could not register continuity frame; next scene falls back to its static image");
            return undefined;
        }
    }
}
