import path from "path";
import { AssemblyMode, CrossfadeClip, MediaTranscoder } from "../../shared/types/index.js";
import { expectedCrossfadeDuration } from "../../shared/utils/crossfade.js";
import { AssemblyError, extractErrorMessage } from "../../shared/utils/errors.js";
import { roundTo } from "../../shared/utils/utils.js";
import { logger } from "../../shared/logger.js";



export interface AssemblyInput {
    scenario: string;
    videoPath: string;
    audioPath?: string;
}

export interface AssemblyPlanEntry extends CrossfadeClip {
    scenario: string;
    merged: boolean;
}

export interface AssemblyResult {
    finalVideoPath: string;
    durationSeconds: number;
    mode: AssemblyMode;
    plan: AssemblyPlanEntry[];
}

export interface AssemblyEngineOptions {
    workDir: string;
    transitionSeconds: number;
}

/**
 * Merges each scene's audio into its clip, then joins the clips in order with timed
 * crossfades computed from measured durations. A rejected crossfade falls back to a
 * cut-based lossless concat.
 */
export class AssemblyEngine {

    constructor(
        private transcoder: MediaTranscoder,
        private options: AssemblyEngineOptions,
    ) { }

    async assemble(inputs: readonly AssemblyInput[], outputPath: string): Promise<AssemblyResult> {
        if (inputs.length === 0) {
            throw new AssemblyError("No scene clips to assemble");
        }

        const plan = await this.buildPlan(inputs);

        if (plan.length === 1) {
            const [ only ] = plan;
            logger.info({ scenario: only.scenario, path: only.path }, "Single scene; using its clip as the final video");
            return { finalVideoPath: only.path, durationSeconds: only.durationSeconds, mode: "single", plan };
        }

        const { transitionSeconds } = this.options;
        try {
            await this.transcoder.concatCrossfade(plan.map(entry => ({ path: entry.path, durationSeconds: entry.durationSeconds, hasAudio: entry.hasAudio })), transitionSeconds, outputPath);
            const expected = expectedCrossfadeDuration(plan.map(entry => entry.durationSeconds), transitionSeconds);
            const durationSeconds = await this.measure(outputPath, expected);
            logger.info({ outputPath, durationSeconds, expected }, "Crossfade assembly completed");
            return { finalVideoPath: outputPath, durationSeconds, mode: "crossfade", plan };
        } catch (crossfadeError) {
            logger.warn({ error: extractErrorMessage(crossfadeError) }, "Crossfade assembly failed; falling back to lossless concatenation");

            try {
                await this.transcoder.concatLossless(plan.map(entry => entry.path), outputPath);
            } catch (losslessError) {
                throw new AssemblyError(
                    `Assembly failed: ${extractErrorMessage(losslessError)}`,
                    { crossfadeError: extractErrorMessage(crossfadeError) },
                    losslessError,
                );
            }

            const expected = roundTo(plan.reduce((sum, entry) => sum + entry.durationSeconds, 0), 6);
            const durationSeconds = await this.measure(outputPath, expected);
            logger.info({ outputPath, durationSeconds }, "Lossless assembly completed");
            return { finalVideoPath: outputPath, durationSeconds, mode: "lossless", plan };
        }
    }

    /**
     * Step A plus measurement. A scene whose merge fails, or that has no audio, is
     * carried forward as video only.
     */
    private async buildPlan(inputs: readonly AssemblyInput[]): Promise<AssemblyPlanEntry[]> {
        const clips = await Promise.all(inputs.map(async (input) => {
            if (!input.audioPath) {
                return { scenario: input.scenario, path: input.videoPath, merged: false };
            }
            const mergedPath = path.join(this.options.workDir, `${input.scenario}_with_audio.mp4`);
            try {
                await this.transcoder.merge(input.videoPath, input.audioPath, mergedPath);
                return { scenario: input.scenario, path: mergedPath, merged: true };
            } catch (error) {
                logger.warn({ scenario: input.scenario, error: extractErrorMessage(error) }, "Audio merge failed; keeping video-only clip");
                return { scenario: input.scenario, path: input.videoPath, merged: false };
            }
        }));

        return Promise.all(clips.map(async (clip) => {
            const probe = await this.transcoder.probe(clip.path);
            return { ...clip, durationSeconds: probe.durationSeconds, hasAudio: probe.hasAudio };
        }));
    }

    private async measure(filePath: string, expected: number): Promise<number> {
        try {
            const { durationSeconds } = await this.transcoder.probe(filePath);
            return durationSeconds > 0 ? durationSeconds : expected;
        } catch (error) {
            logger.warn({ filePath, error: extractErrorMessage(error) }, "Could not measure final video; reporting the computed duration");
            return expected;
        }
    }
}
